/**
 * Route results - the summarized output of a route search.
 */

import type { Place } from "./graph.js";

/** Counters collected while a search runs */
export interface SearchStats {
  /** Nodes taken off the frontier and expanded */
  nodesExpanded: number;
  /** Nodes created, including the root */
  nodesGenerated: number;
  /** Largest frontier size observed */
  peakFrontier: number;
}

/** Plain-data view of a route search outcome */
export interface RouteSummary {
  found: boolean;
  /** The goal place reached, or null when no route exists */
  goal: Place | null;
  /** Places from start to goal (empty when no route exists) */
  path: Place[];
  /** Moves taken along the path (one fewer than `path`) */
  actions: Place[];
  /** Sum of link distances along the path, or null when no route exists */
  totalDistance: number | null;
  stats: SearchStats;
}
