/**
 * Search outcomes.
 *
 * A search either finds a goal node, exhausts the reachable space
 * (`failure`), or is truncated by a depth limit (`cutoff`). Failure and
 * cutoff carry no node; their path cost is infinite.
 */

import type { SearchStats } from "@roadsearch/types";
import type { SearchNode } from "./node.js";

export interface FoundOutcome<S, A> {
  kind: "found";
  node: SearchNode<S, A>;
  pathCost: number;
  stats: SearchStats;
}

export interface FailureOutcome {
  kind: "failure";
  state: "failure";
  pathCost: number;
  stats: SearchStats;
}

/** Reserved for depth-limited algorithms */
export interface CutoffOutcome {
  kind: "cutoff";
  state: "cutoff";
  pathCost: number;
  stats: SearchStats;
}

export type SearchOutcome<S, A> = FoundOutcome<S, A> | FailureOutcome | CutoffOutcome;

export function found<S, A>(node: SearchNode<S, A>, stats: SearchStats): FoundOutcome<S, A> {
  return { kind: "found", node, pathCost: node.pathCost, stats };
}

export function failure(stats: SearchStats): FailureOutcome {
  return { kind: "failure", state: "failure", pathCost: Infinity, stats };
}

export function cutoff(stats: SearchStats): CutoffOutcome {
  return { kind: "cutoff", state: "cutoff", pathCost: Infinity, stats };
}

export function isFound<S, A>(outcome: SearchOutcome<S, A>): outcome is FoundOutcome<S, A> {
  return outcome.kind === "found";
}
