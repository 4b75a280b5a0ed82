/**
 * Link and map-file shapes for weighted road maps.
 *
 * A road map is declared as a list of links between named places. Links
 * may carry an explicit distance or leave it out, in which case the map
 * treats the link as one unit long.
 */

import type { Coordinate } from "./geo.js";

/** A named position on a road map (a town, junction, etc.) */
export type Place = string;

/** A link declared without a distance (weight 1) */
export type UnweightedLink = readonly [from: Place, to: Place];

/** A link declared as a `[from, to, distance]` triple */
export type WeightedTriple = readonly [from: Place, to: Place, distance: number];

/** A link declared as an object */
export interface WeightedLink {
  from: Place;
  to: Place;
  /** Positive distance between the two places */
  distance: number;
}

/** Any accepted way of declaring one link */
export type LinkSpec = UnweightedLink | WeightedTriple | WeightedLink;

/**
 * A road map as stored on disk under `configs/maps/<name>.json`.
 */
export interface MapFile {
  name: string;
  description: string;
  /** Links are one-way when true; mirrored otherwise (default false) */
  directed?: boolean;
  links: WeightedTriple[];
  /** Optional coordinates per place; unknown places sit at the origin */
  locations?: Record<Place, Coordinate>;
}

/** Listing entry for an available map */
export interface MapInfo {
  name: string;
  description: string;
}
