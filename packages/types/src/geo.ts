/**
 * Geometric utility types.
 */

/** Planar coordinate of a place on a road map */
export interface Coordinate {
  x: number;
  y: number;
}
