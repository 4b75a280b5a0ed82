/**
 * @roadsearch/types
 *
 * Shared data types for the road-map search framework.
 *
 * - Graph: places, links and map files
 * - Route: the summarized result of a route search
 * - Geo: planar coordinates
 */

export * from "./graph.js";
export * from "./route.js";
export * from "./geo.js";
