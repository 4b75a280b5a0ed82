/**
 * Core domain types for the search framework.
 *
 * - Problem: the contract every search domain satisfies
 * - Node: the parent-linked search tree
 * - Outcome: what a search returns
 * - RoadMap / RouteProblem: the route-finding domain
 */

export * from "./problem.js";
export * from "./node.js";
export * from "./outcome.js";
export * from "./road-map.js";
export * from "./route-problem.js";
