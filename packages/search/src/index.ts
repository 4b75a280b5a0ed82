/**
 * @roadsearch/search
 *
 * A small generic graph-search framework with a road-map route domain.
 *
 * Key concepts:
 * - SearchProblem: initial state, goal test, actions, transitions, costs
 * - SearchNode: parent-linked search tree with path reconstruction
 * - Expansion: children of a node through the problem's actions
 * - Breadth-first search: FIFO frontier with a reached set
 * - RoadMap / RouteProblem: weighted place graph and route finding over it
 *
 * Pipeline:
 * 1. Load or declare links -> RoadMap
 * 2. RoadMap + start + goal -> RouteProblem
 * 3. breadthFirstSearch(problem) -> SearchOutcome
 * 4. pathStates / summarizeRoute -> presentable route
 */

export * from "./errors.js";

// Domain types
export * from "./domain/index.js";

// Modules
export * from "./search/index.js";
export * from "./maps/index.js";
export * from "./export/index.js";
