/**
 * Search module.
 *
 * Expansion turns a node into its children through the problem's
 * actions; the algorithms decide which node to expand next.
 *
 * Problem -> breadthFirstSearch -> SearchOutcome
 */

export * from "./fifo-queue.js";
export * from "./expand.js";
export * from "./breadth-first.js";
