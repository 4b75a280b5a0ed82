import type { SearchProblem } from "../domain/problem.js";
import { SearchNode } from "../domain/node.js";

/**
 * Children of `node`, one per action the problem allows in its state.
 *
 * Children are produced lazily in the order `problem.actions` lists the
 * actions. Each call starts over; nothing is cached, and neither the
 * problem nor the node is modified.
 */
export function* expand<S, A>(
  problem: SearchProblem<S, A>,
  node: SearchNode<S, A>,
): Generator<SearchNode<S, A>, void, undefined> {
  const state = node.state;
  for (const action of problem.actions(state)) {
    const next = problem.result(state, action);
    const cost = node.pathCost + problem.actionCost(state, action, next);
    yield new SearchNode(next, node, action, cost);
  }
}
