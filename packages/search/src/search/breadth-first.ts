/**
 * Breadth-first search.
 *
 * Expands nodes in the order they were generated, so the tree is explored
 * level by level. A child is goal-tested as soon as it is generated, and a
 * state enters the frontier at most once: the first path to reach a state
 * is the one kept.
 *
 * The returned path has the fewest links of any path to a goal. Link
 * weights play no part in the choice; the reported path cost is just the
 * sum of the weights along that path, which may be more than the cheapest
 * route.
 */

import type { SearchStats } from "@roadsearch/types";
import { keyOf, type SearchProblem } from "../domain/problem.js";
import { SearchNode } from "../domain/node.js";
import { failure, found, type SearchOutcome } from "../domain/outcome.js";
import { expand } from "./expand.js";
import { FifoQueue } from "./fifo-queue.js";

export function breadthFirstSearch<S, A>(problem: SearchProblem<S, A>): SearchOutcome<S, A> {
  const root = new SearchNode<S, A>(problem.initial);
  const stats: SearchStats = { nodesExpanded: 0, nodesGenerated: 1, peakFrontier: 0 };

  if (problem.isGoal(root.state)) {
    return found(root, stats);
  }

  const frontier = new FifoQueue<SearchNode<S, A>>();
  frontier.push(root);
  stats.peakFrontier = 1;
  const reached = new Set<unknown>([keyOf(problem, root.state)]);

  for (let node = frontier.shift(); node; node = frontier.shift()) {
    stats.nodesExpanded++;
    for (const child of expand(problem, node)) {
      stats.nodesGenerated++;
      if (problem.isGoal(child.state)) {
        return found(child, stats);
      }
      const key = keyOf(problem, child.state);
      if (!reached.has(key)) {
        reached.add(key);
        frontier.push(child);
        stats.peakFrontier = Math.max(stats.peakFrontier, frontier.size);
      }
    }
  }

  return failure(stats);
}
