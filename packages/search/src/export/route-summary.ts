/**
 * Route summaries for display and transport.
 */

import type { Place, RouteSummary } from "@roadsearch/types";
import { pathActions, pathStates } from "../domain/node.js";
import { isFound, type SearchOutcome } from "../domain/outcome.js";

/** Line printed when a search ends without reaching a goal */
export const NO_ROUTE_LINE = "No route found";

/** Convert a route search outcome into plain data. */
export function summarizeRoute(outcome: SearchOutcome<Place, Place>): RouteSummary {
  if (!isFound(outcome)) {
    return {
      found: false,
      goal: null,
      path: [],
      actions: [],
      totalDistance: null,
      stats: { ...outcome.stats },
    };
  }
  return {
    found: true,
    goal: outcome.node.state,
    path: pathStates(outcome.node),
    actions: pathActions(outcome.node),
    totalDistance: outcome.pathCost,
    stats: { ...outcome.stats },
  };
}

/**
 * Printable lines for an outcome:
 *
 *     GoalStateWithPath:Thiruvarur
 *     [Thanjavur, Ayyampettai, ..., Thiruvarur]
 *     Total Distance=91 Kilometers
 */
export function formatRouteSummary<S, A>(outcome: SearchOutcome<S, A>): string[] {
  if (!isFound(outcome)) {
    return [NO_ROUTE_LINE];
  }
  const states = pathStates(outcome).map((state) => String(state));
  return [
    `GoalStateWithPath:${String(outcome.node.state)}`,
    `[${states.join(", ")}]`,
    `Total Distance=${outcome.pathCost} Kilometers`,
  ];
}
