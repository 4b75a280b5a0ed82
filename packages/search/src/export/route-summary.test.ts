import { describe, it, expect } from "vitest";
import { formatRouteSummary, summarizeRoute, NO_ROUTE_LINE } from "./route-summary.js";
import { RoadMap } from "../domain/road-map.js";
import { RouteProblem } from "../domain/route-problem.js";
import { breadthFirstSearch } from "../search/breadth-first.js";
import { cutoff } from "../domain/outcome.js";

function chainMap(): RoadMap {
  return new RoadMap([
    ["A", "B", 2],
    ["B", "C", 3],
    ["C", "D", 1],
  ]);
}

describe("summarizeRoute", () => {
  it("summarizes a found route", () => {
    const outcome = breadthFirstSearch(new RouteProblem({ initial: "A", goal: "D", map: chainMap() }));

    expect(summarizeRoute(outcome)).toEqual({
      found: true,
      goal: "D",
      path: ["A", "B", "C", "D"],
      actions: ["B", "C", "D"],
      totalDistance: 6,
      stats: { nodesExpanded: 3, nodesGenerated: 5, peakFrontier: 1 },
    });
  });

  it("summarizes a failed search", () => {
    const map = new RoadMap([["A", "B", 1]]);
    const outcome = breadthFirstSearch(new RouteProblem({ initial: "A", goal: "Z", map }));

    expect(summarizeRoute(outcome)).toEqual({
      found: false,
      goal: null,
      path: [],
      actions: [],
      totalDistance: null,
      stats: { nodesExpanded: 2, nodesGenerated: 3, peakFrontier: 1 },
    });
  });
});

describe("formatRouteSummary", () => {
  it("prints the goal, the path and the total distance", () => {
    const outcome = breadthFirstSearch(new RouteProblem({ initial: "A", goal: "D", map: chainMap() }));

    expect(formatRouteSummary(outcome)).toEqual([
      "GoalStateWithPath:D",
      "[A, B, C, D]",
      "Total Distance=6 Kilometers",
    ]);
  });

  it("prints a single line when there is no route", () => {
    const stats = { nodesExpanded: 0, nodesGenerated: 0, peakFrontier: 0 };

    expect(formatRouteSummary(cutoff(stats))).toEqual([NO_ROUTE_LINE]);
    expect(NO_ROUTE_LINE).toBe("No route found");
  });
});
