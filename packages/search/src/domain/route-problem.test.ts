import { describe, it, expect } from "vitest";
import { RouteProblem } from "./route-problem.js";
import { RoadMap } from "./road-map.js";
import { MissingLinkError } from "../errors.js";

function makeMap(): RoadMap {
  return new RoadMap(
    [
      ["A", "B", 2],
      ["B", "C", 3],
      ["C", "D", 1],
    ],
    { locations: { A: { x: 0, y: 1 } } },
  );
}

describe("RouteProblem", () => {
  it("offers the neighbors of a place as actions", () => {
    const problem = new RouteProblem({ initial: "A", goal: "D", map: makeMap() });

    expect(problem.actions("B")).toEqual(["C", "A"]);
  });

  it("offers no actions at a place the map does not know", () => {
    const problem = new RouteProblem({ initial: "A", goal: "D", map: makeMap() });

    expect(problem.actions("Nowhere")).toEqual([]);
  });

  it("moves to the neighbor named by the action", () => {
    const problem = new RouteProblem({ initial: "A", goal: "D", map: makeMap() });

    expect(problem.result("B", "C")).toBe("C");
  });

  it("stays put when the action is not a neighbor", () => {
    const problem = new RouteProblem({ initial: "A", goal: "D", map: makeMap() });

    expect(problem.result("A", "D")).toBe("A");
    expect(problem.result("Nowhere", "A")).toBe("Nowhere");
  });

  it("charges the link distance", () => {
    const problem = new RouteProblem({ initial: "A", goal: "D", map: makeMap() });

    expect(problem.actionCost("B", "C", "C")).toBe(3);
    expect(problem.actionCost("C", "B", "B")).toBe(3);
  });

  it("throws when no link joins the two places", () => {
    const problem = new RouteProblem({ initial: "A", goal: "D", map: makeMap() });

    expect(() => problem.actionCost("A", "D", "D")).toThrow(MissingLinkError);
    try {
      problem.actionCost("A", "D", "D");
    } catch (err) {
      expect(err).toBeInstanceOf(MissingLinkError);
      if (err instanceof MissingLinkError) {
        expect(err.from).toBe("A");
        expect(err.to).toBe("D");
        expect(err.message).toBe('No link from "A" to "D"');
      }
    }
  });

  it("looks up place locations through the map", () => {
    const problem = new RouteProblem({ initial: "A", goal: "D", map: makeMap() });

    expect(problem.locationOf("A")).toEqual({ x: 0, y: 1 });
    expect(problem.locationOf("D")).toEqual({ x: 0, y: 0 });
  });

  it("shares one map between problems without changing it", () => {
    const map = makeMap();
    const there = new RouteProblem({ initial: "A", goal: "D", map });
    const back = new RouteProblem({ initial: "D", goal: "A", map });

    expect(there.map).toBe(back.map);
    expect(there.actions("C")).toEqual(["D", "B"]);
    expect(back.actions("C")).toEqual(["D", "B"]);
    expect(map.linkCount).toBe(6);
  });
});
