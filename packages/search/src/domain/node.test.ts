import { describe, it, expect } from "vitest";
import { SearchNode, compareByPathCost, pathActions, pathStates } from "./node.js";
import { cutoff, failure, found } from "./outcome.js";

const NO_STATS = { nodesExpanded: 0, nodesGenerated: 0, peakFrontier: 0 };

function chain(): SearchNode<string, string> {
  const a = new SearchNode<string, string>("A");
  const b = new SearchNode("B", a, "to-B", 2);
  const c = new SearchNode("C", b, "to-C", 5);
  return new SearchNode("D", c, "to-D", 6);
}

describe("SearchNode", () => {
  it("defaults to a root with zero cost", () => {
    const root = new SearchNode<string, string>("A");

    expect(root.parent).toBeUndefined();
    expect(root.action).toBeUndefined();
    expect(root.pathCost).toBe(0);
    expect(root.depth).toBe(0);
  });

  it("counts ancestors as depth", () => {
    const d = chain();

    expect(d.depth).toBe(3);
    expect(d.parent?.depth).toBe(2);
  });

  it("renders its state", () => {
    expect(chain().toString()).toBe("<D>");
  });

  it("orders nodes by path cost only", () => {
    const root = new SearchNode<string, string>("A");
    const nodes = [
      new SearchNode("X", root, "x", 7),
      new SearchNode("Y", root, "y", 1),
      new SearchNode("Z", root, "z", 3),
    ];

    expect([...nodes].sort(compareByPathCost).map((n) => n.state)).toEqual(["Y", "Z", "X"]);
  });
});

describe("pathActions", () => {
  it("returns the actions from the root in order", () => {
    expect(pathActions(chain())).toEqual(["to-B", "to-C", "to-D"]);
  });

  it("returns nothing for the root", () => {
    expect(pathActions(new SearchNode("A"))).toEqual([]);
  });

  it("keeps actions that are undefined", () => {
    const root = new SearchNode<string, string | undefined>("A");
    const b = new SearchNode("B", root, undefined, 1);
    const c = new SearchNode("C", b, "to-C", 2);

    expect(pathActions(c)).toEqual([undefined, "to-C"]);
    expect(pathActions(c)).toHaveLength(pathStates(c).length - 1);
  });
});

describe("pathStates", () => {
  it("returns the states from the root in order", () => {
    expect(pathStates(chain())).toEqual(["A", "B", "C", "D"]);
  });

  it("follows the node of a found outcome", () => {
    expect(pathStates(found(chain(), NO_STATS))).toEqual(["A", "B", "C", "D"]);
  });

  it("returns nothing for missing values and terminal outcomes", () => {
    expect(pathStates(undefined)).toEqual([]);
    expect(pathStates(null)).toEqual([]);
    expect(pathStates(failure(NO_STATS))).toEqual([]);
    expect(pathStates(cutoff(NO_STATS))).toEqual([]);
  });

  it("handles trees deeper than the call stack would allow recursively", () => {
    let node = new SearchNode<number, number>(0);
    for (let i = 1; i <= 100_000; i++) {
      node = new SearchNode(i, node, i, i);
    }

    const states = pathStates(node);
    expect(states).toHaveLength(100_001);
    expect(states[0]).toBe(0);
    expect(states[100_000]).toBe(100_000);
    expect(pathActions(node)).toHaveLength(100_000);
  });
});

describe("outcomes", () => {
  it("marks failure and cutoff with a tag and infinite cost", () => {
    expect(failure(NO_STATS)).toEqual({ kind: "failure", state: "failure", pathCost: Infinity, stats: NO_STATS });
    expect(cutoff(NO_STATS)).toEqual({ kind: "cutoff", state: "cutoff", pathCost: Infinity, stats: NO_STATS });
  });

  it("carries the node's cost on a found outcome", () => {
    expect(found(chain(), NO_STATS).pathCost).toBe(6);
  });
});
