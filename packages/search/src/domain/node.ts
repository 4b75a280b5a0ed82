/**
 * Search-tree nodes and path reconstruction.
 *
 * Each node records the state it stands for, the node it was generated
 * from, the action that led here and the accumulated path cost. A node
 * never changes after construction; children point at their parent, so a
 * chain of nodes is the path back to the root.
 */

import type { SearchOutcome } from "./outcome.js";

/** How a node was reached: the node it came from and the action taken there */
export interface SearchStep<S, A> {
  readonly parent: SearchNode<S, A>;
  readonly action: A;
}

/** A node in the search tree */
export class SearchNode<S, A> {
  readonly state: S;
  /** Absent on the root */
  readonly step?: SearchStep<S, A>;
  /** Sum of action costs from the root */
  readonly pathCost: number;
  /** Number of ancestors (0 for the root) */
  readonly depth: number;

  constructor(state: S, ...link: [] | [parent: SearchNode<S, A>, action: A, pathCost?: number]) {
    this.state = state;
    if (link.length === 0) {
      this.pathCost = 0;
      this.depth = 0;
    } else {
      const [parent, action, pathCost = 0] = link;
      this.step = { parent, action };
      this.pathCost = pathCost;
      this.depth = parent.depth + 1;
    }
  }

  get parent(): SearchNode<S, A> | undefined {
    return this.step?.parent;
  }

  /** Action taken in the parent's state to reach this one; undefined on the root */
  get action(): A | undefined {
    return this.step?.action;
  }

  toString(): string {
    return `<${String(this.state)}>`;
  }
}

/** Orders nodes by path cost alone, cheapest first */
export function compareByPathCost<S, A>(a: SearchNode<S, A>, b: SearchNode<S, A>): number {
  return a.pathCost - b.pathCost;
}

/** Actions from the root to `node`, in order. The root yields `[]`. */
export function pathActions<S, A>(node: SearchNode<S, A>): A[] {
  const actions: A[] = [];
  for (let step = node.step; step; step = step.parent.step) {
    actions.push(step.action);
  }
  return actions.reverse();
}

/**
 * States from the root to the given node, in order.
 *
 * Accepts a search outcome as well as a node: a found outcome yields its
 * node's path, while failure and cutoff outcomes (and a missing value)
 * yield `[]`.
 */
export function pathStates<S, A>(
  target: SearchNode<S, A> | SearchOutcome<S, A> | null | undefined,
): S[] {
  const node = target instanceof SearchNode ? target : target?.kind === "found" ? target.node : undefined;
  const states: S[] = [];
  for (let cur = node; cur; cur = cur.parent) {
    states.push(cur.state);
  }
  return states.reverse();
}
