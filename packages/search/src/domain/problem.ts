/**
 * The search-problem contract.
 *
 * A problem fixes an initial state and a goal, and tells the search which
 * actions are available in a state, where each action leads, and what it
 * costs. Algorithms only ever talk to a problem through this interface.
 */

import { NotImplementedError } from "../errors.js";

/** Fields every problem is constructed with */
export interface ProblemConfig<S> {
  initial: S;
  goal: S;
}

/** A search domain over states `S` and actions `A` */
export interface SearchProblem<S, A> {
  readonly initial: S;
  readonly goal: S;
  /**
   * Actions applicable in `state`. Must be finite and deterministic; the
   * order is the order in which children are generated.
   */
  actions(state: S): readonly A[];
  /** The state reached by taking `action` in `state` */
  result(state: S, action: A): S;
  isGoal(state: S): boolean;
  /** Cost of moving from `state` to `next` via `action`. Must be non-negative. */
  actionCost(state: S, action: A, next: S): number;
  /**
   * Identity of a state for duplicate detection. Problems whose states are
   * objects map them to a primitive here; otherwise the state is its own key.
   */
  stateKey?(state: S): unknown;
}

/** Duplicate-detection key of `state` under `problem` */
export function keyOf<S, A>(problem: SearchProblem<S, A>, state: S): unknown {
  return problem.stateKey ? problem.stateKey(state) : state;
}

/**
 * Base class for concrete problems.
 *
 * Supplies the default goal test (equality with `goal`) and unit action
 * cost. `actions` and `result` have no sensible default and throw until a
 * subclass overrides them.
 */
export abstract class Problem<S, A> implements SearchProblem<S, A> {
  readonly initial: S;
  readonly goal: S;

  constructor(config: ProblemConfig<S>) {
    this.initial = config.initial;
    this.goal = config.goal;
  }

  actions(_state: S): readonly A[] {
    throw new NotImplementedError(`${this.constructor.name}.actions`);
  }

  result(_state: S, _action: A): S {
    throw new NotImplementedError(`${this.constructor.name}.result`);
  }

  isGoal(state: S): boolean {
    return keyOf<S, A>(this, state) === keyOf<S, A>(this, this.goal);
  }

  actionCost(_state: S, _action: A, _next: S): number {
    return 1;
  }
}
