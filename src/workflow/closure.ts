/**
 * @fileoverview Deferred call description.
 *
 * A Closure pins down a target and its arguments. Containers in the
 * arguments are copied and frozen when the closure is built, so later
 * changes by the caller cannot leak into a call that runs after a delay.
 * Futures, and any other leaf, are kept by reference.
 *
 * @module workflow/closure
 */

import { Future } from '../future/future';
import { collectFutures, copyTree, freezeTree, transformTree } from '../future/tree';
import { toUpstreamFailure } from '../future/waitGraph';
import type { Args, Kwargs, Target } from './task';

export interface ClosureOptions {
  /**
   * Defer dispatch until unresolved Future arguments are done, instead of
   * starting it right away.
   */
  schedule?: boolean;
}

/** Arguments with every Future replaced by its value. */
export interface MaterializedCall {
  args: unknown[];
  kwargs: Record<string, unknown>;
}

export class Closure<T = unknown> {
  readonly args: Args;
  readonly kwargs: Kwargs;
  readonly schedule: boolean;

  constructor(
    readonly target: Target<T>,
    args: Args = [],
    kwargs: Kwargs = {},
    options: ClosureOptions = {},
  ) {
    this.args = freezeTree(args.map(arg => copyTree(arg)));
    this.kwargs = freezeTree(copyKwargs(kwargs));
    this.schedule = options.schedule ?? false;
    Object.freeze(this);
  }

  /** Label for futures and logs. */
  describe(): string {
    return this.target.describe(this.args, this.kwargs);
  }

  /** Distinct Futures in the arguments. */
  dependencies(): Future<unknown>[] {
    return collectFutures(this.args, this.kwargs);
  }

  /** Futures in the arguments that are not terminal yet. */
  unresolved(): Future<unknown>[] {
    return this.dependencies().filter(dep => !dep.isDone());
  }

  resultMock(): T | undefined {
    return this.target.resultMock(this.args, this.kwargs);
  }

  /**
   * Substitute Future values now.
   *
   * @throws FutureNotDoneError when a dependency is not terminal
   * @throws UpstreamFailureError when a dependency failed
   */
  materializeNow(): MaterializedCall {
    const substitute = (_path: unknown, leaf: unknown): unknown => {
      if (!(leaf instanceof Future)) {
        return leaf;
      }
      const settlement = leaf.settled();
      if (settlement.state === 'failed') {
        throw toUpstreamFailure(leaf, settlement.error);
      }
      return settlement.value;
    };

    return {
      args: this.args.map(arg => transformTree(substitute, arg)),
      kwargs: Object.fromEntries(
        Object.entries(this.kwargs).map(([key, value]) => [key, transformTree(substitute, value)]),
      ),
    };
  }

  /**
   * Wait for every dependency, then substitute their values.
   *
   * @throws UpstreamFailureError when a dependency failed
   */
  async materialize(): Promise<MaterializedCall> {
    for (const dep of this.dependencies()) {
      try {
        await dep.wait();
      } catch (error) {
        throw toUpstreamFailure(dep, error);
      }
    }
    return this.materializeNow();
  }

  toString(): string {
    return `Closure(${this.describe()})`;
  }
}

function copyKwargs(kwargs: Kwargs): Record<string, unknown> {
  return Object.fromEntries(Object.entries(kwargs).map(([key, value]) => [key, copyTree(value)]));
}

/**
 * Build a closure.
 *
 * @example
 * ```typescript
 * const a = runner.run(call(add, [2, 3]));
 * const b = runner.run(call(add, [a, 3], {}, { schedule: true }));
 * ```
 */
export function call<T>(target: Target<T>, args: Args = [], kwargs: Kwargs = {}, options: ClosureOptions = {}): Closure<T> {
  return new Closure(target, args, kwargs, options);
}
