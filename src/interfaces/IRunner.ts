/**
 * @fileoverview Interface for closure runners.
 *
 * @module interfaces/IRunner
 */

import type { Future } from '../future/future';
import type { Closure } from '../workflow/closure';

/**
 * Runs closures and hands back futures of their results.
 *
 * @example
 * ```typescript
 * const a = runner.run(call(add, [2, 3]));
 * const b = runner.run(call(add, [a, 3], {}, { schedule: true }));
 * await runner.shutdown();
 * ```
 */
export interface IRunner {
  /**
   * Start or schedule a closure. Never waits for it.
   */
  run<T>(closure: Closure<T>): Future<T>;

  /**
   * Future of every listed future's value, in order. Fails with the first
   * failed future's error.
   */
  waitAll(futures: readonly Future<unknown>[]): Future<unknown[]>;

  /**
   * Wait for everything run so far.
   *
   * @throws the first error among the futures this runner produced
   */
  shutdown(): Promise<void>;
}
