/**
 * @fileoverview Dry runner
 *
 * Checks a workflow without running it. Each closure's parameters are
 * validated and its future resolves with the target's mock result, so
 * downstream closures see mock values where real results would be.
 *
 * @module runners/dryRunner
 */

import { Logger } from '../core/logger';
import { ConfigurationError, describeError } from '../core/errors';
import { Future, failedFuture, resolvedFuture } from '../future/future';
import { WaitGraph } from '../future/waitGraph';
import type { WaitFuture } from '../future/waitGraph';
import type { IRunner } from '../interfaces/IRunner';
import type { Closure } from '../workflow/closure';
import { validateParameters } from '../workflow/validation';
import { FutureTracker } from './futureTracker';

const log = Logger.for('runner');

export class DryRunner implements IRunner {
  private readonly graph = new WaitGraph();
  private readonly tracker = new FutureTracker();

  run<T>(closure: Closure<T>): Future<T> {
    const label = closure.describe();
    let future: Future<T>;
    try {
      const call = closure.materializeNow();
      validateParameters(closure.target, call.args, call.kwargs);
      const mock = closure.target.resultMock(call.args, call.kwargs);
      if (mock === undefined) {
        throw new ConfigurationError(`'${label}' has no result mock for a dry run`);
      }
      log.info(`Dry run: ${label}`);
      future = resolvedFuture<T>(mock, label);
    } catch (error) {
      log.warn(`Dry run: ${label} rejected`, { error: describeError(error) });
      future = failedFuture<T>(error, label);
    }
    this.tracker.track(future);
    return future;
  }

  waitAll(futures: readonly Future<unknown>[]): WaitFuture<unknown[]> {
    return this.graph.submit(futures, undefined, values => values);
  }

  /**
   * @throws the first validation failure of the run
   */
  async shutdown(): Promise<void> {
    const { failures } = await this.tracker.drain();
    const settlement = failures[0]?.settled();
    if (settlement?.state === 'failed') {
      throw settlement.error;
    }
  }
}
