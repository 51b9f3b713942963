/**
 * @fileoverview Serial runner
 *
 * Runs one closure at a time in submission order, without a pool. A
 * synchronous task whose arguments are ready runs inside `run` when nothing
 * else is queued, so its future is already done when `run` returns.
 * Everything else is chained behind the previous closure.
 *
 * @module runners/serialRunner
 */

import { Logger } from '../core/logger';
import { SchedulerClosedError } from '../core/errors';
import { isPromise } from '../core/utils';
import { Future } from '../future/future';
import { WaitGraph } from '../future/waitGraph';
import type { WaitFuture } from '../future/waitGraph';
import type { IRunner } from '../interfaces/IRunner';
import type { Closure } from '../workflow/closure';
import type { Dispatcher } from './dispatcher';
import { FutureTracker } from './futureTracker';

const log = Logger.for('runner');

export class SerialRunner implements IRunner {
  private readonly graph = new WaitGraph();
  private readonly tracker = new FutureTracker();
  private tail: Promise<void> = Promise.resolve();
  private queued = 0;
  private closed = false;

  constructor(private readonly dispatcher: Dispatcher) {}

  /**
   * @throws SchedulerClosedError after {@link shutdown}
   */
  run<T>(closure: Closure<T>): Future<T> {
    if (this.closed) {
      throw new SchedulerClosedError();
    }
    const future = new Future<T>(closure.describe());
    this.tracker.track(future);

    const target = closure.target;
    if (target.kind === 'task' && this.queued === 0 && closure.unresolved().length === 0) {
      future.markRunning();
      let value: T | Promise<T>;
      try {
        value = this.dispatcher.executeTask(target, closure.materializeNow());
      } catch (error) {
        future.setError(error);
        return future;
      }
      if (!isPromise(value)) {
        future.setResult(value);
        return future;
      }
      const pending = value;
      log.debug(`'${future.label}' continues asynchronously`);
      this.chain(async () => future.setResult(await pending), future);
      return future;
    }

    this.chain(async () => {
      const call = await closure.materialize();
      future.markRunning();
      future.setResult(await this.dispatcher.dispatch(closure, call));
    }, future);
    return future;
  }

  waitAll(futures: readonly Future<unknown>[]): WaitFuture<unknown[]> {
    return this.graph.submit(futures, undefined, values => values);
  }

  /**
   * Wait for the queue to empty, then rethrow the first error.
   */
  async shutdown(): Promise<void> {
    this.closed = true;
    await this.tail;
    const { failures } = await this.tracker.drain();
    const [first] = failures;
    const settlement = first?.settled();
    if (settlement?.state === 'failed') {
      log.error(`'${first.label}' failed`, settlement.error);
      throw settlement.error;
    }
  }

  private chain<T>(step: () => Promise<void>, future: Future<T>): void {
    this.queued++;
    this.tail = this.tail.then(async () => {
      try {
        await step();
      } catch (error) {
        future.setError(error);
      } finally {
        this.queued--;
      }
    });
  }
}
