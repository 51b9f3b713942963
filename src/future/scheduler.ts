/**
 * @fileoverview Scheduler for deferred dispatch.
 *
 * A {@link ScheduledFuture} is registered in the wait graph behind a wait
 * future over its dependencies. When that wait future completes, the
 * scheduler starts the dispatch and the scheduled future adopts its value
 * or error. A failed dependency fails the scheduled future without any
 * dispatch.
 *
 * @module future/scheduler
 */

import { Logger } from '../core/logger';
import { SchedulerClosedError } from '../core/errors';
import { Future } from './future';
import type { WaitFuture } from './waitGraph';
import { WaitGraph } from './waitGraph';

const log = Logger.for('scheduler');

/**
 * Future whose computation starts once its dependencies are terminal.
 */
export class ScheduledFuture<T> extends Future<T> {
  constructor(label: string, readonly dependencies: WaitFuture<void>) {
    super(label);
  }
}

/** Starts the deferred computation and returns its future. */
export type StartFn<T> = () => Future<T>;

export class Scheduler {
  private closed = false;
  private readonly inflight = new Set<Future<unknown>>();
  private drainWaiters: Array<() => void> = [];

  constructor(private readonly graph: WaitGraph) {}

  /** Scheduled futures not yet terminal. */
  get inflightCount(): number {
    return this.inflight.size;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Register a deferred computation. Returns immediately; `start` runs
   * once every dependency is done.
   *
   * @throws SchedulerClosedError after {@link shutdown}
   */
  submit<T>(label: string, dependencies: readonly Future<unknown>[], start: StartFn<T>): ScheduledFuture<T> {
    if (this.closed) {
      throw new SchedulerClosedError();
    }

    const waitFor = this.graph.submit(dependencies, `deps(${label})`);
    const scheduled = new ScheduledFuture<T>(label, waitFor);
    this.graph.track(scheduled, waitFor);

    this.inflight.add(scheduled);
    scheduled.addDoneCallback(done => {
      this.inflight.delete(done);
      this.notifyDrained();
    });

    log.debug(`Scheduled '${label}' after ${dependencies.length} futures`);
    waitFor.addDoneCallback(() => this.release(scheduled, start));
    return scheduled;
  }

  /**
   * Resolve once no scheduled future is waiting or in flight.
   */
  drain(): Promise<void> {
    if (this.inflight.size === 0) {
      return Promise.resolve();
    }
    return new Promise(resolve => this.drainWaiters.push(resolve));
  }

  /**
   * Refuse further submissions and wait for the scheduled work to finish.
   */
  async shutdown(): Promise<void> {
    if (!this.closed) {
      this.closed = true;
      log.debug(`Shutting down with ${this.inflight.size} scheduled futures in flight`);
    }
    await this.drain();
  }

  private release<T>(scheduled: ScheduledFuture<T>, start: StartFn<T>): void {
    const outcome = scheduled.dependencies.settled();
    if (outcome.state === 'failed') {
      log.debug(`Not dispatching '${scheduled.label}': dependency failed`);
      scheduled.setError(outcome.error);
      return;
    }

    let work: Future<T>;
    try {
      work = start();
    } catch (error) {
      scheduled.setError(error);
      return;
    }

    scheduled.markRunning();
    work.addDoneCallback(done => {
      const settlement = done.settled();
      if (settlement.state === 'done') {
        scheduled.setResult(settlement.value);
      } else {
        scheduled.setError(settlement.error);
      }
    });
  }

  private notifyDrained(): void {
    if (this.inflight.size > 0) {
      return;
    }
    const waiters = this.drainWaiters;
    this.drainWaiters = [];
    waiters.forEach(resolve => resolve());
  }
}
