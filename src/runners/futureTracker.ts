/**
 * @fileoverview Bookkeeping of the futures a runner has handed out.
 *
 * A future that succeeds is forgotten as soon as it settles. Failures are
 * kept, in run order, until {@link FutureTracker.drain} reports them, so a
 * long-lived runner holds on to nothing but unsettled work and unreported
 * errors.
 *
 * @module runners/futureTracker
 */

import type { Future } from '../future/future';

export interface DrainReport {
  /** Futures settled since the last drain */
  total: number;
  /** The failed ones, in the order they were run */
  failures: Future<unknown>[];
}

export class FutureTracker {
  private readonly outstanding = new Set<Future<unknown>>();
  private failures: Array<{ order: number; future: Future<unknown> }> = [];
  private runs = 0;
  private succeeded = 0;

  track(future: Future<unknown>): void {
    const order = this.runs++;
    this.outstanding.add(future);
    future.addDoneCallback(done => {
      this.outstanding.delete(done);
      if (done.settled().state === 'failed') {
        this.failures.push({ order, future: done });
      } else {
        this.succeeded++;
      }
    });
  }

  /** Unsettled futures plus unreported failures. */
  get size(): number {
    return this.outstanding.size + this.failures.length;
  }

  /**
   * Wait for every tracked future, then report and forget them.
   */
  async drain(): Promise<DrainReport> {
    await Promise.all([...this.outstanding].map(future => future.whenSettled()));
    const failures = this.failures.sort((a, b) => a.order - b.order).map(entry => entry.future);
    const total = this.succeeded + failures.length;
    this.failures = [];
    this.succeeded = 0;
    return { total, failures };
  }
}
