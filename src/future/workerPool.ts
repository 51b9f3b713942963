/**
 * @fileoverview Bounded worker pool
 *
 * Runs submitted work with at most `maxParallel` items in flight. Work
 * waits in FIFO order for a free slot; its future is `pending` while queued
 * and `running` once it holds a slot.
 *
 * @module future/workerPool
 */

import { Logger } from '../core/logger';
import { Future } from './future';

const log = Logger.for('runner');

interface QueuedWork {
  future: Future<unknown>;
  start: () => Promise<void>;
}

export class WorkerPool {
  private readonly queue: QueuedWork[] = [];
  private active = 0;
  private idleWaiters: Array<() => void> = [];

  constructor(readonly maxParallel: number) {
    if (!Number.isInteger(maxParallel) || maxParallel < 1) {
      throw new RangeError(`maxParallel must be a positive integer, got ${maxParallel}`);
    }
  }

  /** Work currently holding a slot. */
  get running(): number {
    return this.active;
  }

  /** Work waiting for a slot. */
  get queued(): number {
    return this.queue.length;
  }

  /**
   * Queue `work`; the returned future adopts its value or error.
   */
  submit<T>(label: string, work: () => T | Promise<T>): Future<T> {
    const future = new Future<T>(label);
    const start = async (): Promise<void> => {
      try {
        future.setResult(await work());
      } catch (error) {
        future.setError(error);
      }
    };
    this.queue.push({ future, start });
    this.pump();
    return future;
  }

  /**
   * Resolve once nothing is running or queued.
   */
  onIdle(): Promise<void> {
    if (this.active === 0 && this.queue.length === 0) {
      return Promise.resolve();
    }
    return new Promise(resolve => this.idleWaiters.push(resolve));
  }

  private pump(): void {
    while (this.active < this.maxParallel && this.queue.length > 0) {
      const next = this.queue.shift();
      if (!next) {
        break;
      }
      this.active++;
      next.future.markRunning();
      log.debug(`Starting '${next.future.label}' (${this.active}/${this.maxParallel} slots, ${this.queue.length} queued)`);
      void next.start().finally(() => {
        this.active--;
        this.pump();
        this.notifyIdle();
      });
    }
  }

  private notifyIdle(): void {
    if (this.active > 0 || this.queue.length > 0) {
      return;
    }
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    waiters.forEach(resolve => resolve());
  }
}
