/**
 * @fileoverview Write-once future.
 *
 * A Future leaves `pending` exactly once through a single writer. Readers
 * either await {@link Future.wait}, register a done callback, or read the
 * value synchronously once the future is terminal.
 *
 * @module future/future
 */

import { v4 as uuidv4 } from 'uuid';
import { Logger } from '../core/logger';
import { FutureNotDoneError, FutureStateError } from '../core/errors';
import type { FutureState } from './types';
import { isTerminalFutureState, isValidFutureTransition } from './types';

const log = Logger.for('graph');

/** Callback invoked once a future is terminal. */
export type DoneCallback<T> = (future: Future<T>) => void;

/** Terminal outcome of a future. */
export type Settlement<T> =
  | { state: 'done'; value: T }
  | { state: 'failed'; error: unknown };

export class Future<T = unknown> {
  readonly id: string = uuidv4();
  private _state: FutureState = 'pending';
  private settlement?: Settlement<T>;
  private callbacks: DoneCallback<T>[] = [];

  constructor(readonly label: string = 'future') {}

  get state(): FutureState {
    return this._state;
  }

  /** True once the future is done or failed. */
  isDone(): boolean {
    return isTerminalFutureState(this._state);
  }

  /**
   * Mark the computation as started. Ignored once running.
   */
  markRunning(): void {
    if (this._state === 'running') {
      return;
    }
    this.transition('running');
  }

  setResult(value: T): void {
    this.transition('done');
    this.settle({ state: 'done', value });
  }

  setError(error: unknown): void {
    this.transition('failed');
    this.settle({ state: 'failed', error });
  }

  /**
   * Read the value synchronously.
   *
   * @throws FutureNotDoneError while the future is not terminal
   * @throws the stored error when the future failed
   */
  result(): T {
    const settlement = this.settled();
    if (settlement.state === 'failed') {
      throw settlement.error;
    }
    return settlement.value;
  }

  /**
   * The stored error, or undefined when the future succeeded.
   *
   * @throws FutureNotDoneError while the future is not terminal
   */
  error(): unknown {
    const settlement = this.settled();
    return settlement.state === 'failed' ? settlement.error : undefined;
  }

  /**
   * Terminal outcome.
   *
   * @throws FutureNotDoneError while the future is not terminal
   */
  settled(): Settlement<T> {
    if (!this.settlement) {
      throw new FutureNotDoneError(this.label);
    }
    return this.settlement;
  }

  /**
   * Register a callback for completion. Runs immediately when the future
   * is already terminal.
   */
  addDoneCallback(callback: DoneCallback<T>): void {
    if (this.settlement) {
      this.invoke(callback);
      return;
    }
    this.callbacks.push(callback);
  }

  /**
   * Resolve with the value or reject with the error once terminal.
   */
  wait(): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.addDoneCallback(future => {
        const settlement = future.settled();
        if (settlement.state === 'done') {
          resolve(settlement.value);
        } else {
          reject(settlement.error);
        }
      });
    });
  }

  /**
   * Resolve with the terminal outcome, whatever it is. Never rejects.
   */
  whenSettled(): Promise<Settlement<T>> {
    return new Promise<Settlement<T>>(resolve => {
      this.addDoneCallback(future => resolve(future.settled()));
    });
  }

  toString(): string {
    return `Future(${this.label}, ${this._state})`;
  }

  private transition(to: FutureState): void {
    if (!isValidFutureTransition(this._state, to)) {
      throw new FutureStateError(`Invalid transition for future '${this.label}': ${this._state} -> ${to}`);
    }
    this._state = to;
  }

  private settle(settlement: Settlement<T>): void {
    this.settlement = settlement;
    const callbacks = this.callbacks;
    this.callbacks = [];
    for (const callback of callbacks) {
      this.invoke(callback);
    }
  }

  private invoke(callback: DoneCallback<T>): void {
    try {
      callback(this);
    } catch (error) {
      log.error(`Done callback of future '${this.label}' threw`, error);
    }
  }
}

/**
 * A future that is already done.
 */
export function resolvedFuture<T>(value: T, label?: string): Future<T> {
  const future = new Future<T>(label);
  future.setResult(value);
  return future;
}

/**
 * A future that has already failed.
 */
export function failedFuture<T = never>(error: unknown, label?: string): Future<T> {
  const future = new Future<T>(label);
  future.setError(error);
  return future;
}

/**
 * Check if a value is a Future.
 */
export function isFuture(value: unknown): value is Future<unknown> {
  return value instanceof Future;
}
