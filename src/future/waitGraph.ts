/**
 * @fileoverview Wait graph
 *
 * Tracks which futures wait on which. A {@link WaitFuture} completes when
 * every future it depends on is terminal; a failed dependency fails it
 * right away with an {@link UpstreamFailureError}, and that failure reaches
 * every transitive dependent without anything being dispatched.
 *
 * Registration and release are synchronous, so the event loop serializes
 * every graph mutation.
 *
 * Edges:
 * - `before`: waiter -> dependencies it still waits on
 * - `after`: dependency -> waiters to release when it finishes
 * - `derived`: future -> wait future it is started from
 *
 * @module future/waitGraph
 */

import { Logger } from '../core/logger';
import { DependencyCycleError, FutureStateError, UpstreamFailureError } from '../core/errors';
import { Future } from './future';

const log = Logger.for('graph');

/** Combines dependency values into the wait future's value. */
export type Digest<T> = (values: unknown[]) => T;

/**
 * Wrap a dependency failure for its dependents. An error that is already an
 * upstream failure is passed on unchanged, so a whole chain shares it.
 */
export function toUpstreamFailure(dependency: Future<unknown>, error: unknown): UpstreamFailureError {
  if (error instanceof UpstreamFailureError) {
    return error;
  }
  return new UpstreamFailureError(dependency.label, error);
}

/**
 * Future completed by the wait graph.
 */
export class WaitFuture<T> extends Future<T> {
  private readonly dependencies: Future<unknown>[] = [];

  constructor(label: string, private readonly digest: Digest<T>) {
    super(label);
  }

  /** Dependencies in registration order. */
  get waitingOn(): readonly Future<unknown>[] {
    return this.dependencies;
  }

  /** @internal */
  addDependencies(dependencies: readonly Future<unknown>[]): void {
    for (const dep of dependencies) {
      if (!this.dependencies.includes(dep)) {
        this.dependencies.push(dep);
      }
    }
  }

  /**
   * Complete from the current dependency states. The first failed
   * dependency in registration order decides the error.
   *
   * @internal
   */
  settleFromDependencies(): void {
    const failed = this.dependencies.find(dep => dep.state === 'failed');
    if (failed) {
      this.setError(toUpstreamFailure(failed, failed.error()));
      return;
    }

    let value: T;
    try {
      value = this.digest(this.dependencies.map(dep => dep.result()));
    } catch (error) {
      this.setError(error);
      return;
    }
    this.setResult(value);
  }
}

export class WaitGraph {
  private readonly before = new Map<Future<unknown>, Set<Future<unknown>>>();
  private readonly after = new Map<Future<unknown>, Set<WaitFuture<unknown>>>();
  private readonly derived = new Map<Future<unknown>, WaitFuture<unknown>>();

  /**
   * Create a future that completes once every dependency is terminal.
   * Duplicates are counted once; no dependencies completes immediately.
   */
  submit(dependencies: readonly Future<unknown>[], label?: string): WaitFuture<void>;
  submit<T>(dependencies: readonly Future<unknown>[], label: string | undefined, digest: Digest<T>): WaitFuture<T>;
  submit<T>(dependencies: readonly Future<unknown>[], label?: string, digest?: Digest<T>): WaitFuture<T> | WaitFuture<void> {
    const name = label ?? `wait(${dependencies.map(d => d.label).join(', ')})`;
    const waiter = digest ? new WaitFuture<T>(name, digest) : new WaitFuture<void>(name, () => undefined);
    this.link(waiter, dependencies);
    return waiter;
  }

  /**
   * Make `waiter` wait on `dependencies` as well as anything it already
   * waits on.
   *
   * @throws DependencyCycleError when `waiter` is one of the dependencies
   *   or reachable from them; nothing is recorded in that case
   * @throws FutureStateError when `waiter` is already terminal
   */
  link(waiter: WaitFuture<unknown>, dependencies: readonly Future<unknown>[]): void {
    if (waiter.isDone()) {
      throw new FutureStateError(`Cannot add dependencies to finished future '${waiter.label}'`);
    }
    this.checkCycle(waiter, dependencies);

    waiter.addDependencies(dependencies);
    const pending = this.before.get(waiter) ?? new Set<Future<unknown>>();

    for (const dep of dependencies) {
      if (dep.isDone() || pending.has(dep)) {
        continue;
      }
      pending.add(dep);
      let waiters = this.after.get(dep);
      if (!waiters) {
        waiters = new Set<WaitFuture<unknown>>();
        this.after.set(dep, waiters);
        dep.addDoneCallback(done => this.release(done));
      }
      waiters.add(waiter);
    }

    log.debug(`Linked '${waiter.label}' to ${dependencies.length} dependencies (${pending.size} pending)`);

    const failed = dependencies.find(dep => dep.state === 'failed');
    if (pending.size === 0 || failed) {
      this.detach(waiter, pending);
      waiter.settleFromDependencies();
      return;
    }
    this.before.set(waiter, pending);
  }

  /**
   * Record that `future` cannot finish before `source` does (a scheduled
   * future and its wait future), so cycle checks can see through it.
   */
  track(future: Future<unknown>, source: WaitFuture<unknown>): void {
    if (future.isDone() || source.isDone()) {
      return;
    }
    this.derived.set(future, source);
    future.addDoneCallback(done => this.derived.delete(done));
  }

  /** Number of waiters still blocked on at least one dependency. */
  get pendingCount(): number {
    return this.before.size;
  }

  /**
   * Dependencies `waiter` is still blocked on.
   */
  pendingDependencies(waiter: Future<unknown>): Future<unknown>[] {
    return [...(this.before.get(waiter) ?? [])];
  }

  /**
   * Release the waiters of a dependency that just became terminal.
   */
  private release(dependency: Future<unknown>): void {
    const waiters = this.after.get(dependency);
    this.after.delete(dependency);
    if (!waiters) {
      return;
    }

    for (const waiter of waiters) {
      const pending = this.before.get(waiter);
      if (!pending) {
        continue;
      }
      pending.delete(dependency);

      if (dependency.state === 'failed' || pending.size === 0) {
        this.detach(waiter, pending);
        log.debug(`Releasing '${waiter.label}' after '${dependency.label}' (${dependency.state})`);
        waiter.settleFromDependencies();
      }
    }
  }

  /** Drop every edge of a waiter that is about to complete. */
  private detach(waiter: WaitFuture<unknown>, pending: Set<Future<unknown>>): void {
    this.before.delete(waiter);
    for (const dep of pending) {
      const waiters = this.after.get(dep);
      waiters?.delete(waiter);
    }
  }

  /**
   * Depth-first search from the dependencies along pending edges. Reaching
   * the waiter means the new edges would close a cycle.
   */
  private checkCycle(waiter: Future<unknown>, dependencies: readonly Future<unknown>[]): void {
    const visited = new Set<Future<unknown>>();
    const path: Future<unknown>[] = [];

    const dfs = (node: Future<unknown>): boolean => {
      if (node === waiter) {
        return true;
      }
      if (visited.has(node)) {
        return false;
      }
      visited.add(node);
      path.push(node);
      const source = this.derived.get(node);
      const next = [...(this.before.get(node) ?? []), ...(source ? [source] : [])];
      for (const dep of next) {
        if (dfs(dep)) {
          return true;
        }
      }
      path.pop();
      return false;
    };

    for (const dep of dependencies) {
      if (dfs(dep)) {
        const cycle = [waiter, ...path, waiter].map(f => f.label);
        throw new DependencyCycleError(`Circular dependency detected: ${cycle.join(' -> ')}`, cycle);
      }
    }
  }
}
