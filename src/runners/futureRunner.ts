/**
 * @fileoverview Future runner
 *
 * Runs closures on a bounded {@link WorkerPool}. A closure marked
 * `schedule` whose arguments hold unfinished futures is registered with the
 * {@link Scheduler} and dispatched once they are done. Any other closure is
 * started right away; when it still has unfinished arguments its dispatch
 * first waits for them, outside the pool, and only then takes a slot.
 * Either way `run` returns without waiting.
 *
 * @module runners/futureRunner
 */

import { Logger } from '../core/logger';
import { ConfigurationError, SchedulerClosedError } from '../core/errors';
import { JobweaveConfig } from '../core/config';
import { Future } from '../future/future';
import { Scheduler } from '../future/scheduler';
import { getTree, transformTree } from '../future/tree';
import type { TreePath } from '../future/tree';
import { WaitGraph } from '../future/waitGraph';
import type { WaitFuture } from '../future/waitGraph';
import { WorkerPool } from '../future/workerPool';
import type { IRunner } from '../interfaces/IRunner';
import type { Closure, MaterializedCall } from '../workflow/closure';
import { FutureTracker } from './futureTracker';
import type { Dispatcher } from './dispatcher';

const log = Logger.for('runner');

export interface FutureRunnerOptions {
  /** Pool size; defaults to the configured `jobweave.runner.maxParallel` */
  maxParallel?: number;
  config?: JobweaveConfig;
}

export class FutureRunner implements IRunner {
  readonly graph = new WaitGraph();
  readonly scheduler = new Scheduler(this.graph);
  readonly pool: WorkerPool;
  private readonly tracker = new FutureTracker();
  private closed = false;

  constructor(private readonly dispatcher: Dispatcher, options: FutureRunnerOptions = {}) {
    const maxParallel = options.maxParallel ?? (options.config ?? new JobweaveConfig()).maxParallel;
    this.pool = new WorkerPool(maxParallel);
    log.debug(`Future runner with ${maxParallel} slots`);
  }

  /**
   * @throws SchedulerClosedError after {@link shutdown}
   * @throws DependencyCycleError when scheduling would close a cycle
   */
  run<T>(closure: Closure<T>): Future<T> {
    if (this.closed) {
      throw new SchedulerClosedError();
    }
    const label = closure.describe();
    const unresolved = closure.unresolved();

    let future: Future<T>;
    if (closure.schedule && unresolved.length > 0) {
      future = this.scheduler.submit(label, unresolved, () => this.enqueue(closure, label, () => closure.materializeNow()));
    } else if (unresolved.length === 0) {
      future = this.enqueue(closure, label, () => closure.materializeNow());
    } else {
      future = new Future<T>(label);
      void this.materializeThenEnqueue(closure, label, future);
    }

    this.tracker.track(future);
    return future;
  }

  /** Futures still held by the runner: unsettled ones and failures not yet reported. */
  get trackedCount(): number {
    return this.tracker.size;
  }

  /** Run a closure and wait for its value. */
  call<T>(closure: Closure<T>): Promise<T> {
    return this.run(closure).wait();
  }

  /**
   * Run a closure and return a tree shaped like its result mock whose
   * leaves are futures of the matching parts of the result.
   *
   * @throws ConfigurationError when the target has no result mock
   */
  runTree<T>(closure: Closure<T>): unknown {
    const mock = closure.resultMock();
    if (mock === undefined) {
      throw new ConfigurationError(`'${closure.describe()}' has no result mock to shape its result`);
    }
    const whole = this.run(closure);
    return transformTree(
      (path: TreePath) => this.graph.submit([whole], `${whole.label}${formatPath(path)}`, ([value]) => getTree(value, path)),
      mock,
    );
  }

  waitAll(futures: readonly Future<unknown>[]): WaitFuture<unknown[]> {
    return this.graph.submit(futures, undefined, values => values);
  }

  /**
   * Refuse new work, wait for everything run so far, then rethrow the
   * first error among those futures.
   */
  async shutdown(): Promise<void> {
    this.closed = true;
    await this.scheduler.shutdown();
    const { total, failures } = await this.tracker.drain();
    await this.pool.onIdle();

    const [first] = failures;
    const settlement = first?.settled();
    if (settlement?.state === 'failed') {
      log.error(`${failures.length} of ${total} futures failed; first was '${first.label}'`, settlement.error);
      throw settlement.error;
    }
    log.debug(`All ${total} futures done`);
  }

  private enqueue<T>(closure: Closure<T>, label: string, materialize: () => MaterializedCall): Future<T> {
    return this.pool.submit(label, () => this.dispatcher.dispatch(closure, materialize()));
  }

  private async materializeThenEnqueue<T>(closure: Closure<T>, label: string, future: Future<T>): Promise<void> {
    let call: MaterializedCall;
    try {
      call = await closure.materialize();
    } catch (error) {
      future.setError(error);
      return;
    }

    const work = this.enqueue(closure, label, () => call);
    work.addDoneCallback(done => {
      const settlement = done.settled();
      if (settlement.state === 'done') {
        future.setResult(settlement.value);
      } else {
        future.setError(settlement.error);
      }
    });
  }
}

function formatPath(path: TreePath): string {
  return path.map(segment => (typeof segment === 'number' ? `[${segment}]` : `.${String(segment)}`)).join('');
}
