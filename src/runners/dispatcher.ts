/**
 * @fileoverview Closure dispatch
 *
 * Takes a closure whose arguments have been materialized and runs it on the
 * backend its target names:
 * - task functions on the local backend
 * - job templates through the result store, then the subprocess or
 *   cluster backend unless the store holds a reusable result
 *
 * Parameters are validated before anything runs, results after.
 *
 * @module runners/dispatcher
 */

import { Logger } from '../core/logger';
import { ConfigurationError, JobFailedError } from '../core/errors';
import { isPromise } from '../core/utils';
import { LocalBackend } from '../backends/localBackend';
import { isSuccessfulStatus } from '../backends/status';
import type { IExecutionBackend, JobHandle, JobRequest } from '../interfaces/IExecutionBackend';
import { JobResultStore } from '../store/jobResultStore';
import type { Closure, MaterializedCall } from '../workflow/closure';
import type { JobTarget, TaskFunction } from '../workflow/task';
import { validateParameters, validateResult } from '../workflow/validation';

const log = Logger.for('dispatch');

/** Backends available to a dispatcher. */
export interface DispatcherBackends {
  local?: LocalBackend;
  subprocess?: IExecutionBackend<JobRequest, JobHandle>;
  cluster?: IExecutionBackend<JobRequest, JobHandle>;
}

export class Dispatcher {
  private readonly local: LocalBackend;

  constructor(
    private readonly backends: DispatcherBackends = {},
    private readonly store: JobResultStore = new JobResultStore(),
  ) {
    this.local = backends.local ?? new LocalBackend();
  }

  /**
   * Run a closure with the given argument values.
   *
   * @throws ValidationError when parameters or result do not validate
   * @throws ConfigurationError when the job's backend is not configured
   * @throws JobFailedError when a job finishes unsuccessfully
   */
  async dispatch<T>(closure: Closure<T>, call: MaterializedCall): Promise<T> {
    const target = closure.target;
    const label = closure.describe();
    validateParameters(target, call.args, call.kwargs);

    if (target.kind === 'task') {
      log.debug(`Running task '${label}' locally`);
      const handle = await this.local.submit({ task: target, args: call.args, kwargs: call.kwargs, label });
      await this.local.wait(handle);
      return this.checkResult(target, call, await this.local.materializeResult(handle));
    }
    return this.dispatchJob(target, call, label);
  }

  /**
   * Run a task in the caller's turn of the event loop. A synchronous task
   * is finished, and its result validated, when this returns.
   */
  executeTask<T>(task: TaskFunction<T>, call: MaterializedCall): T | Promise<T> {
    validateParameters(task, call.args, call.kwargs);
    const value = task.execute(call.args, call.kwargs);
    if (isPromise(value)) {
      return value.then(resolved => this.checkResult(task, call, resolved));
    }
    return this.checkResult(task, call, value);
  }

  private async dispatchJob<T>(target: JobTarget<T>, call: MaterializedCall, label: string): Promise<T> {
    const jobDir = target.jobDir(call.args, call.kwargs);
    const decision = await this.store.prepare(jobDir, target.jobKwargs(call.args, call.kwargs), {
      canResume: target.canResume,
    });

    let raw: unknown;
    if (decision.action === 'cached') {
      log.info(`Using stored result for '${label}' in ${jobDir}`);
      raw = await this.store.readResult(jobDir);
    } else {
      const request: JobRequest = {
        jobDir,
        templateDir: target.templateDir,
        script: target.script,
        resume: decision.resume,
        label,
      };
      raw = await this.runJob(this.backendFor(target), request);
    }

    const missing = await this.store.missingExtras(jobDir);
    if (missing.length > 0) {
      log.warn(`Result of '${label}' lists missing artifacts: ${missing.join(', ')}`, { jobDir });
    }

    validateResult(target, call.args, call.kwargs, raw);
    return target.parseResult(raw);
  }

  private async runJob(backend: IExecutionBackend<JobRequest, JobHandle>, request: JobRequest): Promise<unknown> {
    const handle = await backend.submit(request);
    log.debug(`Submitted '${request.label}' to ${backend.kind} as ${handle.id}`);
    const status = await backend.wait(handle);
    if (!isSuccessfulStatus(status)) {
      throw new JobFailedError(`Job '${request.label}' finished as ${status}`, { jobDir: request.jobDir });
    }
    return backend.materializeResult(handle);
  }

  private backendFor<T>(target: JobTarget<T>): IExecutionBackend<JobRequest, JobHandle> {
    const backend = this.backends[target.backend];
    if (!backend) {
      throw new ConfigurationError(`No ${target.backend} backend configured for '${target.name}'`);
    }
    return backend;
  }

  private checkResult<T>(target: TaskFunction<T>, call: MaterializedCall, value: T): T {
    validateResult(target, call.args, call.kwargs, value);
    return value;
  }
}
