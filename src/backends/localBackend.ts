/**
 * @fileoverview In-process backend for task functions.
 *
 * @module backends/localBackend
 */

import { v4 as uuidv4 } from 'uuid';
import { Future } from '../future/future';
import type { BackendHandle, IExecutionBackend } from '../interfaces/IExecutionBackend';
import type { TaskFunction } from '../workflow/task';
import type { JobStatus } from './status';

export interface LocalRequest<T> {
  task: TaskFunction<T>;
  args: unknown[];
  kwargs: Record<string, unknown>;
  label: string;
}

export interface LocalHandle<T> extends BackendHandle {
  readonly outcome: Future<T>;
}

export class LocalBackend implements IExecutionBackend<LocalRequest<unknown>, LocalHandle<unknown>> {
  readonly kind = 'local';

  async submit<T>(request: LocalRequest<T>): Promise<LocalHandle<T>> {
    const outcome = new Future<T>(request.label);
    outcome.markRunning();
    void this.execute(request, outcome);
    return { id: uuidv4(), outcome };
  }

  async poll<T>(handle: LocalHandle<T>): Promise<JobStatus> {
    return statusOf(handle.outcome);
  }

  async wait<T>(handle: LocalHandle<T>): Promise<JobStatus> {
    await handle.outcome.whenSettled();
    return statusOf(handle.outcome);
  }

  /**
   * The task's value; rethrows the task's error.
   */
  async materializeResult<T>(handle: LocalHandle<T>): Promise<T> {
    return handle.outcome.wait();
  }

  private async execute<T>(request: LocalRequest<T>, outcome: Future<T>): Promise<void> {
    try {
      outcome.setResult(await request.task.execute(request.args, request.kwargs));
    } catch (error) {
      outcome.setError(error);
    }
  }
}

function statusOf(future: Future<unknown>): JobStatus {
  switch (future.state) {
    case 'done':
      return 'completed';
    case 'failed':
      return 'failed';
    default:
      return 'running';
  }
}
