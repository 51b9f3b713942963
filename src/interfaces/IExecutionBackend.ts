/**
 * @fileoverview Interface for execution backends.
 *
 * The backend set is closed: `local` runs task functions in this process,
 * `subprocess` and `cluster` run job templates in job directories. They
 * share one capability interface so the dispatcher drives them the same way.
 *
 * @module interfaces/IExecutionBackend
 */

import type { JobStatus } from '../backends/status';
import type { BackendKind } from '../workflow/task';

/** Reference to one submitted unit of work. */
export interface BackendHandle {
  readonly id: string;
}

/** Handle of work that runs in a job directory. */
export interface JobHandle extends BackendHandle {
  readonly jobDir: string;
}

/**
 * A job ready to run in its directory. The store has already written the
 * record; `resume` tells the backend the directory may hold earlier work.
 */
export interface JobRequest {
  jobDir: string;
  templateDir: string;
  script: string;
  resume: boolean;
  label: string;
}

/**
 * Capability interface of a backend.
 *
 * @example
 * ```typescript
 * const handle = await backend.submit(request);
 * const status = await backend.wait(handle);
 * if (isSuccessfulStatus(status)) {
 *   return backend.materializeResult(handle);
 * }
 * ```
 */
export interface IExecutionBackend<TRequest, THandle extends BackendHandle> {
  readonly kind: BackendKind;

  /** Start the work. */
  submit(request: TRequest): Promise<THandle>;

  /** Current status without waiting. */
  poll(handle: THandle): Promise<JobStatus>;

  /** Resolve with the terminal status. */
  wait(handle: THandle): Promise<JobStatus>;

  /** Value of finished work. */
  materializeResult(handle: THandle): Promise<unknown>;
}
