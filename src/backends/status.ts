/**
 * @fileoverview Job status values and transitions shared by all backends.
 *
 * @module backends/status
 */

/**
 * Valid job status values.
 * Terminal states: completed, failed, cancelled, unknown
 */
export type JobStatus =
  | 'submitted'    // Handed to the backend, nothing observed yet
  | 'pending'      // Queued
  | 'configuring'  // Resources being allocated
  | 'running'      // Executing
  | 'completed'    // Finished successfully
  | 'failed'       // Finished unsuccessfully
  | 'cancelled'    // Cancelled outside jobweave
  | 'unknown';     // Scheduler no longer knows the job; assumed finished

export const JOB_STATUSES: readonly JobStatus[] = [
  'submitted', 'pending', 'configuring', 'running', 'completed', 'failed', 'cancelled', 'unknown',
];

/**
 * Terminal states - jobs in these states will never change
 */
export const TERMINAL_JOB_STATUSES: readonly JobStatus[] = ['completed', 'failed', 'cancelled', 'unknown'];

/**
 * Valid status transitions. A running job may go back to pending when the
 * scheduler requeues it.
 */
export const VALID_JOB_TRANSITIONS: Record<JobStatus, readonly JobStatus[]> = {
  'submitted':   ['pending', 'configuring', 'running', 'completed', 'failed', 'cancelled', 'unknown'],
  'pending':     ['configuring', 'running', 'completed', 'failed', 'cancelled', 'unknown'],
  'configuring': ['pending', 'running', 'completed', 'failed', 'cancelled', 'unknown'],
  'running':     ['pending', 'completed', 'failed', 'cancelled', 'unknown'],
  'completed':   [],  // Terminal
  'failed':      [],  // Terminal
  'cancelled':   [],  // Terminal
  'unknown':     [],  // Terminal
};

export function isTerminalStatus(status: JobStatus): boolean {
  return TERMINAL_JOB_STATUSES.includes(status);
}

export function isValidStatusTransition(from: JobStatus, to: JobStatus): boolean {
  return VALID_JOB_TRANSITIONS[from].includes(to);
}

/**
 * Terminal statuses after which a result is expected. `unknown` counts:
 * the scheduler forgets finished jobs, and `result.json` decides.
 */
export function isSuccessfulStatus(status: JobStatus): boolean {
  return status === 'completed' || status === 'unknown';
}

export function isJobStatus(value: string): value is JobStatus {
  return JOB_STATUSES.some(s => s === value);
}
