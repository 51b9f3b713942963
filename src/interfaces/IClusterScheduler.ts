/**
 * @fileoverview Interface for batch cluster schedulers.
 *
 * The cluster watcher submits and queries jobs through this interface only,
 * so tests can drive it with an in-process fake.
 *
 * @module interfaces/IClusterScheduler
 */

import type { JobStatus } from '../backends/status';

/** Identifier returned by a submission. */
export interface ClusterSubmission {
  jobId: string;
  /** Cluster name on multi-cluster installations */
  cluster?: string;
}

/**
 * Interface for a batch scheduler.
 *
 * @example
 * ```typescript
 * const { jobId } = await scheduler.submit(jobDir, 'job.sh');
 * const status = await scheduler.queryStatus(jobId);
 * ```
 */
export interface IClusterScheduler {
  readonly name: string;

  /**
   * Submit `script` from inside `jobDir`.
   *
   * @throws ClusterSubmissionError when the scheduler refuses the job
   */
  submit(jobDir: string, script: string): Promise<ClusterSubmission>;

  /**
   * Current status of a job. `unknown` when the scheduler no longer knows it.
   *
   * @throws TransientQueryError when the answer could not be obtained
   */
  queryStatus(jobId: string, cluster?: string): Promise<JobStatus>;
}
