/**
 * @fileoverview Cluster job handles and events.
 *
 * @module cluster/types
 */

import type { JobStatus } from '../backends/status';
import type { ClusterSubmission } from '../interfaces/IClusterScheduler';
import type { JobHandle } from '../interfaces/IExecutionBackend';

/**
 * A job known to the cluster scheduler.
 */
export interface ClusterJobHandle extends JobHandle, ClusterSubmission {
  /** Script that was submitted */
  readonly script: string;
  /** When the job was submitted (ms since epoch); `job.id` mtime for reused jobs */
  readonly submittedAt: number;
}

/**
 * Emitted when the watcher observes a new status for a job.
 */
export interface ClusterTransitionEvent {
  jobId: string;
  jobDir: string;
  from: JobStatus;
  to: JobStatus;
  timestamp: number;
}

/**
 * Events emitted by the cluster watcher
 */
export interface ClusterWatcherEvents {
  'transition': (event: ClusterTransitionEvent) => void;
  'submitted': (handle: ClusterJobHandle) => void;
}

/**
 * Text stored in `job.id`: `id` or `id;cluster`.
 */
export function formatJobId(submission: ClusterSubmission): string {
  return submission.cluster ? `${submission.jobId};${submission.cluster}` : submission.jobId;
}

/**
 * Parse `job.id` content or `sbatch --parsable` output.
 *
 * @returns undefined when the text is not `id[;cluster]`
 */
export function parseJobId(text: string): ClusterSubmission | undefined {
  const lines = text.split('\n').map(line => line.trim()).filter(Boolean);
  const last = lines[lines.length - 1];
  if (!last) {
    return undefined;
  }
  const match = /^(\d+)(?:;(\S+))?$/.exec(last);
  if (!match) {
    return undefined;
  }
  return match[2] ? { jobId: match[1], cluster: match[2] } : { jobId: match[1] };
}

/** Cache key of a job. */
export function cacheKey(submission: ClusterSubmission): string {
  return submission.cluster ? `${submission.cluster}:${submission.jobId}` : submission.jobId;
}
