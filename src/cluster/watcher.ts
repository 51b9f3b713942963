/**
 * @fileoverview Cluster job watcher.
 *
 * Submits a job directory's script to the batch scheduler at most once and
 * follows the job until it reaches a terminal status.
 *
 * - `job.id` in the job directory is the proof of submission; a directory
 *   that has one is reattached, never resubmitted
 * - statuses come through the shared {@link ClusterStatusCache}
 * - each observed change is emitted as `transition` and appended to
 *   `job.status`
 * - query failures and an unavailable status cache are retried on the
 *   next tick and never fail the job
 *
 * @module cluster/watcher
 */

import { EventEmitter } from 'events';
import { Logger } from '../core/logger';
import {
  ClusterSubmissionError,
  ClusterWaitTimeoutError,
  JobRecordError,
  StatusCacheError,
  TransientQueryError,
  describeError,
} from '../core/errors';
import { DefaultFileSystem } from '../core/defaultFileSystem';
import { randomBetween, sleep, writeFileAtomic } from '../core/utils';
import { isTerminalStatus, isValidStatusTransition } from '../backends/status';
import type { JobStatus } from '../backends/status';
import type { IClusterScheduler, ClusterSubmission } from '../interfaces/IClusterScheduler';
import type { IFileSystem } from '../interfaces/IFileSystem';
import { JOB_ID_FILE, JOB_STATUS_FILE, jobFile } from '../store/jobFiles';
import type { ClusterStatusCache } from './statusCache';
import type { ClusterJobHandle, ClusterTransitionEvent } from './types';
import { cacheKey, formatJobId, parseJobId } from './types';

const log = Logger.for('cluster');

export interface ClusterJobWatcherOptions {
  /** Lower bound of the sleep between polls */
  pollIntervalMs: number;
  /** Random extra sleep added to each poll */
  pollJitterMs: number;
  /** `unknown` statuses observed this soon after submission are ignored */
  submitMarginMs: number;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  now?: () => number;
  fileSystem?: IFileSystem;
}

export interface WaitOptions {
  /** Give up after this long; no limit when omitted */
  timeoutMs?: number;
}

/**
 * Watches cluster jobs. Listeners see {@link ClusterWatcherEvents}.
 *
 * @example
 * ```typescript
 * const watcher = new ClusterJobWatcher(new SlurmScheduler(), cache, settings);
 * watcher.on('transition', (evt) => console.log(`${evt.jobId}: ${evt.from} -> ${evt.to}`));
 * const handle = await watcher.submitOnce(jobDir, 'job.sh');
 * const status = await watcher.waitForCompletion(handle);
 * ```
 */
export class ClusterJobWatcher extends EventEmitter {
  private readonly statuses = new Map<string, JobStatus>();
  private readonly fs: IFileSystem;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;
  private readonly now: () => number;

  constructor(
    readonly scheduler: IClusterScheduler,
    private readonly cache: ClusterStatusCache,
    private readonly options: ClusterJobWatcherOptions,
  ) {
    super();
    this.fs = options.fileSystem ?? new DefaultFileSystem();
    this.sleep = options.sleep ?? sleep;
    this.random = options.random ?? Math.random;
    this.now = options.now ?? Date.now;
  }

  /**
   * Submit `script` from `jobDir` unless the directory already holds a
   * `job.id`, in which case that job is reattached.
   *
   * @throws ClusterSubmissionError when the scheduler refuses the job
   * @throws JobRecordError when `job.id` cannot be parsed
   */
  async submitOnce(jobDir: string, script: string): Promise<ClusterJobHandle> {
    const idPath = jobFile(jobDir, JOB_ID_FILE);
    if (await this.fs.existsAsync(idPath)) {
      const text = await this.fs.readFileAsync(idPath);
      const existing = parseJobId(text);
      if (!existing) {
        throw new JobRecordError(`Malformed ${JOB_ID_FILE}: '${text.trim()}'`, jobDir);
      }
      const handle = this.handleFor(existing, jobDir, script, await this.fs.mtimeAsync(idPath));
      log.info(`Reattaching to job ${handle.id} in ${jobDir}`);
      this.statuses.set(jobDir, 'submitted');
      return handle;
    }

    let submission: ClusterSubmission;
    try {
      submission = await this.scheduler.submit(jobDir, script);
    } catch (error) {
      if (error instanceof ClusterSubmissionError) {
        throw error;
      }
      throw new ClusterSubmissionError(`Could not submit ${script}: ${describeError(error)}`, jobDir, error);
    }

    const handle = this.handleFor(submission, jobDir, script, this.now());
    await writeFileAtomic(idPath, `${handle.id}\n`, this.fs);
    this.statuses.set(jobDir, 'submitted');
    this.emit('submitted', handle);
    return handle;
  }

  /**
   * Query the job once and record any change.
   *
   * @returns the observed status, or undefined when nothing usable was
   *   observed this tick
   */
  async pollOnce(handle: ClusterJobHandle): Promise<JobStatus | undefined> {
    let status: JobStatus;
    try {
      const lookup = await this.cache.lookup(cacheKey(handle), () => this.query(handle));
      status = lookup.status;
    } catch (error) {
      if (error instanceof TransientQueryError) {
        log.debug(`Status of job ${handle.id} not available; retrying`, { error: error.message });
        return undefined;
      }
      if (error instanceof StatusCacheError) {
        log.warn(`Status cache unavailable for job ${handle.id}; retrying: ${error.message}`);
        return undefined;
      }
      throw error;
    }

    if (status === 'unknown' && this.withinSubmitMargin(handle)) {
      log.debug(`Job ${handle.id} not listed yet`);
      return undefined;
    }
    await this.record(handle, status);
    return status;
  }

  /**
   * Poll until the job reaches a terminal status.
   *
   * @throws ClusterWaitTimeoutError when `timeoutMs` elapses first
   */
  async waitForCompletion(handle: ClusterJobHandle, options: WaitOptions = {}): Promise<JobStatus> {
    const started = this.now();
    for (;;) {
      await this.sleep(this.nextDelay());
      const status = await this.pollOnce(handle);
      if (status !== undefined && isTerminalStatus(status)) {
        log.info(`Job ${handle.id} finished as ${status}`);
        return status;
      }
      if (options.timeoutMs !== undefined && this.now() - started >= options.timeoutMs) {
        throw new ClusterWaitTimeoutError(handle.id, options.timeoutMs, handle.jobDir);
      }
    }
  }

  /** Last status recorded for a job directory. */
  lastStatus(jobDir: string): JobStatus | undefined {
    return this.statuses.get(jobDir);
  }

  /** Sleep before the next poll, in `[pollIntervalMs, pollIntervalMs + pollJitterMs]`. */
  nextDelay(): number {
    const { pollIntervalMs, pollJitterMs } = this.options;
    return randomBetween(pollIntervalMs, pollIntervalMs + pollJitterMs, this.random);
  }

  /** Scheduler query; a fresh job the scheduler does not list yet is retried, not cached. */
  private async query(handle: ClusterJobHandle): Promise<JobStatus> {
    const status = await this.scheduler.queryStatus(handle.jobId, handle.cluster);
    if (status === 'unknown' && this.withinSubmitMargin(handle)) {
      throw new TransientQueryError(`Job ${handle.id} is not listed yet`);
    }
    return status;
  }

  private withinSubmitMargin(handle: ClusterJobHandle): boolean {
    return this.now() - handle.submittedAt < this.options.submitMarginMs;
  }

  private async record(handle: ClusterJobHandle, to: JobStatus): Promise<void> {
    const from = this.statuses.get(handle.jobDir) ?? 'submitted';
    if (from === to) {
      return;
    }
    if (!isValidStatusTransition(from, to)) {
      log.warn(`Unexpected transition for job ${handle.id}: ${from} -> ${to}`);
    }
    this.statuses.set(handle.jobDir, to);

    const event: ClusterTransitionEvent = {
      jobId: handle.id,
      jobDir: handle.jobDir,
      from,
      to,
      timestamp: this.now(),
    };
    await this.fs.appendFileAsync(
      jobFile(handle.jobDir, JOB_STATUS_FILE),
      `${new Date(event.timestamp).toISOString()} ${from} -> ${to}\n`,
    );
    log.debug(`Job ${handle.id}: ${from} -> ${to}`);
    this.emit('transition', event);
  }

  private handleFor(submission: ClusterSubmission, jobDir: string, script: string, submittedAt: number): ClusterJobHandle {
    return {
      ...submission,
      id: formatJobId(submission),
      jobDir,
      script,
      submittedAt,
    };
  }
}
