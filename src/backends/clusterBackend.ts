/**
 * @fileoverview Cluster backend
 *
 * Runs a job template through the batch scheduler. The template is copied
 * into the job directory only for a first submission; a directory holding
 * `job.id` belongs to a job that is already queued or running, and is left
 * alone. A first submission also gets a `jobenv.sh` for the script to
 * source. The cluster job writes `result.json` before it finishes.
 *
 * @module backends/clusterBackend
 */

import { Logger } from '../core/logger';
import { DefaultFileSystem } from '../core/defaultFileSystem';
import type { ClusterJobWatcher } from '../cluster/watcher';
import type { ClusterJobHandle } from '../cluster/types';
import type { IExecutionBackend, JobRequest } from '../interfaces/IExecutionBackend';
import type { IFileSystem } from '../interfaces/IFileSystem';
import { JobResultStore } from '../store/jobResultStore';
import { JOB_ID_FILE, jobFile } from '../store/jobFiles';
import type { JobStatus } from './status';
import { jobEnv, writeJobEnv } from './jobEnv';

const log = Logger.for('job');

export interface ClusterBackendOptions {
  fileSystem?: IFileSystem;
  store?: JobResultStore;
  /** Limit on each wait; no limit when omitted */
  waitTimeoutMs?: number;
}

export class ClusterBackend implements IExecutionBackend<JobRequest, ClusterJobHandle> {
  readonly kind = 'cluster';
  private readonly fs: IFileSystem;
  private readonly store: JobResultStore;

  constructor(readonly watcher: ClusterJobWatcher, private readonly options: ClusterBackendOptions = {}) {
    this.fs = options.fileSystem ?? new DefaultFileSystem();
    this.store = options.store ?? new JobResultStore(this.fs);
  }

  async submit(request: JobRequest): Promise<ClusterJobHandle> {
    await this.fs.ensureDirAsync(request.jobDir);
    if (!(await this.fs.existsAsync(jobFile(request.jobDir, JOB_ID_FILE)))) {
      await this.fs.copyDirAsync(request.templateDir, request.jobDir);
      await writeJobEnv(request.jobDir, jobEnv(request.jobDir, request.resume), this.fs);
      log.info(`Submitting ${request.script} from ${request.jobDir}${request.resume ? ' (resume)' : ''}`);
    }
    return this.watcher.submitOnce(request.jobDir, request.script);
  }

  async poll(handle: ClusterJobHandle): Promise<JobStatus> {
    return (await this.watcher.pollOnce(handle)) ?? this.watcher.lastStatus(handle.jobDir) ?? 'submitted';
  }

  /**
   * @throws ClusterWaitTimeoutError when the configured wait limit passes
   */
  async wait(handle: ClusterJobHandle): Promise<JobStatus> {
    return this.watcher.waitForCompletion(handle, { timeoutMs: this.options.waitTimeoutMs });
  }

  async materializeResult(handle: ClusterJobHandle): Promise<unknown> {
    return this.store.readResult(handle.jobDir);
  }
}
