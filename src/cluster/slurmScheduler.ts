/**
 * @fileoverview Slurm adapter for the cluster watcher.
 *
 * - submit: `sbatch --parsable <script>` run in the job directory, output
 *   `id` or `id;cluster`
 * - query: `scontrol show job <id>`, state read from `JobState=`;
 *   "Invalid job id" means the scheduler has forgotten the job
 *
 * Command errors, timeouts and unparsable output are transient.
 *
 * @module cluster/slurmScheduler
 */

import { Logger } from '../core/logger';
import { ClusterSubmissionError, TransientQueryError, describeError } from '../core/errors';
import type { JobStatus } from '../backends/status';
import type { ClusterSubmission, IClusterScheduler } from '../interfaces/IClusterScheduler';
import type { IProcessSpawner } from '../interfaces/IProcessSpawner';
import { DefaultProcessSpawner } from '../interfaces/IProcessSpawner';
import type { ExecOptions, ExecResult } from '../process/processHelpers';
import { runCommand } from '../process/processHelpers';
import { formatJobId, parseJobId } from './types';

const log = Logger.for('cluster');

/** Runs a scheduler command. */
export type CommandRunner = (command: string, args: string[], options: ExecOptions) => Promise<ExecResult>;

/**
 * Slurm job states and the status each maps to.
 */
export const SLURM_STATES: Readonly<Record<string, JobStatus>> = {
  PENDING: 'pending',
  REQUEUED: 'pending',
  REQUEUE_HOLD: 'pending',
  REQUEUE_FED: 'pending',
  RESV_DEL_HOLD: 'pending',
  CONFIGURING: 'configuring',
  RUNNING: 'running',
  COMPLETING: 'running',
  SUSPENDED: 'running',
  STAGE_OUT: 'running',
  SIGNALING: 'running',
  RESIZING: 'running',
  COMPLETED: 'completed',
  CANCELLED: 'cancelled',
  FAILED: 'failed',
  TIMEOUT: 'failed',
  NODE_FAIL: 'failed',
  OUT_OF_MEMORY: 'failed',
  BOOT_FAIL: 'failed',
  DEADLINE: 'failed',
  PREEMPTED: 'failed',
  SPECIAL_EXIT: 'failed',
};

export interface SlurmSchedulerOptions {
  spawner?: IProcessSpawner;
  /** Overrides how commands run */
  run?: CommandRunner;
  /** Timeout per command (default 60s) */
  timeoutMs?: number;
}

export class SlurmScheduler implements IClusterScheduler {
  readonly name = 'slurm';
  private readonly run: CommandRunner;
  private readonly timeoutMs: number;

  constructor(options: SlurmSchedulerOptions = {}) {
    const spawner = options.spawner ?? new DefaultProcessSpawner();
    this.run = options.run ?? ((command, args, execOptions) => runCommand(spawner, command, args, execOptions));
    this.timeoutMs = options.timeoutMs ?? 60_000;
  }

  async submit(jobDir: string, script: string): Promise<ClusterSubmission> {
    let result: ExecResult;
    try {
      result = await this.run('sbatch', ['--parsable', script], { cwd: jobDir, timeoutMs: this.timeoutMs });
    } catch (error) {
      throw new ClusterSubmissionError(`sbatch failed: ${describeError(error)}`, jobDir, error);
    }
    if (result.code !== 0) {
      throw new ClusterSubmissionError(`sbatch exited with code ${result.code}: ${result.stderr.trim()}`, jobDir);
    }

    const submission = parseJobId(result.stdout);
    if (!submission) {
      throw new ClusterSubmissionError(`Unexpected sbatch output: ${result.stdout.trim()}`, jobDir);
    }
    log.info(`Submitted ${script} as job ${formatJobId(submission)}`);
    return submission;
  }

  async queryStatus(jobId: string, cluster?: string): Promise<JobStatus> {
    const args = cluster ? ['-M', cluster, 'show', 'job', jobId] : ['show', 'job', jobId];
    let result: ExecResult;
    try {
      result = await this.run('scontrol', args, { timeoutMs: this.timeoutMs });
    } catch (error) {
      throw new TransientQueryError(`scontrol failed for job ${jobId}: ${describeError(error)}`, error);
    }

    if (/Invalid job id/i.test(`${result.stdout}\n${result.stderr}`)) {
      return 'unknown';
    }
    if (result.code !== 0) {
      throw new TransientQueryError(`scontrol exited with code ${result.code} for job ${jobId}: ${result.stderr.trim()}`);
    }
    return parseScontrolOutput(jobId, result.stdout);
  }
}

/**
 * Read the status of `jobId` from `scontrol show job` output.
 * States without a mapping are reported as `unknown`.
 *
 * @throws TransientQueryError when the output has no state for the job
 */
export function parseScontrolOutput(jobId: string, stdout: string): JobStatus {
  const pattern = new RegExp(`JobId=${escapeRegExp(jobId)}\\b[\\s\\S]*?JobState=([A-Z_]+)`);
  const match = pattern.exec(stdout);
  if (!match) {
    throw new TransientQueryError(`No JobState for job ${jobId} in scontrol output`);
  }
  const state = match[1];
  const status = SLURM_STATES[state];
  if (!status) {
    log.warn(`Unrecognized Slurm state ${state} for job ${jobId}; treating as unknown`);
    return 'unknown';
  }
  return status;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
