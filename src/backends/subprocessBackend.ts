/**
 * @fileoverview Subprocess backend
 *
 * Runs a job template's script as a child process inside the job
 * directory. The template is copied into the directory first, with a
 * `jobenv.sh` of the script's exported variables; stdout and stderr go to `<script>.out` and `<script>.err` beside it. A zero exit
 * code means `completed`, anything else `failed`, once both output files
 * are flushed. An output file that cannot be written fails the job and
 * kills the script. The script is expected to write `result.json` itself.
 *
 * @module backends/subprocessBackend
 */

import * as path from 'path';
import { finished } from 'stream/promises';
import { v4 as uuidv4 } from 'uuid';
import { Logger } from '../core/logger';
import { JobFailedError, describeError } from '../core/errors';
import { DefaultFileSystem } from '../core/defaultFileSystem';
import { Future } from '../future/future';
import type { IExecutionBackend, JobHandle, JobRequest } from '../interfaces/IExecutionBackend';
import type { IFileSystem } from '../interfaces/IFileSystem';
import type { IProcessSpawner } from '../interfaces/IProcessSpawner';
import { DefaultProcessSpawner } from '../interfaces/IProcessSpawner';
import { JobResultStore } from '../store/jobResultStore';
import { scriptOutputFiles } from '../store/jobFiles';
import type { JobStatus } from './status';
import { jobEnv, writeJobEnv } from './jobEnv';

const log = Logger.for('job');

export interface SubprocessHandle extends JobHandle {
  readonly script: string;
  /** Exit code once the process has closed */
  readonly exit: Future<number | null>;
}

export interface SubprocessBackendOptions {
  spawner?: IProcessSpawner;
  fileSystem?: IFileSystem;
  store?: JobResultStore;
  /** Extra environment for every script */
  env?: NodeJS.ProcessEnv;
}

export class SubprocessBackend implements IExecutionBackend<JobRequest, SubprocessHandle> {
  readonly kind = 'subprocess';
  private readonly spawner: IProcessSpawner;
  private readonly fs: IFileSystem;
  private readonly store: JobResultStore;
  private readonly env: NodeJS.ProcessEnv;

  constructor(options: SubprocessBackendOptions = {}) {
    this.spawner = options.spawner ?? new DefaultProcessSpawner();
    this.fs = options.fileSystem ?? new DefaultFileSystem();
    this.store = options.store ?? new JobResultStore(this.fs);
    this.env = options.env ?? {};
  }

  async submit(request: JobRequest): Promise<SubprocessHandle> {
    const env = jobEnv(request.jobDir, request.resume, this.env);
    await this.fs.ensureDirAsync(request.jobDir);
    await this.fs.copyDirAsync(request.templateDir, request.jobDir);
    await writeJobEnv(request.jobDir, env, this.fs);

    const { out, err } = scriptOutputFiles(request.jobDir, request.script);
    const exit = new Future<number | null>(request.label);
    exit.markRunning();

    log.info(`Running ${request.script} in ${request.jobDir}${request.resume ? ' (resume)' : ''}`);
    const proc = this.spawner.spawn(path.join(request.jobDir, request.script), [], {
      cwd: request.jobDir,
      env: { ...process.env, ...env },
      shell: false,
      stdio: ['ignore', 'pipe', 'pipe'],
      windowsHide: true,
    });

    const closed = new Promise<number | null>(resolve => {
      proc.on('close', resolve);
    });
    proc.on('error', (error) => {
      if (!exit.isDone()) {
        exit.setError(new JobFailedError(`Failed to start ${request.script}`, { jobDir: request.jobDir, cause: error }));
      }
    });

    void Promise.all([
      closed,
      this.capture(proc.stdout, out, request.jobDir),
      this.capture(proc.stderr, err, request.jobDir),
    ]).then(
      ([code]) => {
        if (!exit.isDone()) {
          exit.setResult(code);
        }
      },
      (error: unknown) => {
        proc.kill('SIGTERM');
        if (!exit.isDone()) {
          log.error(`Stopping ${request.script} in ${request.jobDir}: ${describeError(error)}`);
          exit.setError(error);
        }
      },
    );

    return { id: proc.pid !== undefined ? String(proc.pid) : uuidv4(), jobDir: request.jobDir, script: request.script, exit };
  }

  /**
   * Copy `source` into `file`. Resolves once the file is flushed.
   *
   * @throws JobFailedError when the file cannot be written
   */
  private async capture(source: NodeJS.ReadableStream | null, file: string, jobDir: string): Promise<void> {
    if (!source) {
      return;
    }
    const sink = this.fs.createWriteStream(file);
    source.pipe(sink);
    try {
      await finished(sink);
    } catch (error) {
      // pipe() has detached from the failed sink; drain the rest
      source.resume();
      throw new JobFailedError(`Could not write ${path.basename(file)}: ${describeError(error)}`, { jobDir, cause: error });
    }
  }

  async poll(handle: SubprocessHandle): Promise<JobStatus> {
    if (!handle.exit.isDone()) {
      return 'running';
    }
    return statusOf(handle);
  }

  /**
   * @throws JobFailedError when the script could not be started
   */
  async wait(handle: SubprocessHandle): Promise<JobStatus> {
    await handle.exit.whenSettled();
    const status = statusOf(handle);
    log.debug(`${handle.script} in ${handle.jobDir} finished as ${status}`);
    return status;
  }

  async materializeResult(handle: SubprocessHandle): Promise<unknown> {
    return this.store.readResult(handle.jobDir);
  }
}

function statusOf(handle: SubprocessHandle): JobStatus {
  const settlement = handle.exit.settled();
  if (settlement.state === 'failed') {
    throw settlement.error;
  }
  return settlement.value === 0 ? 'completed' : 'failed';
}
