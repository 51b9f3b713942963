/**
 * @fileoverview Interface for process spawning abstraction.
 *
 * Thin wrapper around child_process.spawn to enable dependency injection
 * and unit testing without spawning real processes.
 *
 * @module interfaces/IProcessSpawner
 */

import { spawn } from 'child_process';
import type { SpawnOptions } from 'child_process';

/**
 * Minimal child process interface for testability.
 * Matches the subset of ChildProcess used by consumers.
 */
export interface ChildProcessLike {
  readonly pid?: number;
  readonly exitCode: number | null;
  readonly stdout: NodeJS.ReadableStream | null;
  readonly stderr: NodeJS.ReadableStream | null;
  kill(signal?: NodeJS.Signals | number): boolean;
  on(event: 'close', listener: (code: number | null) => void): this;
  on(event: 'error', listener: (error: Error) => void): this;
}

/**
 * Interface for spawning child processes.
 *
 * @example
 * ```typescript
 * class SlurmScheduler {
 *   constructor(private readonly spawner: IProcessSpawner) {}
 *
 *   submit(jobDir: string) {
 *     return runCommand(this.spawner, 'sbatch', ['--parsable', 'job.sh'], { cwd: jobDir });
 *   }
 * }
 * ```
 */
export interface IProcessSpawner {
  /**
   * Spawn a child process.
   *
   * @param command - The command to run
   * @param args - Arguments to pass to the command
   * @param options - Spawn options (cwd, env, stdio, etc.)
   */
  spawn(command: string, args: string[], options: SpawnOptions): ChildProcessLike;
}

/**
 * Default process spawner that delegates to child_process.spawn.
 */
export class DefaultProcessSpawner implements IProcessSpawner {
  spawn(command: string, args: string[], options: SpawnOptions): ChildProcessLike {
    return spawn(command, args, options);
  }
}
