/**
 * @fileoverview Process utilities for common spawning patterns
 *
 * Delegates to IProcessSpawner for consistency and testability.
 *
 * @module process/processHelpers
 */

import type { IProcessSpawner } from '../interfaces/IProcessSpawner';

export interface ExecOptions {
  /** Working directory */
  cwd?: string;
  /** Timeout in milliseconds (default: 5000) */
  timeoutMs?: number;
  /** Environment for the child */
  env?: NodeJS.ProcessEnv;
}

/** Outcome of a command that ran to completion. */
export interface ExecResult {
  code: number | null;
  stdout: string;
  stderr: string;
}

/**
 * Run a command and collect its output, whatever its exit code.
 *
 * @throws Error if the command cannot be spawned or times out
 */
export function runCommand(
  spawner: IProcessSpawner,
  command: string,
  args: string[],
  options: ExecOptions = {}
): Promise<ExecResult> {
  const timeoutMs = options.timeoutMs ?? 5000;
  return new Promise((resolve, reject) => {
    const proc = spawner.spawn(command, args, {
      cwd: options.cwd,
      env: options.env,
      shell: false,
      stdio: ['ignore', 'pipe', 'pipe'],
      windowsHide: true
    });

    let stdout = '';
    let stderr = '';
    let killed = false;

    const timer = setTimeout(() => {
      killed = true;
      proc.kill('SIGTERM');
      reject(new Error(`Command timed out after ${timeoutMs}ms: ${command}`));
    }, timeoutMs);

    proc.stdout?.on('data', (data: Buffer) => {
      stdout += data.toString();
    });

    proc.stderr?.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    proc.on('close', (code) => {
      clearTimeout(timer);
      if (killed) {return;}
      resolve({ code, stdout, stderr });
    });

    proc.on('error', (err) => {
      clearTimeout(timer);
      reject(err);
    });
  });
}
