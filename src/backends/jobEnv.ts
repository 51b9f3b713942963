/**
 * @fileoverview Environment of job scripts.
 *
 * A script learns its job directory and whether it resumes from environment
 * variables. The same exports are written to `jobenv.sh` in the job
 * directory: cluster scripts source it, and sourcing it by hand reproduces
 * the environment a job ran with.
 *
 * @module backends/jobEnv
 */

import { ConfigurationError } from '../core/errors';
import { writeFileAtomic } from '../core/utils';
import type { IFileSystem } from '../interfaces/IFileSystem';
import { JOB_ENV_FILE, jobFile } from '../store/jobFiles';

/** Environment variable naming the job directory for the script */
export const JOB_DIR_ENV = 'JOBWEAVE_JOB_DIR';
/** Environment variable set to `1` when the job resumes earlier work */
export const JOB_RESUME_ENV = 'JOBWEAVE_RESUME';

const SHELL_NAME = /^[_a-zA-Z][_a-zA-Z0-9]*$/;

/**
 * Variables exported to a job: `extra` plus the job directory and resume flag.
 */
export function jobEnv(jobDir: string, resume: boolean, extra: NodeJS.ProcessEnv = {}): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(extra)) {
    if (value !== undefined) {
      env[key] = value;
    }
  }
  env[JOB_DIR_ENV] = jobDir;
  env[JOB_RESUME_ENV] = resume ? '1' : '0';
  return env;
}

/**
 * One `export` line per variable, values single-quoted.
 *
 * @throws ConfigurationError for a name the shell would not accept
 */
export function formatShellEnv(env: Record<string, string>): string {
  return Object.entries(env)
    .map(([key, value]) => {
      if (!SHELL_NAME.test(key)) {
        throw new ConfigurationError(`Invalid shell variable name: '${key}'`);
      }
      return `export ${key}='${value.replace(/'/g, `'\\''`)}'\n`;
    })
    .join('');
}

export async function writeJobEnv(jobDir: string, env: Record<string, string>, fileSystem: IFileSystem): Promise<void> {
  await writeFileAtomic(jobFile(jobDir, JOB_ENV_FILE), formatShellEnv(env), fileSystem);
}
