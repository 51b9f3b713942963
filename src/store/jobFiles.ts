/**
 * @fileoverview Names of the files that make up a job record.
 *
 * @module store/jobFiles
 */

import * as path from 'path';

/** Canonical JSON of the call's keyword arguments */
export const KWARGS_FILE = 'kwargs.json';
/** sha256 hex of {@link KWARGS_FILE}; written last, so its presence marks a complete record */
export const KWARGS_HASH_FILE = 'kwargs.hash';
/** Requested kwargs written beside a record they do not match */
export const KWARGS_NEW_FILE = 'kwargs-new.json';
/** sha256 of each file the kwargs reference; absent when they reference none */
export const KWARGS_SHA256_FILE = 'kwargs.sha256';
/** Current file hashes written beside a record whose files changed */
export const KWARGS_NEW_SHA256_FILE = 'kwargs-new.sha256';
/** Result of the job; only valid with a matching hash */
export const RESULT_FILE = 'result.json';
/** Extra artifact file names, one per line, `#` starts a comment */
export const RESULT_EXTRA_FILE = 'result.extra';
/** Cluster job identifier, `id` or `id;cluster` */
export const JOB_ID_FILE = 'job.id';
/** Log of observed cluster status transitions */
export const JOB_STATUS_FILE = 'job.status';
/** Shell exports a script runs with; source it to reproduce the environment */
export const JOB_ENV_FILE = 'jobenv.sh';
/** Job template description */
export const JOBINFO_FILE = 'jobinfo.json';

export function jobFile(jobDir: string, name: string): string {
  return path.join(jobDir, name);
}

/**
 * Files capturing a script's stdout and stderr.
 */
export function scriptOutputFiles(jobDir: string, script: string): { out: string; err: string } {
  const base = path.basename(script);
  return {
    out: path.join(jobDir, `${base}.out`),
    err: path.join(jobDir, `${base}.err`),
  };
}
