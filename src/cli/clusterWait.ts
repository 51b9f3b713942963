#!/usr/bin/env node
/**
 * @fileoverview `jobweave-wait`: submit a job directory to the cluster at
 * most once and wait until it finishes.
 *
 * ```
 * jobweave-wait <jobDir> [--script job.sh] [--timeout <seconds>]
 * ```
 *
 * A directory that already holds `job.id` is reattached instead of being
 * resubmitted, so the command can be repeated after an interruption.
 *
 * @module cli/clusterWait
 */

import * as path from 'path';
import { parseArgs } from 'util';
import { Logger } from '../core/logger';
import { describeError } from '../core/errors';
import { isSuccessfulStatus } from '../backends/status';
import type { ClusterJobWatcher } from '../cluster/watcher';
import { createServices } from '../composition';

const log = Logger.for('cli');

const USAGE = 'Usage: jobweave-wait <jobDir> [--script job.sh] [--timeout <seconds>]';

interface WaitArgs {
  jobDir: string;
  script: string;
  timeoutMs?: number;
}

function parseWaitArgs(argv: string[]): WaitArgs {
  const { values, positionals } = parseArgs({
    args: argv,
    options: {
      script: { type: 'string', default: 'job.sh' },
      timeout: { type: 'string' },
    },
    allowPositionals: true,
  });
  if (positionals.length !== 1) {
    throw new Error(`Expected one job directory, got ${positionals.length}`);
  }

  let timeoutMs: number | undefined;
  if (values.timeout !== undefined) {
    const seconds = Number(values.timeout);
    if (!Number.isFinite(seconds) || seconds <= 0) {
      throw new Error(`Invalid --timeout '${values.timeout}'`);
    }
    timeoutMs = seconds * 1000;
  }
  return { jobDir: path.resolve(positionals[0]), script: values.script ?? 'job.sh', timeoutMs };
}

/**
 * @returns the process exit code: 0 when the job finished successfully,
 *   1 on failure or error, 2 on usage error
 */
export async function main(argv: string[], watcher?: ClusterJobWatcher): Promise<number> {
  let args: WaitArgs;
  try {
    args = parseWaitArgs(argv);
  } catch (error) {
    console.error(`${describeError(error)}\n${USAGE}`);
    return 2;
  }

  try {
    const cluster = watcher ?? createServices().watcher;
    const handle = await cluster.submitOnce(args.jobDir, args.script);
    const status = await cluster.waitForCompletion(handle, { timeoutMs: args.timeoutMs });
    if (!isSuccessfulStatus(status)) {
      log.error(`Job ${handle.id} in ${args.jobDir} finished as ${status}`);
      return 1;
    }
    log.info(`Job ${handle.id} in ${args.jobDir} finished as ${status}`);
    return 0;
  } catch (error) {
    log.error(`Waiting for ${args.jobDir} failed`, error);
    return 1;
  }
}

if (require.main === module) {
  void main(process.argv.slice(2)).then(code => {
    process.exitCode = code;
  });
}
