#!/usr/bin/env node
/**
 * @fileoverview `jobweave-clean`: remove job directories that have
 * `kwargs.json` but no `result.json`.
 *
 * ```
 * jobweave-clean <results> [-n|--dry-run]
 * ```
 *
 * @module cli/cleanResults
 */

import { parseArgs } from 'util';
import { Logger } from '../core/logger';
import { EnvConfigProvider } from '../core/envConfigProvider';
import { describeError } from '../core/errors';
import { JobResultStore } from '../store/jobResultStore';

const log = Logger.for('cli');

const USAGE = 'Usage: jobweave-clean <results> [-n|--dry-run]';

/**
 * @returns the process exit code: 0 on success, 1 on error, 2 on usage error
 */
export async function main(argv: string[], store: JobResultStore = new JobResultStore()): Promise<number> {
  let root: string;
  let dryRun: boolean;
  try {
    const { values, positionals } = parseArgs({
      args: argv,
      options: {
        'dry-run': { type: 'boolean', short: 'n', default: false },
      },
      allowPositionals: true,
    });
    if (positionals.length !== 1) {
      throw new Error(`Expected one results directory, got ${positionals.length}`);
    }
    root = positionals[0];
    dryRun = values['dry-run'] ?? false;
  } catch (error) {
    console.error(`${describeError(error)}\n${USAGE}`);
    return 2;
  }

  try {
    const removed = await store.cleanIncomplete(root, { dryRun });
    log.info(`${dryRun ? 'Would remove' : 'Removed'} ${removed.length} incomplete job directories under ${root}`);
    return 0;
  } catch (error) {
    log.error(`Cleaning ${root} failed`, error);
    return 1;
  }
}

if (require.main === module) {
  Logger.initialize(new EnvConfigProvider());
  void main(process.argv.slice(2)).then(code => {
    process.exitCode = code;
  });
}
