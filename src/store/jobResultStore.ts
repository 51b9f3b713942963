/**
 * @fileoverview Job result store
 *
 * Decides, for a job directory and the requested keyword arguments, whether
 * the stored result can be reused, the job must run (fresh or resumed), or
 * the record conflicts with the request.
 *
 * Record protocol:
 * - `kwargs.json` holds the canonical kwargs, `kwargs.hash` their sha256
 * - `kwargs.sha256` holds the hashes of files the kwargs reference
 * - `kwargs.hash` is removed before `kwargs.json` is replaced and written
 *   last, so a record with a hash is always complete
 * - a `result.json` is only trusted beside a matching hash and unchanged
 *   referenced files
 *
 * Every file is written through a temp file and a rename.
 *
 * @module store/jobResultStore
 */

import * as path from 'path';
import { glob } from 'glob';
import { Logger } from '../core/logger';
import { HashMismatchWithoutResumeError, JobRecordError, JobResultMissingError } from '../core/errors';
import type { RecordRejectReason } from '../core/errors';
import { DefaultFileSystem } from '../core/defaultFileSystem';
import { writeFileAtomic } from '../core/utils';
import type { IFileSystem } from '../interfaces/IFileSystem';
import { canonicalJson, parseJson, sha256Hex } from './canonical';
import { formatHashes, hashFileRefs, parseHashes } from './fileRefs';
import {
  KWARGS_FILE,
  KWARGS_HASH_FILE,
  KWARGS_NEW_FILE,
  KWARGS_NEW_SHA256_FILE,
  KWARGS_SHA256_FILE,
  RESULT_EXTRA_FILE,
  RESULT_FILE,
  jobFile,
} from './jobFiles';

const log = Logger.for('store');

/**
 * Outcome of {@link JobResultStore.prepare}.
 */
export type StoreDecision =
  | { action: 'cached'; jobDir: string }
  | { action: 'execute'; jobDir: string; resume: boolean };

export interface PrepareOptions {
  /** Whether the job can pick up a record that has no result */
  canResume: boolean;
}

export interface CleanOptions {
  /** Only report what would be removed */
  dryRun?: boolean;
}

export class JobResultStore {
  constructor(private readonly fs: IFileSystem = new DefaultFileSystem()) {}

  /**
   * Reconcile the job record with the requested kwargs.
   *
   * @throws SerializationError when kwargs are not JSON values
   * @throws FileReferenceError when a referenced file cannot be read
   * @throws JobRecordError when a result exists without kwargs
   * @throws HashMismatchWithoutResumeError when the record conflicts with
   *   the request and the job cannot resume
   */
  async prepare(jobDir: string, kwargs: Record<string, unknown>, options: PrepareOptions): Promise<StoreDecision> {
    const newText = canonicalJson(kwargs);
    const newHash = sha256Hex(newText);
    const fileHashes = formatHashes(await hashFileRefs(kwargs, jobDir, this.fs));

    await this.fs.ensureDirAsync(jobDir);
    const kwargsPath = jobFile(jobDir, KWARGS_FILE);
    const hashPath = jobFile(jobDir, KWARGS_HASH_FILE);
    const hasResult = await this.hasResult(jobDir);

    if (!(await this.fs.existsAsync(kwargsPath))) {
      if (hasResult) {
        throw new JobRecordError(`Found ${RESULT_FILE} without ${KWARGS_FILE}`, jobDir);
      }
      await this.writeRecord(jobDir, newText, newHash, fileHashes);
      log.debug(`New job record in ${jobDir}`);
      return { action: 'execute', jobDir, resume: false };
    }

    const storedText = await this.fs.readFileAsync(kwargsPath);
    if (isResetRecord(storedText)) {
      await this.writeRecord(jobDir, newText, newHash, fileHashes);
      if (hasResult) {
        log.warn(`${KWARGS_FILE} was reset in ${jobDir}; trusting the existing result`);
        return { action: 'cached', jobDir };
      }
      log.info(`Refreshed ${KWARGS_FILE} in ${jobDir}`);
      return { action: 'execute', jobDir, resume: false };
    }

    const storedTextHash = sha256Hex(storedText);
    let storedHash: string;
    if (await this.fs.existsAsync(hashPath)) {
      storedHash = (await this.fs.readFileAsync(hashPath)).trim();
    } else {
      storedHash = storedTextHash;
      await this.writeAtomic(hashPath, storedHash);
      log.info(`Restored missing ${KWARGS_HASH_FILE} in ${jobDir}`);
    }

    const storedCanonical = canonicalJson(parseJson(storedText, kwargsPath, jobDir));
    const consistent = storedHash === storedTextHash;
    let mismatch: RecordRejectReason | undefined;
    if (!consistent || storedCanonical !== newText) {
      mismatch = 'hash-mismatch';
    } else if (!(await this.fileHashesMatch(jobDir, fileHashes))) {
      mismatch = 'file-hash-mismatch';
    }

    if (!mismatch && hasResult) {
      log.debug(`Reusing result in ${jobDir}`);
      return { action: 'cached', jobDir };
    }

    if (mismatch) {
      log.debug(`Record mismatch in ${jobDir}`, { mismatch, consistent, storedHash, newHash });
      if (mismatch === 'hash-mismatch') {
        await this.writeAtomic(jobFile(jobDir, KWARGS_NEW_FILE), newText);
      } else {
        await this.writeAtomic(jobFile(jobDir, KWARGS_NEW_SHA256_FILE), fileHashes);
      }
      if (hasResult || !options.canResume) {
        throw new HashMismatchWithoutResumeError(jobDir, mismatch);
      }
    } else if (!options.canResume) {
      throw new HashMismatchWithoutResumeError(jobDir, 'missing-result');
    }

    await this.writeRecord(jobDir, newText, newHash, fileHashes);
    log.info(`Resuming job in ${jobDir}`);
    return { action: 'execute', jobDir, resume: true };
  }

  async hasResult(jobDir: string): Promise<boolean> {
    return this.fs.existsAsync(jobFile(jobDir, RESULT_FILE));
  }

  /**
   * Parse `result.json`.
   *
   * @throws JobResultMissingError when the file does not exist
   * @throws SerializationError when it is not valid JSON
   */
  async readResult(jobDir: string): Promise<unknown> {
    const resultPath = jobFile(jobDir, RESULT_FILE);
    if (!(await this.fs.existsAsync(resultPath))) {
      throw new JobResultMissingError(jobDir);
    }
    return parseJson(await this.fs.readFileAsync(resultPath), resultPath, jobDir);
  }

  /**
   * Write `result.json` as canonical JSON.
   */
  async writeResult(jobDir: string, value: unknown): Promise<void> {
    await this.fs.ensureDirAsync(jobDir);
    await this.writeAtomic(jobFile(jobDir, RESULT_FILE), canonicalJson(value));
  }

  /**
   * Artifact names listed in `result.extra`; empty when the file is absent.
   */
  async readExtra(jobDir: string): Promise<string[]> {
    const extraPath = jobFile(jobDir, RESULT_EXTRA_FILE);
    if (!(await this.fs.existsAsync(extraPath))) {
      return [];
    }
    const text = await this.fs.readFileAsync(extraPath);
    return text
      .split('\n')
      .map(line => line.replace(/#.*$/, '').trim())
      .filter(line => line.length > 0);
  }

  /** Artifacts listed in `result.extra` that are not in the job directory. */
  async missingExtras(jobDir: string): Promise<string[]> {
    const missing: string[] = [];
    for (const name of await this.readExtra(jobDir)) {
      if (!(await this.fs.existsAsync(jobFile(jobDir, name)))) {
        missing.push(name);
      }
    }
    return missing;
  }

  /**
   * Job directories under `root` that have kwargs but no result.
   */
  async findIncomplete(root: string): Promise<string[]> {
    const kwargsFiles = await glob(`**/${KWARGS_FILE}`, { cwd: root, absolute: true, dot: true });
    const incomplete: string[] = [];
    for (const file of kwargsFiles.sort()) {
      const jobDir = path.dirname(file);
      if (!(await this.hasResult(jobDir))) {
        incomplete.push(jobDir);
      }
    }
    return incomplete;
  }

  /**
   * Remove incomplete job directories under `root`.
   *
   * @returns the directories removed (or that would be, on a dry run)
   */
  async cleanIncomplete(root: string, options: CleanOptions = {}): Promise<string[]> {
    const incomplete = await this.findIncomplete(root);
    for (const jobDir of incomplete) {
      if (options.dryRun) {
        log.info(`Would remove ${jobDir}`);
      } else {
        log.info(`Removing ${jobDir}`);
        await this.fs.rmAsync(jobDir, { recursive: true, force: true });
      }
    }
    return incomplete;
  }

  /**
   * Compare stored file hashes with `fileHashes`. A missing `kwargs.sha256`
   * is written rather than compared.
   *
   * @throws SerializationError when the stored hashes are malformed
   */
  private async fileHashesMatch(jobDir: string, fileHashes: string): Promise<boolean> {
    const sumsPath = jobFile(jobDir, KWARGS_SHA256_FILE);
    if (!(await this.fs.existsAsync(sumsPath))) {
      if (fileHashes !== '') {
        await this.writeAtomic(sumsPath, fileHashes);
        log.info(`Restored missing ${KWARGS_SHA256_FILE} in ${jobDir}`);
      }
      return true;
    }
    const stored = parseHashes(await this.fs.readFileAsync(sumsPath), sumsPath, jobDir);
    return formatHashes(stored) === fileHashes;
  }

  /**
   * Replace kwargs, file hashes and hash: hash removed first, written last.
   */
  private async writeRecord(jobDir: string, text: string, hash: string, fileHashes: string): Promise<void> {
    const sumsPath = jobFile(jobDir, KWARGS_SHA256_FILE);
    await this.fs.rmAsync(jobFile(jobDir, KWARGS_HASH_FILE), { force: true });
    await this.writeAtomic(jobFile(jobDir, KWARGS_FILE), text);
    if (fileHashes !== '') {
      await this.writeAtomic(sumsPath, fileHashes);
    } else if (await this.fs.existsAsync(sumsPath)) {
      await this.fs.rmAsync(sumsPath, { force: true });
    }
    await this.writeAtomic(jobFile(jobDir, KWARGS_HASH_FILE), hash);
  }

  private async writeAtomic(file: string, content: string): Promise<void> {
    await writeFileAtomic(file, content, this.fs);
  }
}

/** An empty or `null` kwargs file asks for a refresh. */
function isResetRecord(text: string): boolean {
  const trimmed = text.trim();
  return trimmed === '' || trimmed === 'null';
}
