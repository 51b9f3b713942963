/**
 * @fileoverview File references in job arguments.
 *
 * A kwargs leaf of the form `{ "$file": "<path>" }` names a file the job
 * reads. Relative paths resolve against the job directory. The sha256 of
 * every referenced file is kept in `kwargs.sha256`, in the format
 * `sha256sum` reads and writes, so a stored result is only reused while
 * the files it was computed from are unchanged.
 *
 * @module store/fileRefs
 */

import * as crypto from 'crypto';
import * as path from 'path';
import { FileReferenceError, SerializationError, describeError } from '../core/errors';
import { isPlainRecord } from '../future/tree';
import type { IFileSystem } from '../interfaces/IFileSystem';

export const FILE_REF_KEY = '$file';

export interface FileRef {
  $file: string;
}

/**
 * Mark `filePath` as a file the job depends on.
 *
 * @example
 * ```typescript
 * runner.run(jobs.call('templates/eval', 'eval/seed-1', { model: fileRef('../train/model.bin') }));
 * ```
 */
export function fileRef(filePath: string): FileRef {
  return { [FILE_REF_KEY]: filePath };
}

export function isFileRef(value: unknown): value is FileRef {
  return isPlainRecord(value) && Object.keys(value).length === 1 && typeof value[FILE_REF_KEY] === 'string';
}

/**
 * Referenced paths in the order they first appear.
 */
export function collectFileRefs(value: unknown): string[] {
  const found = new Set<string>();
  const visit = (node: unknown): void => {
    if (isFileRef(node)) {
      found.add(node.$file);
    } else if (Array.isArray(node)) {
      node.forEach(visit);
    } else if (isPlainRecord(node)) {
      Object.values(node).forEach(visit);
    }
  };
  visit(value);
  return [...found];
}

/** Referenced path to sha256 hex digest */
export type FileHashes = Map<string, string>;

/**
 * Hash every file referenced from `kwargs`.
 *
 * @throws FileReferenceError when a referenced file cannot be read
 */
export async function hashFileRefs(kwargs: unknown, jobDir: string, fileSystem: IFileSystem): Promise<FileHashes> {
  const hashes: FileHashes = new Map();
  for (const ref of collectFileRefs(kwargs)) {
    try {
      hashes.set(ref, await sha256File(path.resolve(jobDir, ref), fileSystem));
    } catch (error) {
      throw new FileReferenceError(`Cannot read referenced file '${ref}': ${describeError(error)}`, jobDir, error);
    }
  }
  return hashes;
}

function sha256File(file: string, fileSystem: IFileSystem): Promise<string> {
  return new Promise((resolve, reject) => {
    const hash = crypto.createHash('sha256');
    const stream = fileSystem.createReadStream(file);
    stream.on('data', (chunk: Buffer | string) => hash.update(chunk));
    stream.on('error', reject);
    stream.on('end', () => resolve(hash.digest('hex')));
  });
}

/**
 * `sha256sum` lines sorted by path; empty when nothing is referenced.
 */
export function formatHashes(hashes: FileHashes): string {
  return [...hashes]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([file, sha]) => `${sha}  ${file}\n`)
    .join('');
}

/**
 * Parse `sha256sum` output. Blank lines are skipped.
 *
 * @throws SerializationError on a line that is not `<hex digest>  <path>`
 */
export function parseHashes(text: string, file: string, jobDir?: string): FileHashes {
  const hashes: FileHashes = new Map();
  for (const line of text.split('\n')) {
    if (line.trim() === '') {
      continue;
    }
    const match = /^([0-9a-fA-F]{64}) [ *](.+)$/.exec(line);
    if (!match) {
      throw new SerializationError(`Malformed checksum line in ${file}: '${line}'`, { jobDir });
    }
    hashes.set(match[2], match[1].toLowerCase());
  }
  return hashes;
}
