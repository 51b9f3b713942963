/**
 * @fileoverview Interface for file system operations abstraction.
 *
 * The job result store, the backends and the cluster watcher do all their
 * file I/O through this interface so tests can observe or fail individual
 * operations.
 *
 * @module interfaces/IFileSystem
 */

import type { Readable, Writable } from 'stream';

/**
 * Interface for file system operations.
 *
 * @example
 * ```typescript
 * class JobResultStore {
 *   constructor(private readonly fs: IFileSystem) {}
 *
 *   async hasResult(jobDir: string): Promise<boolean> {
 *     return this.fs.existsAsync(path.join(jobDir, 'result.json'));
 *   }
 * }
 * ```
 */
export interface IFileSystem {
  /**
   * Ensure a directory exists, creating it recursively if needed.
   * @param dirPath - Directory path to ensure
   */
  ensureDirAsync(dirPath: string): Promise<void>;

  /** Check whether a path exists. */
  existsAsync(filePath: string): Promise<boolean>;

  /** Read a UTF-8 text file. */
  readFileAsync(filePath: string): Promise<string>;

  /** Write a UTF-8 text file, replacing any previous content. */
  writeFileAsync(filePath: string, content: string): Promise<void>;

  /** Append UTF-8 text to a file, creating it if needed. */
  appendFileAsync(filePath: string, content: string): Promise<void>;

  /** Rename a file; replaces the destination atomically on POSIX. */
  renameAsync(oldPath: string, newPath: string): Promise<void>;

  /** Remove a file. */
  unlinkAsync(filePath: string): Promise<void>;

  /** Remove a file or directory tree. */
  rmAsync(filePath: string, options?: { recursive?: boolean; force?: boolean }): Promise<void>;

  /** Modification time in milliseconds since epoch. */
  mtimeAsync(filePath: string): Promise<number>;

  /** Copy a directory tree into `dest`, overwriting files that exist there. */
  copyDirAsync(src: string, dest: string): Promise<void>;

  /**
   * Open a file for streamed writing, truncating it. Open failures are
   * emitted as `error` on the stream.
   */
  createWriteStream(filePath: string): Writable;

  /** Open a file for streamed reading. Open failures are emitted as `error`. */
  createReadStream(filePath: string): Readable;
}
