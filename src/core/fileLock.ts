/**
 * @fileoverview Exclusive lock around a shared file.
 *
 * Combines an in-process async mutex with a lock file created with the
 * `wx` flag, so concurrent callers in this process queue up in order and
 * other processes on the same filesystem wait for the lock file to go away.
 * A lock file older than `staleMs` is treated as left behind by a crashed
 * process and taken over, unless it changed since it was judged stale.
 *
 * @module core/fileLock
 */

import * as fs from 'fs';
import * as path from 'path';
import { Logger } from './logger';
import { LockTimeoutError, errorCode } from './errors';
import { ensureDirAsync, sleep } from './utils';

const log = Logger.for('cluster');

/** Identity of a lock file at one point in time. */
export interface LockFileStamp {
  ino: number;
  mtimeMs: number;
}

export interface FileLockOptions {
  /** Delay between attempts while another holder has the lock (default 50ms) */
  retryDelayMs?: number;
  /** Give up after this long (default 10s) */
  timeoutMs?: number;
  /** Lock files older than this are removed (default 60s) */
  staleMs?: number;
}

/**
 * Scoped exclusive lock. The lock is always released when the callback
 * settles, whether it resolves or throws.
 */
export class FileLock {
  private tail: Promise<void> = Promise.resolve();
  private readonly retryDelayMs: number;
  private readonly timeoutMs: number;
  private readonly staleMs: number;

  constructor(readonly lockPath: string, options: FileLockOptions = {}) {
    this.retryDelayMs = options.retryDelayMs ?? 50;
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.staleMs = options.staleMs ?? 60_000;
  }

  /**
   * Run `fn` while holding the lock.
   */
  async withLock<T>(fn: () => Promise<T>): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => undefined;
    const current = new Promise<void>(resolve => { release = resolve; });
    this.tail = previous.then(() => current);

    await previous;
    try {
      await this.acquireFile();
      try {
        return await fn();
      } finally {
        await fs.promises.rm(this.lockPath, { force: true });
      }
    } finally {
      release();
    }
  }

  private async acquireFile(): Promise<void> {
    await ensureDirAsync(path.dirname(this.lockPath));
    const started = Date.now();

    for (;;) {
      try {
        const handle = await fs.promises.open(this.lockPath, 'wx');
        try {
          await handle.writeFile(`${process.pid}\n`);
        } finally {
          await handle.close();
        }
        return;
      } catch (error) {
        if (errorCode(error) !== 'EEXIST') {
          throw error;
        }
      }

      const stamp = await lockStamp(this.lockPath);
      if (stamp === undefined) {
        continue;
      }
      const age = Date.now() - stamp.mtimeMs;
      if (age > this.staleMs) {
        if (await removeLockIfUnchanged(this.lockPath, stamp)) {
          log.warn(`Removed stale lock ${this.lockPath} (${Math.round(age / 1000)}s old)`);
        }
        continue;
      }
      if (Date.now() - started >= this.timeoutMs) {
        throw new LockTimeoutError(this.lockPath, this.timeoutMs);
      }
      await sleep(this.retryDelayMs);
    }
  }
}

/** Inode and mtime of `lockPath`, or undefined when it is gone. */
export async function lockStamp(lockPath: string): Promise<LockFileStamp | undefined> {
  try {
    const stat = await fs.promises.stat(lockPath);
    return { ino: stat.ino, mtimeMs: stat.mtimeMs };
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      return undefined;
    }
    throw error;
  }
}

/**
 * Remove `lockPath` only while it is still the file described by `seen`.
 * A process that took over the same stale lock first may already have
 * replaced it with a live one.
 *
 * @returns whether the file was removed
 */
export async function removeLockIfUnchanged(lockPath: string, seen: LockFileStamp): Promise<boolean> {
  const current = await lockStamp(lockPath);
  if (!current || current.ino !== seen.ino || current.mtimeMs !== seen.mtimeMs) {
    return false;
  }
  await fs.promises.rm(lockPath, { force: true });
  return true;
}
