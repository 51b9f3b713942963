/**
 * @fileoverview Cluster status cache shared by all watchers.
 *
 * Many workflows may watch jobs on the same cluster; the cache keeps them
 * from asking the scheduler about the same job more often than
 * `minQueryIntervalMs`. Entries live in a JSON file guarded by a
 * {@link FileLock}. The lock covers each read and each read-modify-write,
 * never the scheduler query itself.
 *
 * Without a file path the cache is private to the process.
 *
 * @module cluster/statusCache
 */

import * as fs from 'fs';
import { Logger } from '../core/logger';
import { StatusCacheError, describeError, errorCode } from '../core/errors';
import { FileLock } from '../core/fileLock';
import { writeFileAtomic } from '../core/utils';
import { JOB_STATUSES } from '../backends/status';
import type { JobStatus } from '../backends/status';
import { compileValidator, formatErrors } from '../workflow/validation';

const log = Logger.for('cluster');

/** Entries older than this are dropped when the file is rewritten. */
const PRUNE_AGE_MS = 24 * 60 * 60 * 1000;

export interface CacheEntry {
  jobId: string;
  status: JobStatus;
  /** When the status was observed (ms since epoch) */
  observedAt: number;
}

interface CacheFile {
  version: 1;
  entries: Record<string, CacheEntry>;
}

/** Result of {@link ClusterStatusCache.lookup}. */
export interface CacheLookup {
  status: JobStatus;
  observedAt: number;
  /** False when the scheduler was queried for this lookup */
  fromCache: boolean;
}

export interface ClusterStatusCacheOptions {
  /** Shared cache file; omit for an in-memory cache */
  filePath?: string;
  minQueryIntervalMs: number;
  now?: () => number;
  /** Lock guarding the file (default `<filePath>.lock`) */
  lock?: FileLock;
}

const validateCacheFile = compileValidator<CacheFile>({
  type: 'object',
  properties: {
    version: { const: 1 },
    entries: {
      type: 'object',
      additionalProperties: {
        type: 'object',
        properties: {
          jobId: { type: 'string' },
          status: { enum: [...JOB_STATUSES] },
          observedAt: { type: 'number' },
        },
        required: ['jobId', 'status', 'observedAt'],
        additionalProperties: false,
      },
    },
  },
  required: ['version', 'entries'],
  additionalProperties: false,
});

export class ClusterStatusCache {
  readonly filePath?: string;
  private readonly minQueryIntervalMs: number;
  private readonly now: () => number;
  private readonly lock?: FileLock;
  private readonly memory = new Map<string, CacheEntry>();
  private readonly inflight = new Map<string, Promise<CacheLookup>>();

  constructor(options: ClusterStatusCacheOptions) {
    this.filePath = options.filePath;
    this.minQueryIntervalMs = options.minQueryIntervalMs;
    this.now = options.now ?? Date.now;
    if (options.filePath) {
      this.lock = options.lock ?? new FileLock(`${options.filePath}.lock`);
    }
  }

  /**
   * Status of `key`, from the cache when fresh, otherwise from `query`.
   * Concurrent lookups of one key in this process share a query.
   *
   * A status that was queried but could not be written back is still
   * returned.
   *
   * @throws StatusCacheError when the cache cannot be read
   * @throws whatever `query` throws; failed queries are not cached
   */
  lookup(key: string, query: () => Promise<JobStatus>): Promise<CacheLookup> {
    const pending = this.inflight.get(key);
    if (pending) {
      return pending;
    }
    const lookup = this.resolve(key, query).finally(() => {
      this.inflight.delete(key);
    });
    this.inflight.set(key, lookup);
    return lookup;
  }

  /** Stored entry for `key`, fresh or not. */
  async peek(key: string): Promise<CacheEntry | undefined> {
    const lock = this.lock;
    if (!lock) {
      return this.memory.get(key);
    }
    return lock.withLock(async () => (await this.load()).entries[key]);
  }

  /** Drop every entry. */
  async clear(): Promise<void> {
    this.memory.clear();
    const { lock, filePath } = this;
    if (lock && filePath) {
      await lock.withLock(() => fs.promises.rm(filePath, { force: true }));
    }
  }

  private async resolve(key: string, query: () => Promise<JobStatus>): Promise<CacheLookup> {
    let cached: CacheEntry | undefined;
    try {
      cached = await this.peek(key);
    } catch (error) {
      throw new StatusCacheError(`Could not read status cache ${this.filePath ?? ''}: ${describeError(error)}`, error);
    }
    if (cached && this.now() - cached.observedAt < this.minQueryIntervalMs) {
      log.debug(`Cache hit for job ${key}: ${cached.status}`);
      return { status: cached.status, observedAt: cached.observedAt, fromCache: true };
    }

    const status = await query();
    const entry: CacheEntry = { jobId: key, status, observedAt: this.now() };
    try {
      await this.store(key, entry);
    } catch (error) {
      log.warn(`Could not record status of job ${key} in ${this.filePath ?? ''}: ${describeError(error)}`);
    }
    return { status, observedAt: entry.observedAt, fromCache: false };
  }

  private async store(key: string, entry: CacheEntry): Promise<void> {
    const { lock, filePath } = this;
    if (!lock || !filePath) {
      this.memory.set(key, entry);
      return;
    }
    await lock.withLock(async () => {
      const data = await this.load();
      data.entries[key] = entry;
      this.prune(data);
      await writeFileAtomic(filePath, JSON.stringify(data, null, 2));
    });
  }

  private prune(data: CacheFile): void {
    const cutoff = this.now() - PRUNE_AGE_MS;
    for (const [key, entry] of Object.entries(data.entries)) {
      if (entry.observedAt < cutoff) {
        delete data.entries[key];
      }
    }
  }

  /** Current file content; an empty cache when missing or unreadable. */
  private async load(): Promise<CacheFile> {
    const empty: CacheFile = { version: 1, entries: {} };
    if (!this.filePath) {
      return empty;
    }

    let text: string;
    try {
      text = await fs.promises.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        return empty;
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      log.warn(`Ignoring malformed status cache ${this.filePath}`, error);
      return empty;
    }
    if (!validateCacheFile(parsed)) {
      log.warn(`Ignoring invalid status cache ${this.filePath}: ${formatErrors(validateCacheFile.errors).join('; ')}`);
      return empty;
    }
    return parsed;
  }
}
