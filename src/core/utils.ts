import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { randomUUID } from 'crypto';
import type { IFileSystem } from '../interfaces/IFileSystem';

/** The file operations an atomic write needs. */
export type AtomicWriteFileSystem = Pick<IFileSystem, 'ensureDirAsync' | 'writeFileAsync' | 'renameAsync' | 'rmAsync'>;

const nodeFileSystem: AtomicWriteFileSystem = {
  ensureDirAsync,
  writeFileAsync: (file, content) => fs.promises.writeFile(file, content, 'utf8'),
  renameAsync: (oldPath, newPath) => fs.promises.rename(oldPath, newPath),
  rmAsync: (file, options) => fs.promises.rm(file, options),
};

// ─────────────────────────────────────────────────────────────────────────────
// Async file utilities
// ─────────────────────────────────────────────────────────────────────────────

export async function ensureDirAsync(p: string): Promise<void> {
  try {
    await fs.promises.access(p);
  } catch {
    await fs.promises.mkdir(p, { recursive: true });
  }
}

/**
 * Read and parse a JSON file; `fallback` when missing or malformed.
 */
export async function readJSONAsync(file: string, fallback: unknown): Promise<unknown> {
  try {
    const content = await fs.promises.readFile(file, 'utf8');
    return JSON.parse(content);
  } catch {
    return fallback;
  }
}

export async function writeJSONAsync(file: string, obj: unknown): Promise<void> {
  await writeFileAtomic(file, JSON.stringify(obj, null, 2));
}

export async function existsAsync(p: string): Promise<boolean> {
  try {
    await fs.promises.access(p);
    return true;
  } catch {
    return false;
  }
}

/**
 * Write a file through a temp file in the same directory and a rename, so
 * readers see either the old content or the new one. The temp file is
 * removed when the write fails.
 */
export async function writeFileAtomic(
  file: string,
  content: string,
  fileSystem: AtomicWriteFileSystem = nodeFileSystem,
): Promise<void> {
  await fileSystem.ensureDirAsync(path.dirname(file));
  const tempPath = `${file}.tmp.${process.pid}.${randomUUID().slice(0, 8)}`;
  try {
    await fileSystem.writeFileAsync(tempPath, content);
    await fileSystem.renameAsync(tempPath, file);
  } catch (error) {
    await fileSystem.rmAsync(tempPath, { force: true });
    throw error;
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// System utilities
// ─────────────────────────────────────────────────────────────────────────────

export function cpuCountMinusOne(): number {
  const n = os.cpus().length || 2;
  return Math.max(1, n - 1);
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export function isPromise<T>(value: T | Promise<T>): value is Promise<T> {
  return value instanceof Promise;
}

/**
 * Uniform random integer in `[min, max]`.
 */
export function randomBetween(min: number, max: number, random: () => number = Math.random): number {
  if (max <= min) return min;
  return min + Math.floor(random() * (max - min + 1));
}
