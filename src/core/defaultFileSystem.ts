/**
 * @fileoverview Default IFileSystem implementation using Node.js fs module.
 *
 * @module core/defaultFileSystem
 */

import * as fs from 'fs';
import type { Readable, Writable } from 'stream';
import type { IFileSystem } from '../interfaces/IFileSystem';
import { ensureDirAsync, existsAsync } from './utils';

/**
 * Default file system implementation backed by Node.js fs module.
 */
export class DefaultFileSystem implements IFileSystem {
  async ensureDirAsync(dirPath: string): Promise<void> {
    await ensureDirAsync(dirPath);
  }

  async existsAsync(filePath: string): Promise<boolean> {
    return existsAsync(filePath);
  }

  async readFileAsync(filePath: string): Promise<string> {
    return fs.promises.readFile(filePath, 'utf8');
  }

  async writeFileAsync(filePath: string, content: string): Promise<void> {
    await fs.promises.writeFile(filePath, content, 'utf8');
  }

  async appendFileAsync(filePath: string, content: string): Promise<void> {
    await fs.promises.appendFile(filePath, content, 'utf8');
  }

  async renameAsync(oldPath: string, newPath: string): Promise<void> {
    await fs.promises.rename(oldPath, newPath);
  }

  async unlinkAsync(filePath: string): Promise<void> {
    await fs.promises.unlink(filePath);
  }

  async rmAsync(filePath: string, options?: { recursive?: boolean; force?: boolean }): Promise<void> {
    await fs.promises.rm(filePath, options);
  }

  async mtimeAsync(filePath: string): Promise<number> {
    const stat = await fs.promises.stat(filePath);
    return stat.mtimeMs;
  }

  async copyDirAsync(src: string, dest: string): Promise<void> {
    await fs.promises.cp(src, dest, { recursive: true, force: true });
  }

  createWriteStream(filePath: string): Writable {
    return fs.createWriteStream(filePath);
  }

  createReadStream(filePath: string): Readable {
    return fs.createReadStream(filePath);
  }
}
