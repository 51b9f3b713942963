/**
 * @fileoverview Core module exports.
 *
 * Logging, configuration, errors and filesystem helpers shared by every
 * other module.
 *
 * @module core
 */

export * from './errors';
export { Logger, ComponentLogger, LOG_COMPONENTS } from './logger';
export type { LogLevel, LogComponent } from './logger';
export * from './config';
export { EnvConfigProvider, toEnvName } from './envConfigProvider';
export { DefaultFileSystem } from './defaultFileSystem';
export { FileLock } from './fileLock';
export type { FileLockOptions } from './fileLock';
export { cpuCountMinusOne, writeFileAtomic } from './utils';
