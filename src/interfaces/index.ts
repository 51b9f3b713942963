/**
 * @fileoverview Central export for all interfaces.
 *
 * Import interfaces from this module for convenience:
 * ```typescript
 * import { IRunner, IClusterScheduler } from './interfaces';
 * ```
 *
 * @module interfaces
 */

export * from './ILogger';
export * from './IConfigProvider';
export * from './IFileSystem';
export * from './IProcessSpawner';
export * from './IExecutionBackend';
export * from './IClusterScheduler';
export * from './IRunner';
