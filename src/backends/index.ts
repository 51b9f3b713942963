/**
 * @fileoverview Execution backends.
 *
 * @module backends
 */

export * from './status';
export * from './jobEnv';
export * from './localBackend';
export * from './subprocessBackend';
export * from './clusterBackend';
