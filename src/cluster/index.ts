/**
 * @fileoverview Cluster module exports.
 *
 * @module cluster
 */

export * from './types';
export * from './slurmScheduler';
export * from './statusCache';
export * from './watcher';
