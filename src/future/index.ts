/**
 * @fileoverview Futures, wait graph and scheduler.
 *
 * @module future
 */

export * from './types';
export * from './future';
export * from './tree';
export * from './waitGraph';
export * from './scheduler';
export * from './workerPool';
