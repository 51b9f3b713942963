/**
 * @fileoverview Runners and dispatch.
 *
 * @module runners
 */

export * from './dispatcher';
export * from './futureRunner';
export * from './serialRunner';
export * from './dryRunner';
