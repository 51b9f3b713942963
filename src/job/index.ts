/**
 * @fileoverview Job templates.
 *
 * @module job
 */

export * from './jobInfo';
export * from './job';
