/**
 * @fileoverview Call targets, closures and validation.
 *
 * @module workflow
 */

export * from './task';
export * from './closure';
export * from './validation';
