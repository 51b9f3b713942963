/**
 * @fileoverview jobweave public API.
 *
 * @example
 * ```typescript
 * import { call, createFutureRunner, defineTask } from 'jobweave';
 *
 * const add = defineTask({ name: 'add', fn: ([a, b]) => Number(a) + Number(b), mock: () => 0 });
 * const runner = createFutureRunner();
 * const a = runner.run(call(add, [2, 3]));
 * const b = runner.run(call(add, [a, 3], {}, { schedule: true }));
 * console.log(await b.wait()); // 8
 * await runner.shutdown();
 * ```
 *
 * @module jobweave
 */

export * from './core';
export * from './interfaces';
export * from './future';
export * from './workflow';
export * from './store/jobResultStore';
export * from './store/jobFiles';
export { canonicalJson, sha256Hex } from './store/canonical';
export * from './store/fileRefs';
export * from './backends';
export * from './cluster';
export * from './runners';
export * from './job';
export * from './composition';
