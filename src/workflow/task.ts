/**
 * @fileoverview Call targets
 *
 * A target is either a task function run in this process or a job template
 * run in its own directory by a subprocess or cluster backend. Both carry an
 * optional parameter schema and a result mock; the mock doubles as the
 * shape of the result for validation, dry runs and per-leaf futures.
 *
 * @module workflow/task
 */

import type { SchemaObject } from 'ajv';

/** Positional arguments of a call. */
export type Args = readonly unknown[];

/** Keyword arguments of a call. */
export type Kwargs = Readonly<Record<string, unknown>>;

/** Backends a call can be dispatched to. */
export type BackendKind = 'local' | 'subprocess' | 'cluster';

interface TargetBase<T> {
  /** Short name used in labels and logs */
  readonly name: string;

  /** Label for one call of this target. */
  describe(args: Args, kwargs: Kwargs): string;

  /**
   * Schema for `{ args, kwargs }`, checked before execution.
   * Undefined skips validation.
   */
  parametersSchema(): SchemaObject | undefined;

  /** Stand-in result of the call, or undefined when the target has none. */
  resultMock(args: Args, kwargs: Kwargs): T | undefined;
}

/**
 * Target executed in-process by the local backend.
 */
export interface TaskFunction<T> extends TargetBase<T> {
  readonly kind: 'task';
  execute(args: unknown[], kwargs: Record<string, unknown>): T | Promise<T>;
}

/**
 * Target executed in a job directory from a template.
 */
export interface JobTarget<T> extends TargetBase<T> {
  readonly kind: 'job';
  /** Template directory copied into the job directory before the run */
  readonly templateDir: string;
  /** Script run inside the job directory */
  readonly script: string;
  readonly backend: Exclude<BackendKind, 'local'>;
  /** Whether a job whose record lost its result may be resumed in place */
  readonly canResume: boolean;

  /** Absolute job directory for a call. */
  jobDir(args: Args, kwargs: Kwargs): string;

  /** Keyword arguments written to `kwargs.json`. */
  jobKwargs(args: Args, kwargs: Kwargs): Record<string, unknown>;

  /** Turn the parsed `result.json` into the call's value. */
  parseResult(raw: unknown): T;
}

export type Target<T> = TaskFunction<T> | JobTarget<T>;

/**
 * Options for {@link defineTask}.
 */
export interface TaskOptions<T> {
  name: string;
  fn: (args: unknown[], kwargs: Record<string, unknown>) => T | Promise<T>;
  /** Schema for `{ args, kwargs }` */
  parameters?: SchemaObject;
  /** Produces the stand-in result */
  mock?: (args: Args, kwargs: Kwargs) => T;
  describe?: (args: Args, kwargs: Kwargs) => string;
}

/**
 * Wrap a function as a task target.
 *
 * @example
 * ```typescript
 * const add = defineTask({
 *   name: 'add',
 *   fn: ([a, b]) => Number(a) + Number(b),
 *   mock: () => 0,
 * });
 * ```
 */
export function defineTask<T>(options: TaskOptions<T>): TaskFunction<T> {
  return {
    kind: 'task',
    name: options.name,
    describe: (args, kwargs) => options.describe?.(args, kwargs) ?? options.name,
    parametersSchema: () => options.parameters,
    resultMock: (args, kwargs) => options.mock?.(args, kwargs),
    execute: (args, kwargs) => options.fn(args, kwargs),
  };
}
