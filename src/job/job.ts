/**
 * @fileoverview Job templates and the factory that turns them into closures.
 *
 * A job call is `(locator, kwargs)`: the locator is the job directory
 * relative to the factory's results root, the kwargs end up in
 * `kwargs.json` for the script to read.
 *
 * @module job/job
 */

import * as path from 'path';
import type { SchemaObject } from 'ajv';
import { Logger } from '../core/logger';
import { ConfigurationError } from '../core/errors';
import { Closure } from '../workflow/closure';
import type { ClosureOptions } from '../workflow/closure';
import type { Args, JobTarget, Kwargs } from '../workflow/task';
import { loadJobInfo } from './jobInfo';
import type { JobBackend, JobInfo } from './jobInfo';

const log = Logger.for('job');

/**
 * A job template bound to a results root.
 */
export class JobTemplate implements JobTarget<unknown> {
  readonly kind = 'job';
  readonly name: string;

  constructor(readonly templateDir: string, readonly info: JobInfo, readonly root: string) {
    this.name = path.basename(templateDir);
  }

  get script(): string {
    return this.info.script;
  }

  get backend(): JobBackend {
    return this.info.backend;
  }

  get canResume(): boolean {
    return this.info.canResume;
  }

  describe(args: Args): string {
    return `${this.name}:${locatorOf(args)}`;
  }

  /** Positional arguments are fixed to the locator; kwargs follow `parameters`. */
  parametersSchema(): SchemaObject | undefined {
    if (!this.info.parameters) {
      return undefined;
    }
    return {
      type: 'object',
      properties: {
        args: { type: 'array', items: [{ type: 'string' }], minItems: 1, maxItems: 1 },
        kwargs: this.info.parameters,
      },
      required: ['args', 'kwargs'],
    };
  }

  resultMock(): unknown {
    return this.info.resultMock;
  }

  /**
   * @throws ConfigurationError when the locator escapes the results root
   */
  jobDir(args: Args): string {
    const locator = locatorOf(args);
    const dir = path.resolve(this.root, locator);
    const relative = path.relative(this.root, dir);
    if (relative === '' || relative.startsWith('..') || path.isAbsolute(relative)) {
      throw new ConfigurationError(`Job locator '${locator}' is not inside ${this.root}`);
    }
    return dir;
  }

  jobKwargs(_args: Args, kwargs: Kwargs): Record<string, unknown> {
    return { ...kwargs };
  }

  parseResult(raw: unknown): unknown {
    return raw;
  }
}

/**
 * Loads job templates once and builds job closures under a results root.
 *
 * @example
 * ```typescript
 * const jobs = new JobFactory('results');
 * const model = runner.run(jobs.call('templates/train', 'train/seed-1', { seed: 1 }));
 * ```
 */
export class JobFactory {
  readonly root: string;
  private readonly templates = new Map<string, JobTemplate>();

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  /**
   * The template in `templateDir`, loaded on first use.
   *
   * @throws ConfigurationError when its `jobinfo.json` is missing or invalid
   */
  template(templateDir: string): JobTemplate {
    const dir = path.resolve(templateDir);
    let template = this.templates.get(dir);
    if (!template) {
      template = new JobTemplate(dir, loadJobInfo(dir), this.root);
      this.templates.set(dir, template);
      log.debug(`Loaded job template ${template.name} (${template.backend})`, { dir });
    }
    return template;
  }

  /**
   * Closure running `templateDir` in `<root>/<locator>` with `kwargs`.
   */
  call(templateDir: string, locator: string, kwargs: Kwargs = {}, options: ClosureOptions = {}): Closure<unknown> {
    return new Closure(this.template(templateDir), [locator], kwargs, options);
  }
}

function locatorOf(args: Args): string {
  const locator = args[0];
  if (typeof locator !== 'string' || locator.length === 0) {
    throw new ConfigurationError('A job call needs its locator as the first argument');
  }
  return locator;
}

