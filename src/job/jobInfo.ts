/**
 * @fileoverview Job template description (`jobinfo.json`).
 *
 * Every job template directory carries a `jobinfo.json` next to the script
 * it runs:
 *
 * ```json
 * {
 *   "script": "run",
 *   "backend": "subprocess",
 *   "canResume": false,
 *   "parameters": { "type": "object", "properties": { "seed": { "type": "integer" } } },
 *   "resultMock": { "model": "" },
 *   "resources": {}
 * }
 * ```
 *
 * `parameters` is the schema of the job's keyword arguments and
 * `resultMock` the shape of its `result.json`.
 *
 * @module job/jobInfo
 */

import * as fs from 'fs';
import type { SchemaObject } from 'ajv';
import { ConfigurationError, describeError } from '../core/errors';
import { JOBINFO_FILE, jobFile } from '../store/jobFiles';
import { compileValidator, formatErrors } from '../workflow/validation';

/** Backends a job template may ask for. */
export type JobBackend = 'subprocess' | 'cluster';

/**
 * Parsed `jobinfo.json` with defaults applied.
 */
export interface JobInfo {
  script: string;
  backend: JobBackend;
  canResume: boolean;
  /** Schema of the keyword arguments; undefined accepts any */
  parameters?: SchemaObject;
  /** Stand-in result; undefined disables result validation */
  resultMock?: unknown;
  /** Backend-specific resource requests, passed through untouched */
  resources: Record<string, unknown>;
  description?: string;
}

interface JobInfoFile {
  script?: string;
  backend?: JobBackend;
  canResume?: boolean;
  parameters?: SchemaObject;
  resultMock?: unknown;
  resources?: Record<string, unknown>;
  description?: string;
}

const validateJobInfo = compileValidator<JobInfoFile>({
  type: 'object',
  properties: {
    script: { type: 'string', minLength: 1 },
    backend: { enum: ['subprocess', 'cluster'] },
    canResume: { type: 'boolean' },
    parameters: { type: 'object' },
    resultMock: {},
    resources: { type: 'object' },
    description: { type: 'string' },
  },
  additionalProperties: false,
});

/**
 * Read and validate the `jobinfo.json` of a template directory.
 *
 * @throws ConfigurationError when the file is missing, not JSON, or invalid
 */
export function loadJobInfo(templateDir: string): JobInfo {
  const file = jobFile(templateDir, JOBINFO_FILE);
  let text: string;
  try {
    text = fs.readFileSync(file, 'utf8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read ${file}: ${describeError(error)}`, { cause: error });
  }

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    throw new ConfigurationError(`Malformed JSON in ${file}: ${describeError(error)}`, { cause: error });
  }

  if (!validateJobInfo(data)) {
    throw new ConfigurationError(`Invalid ${file}: ${formatErrors(validateJobInfo.errors).join('; ')}`);
  }

  return {
    script: data.script ?? 'run',
    backend: data.backend ?? 'subprocess',
    canResume: data.canResume ?? false,
    parameters: data.parameters,
    resultMock: data.resultMock,
    resources: data.resources ?? {},
    description: data.description,
  };
}
