/**
 * @fileoverview Parameter and result validation using Ajv
 *
 * Parameters are checked against the target's schema before anything runs.
 * Results are checked against a schema derived from the target's result
 * mock: same container shapes, same JSON types at the leaves.
 *
 * @module workflow/validation
 */

import Ajv from 'ajv';
import type { ErrorObject, SchemaObject, ValidateFunction } from 'ajv';
import { ValidationError } from '../core/errors';
import { isPlainRecord } from '../future/tree';
import type { Args, Kwargs, Target } from './task';

// ============================================================================
// VALIDATOR SINGLETONS
// ============================================================================

/**
 * For jobweave's own file formats.
 *
 * Configuration:
 * - allErrors: true - Collect all errors, not just the first
 * - strict: true - Enforce strict mode
 * - coerceTypes: false - Don't coerce types
 */
const ajv = new Ajv({
  allErrors: true,
  strict: true,
  allowUnionTypes: true,
  removeAdditional: false,
  useDefaults: false,
  coerceTypes: false,
});

/**
 * For schemas written by users and derived from mocks. Strict mode would
 * reject valid JSON Schema such as a `required` key that is not listed
 * under `properties`.
 */
const userAjv = new Ajv({
  allErrors: true,
  strict: false,
  allowUnionTypes: true,
  removeAdditional: false,
  useDefaults: false,
  coerceTypes: false,
});

// ============================================================================
// ERROR FORMATTING
// ============================================================================

/**
 * Format Ajv errors as one message per failing location.
 */
export function formatErrors(errors: ErrorObject[] | null | undefined): string[] {
  if (!errors || errors.length === 0) {
    return ['validation failed (no details available)'];
  }

  const messages: string[] = [];
  const seen = new Set<string>();

  for (const err of errors) {
    const path = err.instancePath || '/';
    const key = `${path}:${err.keyword}`;
    if (seen.has(key)) continue;
    seen.add(key);

    switch (err.keyword) {
      case 'required':
        messages.push(`missing required field '${String(err.params.missingProperty)}' at ${path}`);
        break;
      case 'additionalProperties':
        messages.push(`unknown property '${String(err.params.additionalProperty)}' at ${path}`);
        break;
      case 'type':
        messages.push(`expected ${String(err.params.type)} at ${path}`);
        break;
      default:
        messages.push(`${path} ${err.message ?? err.keyword}`);
    }
  }
  return messages;
}

// ============================================================================
// PUBLIC API
// ============================================================================

/**
 * Validate `data` against `schema`.
 *
 * @throws ValidationError listing every failing location
 */
export function validateAgainst(schema: SchemaObject, data: unknown, what: string): void {
  let validate: ValidateFunction;
  try {
    validate = userAjv.compile(schema);
  } catch (error) {
    throw new ValidationError(`Invalid schema for ${what}`, [error instanceof Error ? error.message : String(error)]);
  }
  try {
    if (!validate(data)) {
      throw new ValidationError(`Invalid ${what}`, formatErrors(validate.errors));
    }
  } finally {
    userAjv.removeSchema(schema);
  }
}

/**
 * Compile a schema for a file format read back by jobweave itself. The
 * returned function narrows its argument to `T`.
 */
export function compileValidator<T>(schema: SchemaObject): ValidateFunction<T> {
  return ajv.compile<T>(schema);
}

/**
 * Check a call's parameters against the target's schema.
 */
export function validateParameters<T>(target: Target<T>, args: Args, kwargs: Kwargs): void {
  const schema = target.parametersSchema();
  if (!schema) {
    return;
  }
  validateAgainst(schema, { args, kwargs }, `parameters for '${target.name}'`);
}

/**
 * Check a result against the schema derived from the target's mock.
 * Targets without a mock accept any result.
 */
export function validateResult<T>(target: Target<T>, args: Args, kwargs: Kwargs, result: unknown): void {
  const mock = target.resultMock(args, kwargs);
  if (mock === undefined) {
    return;
  }
  validateAgainst(schemaFromMock(mock), result, `result of '${target.name}'`);
}

/**
 * Derive a schema from a mock value. Arrays become fixed-length tuples,
 * plain records require their keys, other leaves match their JSON type.
 * Leaves with no JSON type accept anything.
 */
export function schemaFromMock(mock: unknown): SchemaObject {
  if (mock === null) {
    return { type: 'null' };
  }
  switch (typeof mock) {
    case 'boolean':
      return { type: 'boolean' };
    case 'number':
      return { type: 'number' };
    case 'string':
      return { type: 'string' };
  }
  if (Array.isArray(mock)) {
    if (mock.length === 0) {
      return { type: 'array' };
    }
    return {
      type: 'array',
      items: mock.map((item: unknown) => schemaFromMock(item)),
      minItems: mock.length,
      maxItems: mock.length,
    };
  }
  if (isPlainRecord(mock)) {
    const keys = Object.keys(mock);
    return {
      type: 'object',
      properties: Object.fromEntries(keys.map(key => [key, schemaFromMock(mock[key])])),
      required: keys,
    };
  }
  return {};
}
