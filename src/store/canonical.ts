/**
 * @fileoverview Canonical JSON and hashing of job arguments.
 *
 * Canonical text has sorted keys and two-space indentation, so equal
 * arguments always produce byte-identical files and hashes. Only JSON
 * values are accepted: anything `JSON.stringify` would drop, alter or
 * reject raises {@link SerializationError} instead.
 *
 * @module store/canonical
 */

import * as crypto from 'crypto';
import { SerializationError } from '../core/errors';
import { isPlainRecord } from '../future/tree';

/**
 * Serialize a JSON value canonically.
 *
 * @throws SerializationError for undefined, functions, symbols, bigints,
 *   non-finite numbers, class instances (Futures, Maps, Dates) and cycles
 */
export function canonicalJson(value: unknown): string {
  return write(value, '', '$', new Set());
}

function write(value: unknown, indent: string, where: string, ancestors: Set<object>): string {
  if (value === null) {
    return 'null';
  }
  if (typeof value === 'boolean') {
    return value ? 'true' : 'false';
  }
  if (typeof value === 'string') {
    return JSON.stringify(value);
  }
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new SerializationError(`Cannot serialize non-finite number at ${where}`);
    }
    return JSON.stringify(value);
  }
  if (typeof value !== 'object') {
    throw new SerializationError(`Cannot serialize ${typeof value} at ${where}`);
  }

  if (ancestors.has(value)) {
    throw new SerializationError(`Cannot serialize circular reference at ${where}`);
  }
  const inner = indent + '  ';

  if (Array.isArray(value)) {
    if (value.length === 0) return '[]';
    ancestors.add(value);
    const items = value.map((item: unknown, i) => inner + write(item, inner, `${where}[${i}]`, ancestors));
    ancestors.delete(value);
    return `[\n${items.join(',\n')}\n${indent}]`;
  }

  if (isPlainRecord(value)) {
    const keys = Object.keys(value).sort();
    if (keys.length === 0) return '{}';
    ancestors.add(value);
    const entries = keys.map(key => `${inner}${JSON.stringify(key)}: ${write(value[key], inner, `${where}.${key}`, ancestors)}`);
    ancestors.delete(value);
    return `{\n${entries.join(',\n')}\n${indent}}`;
  }

  const kind = value.constructor?.name ?? 'object';
  throw new SerializationError(`Cannot serialize ${kind} instance at ${where}`);
}

/**
 * sha256 hex digest of a text.
 */
export function sha256Hex(text: string): string {
  return crypto.createHash('sha256').update(text, 'utf8').digest('hex');
}

/**
 * Parse JSON text, reporting malformed content as a SerializationError.
 */
export function parseJson(text: string, file: string, jobDir?: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new SerializationError(`Malformed JSON in ${file}`, { jobDir, cause: error });
  }
}
