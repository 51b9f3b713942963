/**
 * @fileoverview Unit tests for parameter and result validation
 */

import { suite, test } from 'mocha';
import * as assert from 'assert';
import { defineTask } from '../../../workflow/task';
import {
  formatErrors,
  schemaFromMock,
  validateAgainst,
  validateParameters,
  validateResult,
} from '../../../workflow/validation';
import { ValidationError } from '../../../core/errors';

const pair = defineTask({
  name: 'pair',
  fn: () => ({ a: 1, b: ['x'] }),
  mock: () => ({ a: 0, b: ['mock'] }),
  parameters: {
    type: 'object',
    properties: {
      args: { type: 'array', maxItems: 0 },
      kwargs: {
        type: 'object',
        properties: { size: { type: 'integer' } },
        required: ['size'],
        additionalProperties: false,
      },
    },
  },
});

suite('Validation Unit Tests', () => {
  suite('formatErrors', () => {
    test('no errors gives a placeholder', () => {
      assert.deepStrictEqual(formatErrors(null), ['validation failed (no details available)']);
      assert.deepStrictEqual(formatErrors([]), ['validation failed (no details available)']);
    });
  });

  suite('schemaFromMock', () => {
    test('leaves map to their JSON type', () => {
      assert.deepStrictEqual(schemaFromMock(1), { type: 'number' });
      assert.deepStrictEqual(schemaFromMock('s'), { type: 'string' });
      assert.deepStrictEqual(schemaFromMock(true), { type: 'boolean' });
      assert.deepStrictEqual(schemaFromMock(null), { type: 'null' });
      assert.deepStrictEqual(schemaFromMock(undefined), {});
    });

    test('arrays become tuples and records require their keys', () => {
      assert.deepStrictEqual(schemaFromMock({ xs: [1, 'a'], empty: [] }), {
        type: 'object',
        properties: {
          xs: {
            type: 'array',
            items: [{ type: 'number' }, { type: 'string' }],
            minItems: 2,
            maxItems: 2,
          },
          empty: { type: 'array' },
        },
        required: ['xs', 'empty'],
      });
    });
  });

  suite('validateResult', () => {
    test('accepts a result shaped like the mock', () => {
      validateResult(pair, [], {}, { a: 2, b: ['y'] });
    });

    test('reports a wrong leaf type', () => {
      assert.throws(() => validateResult(pair, [], {}, { a: '2', b: ['y'] }), (error: unknown) => {
        assert.ok(error instanceof ValidationError);
        assert.deepStrictEqual(error.details, ['expected number at /a']);
        assert.strictEqual(error.message, "Invalid result of 'pair': expected number at /a");
        return true;
      });
    });

    test('reports a missing key', () => {
      assert.throws(() => validateResult(pair, [], {}, { a: 1 }), /missing required field 'b' at \//);
    });

    test('targets without a mock accept anything', () => {
      const loose = defineTask({ name: 'loose', fn: () => 1 });
      validateResult(loose, [], {}, 'anything');
    });
  });

  suite('validateParameters', () => {
    test('checks args and kwargs together', () => {
      validateParameters(pair, [], { size: 3 });
      assert.throws(() => validateParameters(pair, [], { size: 3, extra: true }), /unknown property 'extra' at \/kwargs/);
      assert.throws(() => validateParameters(pair, [], {}), /missing required field 'size' at \/kwargs/);
    });

    test('required keys need not be listed under properties', () => {
      const sized = defineTask({
        name: 'sized',
        fn: () => 1,
        parameters: {
          type: 'object',
          properties: { kwargs: { type: 'object', required: ['size'] } },
        },
      });

      validateParameters(sized, [], { size: 1 });
      assert.throws(() => validateParameters(sized, [], {}), /^ValidationError: Invalid parameters for 'sized': missing required field 'size' at \/kwargs$/);
    });

    test('targets without a schema are not checked', () => {
      const open = defineTask({ name: 'open', fn: () => 1 });
      validateParameters(open, [1, 2, 3], { anything: true });
    });
  });

  test('an invalid schema is reported as such', () => {
    assert.throws(() => validateAgainst({ type: 'nope' }, 1, 'thing'), /^ValidationError: Invalid schema for thing: /);
  });
});
