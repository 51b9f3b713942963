/**
 * @fileoverview Unit tests for job script environments
 */

import { suite, test } from 'mocha';
import * as assert from 'assert';
import { formatShellEnv, jobEnv } from '../../../backends/jobEnv';
import { ConfigurationError } from '../../../core/errors';

suite('Job Environment Unit Tests', () => {
  test('job variables follow the extra ones and win over them', () => {
    assert.deepStrictEqual(jobEnv('/runs/a', false, { SEED: '1', JOBWEAVE_RESUME: '1', UNSET: undefined }), {
      SEED: '1',
      JOBWEAVE_RESUME: '0',
      JOBWEAVE_JOB_DIR: '/runs/a',
    });
  });

  test('values are single-quoted for the shell', () => {
    assert.strictEqual(
      formatShellEnv({ NOTE: "it's $HOME", EMPTY: '' }),
      "export NOTE='it'\\''s $HOME'\nexport EMPTY=''\n",
    );
  });

  test('names the shell would reject are refused', () => {
    assert.throws(() => formatShellEnv({ '1ST': 'x' }), ConfigurationError);
    assert.throws(() => formatShellEnv({ 'A B': 'x' }), /^ConfigurationError: Invalid shell variable name: 'A B'$/);
  });
});
