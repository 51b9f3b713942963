/**
 * @fileoverview Unit tests for runCommand
 */

import { suite, test } from 'mocha';
import * as assert from 'assert';
import { runCommand } from '../../../process/processHelpers';
import { FakeProcess, FakeSpawner } from '../helpers/fakeProcess';

suite('Process Helpers Unit Tests', () => {
  test('collects output and the exit code', async () => {
    const spawner = new FakeSpawner();
    const proc = spawner.enqueue(new FakeProcess({ streams: true }));

    const running = runCommand(spawner, 'sbatch', ['--parsable', 'job.sh'], { cwd: '/jobs/a' });
    proc.finish(1, 'partial\n', 'sbatch: error\n');

    assert.deepStrictEqual(await running, { code: 1, stdout: 'partial\n', stderr: 'sbatch: error\n' });
    assert.strictEqual(spawner.calls[0].command, 'sbatch');
    assert.deepStrictEqual(spawner.calls[0].args, ['--parsable', 'job.sh']);
    assert.strictEqual(spawner.calls[0].options.cwd, '/jobs/a');
    assert.strictEqual(spawner.calls[0].options.shell, false);
  });

  test('kills the process on timeout', async () => {
    const spawner = new FakeSpawner();
    const proc = spawner.enqueue(new FakeProcess({ streams: true }));

    await assert.rejects(
      runCommand(spawner, 'scontrol', ['show', 'job', '1'], { timeoutMs: 20 }),
      /Command timed out after 20ms: scontrol/,
    );
    assert.strictEqual(proc.killed, true);
  });

  test('rejects when the command cannot start', async () => {
    const spawner = new FakeSpawner();
    const proc = spawner.enqueue(new FakeProcess());

    const running = runCommand(spawner, 'missing', []);
    proc.emit('error', new Error('spawn missing ENOENT'));
    await assert.rejects(running, /spawn missing ENOENT/);
  });
});
