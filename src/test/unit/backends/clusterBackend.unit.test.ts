/**
 * @fileoverview Unit tests for ClusterBackend
 */

import { suite, test, setup, teardown } from 'mocha';
import * as assert from 'assert';
import * as sinon from 'sinon';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { ClusterBackend } from '../../../backends/clusterBackend';
import { ClusterJobWatcher } from '../../../cluster/watcher';
import { ClusterStatusCache } from '../../../cluster/statusCache';
import { ClusterWaitTimeoutError, TransientQueryError } from '../../../core/errors';
import type { JobRequest } from '../../../interfaces/IExecutionBackend';
import { FakeClusterScheduler } from '../helpers/fakeClusterScheduler';

suite('ClusterBackend Unit Tests', () => {
  let tempDir: string;
  let templateDir: string;
  let request: JobRequest;
  let scheduler: FakeClusterScheduler;
  let watcher: ClusterJobWatcher;
  let clock: number;

  setup(async () => {
    sinon.stub(console, 'error');
    tempDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'cluster-backend-test-'));
    templateDir = path.join(tempDir, 'templates', 'sim');
    await fs.promises.mkdir(templateDir, { recursive: true });
    await fs.promises.writeFile(path.join(templateDir, 'job.sh'), 'v1\n');

    clock = 1_000_000;
    const now = () => clock;
    scheduler = new FakeClusterScheduler();
    watcher = new ClusterJobWatcher(scheduler, new ClusterStatusCache({ minQueryIntervalMs: 0, now }), {
      pollIntervalMs: 100,
      pollJitterMs: 0,
      submitMarginMs: 0,
      now,
      sleep: async ms => {
        clock += ms;
      },
    });
    request = {
      jobDir: path.join(tempDir, 'results', 'sim-1'),
      templateDir,
      script: 'job.sh',
      resume: false,
      label: 'sim:sim-1',
    };
  });

  teardown(async () => {
    sinon.restore();
    await fs.promises.rm(tempDir, { recursive: true, force: true });
  });

  test('copies the template, submits, waits and reads the result', async () => {
    scheduler.answers.push('pending', 'running', 'completed');
    const backend = new ClusterBackend(watcher);

    const handle = await backend.submit(request);
    assert.strictEqual(fs.readFileSync(path.join(request.jobDir, 'job.sh'), 'utf8'), 'v1\n');
    assert.strictEqual(handle.id, '100');
    assert.strictEqual(
      fs.readFileSync(path.join(request.jobDir, 'jobenv.sh'), 'utf8'),
      `export JOBWEAVE_JOB_DIR='${request.jobDir}'\nexport JOBWEAVE_RESUME='0'\n`,
    );

    assert.strictEqual(await backend.wait(handle), 'completed');
    fs.writeFileSync(path.join(request.jobDir, 'result.json'), '[1, 2]');
    assert.deepStrictEqual(await backend.materializeResult(handle), [1, 2]);
  });

  test('a directory with job.id is reattached and left alone', async () => {
    const backend = new ClusterBackend(watcher);
    await backend.submit(request);
    fs.writeFileSync(path.join(templateDir, 'job.sh'), 'v2\n');

    const again = await backend.submit({ ...request, resume: true });
    assert.strictEqual(again.id, '100');
    assert.strictEqual(scheduler.submissions.length, 1);
    assert.strictEqual(fs.readFileSync(path.join(request.jobDir, 'job.sh'), 'utf8'), 'v1\n');
  });

  test('poll falls back to the last recorded status', async () => {
    const backend = new ClusterBackend(watcher);
    const handle = await backend.submit(request);

    scheduler.answers.push('running', new TransientQueryError('scontrol timed out'));
    assert.strictEqual(await backend.poll(handle), 'running');
    assert.strictEqual(await backend.poll(handle), 'running');
    assert.strictEqual(scheduler.queries.length, 2);
  });

  test('the wait limit is applied', async () => {
    const backend = new ClusterBackend(watcher, { waitTimeoutMs: 250 });
    const handle = await backend.submit(request);
    await assert.rejects(backend.wait(handle), ClusterWaitTimeoutError);
  });
});
