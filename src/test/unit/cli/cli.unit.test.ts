/**
 * @fileoverview Unit tests for the command line entry points
 */

import { suite, test, setup, teardown } from 'mocha';
import * as assert from 'assert';
import * as sinon from 'sinon';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { main as cleanMain } from '../../../cli/cleanResults';
import { main as waitMain } from '../../../cli/clusterWait';
import { JobResultStore } from '../../../store/jobResultStore';
import { ClusterJobWatcher } from '../../../cluster/watcher';
import { ClusterStatusCache } from '../../../cluster/statusCache';
import { FakeClusterScheduler } from '../helpers/fakeClusterScheduler';

suite('CLI Unit Tests', () => {
  let tempDir: string;
  let errorStub: sinon.SinonStub;

  setup(async () => {
    errorStub = sinon.stub(console, 'error');
    tempDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'cli-test-'));
  });

  teardown(async () => {
    sinon.restore();
    await fs.promises.rm(tempDir, { recursive: true, force: true });
  });

  suite('jobweave-clean', () => {
    let store: JobResultStore;
    let unfinished: string;

    setup(async () => {
      store = new JobResultStore();
      unfinished = path.join(tempDir, 'results', 'u');
      await store.prepare(unfinished, { a: 1 }, { canResume: false });
    });

    test('usage errors exit with 2', async () => {
      assert.strictEqual(await cleanMain([], store), 2);
      assert.strictEqual(await cleanMain(['a', 'b'], store), 2);
      assert.strictEqual(await cleanMain(['--bogus', 'a'], store), 2);
      assert.match(String(errorStub.lastCall.args[0]), /Usage: jobweave-clean <results> \[-n\|--dry-run\]$/);
    });

    test('dry run keeps the directories', async () => {
      assert.strictEqual(await cleanMain(['-n', path.join(tempDir, 'results')], store), 0);
      assert.strictEqual(fs.existsSync(unfinished), true);
    });

    test('removes incomplete directories', async () => {
      assert.strictEqual(await cleanMain([path.join(tempDir, 'results')], store), 0);
      assert.strictEqual(fs.existsSync(unfinished), false);
    });
  });

  suite('jobweave-wait', () => {
    let scheduler: FakeClusterScheduler;
    let watcher: ClusterJobWatcher;
    let jobDir: string;

    setup(() => {
      scheduler = new FakeClusterScheduler();
      let clock = 0;
      const now = () => clock;
      watcher = new ClusterJobWatcher(scheduler, new ClusterStatusCache({ minQueryIntervalMs: 0, now }), {
        pollIntervalMs: 10,
        pollJitterMs: 0,
        submitMarginMs: 0,
        now,
        sleep: async ms => {
          clock += ms;
        },
      });
      jobDir = path.join(tempDir, 'job');
      fs.mkdirSync(jobDir);
    });

    test('exits with 0 when the job completes', async () => {
      scheduler.answers.push('pending', 'completed');
      assert.strictEqual(await waitMain([jobDir, '--script', 'train.sh'], watcher), 0);
      assert.deepStrictEqual(scheduler.submissions, [{ jobDir, script: 'train.sh' }]);
    });

    test('exits with 1 when the job fails', async () => {
      scheduler.answers.push('failed');
      assert.strictEqual(await waitMain([jobDir], watcher), 1);
      assert.strictEqual(scheduler.submissions[0].script, 'job.sh');
    });

    test('exits with 1 on timeout', async () => {
      assert.strictEqual(await waitMain([jobDir, '--timeout', '0.05'], watcher), 1);
      assert.strictEqual(scheduler.queries.length, 5);
    });

    test('usage errors exit with 2', async () => {
      assert.strictEqual(await waitMain([], watcher), 2);
      assert.strictEqual(await waitMain([jobDir, '--timeout', 'soon'], watcher), 2);
      assert.match(String(errorStub.lastCall.args[0]), /^Invalid --timeout 'soon'\n/);
      assert.strictEqual(scheduler.submissions.length, 0);
    });
  });
});
