/**
 * @fileoverview Unit tests for the Dispatcher
 */

import { suite, test, setup, teardown } from 'mocha';
import * as assert from 'assert';
import * as sinon from 'sinon';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { Dispatcher } from '../../../runners/dispatcher';
import { JobFactory } from '../../../job/job';
import { call } from '../../../workflow/closure';
import { defineTask } from '../../../workflow/task';
import {
  ConfigurationError,
  HashMismatchWithoutResumeError,
  JobFailedError,
  ValidationError,
} from '../../../core/errors';
import { FakeJobBackend, writeTemplate } from '../helpers/fakeJobBackend';

suite('Dispatcher Unit Tests', () => {
  let tempDir: string;
  let errorStub: sinon.SinonStub;
  let squareTemplate: string;
  let backend: FakeJobBackend;
  let dispatcher: Dispatcher;
  let jobs: JobFactory;

  setup(async () => {
    errorStub = sinon.stub(console, 'error');
    tempDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'dispatcher-test-'));
    squareTemplate = writeTemplate(path.join(tempDir, 'templates', 'square'), {
      backend: 'subprocess',
      parameters: { type: 'object', properties: { n: { type: 'integer' } }, required: ['n'] },
      resultMock: { square: 0 },
    });
    backend = new FakeJobBackend('subprocess', kwargs => ({ square: Number(kwargs.n) ** 2 }));
    dispatcher = new Dispatcher({ subprocess: backend });
    jobs = new JobFactory(path.join(tempDir, 'results'));
  });

  teardown(async () => {
    sinon.restore();
    await fs.promises.rm(tempDir, { recursive: true, force: true });
  });

  // =========================================================================
  // Tasks
  // =========================================================================

  suite('tasks', () => {
    const add = defineTask({
      name: 'add',
      fn: ([a, b]) => Number(a) + Number(b),
      mock: () => 0,
    });

    test('dispatch runs the task and checks the result', async () => {
      const closure = call(add, [2, 3]);
      assert.strictEqual(await dispatcher.dispatch(closure, closure.materializeNow()), 5);
    });

    test('a result of the wrong type is rejected', async () => {
      const wrong = defineTask<unknown>({ name: 'wrong', fn: () => 'five', mock: () => 0 });
      const closure = call(wrong);
      await assert.rejects(dispatcher.dispatch(closure, closure.materializeNow()), ValidationError);
    });

    test('executeTask finishes a synchronous task before returning', () => {
      assert.strictEqual(dispatcher.executeTask(add, { args: [1, 1], kwargs: {} }), 2);
    });

    test('executeTask returns the promise of an async task', async () => {
      const later = defineTask({ name: 'later', fn: async () => 'done', mock: () => '' });
      const value = dispatcher.executeTask(later, { args: [], kwargs: {} });
      assert.ok(value instanceof Promise);
      assert.strictEqual(await value, 'done');
    });
  });

  // =========================================================================
  // Jobs
  // =========================================================================

  suite('jobs', () => {
    test('runs the job once and reuses its stored result', async () => {
      const closure = jobs.call(squareTemplate, 'sq/3', { n: 3 });

      assert.deepStrictEqual(await dispatcher.dispatch(closure, closure.materializeNow()), { square: 9 });
      assert.deepStrictEqual(backend.requests, [{
        jobDir: path.join(tempDir, 'results', 'sq', '3'),
        templateDir: squareTemplate,
        script: 'run',
        resume: false,
        label: 'square:sq/3',
      }]);

      const again = jobs.call(squareTemplate, 'sq/3', { n: 3 });
      assert.deepStrictEqual(await dispatcher.dispatch(again, again.materializeNow()), { square: 9 });
      assert.strictEqual(backend.requests.length, 1);
    });

    test('other kwargs for a finished job are refused', async () => {
      const first = jobs.call(squareTemplate, 'sq/x', { n: 2 });
      await dispatcher.dispatch(first, first.materializeNow());

      const changed = jobs.call(squareTemplate, 'sq/x', { n: 5 });
      await assert.rejects(dispatcher.dispatch(changed, changed.materializeNow()), HashMismatchWithoutResumeError);
      assert.strictEqual(backend.requests.length, 1);
    });

    test('invalid parameters stop the job before its directory exists', async () => {
      const closure = jobs.call(squareTemplate, 'sq/bad', { n: 'three' });
      await assert.rejects(dispatcher.dispatch(closure, closure.materializeNow()), /expected integer at \/kwargs\/n/);
      assert.strictEqual(fs.existsSync(path.join(tempDir, 'results', 'sq', 'bad')), false);
    });

    test('an unsuccessful job fails the call', async () => {
      backend.status = 'failed';
      const closure = jobs.call(squareTemplate, 'sq/4', { n: 4 });
      const jobDir = path.join(tempDir, 'results', 'sq', '4');

      await assert.rejects(dispatcher.dispatch(closure, closure.materializeNow()), (error: unknown) => {
        assert.ok(error instanceof JobFailedError);
        assert.strictEqual(error.message, `Job 'square:sq/4' finished as failed (job: ${jobDir})`);
        return true;
      });
    });

    test('a result that does not match the mock is rejected', async () => {
      const sloppy = new Dispatcher({ subprocess: new FakeJobBackend('subprocess', () => ({ square: 'nine' })) });
      const closure = jobs.call(squareTemplate, 'sq/9', { n: 3 });
      await assert.rejects(sloppy.dispatch(closure, closure.materializeNow()), /expected number at \/square/);
    });

    test('a job without its backend is a configuration error', async () => {
      const sim = writeTemplate(path.join(tempDir, 'templates', 'sim'), { backend: 'cluster' });
      const closure = jobs.call(sim, 'sim/1');
      await assert.rejects(dispatcher.dispatch(closure, closure.materializeNow()), (error: unknown) => {
        assert.ok(error instanceof ConfigurationError);
        assert.strictEqual(error.message, "No cluster backend configured for 'sim'");
        return true;
      });
    });

    test('missing extra artifacts are reported', async () => {
      const jobDir = path.join(tempDir, 'results', 'sq', '5');
      fs.mkdirSync(jobDir, { recursive: true });
      fs.writeFileSync(path.join(jobDir, 'result.extra'), 'plot.png\n');

      const closure = jobs.call(squareTemplate, 'sq/5', { n: 5 });
      assert.deepStrictEqual(await dispatcher.dispatch(closure, closure.materializeNow()), { square: 25 });
      const warnings = errorStub.getCalls().map(c => String(c.args[0])).filter(line => line.includes('missing artifacts'));
      assert.strictEqual(warnings.length, 1);
      assert.match(warnings[0], /Result of 'square:sq\/5' lists missing artifacts: plot\.png/);
    });
  });
});
