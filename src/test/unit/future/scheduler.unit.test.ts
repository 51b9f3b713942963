/**
 * @fileoverview Unit tests for the Scheduler
 */

import { suite, test, setup } from 'mocha';
import * as assert from 'assert';
import * as sinon from 'sinon';
import { Future } from '../../../future/future';
import { WaitGraph } from '../../../future/waitGraph';
import { Scheduler } from '../../../future/scheduler';
import { DependencyCycleError, SchedulerClosedError, UpstreamFailureError } from '../../../core/errors';

suite('Scheduler Unit Tests', () => {
  let graph: WaitGraph;
  let scheduler: Scheduler;

  setup(() => {
    graph = new WaitGraph();
    scheduler = new Scheduler(graph);
  });

  test('starts only once the dependencies are done', () => {
    const a = new Future<number>('a');
    const work = new Future<number>('work');
    const start = sinon.spy(() => work);

    const scheduled = scheduler.submit('s', [a], start);
    assert.strictEqual(start.callCount, 0);
    assert.strictEqual(scheduled.state, 'pending');
    assert.strictEqual(scheduler.inflightCount, 1);

    a.setResult(1);
    assert.strictEqual(start.callCount, 1);
    assert.strictEqual(scheduled.state, 'running');

    work.setResult(5);
    assert.strictEqual(scheduled.result(), 5);
    assert.strictEqual(scheduler.inflightCount, 0);
  });

  test('no dependencies starts right away', () => {
    const start = sinon.spy(() => {
      const work = new Future<string>('work');
      work.setResult('now');
      return work;
    });
    const scheduled = scheduler.submit('s', [], start);
    assert.strictEqual(start.callCount, 1);
    assert.strictEqual(scheduled.result(), 'now');
  });

  test('a failed dependency fails the scheduled future without starting it', () => {
    const a = new Future<number>('a');
    const start = sinon.spy(() => new Future<number>('work'));
    const scheduled = scheduler.submit('s', [a], start);

    a.setError(new Error('a broke'));
    assert.strictEqual(start.callCount, 0);
    const error = scheduled.error();
    assert.ok(error instanceof UpstreamFailureError);
    assert.strictEqual(error.upstreamLabel, 'a');
  });

  test('failure runs down a chain of scheduled futures', () => {
    const a = new Future<number>('a');
    const start = sinon.spy(() => new Future<number>('work'));
    const b = scheduler.submit('b', [a], start);
    const c = scheduler.submit('c', [b], start);

    a.setError(new Error('a broke'));
    assert.strictEqual(start.callCount, 0);
    assert.strictEqual(b.error(), c.error());
  });

  test('a throwing start fails the scheduled future', () => {
    const scheduled = scheduler.submit('s', [], () => {
      throw new Error('cannot start');
    });
    assert.throws(() => scheduled.result(), /cannot start/);
  });

  test('a work failure is adopted as is', () => {
    const work = new Future<number>('work');
    const scheduled = scheduler.submit('s', [], () => work);
    const cause = new Error('work broke');
    work.setError(cause);
    assert.strictEqual(scheduled.error(), cause);
  });

  test('drain resolves once nothing is in flight', async () => {
    const a = new Future<number>('a');
    const work = new Future<number>('work');
    scheduler.submit('s', [a], () => work);

    let drained = false;
    const draining = scheduler.drain().then(() => {
      drained = true;
    });
    await new Promise(resolve => setImmediate(resolve));
    assert.strictEqual(drained, false);

    a.setResult(1);
    work.setResult(2);
    await draining;
    assert.strictEqual(drained, true);
  });

  test('shutdown refuses new work and waits for scheduled work', async () => {
    const work = new Future<number>('work');
    const scheduled = scheduler.submit('s', [], () => work);

    const stopping = scheduler.shutdown();
    assert.strictEqual(scheduler.isClosed, true);
    assert.throws(() => scheduler.submit('late', [], () => work), SchedulerClosedError);

    work.setResult(1);
    await stopping;
    assert.strictEqual(scheduled.result(), 1);
  });

  test('cycle checks see through scheduled futures', () => {
    const a = new Future<number>('a');
    const scheduled = scheduler.submit('s', [a], () => new Future<number>('work'));
    const after = graph.submit([scheduled], 'x');

    assert.throws(() => graph.link(scheduled.dependencies, [after]), (error: unknown) => {
      assert.ok(error instanceof DependencyCycleError);
      assert.deepStrictEqual(error.cycle, ['deps(s)', 'x', 's', 'deps(s)']);
      return true;
    });
  });
});
