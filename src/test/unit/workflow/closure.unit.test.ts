/**
 * @fileoverview Unit tests for Closure
 */

import { suite, test } from 'mocha';
import * as assert from 'assert';
import { Future, failedFuture, resolvedFuture } from '../../../future/future';
import { call, Closure } from '../../../workflow/closure';
import { defineTask } from '../../../workflow/task';
import { FutureNotDoneError, UpstreamFailureError } from '../../../core/errors';

const echo = defineTask({
  name: 'echo',
  fn: (args, kwargs) => ({ args, kwargs }),
});

suite('Closure Unit Tests', () => {
  test('arguments are copied and frozen', () => {
    const list = [1, 2];
    const options = { depth: { max: 3 } };
    const closure = call(echo, [list], { options });

    list.push(3);
    options.depth.max = 9;

    assert.deepStrictEqual(closure.args, [[1, 2]]);
    assert.deepStrictEqual(closure.kwargs, { options: { depth: { max: 3 } } });
    assert.strictEqual(Object.isFrozen(closure.args[0]), true);
    assert.strictEqual(Object.isFrozen(closure.kwargs.options), true);
    assert.strictEqual(Object.isFrozen(closure), true);
  });

  test('futures are kept by reference and collected once', () => {
    const f = new Future<number>('f');
    const g = resolvedFuture(2, 'g');
    const closure = call(echo, [{ x: f }, [f, g]]);

    assert.deepStrictEqual(closure.dependencies().map(dep => dep.label), ['f', 'g']);
    assert.strictEqual(closure.dependencies()[0], f);
    assert.deepStrictEqual(closure.unresolved().map(dep => dep.label), ['f']);
  });

  test('materializeNow substitutes values at every depth', () => {
    const a = resolvedFuture(5, 'a');
    const closure = call(echo, [a, [a, 'x']], { nested: { value: a } });

    assert.deepStrictEqual(closure.materializeNow(), {
      args: [5, [5, 'x']],
      kwargs: { nested: { value: 5 } },
    });
  });

  test('materializeNow throws for a pending dependency', () => {
    const closure = call(echo, [new Future<number>('slow')]);
    assert.throws(() => closure.materializeNow(), FutureNotDoneError);
  });

  test('materializeNow wraps a failed dependency', () => {
    const closure = call(echo, [failedFuture(new Error('gone'), 'lost')]);
    assert.throws(() => closure.materializeNow(), (error: unknown) => {
      assert.ok(error instanceof UpstreamFailureError);
      assert.strictEqual(error.upstreamLabel, 'lost');
      return true;
    });
  });

  test('materialize waits for dependencies', async () => {
    const a = new Future<number>('a');
    const closure = call(echo, [], { a });
    const materialized = closure.materialize();
    a.setResult(4);
    assert.deepStrictEqual(await materialized, { args: [], kwargs: { a: 4 } });
  });

  test('materialize rejects with an upstream failure', async () => {
    const a = new Future<number>('a');
    const closure = call(echo, [a]);
    const materialized = closure.materialize();
    a.setError(new Error('late failure'));
    await assert.rejects(materialized, /Upstream future 'a' failed: late failure/);
  });

  test('label and defaults', () => {
    const closure = new Closure(echo);
    assert.strictEqual(closure.describe(), 'echo');
    assert.strictEqual(closure.toString(), 'Closure(echo)');
    assert.strictEqual(closure.schedule, false);
    assert.strictEqual(call(echo, [], {}, { schedule: true }).schedule, true);
    assert.strictEqual(closure.resultMock(), undefined);
  });
});
