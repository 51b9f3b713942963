/**
 * @fileoverview Unit tests for the wait graph
 *
 * Tests cover:
 * - Completion once every dependency is terminal
 * - Failure propagation through chains
 * - Cycle rejection
 */

import { suite, test, setup } from 'mocha';
import * as assert from 'assert';
import { Future, failedFuture, resolvedFuture } from '../../../future/future';
import { WaitGraph, toUpstreamFailure } from '../../../future/waitGraph';
import { DependencyCycleError, FutureStateError, UpstreamFailureError } from '../../../core/errors';

suite('WaitGraph Unit Tests', () => {
  let graph: WaitGraph;

  setup(() => {
    graph = new WaitGraph();
  });

  // =========================================================================
  // Completion
  // =========================================================================

  test('no dependencies completes immediately', () => {
    const waiter = graph.submit([]);
    assert.strictEqual(waiter.state, 'done');
    assert.strictEqual(waiter.result(), undefined);
    assert.strictEqual(graph.pendingCount, 0);
  });

  test('completes when the last dependency finishes', () => {
    const a = new Future<number>('a');
    const b = new Future<number>('b');
    const waiter = graph.submit([a, b], undefined, values => values);

    assert.strictEqual(waiter.label, 'wait(a, b)');
    assert.strictEqual(graph.pendingCount, 1);
    a.setResult(1);
    assert.strictEqual(waiter.isDone(), false);
    assert.deepStrictEqual(graph.pendingDependencies(waiter).map(f => f.label), ['b']);

    b.setResult(2);
    assert.deepStrictEqual(waiter.result(), [1, 2]);
    assert.strictEqual(graph.pendingCount, 0);
  });

  test('already finished dependencies count as done', () => {
    const waiter = graph.submit([resolvedFuture(4), resolvedFuture(5)], 'sum', values => values.length);
    assert.strictEqual(waiter.result(), 2);
  });

  test('duplicate dependencies are counted once', () => {
    const a = new Future<number>('a');
    const waiter = graph.submit([a, a], 'twice', values => values);
    assert.strictEqual(waiter.waitingOn.length, 1);
    a.setResult(3);
    assert.deepStrictEqual(waiter.result(), [3]);
  });

  test('a throwing digest fails the waiter', () => {
    const a = new Future<number>('a');
    const waiter = graph.submit([a], 'digest', () => {
      throw new Error('bad digest');
    });
    a.setResult(1);
    assert.throws(() => waiter.result(), /bad digest/);
  });

  // =========================================================================
  // Failure propagation
  // =========================================================================

  test('a failed dependency fails the waiter without waiting for the rest', () => {
    const a = new Future<number>('a');
    const b = new Future<number>('b');
    const cause = new Error('b broke');
    const waiter = graph.submit([a, b], 'w');

    b.setError(cause);
    assert.strictEqual(waiter.state, 'failed');
    const error = waiter.error();
    assert.ok(error instanceof UpstreamFailureError);
    assert.strictEqual(error.upstreamLabel, 'b');
    assert.strictEqual(error.cause, cause);
    assert.strictEqual(graph.pendingCount, 0);
  });

  test('the first failed dependency in listed order decides the error', () => {
    const first = failedFuture(new Error('first'), 'first');
    const second = failedFuture(new Error('second'), 'second');
    const waiter = graph.submit([first, second], 'w');
    const error = waiter.error();
    assert.ok(error instanceof UpstreamFailureError);
    assert.strictEqual(error.upstreamLabel, 'first');
  });

  test('failure reaches every transitive dependent as one error', () => {
    const root = new Future<number>('root');
    const w1 = graph.submit([root], 'w1');
    const w2 = graph.submit([w1], 'w2');
    const w3 = graph.submit([w2], 'w3');

    root.setError(new Error('root cause'));
    assert.strictEqual(w3.state, 'failed');
    assert.strictEqual(w1.error(), w2.error());
    assert.strictEqual(w2.error(), w3.error());
    assert.match(String(w3.error()), /Upstream future 'root' failed: root cause/);
  });

  test('toUpstreamFailure wraps once', () => {
    const dep = new Future('dep');
    const wrapped = toUpstreamFailure(dep, new Error('x'));
    assert.strictEqual(toUpstreamFailure(new Future('other'), wrapped), wrapped);
  });

  // =========================================================================
  // Cycles
  // =========================================================================

  test('linking a waiter to itself is a cycle', () => {
    const a = new Future('a');
    const w1 = graph.submit([a], 'w1');
    assert.throws(() => graph.link(w1, [w1]), (error: unknown) => {
      assert.ok(error instanceof DependencyCycleError);
      assert.strictEqual(error.message, 'Circular dependency detected: w1 -> w1');
      return true;
    });
  });

  test('a cycle through another waiter is rejected and nothing is recorded', () => {
    const a = new Future('a');
    const w1 = graph.submit([a], 'w1');
    const w2 = graph.submit([w1], 'w2');

    assert.throws(() => graph.link(w1, [w2]), (error: unknown) => {
      assert.ok(error instanceof DependencyCycleError);
      assert.deepStrictEqual(error.cycle, ['w1', 'w2', 'w1']);
      return true;
    });
    assert.deepStrictEqual(graph.pendingDependencies(w1).map(f => f.label), ['a']);

    a.setResult(undefined);
    assert.strictEqual(w1.state, 'done');
    assert.strictEqual(w2.state, 'done');
  });

  test('link adds dependencies to a pending waiter', () => {
    const a = new Future('a');
    const b = new Future('b');
    const waiter = graph.submit([a], 'w');
    graph.link(waiter, [b]);

    a.setResult(1);
    assert.strictEqual(waiter.isDone(), false);
    b.setResult(2);
    assert.strictEqual(waiter.isDone(), true);
  });

  test('link on a finished waiter throws', () => {
    const waiter = graph.submit([]);
    assert.throws(() => graph.link(waiter, [new Future()]), FutureStateError);
  });
});
