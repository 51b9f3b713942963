/**
 * @fileoverview Unit tests for the WorkerPool
 */

import { suite, test } from 'mocha';
import * as assert from 'assert';
import { WorkerPool } from '../../../future/workerPool';

function flush(): Promise<void> {
  return new Promise(resolve => setImmediate(resolve));
}

suite('WorkerPool Unit Tests', () => {
  test('rejects a bound that is not a positive integer', () => {
    assert.throws(() => new WorkerPool(0), RangeError);
    assert.throws(() => new WorkerPool(1.5), /maxParallel must be a positive integer, got 1.5/);
  });

  test('never runs more than maxParallel at once', async () => {
    const pool = new WorkerPool(2);
    const releases: Array<() => void> = [];
    const work = () => new Promise<void>(resolve => releases.push(resolve));

    const futures = [1, 2, 3, 4].map(n => pool.submit(`w${n}`, work));
    assert.strictEqual(releases.length, 2);
    assert.strictEqual(pool.running, 2);
    assert.strictEqual(pool.queued, 2);
    assert.strictEqual(futures[0].state, 'running');
    assert.strictEqual(futures[2].state, 'pending');

    releases[0]();
    await flush();
    assert.strictEqual(futures[0].state, 'done');
    assert.strictEqual(releases.length, 3);
    assert.strictEqual(pool.running, 2);
    assert.strictEqual(pool.queued, 1);

    releases.slice(1).forEach(release => release());
    await flush();
    releases[3]();
    await pool.onIdle();
    assert.deepStrictEqual(futures.map(f => f.state), ['done', 'done', 'done', 'done']);
  });

  test('starts queued work in submission order', async () => {
    const pool = new WorkerPool(1);
    const started: string[] = [];
    for (const name of ['a', 'b', 'c']) {
      pool.submit(name, async () => {
        started.push(name);
      });
    }
    await pool.onIdle();
    assert.deepStrictEqual(started, ['a', 'b', 'c']);
  });

  test('failed work fails its future and frees the slot', async () => {
    const pool = new WorkerPool(1);
    const failing = pool.submit('bad', () => {
      throw new Error('bad work');
    });
    const next = pool.submit('good', () => 7);

    assert.strictEqual(await next.wait(), 7);
    assert.throws(() => failing.result(), /bad work/);
  });

  test('onIdle resolves at once when empty', async () => {
    await new WorkerPool(3).onIdle();
  });
});
