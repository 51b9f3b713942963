/**
 * @fileoverview Unit tests for LocalBackend
 */

import { suite, test } from 'mocha';
import * as assert from 'assert';
import { LocalBackend } from '../../../backends/localBackend';
import { defineTask } from '../../../workflow/task';

suite('LocalBackend Unit Tests', () => {
  const backend = new LocalBackend();

  test('runs the task and reports completed', async () => {
    const add = defineTask({ name: 'add', fn: ([a, b]) => Number(a) + Number(b) });
    const handle = await backend.submit({ task: add, args: [2, 3], kwargs: {}, label: 'add' });

    assert.strictEqual(await backend.wait(handle), 'completed');
    assert.strictEqual(await backend.poll(handle), 'completed');
    assert.strictEqual(await backend.materializeResult(handle), 5);
  });

  test('a throwing task is failed and its error kept', async () => {
    const broken = defineTask<number>({
      name: 'broken',
      fn: () => {
        throw new Error('task broke');
      },
    });
    const handle = await backend.submit({ task: broken, args: [], kwargs: {}, label: 'broken' });

    assert.strictEqual(await backend.wait(handle), 'failed');
    await assert.rejects(backend.materializeResult(handle), /task broke/);
  });

  test('an async task is running until it settles', async () => {
    let release: (value: string) => void = () => undefined;
    const slow = defineTask({
      name: 'slow',
      fn: () => new Promise<string>(resolve => {
        release = resolve;
      }),
    });
    const handle = await backend.submit({ task: slow, args: [], kwargs: { k: 1 }, label: 'slow' });

    assert.strictEqual(await backend.poll(handle), 'running');
    release('late');
    assert.strictEqual(await backend.wait(handle), 'completed');
    assert.strictEqual(await backend.materializeResult(handle), 'late');
  });
});
