import { describe, expect, it } from 'vitest';
import { TaskSet } from './task-set.js';

function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

describe('TaskSet', () => {
  it('yields results in completion order', async () => {
    const set = new TaskSet<string>();
    const slow = deferred<string>();
    const fast = deferred<string>();

    set.spawn(() => slow.promise);
    set.spawn(() => fast.promise);
    expect(set.size).toBe(2);

    fast.resolve('fast');
    expect(await set.joinNext()).toEqual({ status: 'ok', value: 'fast' });

    slow.resolve('slow');
    expect(await set.joinNext()).toEqual({ status: 'ok', value: 'slow' });
    expect(set.size).toBe(0);
  });

  it('reports rejected and throwing units as faults', async () => {
    const set = new TaskSet<number>();
    const boom = new Error('boom');

    set.spawn(() => Promise.reject(boom));
    set.spawn(() => {
      throw new Error('sync');
    });

    const first = await set.joinNext();
    const second = await set.joinNext();
    const errors = [first, second].map((r) => (r?.status === 'fault' ? r.error : null));

    expect(errors).toContain(boom);
    expect(errors.map((e) => (e instanceof Error ? e.message : ''))).toEqual(
      expect.arrayContaining(['boom', 'sync']),
    );
  });

  it('keeps results that finish before anyone joins', async () => {
    const set = new TaskSet<number>();
    set.spawn(async () => 1);
    set.spawn(async () => 2);
    await new Promise((resolve) => setImmediate(resolve));

    expect(set.size).toBe(2);
    expect(await set.joinNext()).toEqual({ status: 'ok', value: 1 });
    expect(await set.joinNext()).toEqual({ status: 'ok', value: 2 });
  });

  it('resolves undefined when empty', async () => {
    await expect(new TaskSet<number>().joinNext()).resolves.toBeUndefined();
  });
});
