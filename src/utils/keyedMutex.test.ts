import { describe, it, expect } from 'vitest';

import { KeyedMutex } from './keyedMutex.js';

function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('KeyedMutex', () => {
  it('runs tasks for the same key one at a time, in order', async () => {
    const mutex = new KeyedMutex();
    const order: string[] = [];
    const gate = deferred();

    const first = mutex.runExclusive('u1', async () => {
      order.push('first:start');
      await gate.promise;
      order.push('first:end');
    });
    const second = mutex.runExclusive('u1', async () => {
      order.push('second');
    });

    await new Promise((r) => setTimeout(r, 0));
    expect(order).toEqual(['first:start']);

    gate.resolve();
    await Promise.all([first, second]);
    expect(order).toEqual(['first:start', 'first:end', 'second']);
  });

  it('lets different keys proceed independently', async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();
    const order: string[] = [];

    const blocked = mutex.runExclusive('u1', async () => {
      await gate.promise;
      order.push('u1');
    });
    await mutex.runExclusive('u2', async () => {
      order.push('u2');
    });

    expect(order).toEqual(['u2']);
    gate.resolve();
    await blocked;
    expect(order).toEqual(['u2', 'u1']);
  });

  it('releases the lock when a task throws', async () => {
    const mutex = new KeyedMutex();

    await expect(
      mutex.runExclusive('u1', async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    await expect(mutex.runExclusive('u1', async () => 42)).resolves.toBe(42);
    expect(mutex.isLocked('u1')).toBe(false);
  });
});
