import { describe, it, expect } from 'vitest';
import { KeyedLock } from '../../src/application/keyed-lock.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('KeyedLock', () => {
  it('runs tasks with the same key one at a time in call order', async () => {
    const lock = new KeyedLock();
    const order: string[] = [];
    const gate = deferred();

    const first = lock.runExclusive('item-1', async () => {
      order.push('first:start');
      await gate.promise;
      order.push('first:end');
    });
    const second = lock.runExclusive('item-1', async () => {
      order.push('second');
    });

    await Promise.resolve();
    expect(lock.isLocked('item-1')).toBe(true);
    gate.resolve();
    await Promise.all([first, second]);

    expect(order).toEqual(['first:start', 'first:end', 'second']);
  });

  it('does not serialize different keys', async () => {
    const lock = new KeyedLock();
    const gate = deferred();

    const blocked = lock.runExclusive('item-1', () => gate.promise);
    const other = await lock.runExclusive('item-2', async () => 'done');

    expect(other).toBe('done');
    gate.resolve();
    await blocked;
  });

  it('releases the key after a failure and keeps the error with its caller', async () => {
    const lock = new KeyedLock();

    const failing = lock.runExclusive('item-1', async () => {
      throw new Error('boom');
    });
    const next = lock.runExclusive('item-1', async () => 42);

    await expect(failing).rejects.toThrow('boom');
    await expect(next).resolves.toBe(42);
  });

  it('forgets idle keys', async () => {
    const lock = new KeyedLock();

    await lock.runExclusive('item-1', async () => undefined);
    await new Promise((resolve) => setTimeout(resolve, 0));

    expect(lock.isLocked('item-1')).toBe(false);
  });
});
