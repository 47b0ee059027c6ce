import { describe, it, expect } from 'vitest';

import { KeyedLock, conversationKey, memoryKey, sessionKey } from '../../src/memory/locks.js';
import { deferred } from '../utils/deferred.js';

describe('KeyedLock', () => {
  it('runs holders of the same key one after another', async () => {
    const lock = new KeyedLock();
    const gate = deferred();
    const order: string[] = [];

    const first = lock.run('k', async () => {
      order.push('first:start');
      await gate.promise;
      order.push('first:end');
    });
    const second = lock.run('k', () => {
      order.push('second');
    });

    expect(lock.isLocked('k')).toBe(true);
    gate.resolve();
    await Promise.all([first, second]);

    expect(order).toEqual(['first:start', 'first:end', 'second']);
    expect(lock.isLocked('k')).toBe(false);
  });

  it('does not block other keys', async () => {
    const lock = new KeyedLock();
    const gate = deferred();
    const held = lock.run('a', () => gate.promise);

    await expect(lock.run('b', () => 'done')).resolves.toBe('done');

    gate.resolve();
    await held;
  });

  it('releases the key when the holder throws', async () => {
    const lock = new KeyedLock();
    await expect(
      lock.run('k', () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');
    expect(lock.isLocked('k')).toBe(false);
  });

  it('tryRun gives up immediately on a held key', async () => {
    const lock = new KeyedLock();
    const gate = deferred();
    const held = lock.run('k', () => gate.promise);

    expect(await lock.tryRun('k', () => 1)).toEqual({ acquired: false });

    gate.resolve();
    await held;
    expect(await lock.tryRun('k', () => 2)).toEqual({ acquired: true, value: 2 });
  });

  it('tryRunAll takes every key or none', async () => {
    const lock = new KeyedLock();
    const gate = deferred();
    const held = lock.run('a', () => gate.promise);

    expect(await lock.tryRunAll(['a', 'b'], () => 'x')).toEqual({ acquired: false });
    expect(lock.isLocked('b')).toBe(false);

    gate.resolve();
    await held;
    expect(await lock.tryRunAll(['a', 'b'], () => 'x')).toEqual({ acquired: true, value: 'x' });
    expect(lock.isLocked('a')).toBe(false);
    expect(lock.isLocked('b')).toBe(false);
  });
});

describe('lock keys', () => {
  it('namespaces keys by resource', () => {
    expect(memoryKey(12)).toBe('memory:12');
    expect(sessionKey(3)).toBe('session:3');
    expect(conversationKey('abc')).toBe('conversation:abc');
  });
});
