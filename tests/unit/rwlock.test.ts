import { describe, it, expect } from 'vitest';
import { RWLock } from '../../src/storage/rwlock.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve = () => {};
  const promise = new Promise<void>((r) => {
    resolve = () => r();
  });
  return { promise, resolve };
}

describe('RWLock', () => {
  it('lets readers share the lock', async () => {
    const lock = new RWLock();
    const gate = deferred();
    let peak = 0;

    const reader = () => lock.withRead(async () => {
      peak = Math.max(peak, lock.activeReaders);
      await gate.promise;
    });

    const running = [reader(), reader(), reader()];
    await Promise.resolve();
    gate.resolve();
    await Promise.all(running);

    expect(peak).toBe(3);
    expect(lock.activeReaders).toBe(0);
  });

  it('runs a writer alone after readers drain', async () => {
    const lock = new RWLock();
    const gate = deferred();
    const order: string[] = [];

    const read = lock.withRead(async () => {
      order.push('read:start');
      await gate.promise;
      order.push('read:end');
    });
    const write = lock.withWrite(() => {
      order.push(`write readers=${lock.activeReaders}`);
    });

    await Promise.resolve();
    gate.resolve();
    await Promise.all([read, write]);

    expect(order).toEqual(['read:start', 'read:end', 'write readers=0']);
  });

  it('makes new readers wait behind a queued writer', async () => {
    const lock = new RWLock();
    const gate = deferred();
    const order: string[] = [];

    const first = lock.withRead(async () => {
      await gate.promise;
      order.push('first reader');
    });
    const writer = lock.withWrite(() => {
      order.push('writer');
    });
    const late = lock.withRead(() => {
      order.push('late reader');
    });

    await Promise.resolve();
    gate.resolve();
    await Promise.all([first, writer, late]);

    expect(order).toEqual(['first reader', 'writer', 'late reader']);
  });

  it('releases the lock when the callback throws', async () => {
    const lock = new RWLock();
    await expect(lock.withWrite(() => {
      throw new Error('boom');
    })).rejects.toThrow('boom');

    expect(lock.writing).toBe(false);
    await expect(lock.withRead(() => 'ok')).resolves.toBe('ok');
  });

  it('ignores a second release', async () => {
    const lock = new RWLock();
    const release = await lock.readLock();
    release();
    release();
    expect(lock.activeReaders).toBe(0);
  });
});
