import { describe, it, expect } from 'vitest';
import { Mutex } from '../watcher/mutex.js';

describe('Mutex', () => {
  it('runs critical sections one at a time in request order', async () => {
    const mutex = new Mutex();
    const order: string[] = [];

    const slow = mutex.runExclusive(async () => {
      order.push('slow:start');
      await new Promise((resolve) => setTimeout(resolve, 20));
      order.push('slow:end');
    });
    const fast = mutex.runExclusive(() => {
      order.push('fast');
    });

    await Promise.all([slow, fast]);
    expect(order).toEqual(['slow:start', 'slow:end', 'fast']);
  });

  it('returns the value of the critical section', async () => {
    const mutex = new Mutex();
    await expect(mutex.runExclusive(() => 42)).resolves.toBe(42);
  });

  it('releases the lock when the critical section throws', async () => {
    const mutex = new Mutex();

    await expect(
      mutex.runExclusive(() => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');

    await expect(mutex.runExclusive(() => 'after')).resolves.toBe('after');
  });
});
