/**
 * Promise-chain lock. Callers run one at a time, in the order they asked,
 * and the lock is released even when the critical section throws.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  async runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    const previous = this.tail;

    let releaseLock: () => void = () => {};
    this.tail = new Promise((resolve) => {
      releaseLock = resolve;
    });

    try {
      await previous;
      return await fn();
    } finally {
      releaseLock();
    }
  }
}
