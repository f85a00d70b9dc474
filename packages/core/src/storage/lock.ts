/**
 * Keyed async lock - serializes critical sections per key
 * @module storage/lock
 */

/**
 * Runs tasks for the same key one after another, in call order.
 * Tasks for different keys do not wait on each other.
 *
 * @example
 * ```typescript
 * const lock = new KeyedLock();
 * await lock.run('inventory', async () => {
 *   await backup();
 *   await write();
 * });
 * ```
 */
export class KeyedLock {
  private tails: Map<string, Promise<unknown>> = new Map();

  async run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const current = previous.then(() => task());
    const tail = current.then(
      () => undefined,
      () => undefined
    );

    this.tails.set(key, tail);

    try {
      return await current;
    } finally {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /**
   * Whether any task for the key is queued or running
   */
  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}
