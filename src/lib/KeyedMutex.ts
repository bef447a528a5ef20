/**
 * Promise-chained mutex per key
 *
 * Callers for the same key run one after another in call order; callers
 * for different keys never wait for each other.
 */
export class KeyedMutex {
  private tails: Map<string, Promise<void>> = new Map();

  /**
   * Run `fn` while holding the lock for `key`
   */
  async runExclusive<T>(key: string, fn: () => Promise<T> | T): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let unlock: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      unlock = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await fn();
    } finally {
      unlock();
      // Last holder cleans up so idle keys do not accumulate
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /**
   * Whether anyone holds or waits for the lock of `key`
   */
  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}
