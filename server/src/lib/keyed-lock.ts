/**
 * Keyed Lock
 * Serializes async work per key while letting unrelated keys run concurrently.
 * Used for per-sender profile writes and per-phrase learning updates.
 */

export class KeyedLock {
  private tails: Map<string, Promise<void>> = new Map();

  /**
   * Run fn once every earlier holder of the same key has finished
   */
  async runExclusive<T>(key: string, fn: () => Promise<T> | T): Promise<T> {
    const previous = this.tails.get(key) || Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>(resolve => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await fn();
    } finally {
      release();
      // Last holder cleans up so the map does not grow with every key seen
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }

  get activeKeys(): number {
    return this.tails.size;
  }
}
