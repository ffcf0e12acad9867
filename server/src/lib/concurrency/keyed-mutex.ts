/**
 * Keyed Mutex
 * Serializes async critical sections that share a key; different keys run concurrently.
 *
 * Tails are chained per key and dropped once the last holder releases,
 * so the map only holds keys with work in flight.
 */

export class KeyedMutex {
  private tails = new Map<string, Promise<void>>();
  private stats = {
    acquired: 0,
    contended: 0
  };

  async runExclusive<T>(key: string, fn: () => Promise<T> | T): Promise<T> {
    const previous = this.tails.get(key);
    if (previous) {
      this.stats.contended++;
    }
    this.stats.acquired++;

    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = (previous ?? Promise.resolve()).then(() => current);
    this.tails.set(key, tail);

    try {
      if (previous) {
        await previous;
      }
      return await fn();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }

  getStats() {
    return { ...this.stats, activeKeys: this.tails.size };
  }
}
