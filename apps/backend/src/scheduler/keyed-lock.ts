/**
 * Serializes async work per key: calls sharing a key run one after another in
 * arrival order, calls with different keys run independently.
 */
export class KeyedLock {
  private tails = new Map<string, Promise<void>>();

  async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const prev = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => {};
    const next = new Promise<void>((r) => {
      release = r;
    });
    this.tails.set(key, next);
    try {
      await prev;
      return await fn();
    } finally {
      release();
      if (this.tails.get(key) === next) {
        this.tails.delete(key);
      }
    }
  }

  /** Number of keys with queued or running work. */
  get size(): number {
    return this.tails.size;
  }
}
