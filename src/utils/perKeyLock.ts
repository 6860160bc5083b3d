/**
 * Serializes async work per key. Callers for the same key run one after another in
 * arrival order; different keys never wait on each other.
 */
export class PerKeyLock<TKey> {
  private readonly chains = new Map<TKey, Promise<void>>();

  async runExclusive<T>(key: TKey, fn: () => Promise<T> | T): Promise<T> {
    const prev = this.chains.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const next = new Promise<void>((resolve) => {
      release = resolve;
    });
    const chain = prev.then(() => next);
    this.chains.set(key, chain);

    await prev;
    try {
      return await fn();
    } finally {
      release();
      queueMicrotask(() => {
        if (this.chains.get(key) === chain) this.chains.delete(key);
      });
    }
  }

  isLocked(key: TKey): boolean {
    return this.chains.has(key);
  }

  get activeCount(): number {
    return this.chains.size;
  }
}
