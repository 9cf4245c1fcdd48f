/**
 * Single-flight cache: concurrent callers for a missing key share one
 * factory call. Rejections are not cached.
 */
export class AsyncCache<K, V> {
  private readonly settled = new Map<K, V>();
  private readonly pending = new Map<K, Promise<V>>();
  private readonly maxEntries: number;

  constructor(options: { maxEntries?: number } = {}) {
    this.maxEntries = options.maxEntries ?? Number.POSITIVE_INFINITY;
  }

  get size(): number {
    return this.settled.size;
  }

  peek(key: K): V | undefined {
    return this.settled.get(key);
  }

  getOrCreate(key: K, factory: () => Promise<V>): Promise<V> {
    if (this.settled.has(key)) {
      const value = this.settled.get(key);
      if (value !== undefined) return Promise.resolve(value);
    }
    const inFlight = this.pending.get(key);
    if (inFlight) return inFlight;

    const promise = factory().then(
      (value) => {
        this.pending.delete(key);
        this.remember(key, value);
        return value;
      },
      (err: unknown) => {
        this.pending.delete(key);
        throw err;
      }
    );
    this.pending.set(key, promise);
    return promise;
  }

  delete(key: K): void {
    this.settled.delete(key);
  }

  clear(): void {
    this.settled.clear();
  }

  private remember(key: K, value: V): void {
    this.settled.set(key, value);
    // Oldest insertion goes first once the bound is reached.
    while (this.settled.size > this.maxEntries) {
      const oldest = this.settled.keys().next();
      if (oldest.done) break;
      this.settled.delete(oldest.value);
    }
  }
}
