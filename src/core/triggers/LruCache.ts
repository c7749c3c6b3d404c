export interface LruCacheOptions {
  maxSize: number;
}

/**
 * Size-bounded map that drops the least recently used key first.
 * Map iteration order doubles as recency order (oldest first).
 */
export class LruCache<T> {
  private cache = new Map<string, T>();
  private readonly maxSize: number;

  constructor(options: LruCacheOptions) {
    if (!Number.isInteger(options.maxSize) || options.maxSize < 1) {
      throw new Error(`LruCache maxSize must be a positive integer, got ${options.maxSize}`);
    }
    this.maxSize = options.maxSize;
  }

  get(key: string): T | undefined {
    if (!this.cache.has(key)) return undefined;
    const value = this.cache.get(key);
    // Refresh position
    this.cache.delete(key);
    if (value !== undefined) this.cache.set(key, value);
    return value;
  }

  set(key: string, value: T): void {
    if (this.cache.has(key)) this.cache.delete(key);
    this.cache.set(key, value);

    while (this.cache.size > this.maxSize) {
      const oldest = this.cache.keys().next();
      if (oldest.done) break;
      this.cache.delete(oldest.value);
    }
  }
}
