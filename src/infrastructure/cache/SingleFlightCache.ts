/**
 * Keyed promise cache with single-flight semantics.
 *
 * The first caller for a key runs the loader; callers arriving while it is
 * in flight share the same promise. Successful results are kept until they
 * expire or are evicted, failures are dropped so the next caller retries.
 * Map updates happen synchronously between awaits, so no extra locking is
 * needed on the event loop.
 */

export interface SingleFlightCacheOptions {
  // Milliseconds a completed value stays fresh; Infinity keeps it forever
  ttl: number;
  maxEntries: number;
  now?: () => number;
}

interface CacheEntry<T> {
  promise: Promise<T>;
  settled: boolean;
  expiresAt: number;
}

export class SingleFlightCache<T> {
  private readonly entries = new Map<string, CacheEntry<T>>();
  private readonly ttl: number;
  private readonly maxEntries: number;
  private readonly now: () => number;

  constructor(options: SingleFlightCacheOptions) {
    this.ttl = options.ttl;
    this.maxEntries = options.maxEntries;
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Returns the cached or in-flight value for `key`, running `loader` only
   * when there is neither.
   */
  get(key: string, loader: () => Promise<T>): Promise<T> {
    const existing = this.entries.get(key);
    if (existing && (!existing.settled || existing.expiresAt > this.now())) {
      return existing.promise;
    }
    if (existing) {
      this.entries.delete(key);
    }

    const entry: CacheEntry<T> = {
      promise: Promise.resolve().then(loader),
      settled: false,
      expiresAt: Infinity
    };
    this.entries.set(key, entry);
    this.evictOverflow();

    entry.promise.then(
      () => {
        entry.settled = true;
        entry.expiresAt = this.now() + this.ttl;
      },
      () => {
        if (this.entries.get(key) === entry) {
          this.entries.delete(key);
        }
      }
    );

    return entry.promise;
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  // Oldest settled entries go first; in-flight ones are never evicted
  private evictOverflow(): void {
    if (this.entries.size <= this.maxEntries) {
      return;
    }
    for (const [key, entry] of this.entries) {
      if (this.entries.size <= this.maxEntries) {
        break;
      }
      if (entry.settled) {
        this.entries.delete(key);
      }
    }
  }
}
