export type Clock = () => number;

interface CacheEntry<T> {
  value: T;
  expiresAt: number;
}

export interface LoadOptions<T> {
  /** Return false to hand the value back without storing it */
  shouldCache?: (value: T) => boolean;
}

/**
 * SnapshotCache - time-bounded memo of loader results, keyed by string.
 *
 * Concurrent callers for the same key share one in-flight load. A load that
 * started before `invalidateAll()` never repopulates the cache.
 */
export class SnapshotCache<T> {
  private readonly entries = new Map<string, CacheEntry<T>>();
  private readonly inFlight = new Map<string, Promise<T>>();
  private generation = 0;

  constructor(
    private readonly ttlMs: number,
    private readonly clock: Clock = Date.now,
  ) {}

  /**
   * Cached value if it has not expired; expired entries are evicted.
   */
  peek(key: string): T | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (this.clock() >= entry.expiresAt) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.value;
  }

  async getOrLoad(
    key: string,
    loader: () => Promise<T>,
    options: LoadOptions<T> = {},
  ): Promise<T> {
    const cached = this.peek(key);
    if (cached !== undefined) return cached;

    const pending = this.inFlight.get(key);
    if (pending) return pending;

    const generation = this.generation;
    const load = loader()
      .then((value) => {
        const cacheable = options.shouldCache?.(value) ?? true;
        if (cacheable && this.ttlMs > 0 && generation === this.generation) {
          this.entries.set(key, { value, expiresAt: this.clock() + this.ttlMs });
        }
        return value;
      })
      .finally(() => {
        if (this.inFlight.get(key) === load) {
          this.inFlight.delete(key);
        }
      });

    this.inFlight.set(key, load);
    return load;
  }

  invalidateAll(): void {
    this.entries.clear();
    this.inFlight.clear();
    this.generation++;
  }

  get size(): number {
    return this.entries.size;
  }
}

/** Injection token for the snapshot cache instance */
export const SNAPSHOT_CACHE = Symbol('SNAPSHOT_CACHE');
