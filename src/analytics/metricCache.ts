export interface CacheEntry<V> {
  metricId: string;
  value: V;
  computedAt: number;
  expiresAt: number;
}

export interface CacheLookup<V> {
  value: V;
  computedAt: number;
  fromCache: boolean;
}

interface InFlight<V> {
  metricId: string;
  promise: Promise<CacheEntry<V>>;
}

const canonicalize = (value: unknown): unknown => {
  if (value instanceof Date) return value.toISOString();
  if (Array.isArray(value)) return value.map(canonicalize);
  if (value !== null && typeof value === "object") {
    const entries: Array<[string, unknown]> = Object.entries(value);
    const out: Record<string, unknown> = {};
    for (const [k, v] of entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
      if (v !== undefined) out[k] = canonicalize(v);
    }
    return out;
  }
  return value;
};

/** Key order and undefined members do not affect the key. */
export const cacheKey = (metricId: string, filters: unknown): string => `${metricId}|${JSON.stringify(canonicalize(filters))}`;

/**
 * Memoizes metric values per (metric id, normalized filters). Concurrent misses
 * on the same key share one computation; failures are never stored.
 */
export class MetricCache<V> {
  private readonly store = new Map<string, CacheEntry<V>>();
  private readonly inFlight = new Map<string, InFlight<V>>();
  private readonly now: () => number;

  constructor(opts?: { now?: () => number }) {
    this.now = opts?.now ?? Date.now;
  }

  get size(): number {
    return this.store.size;
  }

  peek(metricId: string, filters: unknown): CacheEntry<V> | null {
    return this.readFresh(cacheKey(metricId, filters));
  }

  async getOrCompute(
    metricId: string,
    filters: unknown,
    ttlSeconds: number,
    compute: () => Promise<V>
  ): Promise<CacheLookup<V>> {
    const key = cacheKey(metricId, filters);

    const fresh = this.readFresh(key);
    if (fresh) return { value: fresh.value, computedAt: fresh.computedAt, fromCache: true };

    const pending = this.inFlight.get(key);
    if (pending) {
      const entry = await pending.promise;
      return { value: entry.value, computedAt: entry.computedAt, fromCache: true };
    }

    const flight: InFlight<V> = {
      metricId,
      promise: (async () => {
        const value = await compute();
        const computedAt = this.now();
        return { metricId, value, computedAt, expiresAt: computedAt + Math.max(0, ttlSeconds) * 1000 };
      })()
    };
    this.inFlight.set(key, flight);

    try {
      const entry = await flight.promise;
      // An invalidation while computing drops the flight; its result is not kept.
      if (this.inFlight.get(key) === flight) {
        this.evictExpired();
        this.store.set(key, entry);
      }
      return { value: entry.value, computedAt: entry.computedAt, fromCache: false };
    } finally {
      if (this.inFlight.get(key) === flight) this.inFlight.delete(key);
    }
  }

  /** Clears every entry, or only those of one metric. Returns how many were dropped. */
  invalidate(metricId?: string): number {
    let dropped = 0;

    for (const [key, entry] of this.store) {
      if (metricId === undefined || entry.metricId === metricId) {
        this.store.delete(key);
        dropped += 1;
      }
    }

    for (const [key, flight] of this.inFlight) {
      if (metricId === undefined || flight.metricId === metricId) this.inFlight.delete(key);
    }

    return dropped;
  }

  private evictExpired(): void {
    const now = this.now();
    for (const [key, entry] of this.store) {
      if (now >= entry.expiresAt) this.store.delete(key);
    }
  }

  private readFresh(key: string): CacheEntry<V> | null {
    const entry = this.store.get(key);
    if (!entry) return null;

    if (this.now() >= entry.expiresAt) {
      this.store.delete(key);
      return null;
    }

    return entry;
  }
}
