/**
 * In-memory cache with TTL support.
 *
 * Used to share one venue snapshot between the whale scan and the analysis
 * pass of the same tick.
 */

// =============================================================================
// CACHE TYPES
// =============================================================================

interface CacheEntry<T> {
  data: T;
  timestamp: number;
  ttl: number;  // in ms
}

// Default TTL: 5 minutes
const DEFAULT_TTL = 5 * 60 * 1000;

// =============================================================================
// CACHE
// =============================================================================

export class TtlCache<T> {
  private readonly entries = new Map<string, CacheEntry<T>>();
  private readonly pending = new Map<string, Promise<T>>();

  constructor(
    private readonly defaultTtlMs: number = DEFAULT_TTL,
    private readonly now: () => number = Date.now
  ) {}

  /**
   * Get a value from cache.
   * Returns undefined if not found or expired.
   */
  get(key: string): T | undefined {
    const entry = this.entries.get(key);

    if (!entry) {
      return undefined;
    }

    if (this.now() - entry.timestamp > entry.ttl) {
      this.entries.delete(key);
      return undefined;
    }

    return entry.data;
  }

  set(key: string, data: T, ttlMs: number = this.defaultTtlMs): void {
    this.entries.set(key, {
      data,
      timestamp: this.now(),
      ttl: ttlMs,
    });
  }

  /**
   * Get or compute a value. Concurrent callers for the same key share one
   * computation; failures are not cached.
   */
  async getOrCompute(
    key: string,
    compute: () => Promise<T>,
    ttlMs: number = this.defaultTtlMs
  ): Promise<T> {
    const cached = this.get(key);
    if (cached !== undefined) {
      return cached;
    }

    const inFlight = this.pending.get(key);
    if (inFlight) {
      return inFlight;
    }

    const computation = compute()
      .then(value => {
        this.set(key, value, ttlMs);
        return value;
      })
      .finally(() => {
        this.pending.delete(key);
      });

    this.pending.set(key, computation);
    return computation;
  }

  get size(): number {
    return this.entries.size;
  }
}
