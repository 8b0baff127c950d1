import { type Clock, type LoggerLike, silentLogger, systemClock } from '../logging';

export interface TtlCacheOptions {
  /** Seconds an entry stays visible after it was stored. */
  ttlSeconds?: number;
  /** Maximum number of entries held at once. */
  maxSize?: number;
  /** Label used in log lines, e.g. `crypto-price`. */
  name?: string;
  logger?: LoggerLike;
  clock?: Clock;
}

export interface TtlCacheStats {
  size: number;
  maxSize: number;
  hits: number;
  misses: number;
  hitRate: number;
  ttlSeconds: number;
}

interface CacheEntry<T> {
  value: T;
  storedAt: number;
}

export const DEFAULT_CACHE_TTL_SECONDS = 300;
export const DEFAULT_CACHE_MAX_SIZE = 100;

/**
 * Expiring key/value store for API responses with a small capacity bound.
 *
 * Eviction picks the entry with the oldest `storedAt`, not the least recently
 * read one; the workloads are tens of distinct calls, so a full scan on insert
 * is fine and no access-order bookkeeping is kept.
 */
export class TtlCache<T> {
  private readonly storage = new Map<string, CacheEntry<T>>();
  private readonly ttlMs: number;
  private readonly maxSize: number;
  private readonly name: string;
  private readonly logger: LoggerLike;
  private readonly clock: Clock;
  private hits = 0;
  private misses = 0;

  constructor(options: TtlCacheOptions = {}) {
    const ttlSeconds = options.ttlSeconds ?? DEFAULT_CACHE_TTL_SECONDS;
    const maxSize = options.maxSize ?? DEFAULT_CACHE_MAX_SIZE;

    if (!Number.isFinite(ttlSeconds) || ttlSeconds <= 0) {
      throw new Error(`TtlCache ttlSeconds must be positive, received ${ttlSeconds}`);
    }
    if (!Number.isInteger(maxSize) || maxSize < 1) {
      throw new Error(`TtlCache maxSize must be a positive integer, received ${maxSize}`);
    }

    this.ttlMs = ttlSeconds * 1000;
    this.maxSize = maxSize;
    this.name = options.name ?? 'cache';
    this.logger = options.logger ?? silentLogger;
    this.clock = options.clock ?? systemClock;
  }

  get(key: string): T | undefined {
    const entry = this.storage.get(key);

    if (entry) {
      if (this.clock() - entry.storedAt < this.ttlMs) {
        this.hits += 1;
        this.logger.debug?.({ cache: this.name, key: preview(key) }, 'Cache hit');
        return entry.value;
      }
      this.storage.delete(key);
    }

    this.misses += 1;
    this.logger.debug?.({ cache: this.name, key: preview(key) }, 'Cache miss');
    return undefined;
  }

  set(key: string, value: T): void {
    if (!this.storage.has(key) && this.storage.size >= this.maxSize) {
      this.evictOldest();
    }

    // Re-inserting moves the key to the end of iteration order so that ties
    // on storedAt still resolve to the earliest write.
    this.storage.delete(key);
    this.storage.set(key, { value, storedAt: this.clock() });
    this.logger.debug?.(
      { cache: this.name, key: preview(key), size: this.storage.size, maxSize: this.maxSize },
      'Cache set',
    );
  }

  /**
   * Return the cached value for `key`, or run `loader`, store its result and
   * return it. Loader rejections propagate and nothing is stored.
   */
  async getOrLoad(key: string, loader: () => Promise<T>): Promise<T> {
    const cached = this.get(key);
    if (cached !== undefined) {
      return cached;
    }

    const value = await loader();
    this.set(key, value);
    return value;
  }

  delete(key: string): boolean {
    return this.storage.delete(key);
  }

  clear(): void {
    this.storage.clear();
    this.hits = 0;
    this.misses = 0;
    this.logger.info?.({ cache: this.name }, 'Cache cleared');
  }

  hitRate(): number {
    const total = this.hits + this.misses;
    return total > 0 ? this.hits / total : 0;
  }

  stats(): TtlCacheStats {
    return {
      size: this.storage.size,
      maxSize: this.maxSize,
      hits: this.hits,
      misses: this.misses,
      hitRate: this.hitRate(),
      ttlSeconds: this.ttlMs / 1000,
    };
  }

  private evictOldest(): void {
    let oldestKey: string | undefined;
    let oldestStoredAt = Number.POSITIVE_INFINITY;

    for (const [key, entry] of this.storage) {
      if (entry.storedAt < oldestStoredAt) {
        oldestKey = key;
        oldestStoredAt = entry.storedAt;
      }
    }

    if (oldestKey !== undefined) {
      this.storage.delete(oldestKey);
      this.logger.debug?.({ cache: this.name, key: preview(oldestKey) }, 'Cache full, evicted oldest entry');
    }
  }
}

function preview(key: string): string {
  return key.length > 20 ? `${key.slice(0, 20)}...` : key;
}
