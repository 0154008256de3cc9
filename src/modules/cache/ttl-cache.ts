import { Logger } from '@nestjs/common';
import { CacheEntry, CacheOptions, CacheStats } from './cache.interface';

/**
 * In-memory key/value store with per-entry insertion timestamps.
 *
 * Expiration is lazy: an entry older than the TTL is only removed when a
 * `get` observes it. There is no background sweeper and no size bound.
 */
export class TtlCache<T> {
  private readonly logger: Logger;
  private readonly store = new Map<string, CacheEntry<T>>();
  private readonly ttlMs: number;
  private readonly now: () => number;
  private stats = {
    hits: 0,
    misses: 0,
    evictions: 0,
  };

  constructor(options: CacheOptions) {
    this.ttlMs = options.ttlSeconds * 1000;
    this.now = options.now ?? (() => Date.now());
    this.logger = new Logger(`${TtlCache.name}:${options.name ?? 'default'}`);
  }

  get ttlSeconds(): number {
    return this.ttlMs / 1000;
  }

  /**
   * Number of stored entries, stale ones included until a read removes them
   */
  get size(): number {
    return this.store.size;
  }

  /**
   * Get a value if present and not older than the TTL
   */
  get(key: string): T | undefined {
    const entry = this.store.get(key);

    if (!entry) {
      this.stats.misses++;
      this.logger.debug(`Cache miss for key: ${key}`);
      return undefined;
    }

    if (this.now() - entry.insertedAt > this.ttlMs) {
      this.store.delete(key);
      this.stats.misses++;
      this.stats.evictions++;
      this.logger.debug(`Cache entry expired for key: ${key}`);
      return undefined;
    }

    this.stats.hits++;
    this.logger.debug(`Cache hit for key: ${key}`);
    return entry.value;
  }

  /**
   * Insert or replace a value, stamped with the current time
   */
  set(key: string, value: T): void {
    this.store.set(key, { value, insertedAt: this.now() });
    this.logger.debug(`Cached value for key: ${key}, ttl: ${this.ttlSeconds}s`);
  }

  clear(): void {
    const size = this.store.size;
    this.store.clear();
    this.logger.debug(`Cleared cache: ${size} entries removed`);
  }

  getStats(): CacheStats {
    const lookups = this.stats.hits + this.stats.misses;
    return {
      hits: this.stats.hits,
      misses: this.stats.misses,
      evictions: this.stats.evictions,
      entries: this.store.size,
      hitRate: lookups === 0 ? 0 : this.stats.hits / lookups,
    };
  }
}
