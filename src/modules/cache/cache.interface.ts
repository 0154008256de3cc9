export interface CacheEntry<T> {
  value: T;
  insertedAt: number; // epoch ms
}

export interface CacheOptions {
  ttlSeconds: number;
  /** Clock used for insertion timestamps and staleness checks. Defaults to Date.now */
  now?: () => number;
  /** Label used in log lines */
  name?: string;
}

export interface CacheStats {
  hits: number;
  misses: number;
  evictions: number;
  entries: number;
  hitRate: number;
}
