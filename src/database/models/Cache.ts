/**
 * Response cache model - one persisted slot per fingerprint key
 */

export interface ResponseCacheEntry<T = unknown> {
  cacheKey: string;
  payload: T;
  cachedAt: Date;
  expiresAt: Date;
}

export interface ResponseCacheRow {
  cache_key: string;
  payload: unknown;
  cached_at: Date;
  expires_at: Date;
}

export interface CacheStoreStatistics {
  totalEntries: number;
  expiredEntries: number;
}
