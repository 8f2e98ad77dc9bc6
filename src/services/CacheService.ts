/**
 * CacheService - stale-while-revalidate reads keyed by request fingerprint
 */

import { CacheStore } from '../database/stores';
import { ConnectivityMonitor } from './ConnectivityMonitor';
import { createLogger } from '../utils/logger';
import {
  AppError,
  ConnectivityError,
  Result,
  err,
  errorMessage,
  ok,
  toAppError,
} from '../utils/errors';

export const DEFAULT_CACHE_TTL_MS = 60 * 60 * 1000;
export const SEARCH_CACHE_TTL_MS = 15 * 60 * 1000;

export const personalizedNewsKey = (
  userId: string,
  page: number,
  limit: number,
): string => `news_personalized_${userId}_p${page}_l${limit}`;

export const searchResultsKey = (
  query: string,
  page: number,
  limit: number,
): string => `search_${query}_p${page}_l${limit}`;

// Payloads come back from storage as plain JSON
export type CacheDecoder<T> = (payload: unknown) => T | null;

export type CacheSource = 'cache' | 'remote';

export interface CacheResult<T> {
  data: T;
  isStale: boolean;
  source: CacheSource;
  cacheKey: string;
  lastUpdated?: Date;
}

export interface CachedValue<T> {
  data: T;
  isStale: boolean;
  lastUpdated: Date;
}

export interface FetchOptions {
  ttlMs?: number;
}

export interface CacheStatistics {
  totalEntries: number;
  expiredEntries: number;
  hits: number;
  misses: number;
  hitRate: number;
}

export class CacheService {
  private logger = createLogger('CacheService');
  private hits = 0;
  private misses = 0;

  constructor(
    private readonly store: CacheStore,
    private readonly connectivity: ConnectivityMonitor,
    private readonly now: () => Date = () => new Date(),
  ) {}

  /**
   * Reads through the cache:
   * offline serves the cached copy regardless of age; online refreshes it
   * and falls back to the cached copy when the remote call fails.
   */
  async fetch<T>(
    key: string,
    loader: () => Promise<T>,
    decode: CacheDecoder<T>,
    options: FetchOptions = {},
  ): Promise<Result<CacheResult<T>, AppError>> {
    const cached = await this.get(key, decode);
    const online = await this.isOnline();

    if (!online) {
      if (cached) {
        this.logger.debug('Offline, serving cached data', {
          key,
          isStale: cached.isStale,
        });
        return ok(this.fromCache(key, cached));
      }
      return err(new ConnectivityError());
    }

    try {
      const data = await loader();
      await this.put(key, data, options.ttlMs);
      return ok({
        data,
        isStale: false,
        source: 'remote',
        cacheKey: key,
        lastUpdated: this.now(),
      });
    } catch (error) {
      if (cached) {
        this.logger.warn('Remote fetch failed, serving cached data', {
          key,
          error: errorMessage(error),
        });
        return ok(this.fromCache(key, cached));
      }
      return err(toAppError(error));
    }
  }

  /**
   * Returns the cached value, or null on a miss. Storage failures and
   * undecodable payloads count as misses.
   */
  async get<T>(key: string, decode: CacheDecoder<T>): Promise<CachedValue<T> | null> {
    const entry = await this.store.get(key);
    if (!entry.success) {
      this.logger.warn('Cache read failed, treating as miss', {
        key,
        error: entry.error.message,
      });
      this.misses++;
      return null;
    }

    if (!entry.data) {
      this.misses++;
      return null;
    }

    const data = decode(entry.data.payload);
    if (data === null) {
      this.logger.warn('Cached payload could not be decoded', { key });
      this.misses++;
      return null;
    }

    this.hits++;
    return {
      data,
      isStale: this.now().getTime() >= entry.data.expiresAt.getTime(),
      lastUpdated: entry.data.cachedAt,
    };
  }

  /**
   * Writes an entry; returns false when storage rejected it
   */
  async put<T>(key: string, data: T, ttlMs = DEFAULT_CACHE_TTL_MS): Promise<boolean> {
    const cachedAt = this.now();
    const result = await this.store.put({
      cacheKey: key,
      payload: data,
      cachedAt,
      expiresAt: new Date(cachedAt.getTime() + ttlMs),
    });

    if (!result.success) {
      this.logger.warn('Cache write failed', { key, error: result.error.message });
      return false;
    }
    return true;
  }

  async invalidate(key: string): Promise<boolean> {
    const result = await this.store.delete(key);
    return result.success && result.data;
  }

  async invalidatePrefix(prefix: string): Promise<number> {
    const result = await this.store.deletePrefix(prefix);
    return result.success ? result.data : 0;
  }

  async clear(): Promise<number> {
    const result = await this.store.clear();
    this.hits = 0;
    this.misses = 0;
    return result.success ? result.data : 0;
  }

  async purgeExpired(): Promise<number> {
    const result = await this.store.purgeExpired(this.now());
    if (!result.success) {
      this.logger.warn('Cache purge failed', { error: result.error.message });
      return 0;
    }
    if (result.data > 0) {
      this.logger.info('Expired cache entries purged', { count: result.data });
    }
    return result.data;
  }

  async getStatistics(): Promise<CacheStatistics> {
    const stored = await this.store.getStatistics(this.now());
    const lookups = this.hits + this.misses;
    return {
      totalEntries: stored.success ? stored.data.totalEntries : 0,
      expiredEntries: stored.success ? stored.data.expiredEntries : 0,
      hits: this.hits,
      misses: this.misses,
      hitRate: lookups === 0 ? 0 : this.hits / lookups,
    };
  }

  private fromCache<T>(key: string, cached: CachedValue<T>): CacheResult<T> {
    return {
      data: cached.data,
      isStale: cached.isStale,
      source: 'cache',
      cacheKey: key,
      lastUpdated: cached.lastUpdated,
    };
  }

  private async isOnline(): Promise<boolean> {
    try {
      return await this.connectivity.isConnected();
    } catch (error) {
      this.logger.warn('Connectivity check failed, assuming offline', {
        error: errorMessage(error),
      });
      return false;
    }
  }
}
