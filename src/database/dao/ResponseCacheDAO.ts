/**
 * ResponseCacheDAO - persisted slots of the response cache
 */

import { DatabaseConnection } from '../connection';
import {
  CacheStoreStatistics,
  DatabaseResult,
  ResponseCacheEntry,
  ResponseCacheRow,
} from '../models';
import { CacheStore } from '../stores';
import { createLogger } from '../../utils/logger';
import { err, fromDatabaseError, ok } from '../../utils/errors';
import { escapeLike } from './NewsDAO';

const toEntry = (row: ResponseCacheRow): ResponseCacheEntry => ({
  cacheKey: row.cache_key,
  payload: row.payload,
  cachedAt: new Date(row.cached_at),
  expiresAt: new Date(row.expires_at),
});

interface CacheStatsRow {
  total_entries: number;
  expired_entries: number;
}

export class ResponseCacheDAO implements CacheStore {
  private logger = createLogger('ResponseCacheDAO');

  constructor(private readonly db: DatabaseConnection) {}

  async get(cacheKey: string): Promise<DatabaseResult<ResponseCacheEntry | null>> {
    try {
      const result = await this.db.query<ResponseCacheRow>(
        'SELECT * FROM response_cache WHERE cache_key = $1',
        [cacheKey],
      );
      const row = result.rows[0];
      return ok(row ? toEntry(row) : null);
    } catch (error) {
      this.logger.error('Error reading cache entry', { error, cacheKey });
      return err(fromDatabaseError(error));
    }
  }

  async put(entry: ResponseCacheEntry): Promise<DatabaseResult<void>> {
    try {
      await this.db.query(
        `
          INSERT INTO response_cache (cache_key, payload, cached_at, expires_at)
          VALUES ($1, $2::jsonb, $3, $4)
          ON CONFLICT (cache_key) DO UPDATE SET
            payload = EXCLUDED.payload,
            cached_at = EXCLUDED.cached_at,
            expires_at = EXCLUDED.expires_at
        `,
        [
          entry.cacheKey,
          JSON.stringify(entry.payload),
          entry.cachedAt,
          entry.expiresAt,
        ],
      );
      return ok(undefined);
    } catch (error) {
      this.logger.error('Error writing cache entry', {
        error,
        cacheKey: entry.cacheKey,
      });
      return err(fromDatabaseError(error));
    }
  }

  async delete(cacheKey: string): Promise<DatabaseResult<boolean>> {
    try {
      const result = await this.db.query(
        'DELETE FROM response_cache WHERE cache_key = $1',
        [cacheKey],
      );
      return ok((result.rowCount ?? 0) > 0);
    } catch (error) {
      this.logger.error('Error deleting cache entry', { error, cacheKey });
      return err(fromDatabaseError(error));
    }
  }

  async deletePrefix(prefix: string): Promise<DatabaseResult<number>> {
    try {
      const result = await this.db.query(
        'DELETE FROM response_cache WHERE cache_key LIKE $1',
        [`${escapeLike(prefix)}%`],
      );
      return ok(result.rowCount ?? 0);
    } catch (error) {
      this.logger.error('Error deleting cache entries', { error, prefix });
      return err(fromDatabaseError(error));
    }
  }

  async clear(): Promise<DatabaseResult<number>> {
    try {
      const result = await this.db.query('DELETE FROM response_cache');
      return ok(result.rowCount ?? 0);
    } catch (error) {
      this.logger.error('Error clearing cache', { error });
      return err(fromDatabaseError(error));
    }
  }

  async purgeExpired(now: Date): Promise<DatabaseResult<number>> {
    try {
      const result = await this.db.query(
        'DELETE FROM response_cache WHERE expires_at <= $1',
        [now],
      );
      return ok(result.rowCount ?? 0);
    } catch (error) {
      this.logger.error('Error purging expired cache entries', { error });
      return err(fromDatabaseError(error));
    }
  }

  async getStatistics(now: Date): Promise<DatabaseResult<CacheStoreStatistics>> {
    try {
      const result = await this.db.query<CacheStatsRow>(
        `SELECT
           COUNT(*)::int AS total_entries,
           COUNT(*) FILTER (WHERE expires_at <= $1)::int AS expired_entries
         FROM response_cache`,
        [now],
      );
      const row = result.rows[0];
      return ok({
        totalEntries: Number(row?.total_entries ?? 0),
        expiredEntries: Number(row?.expired_entries ?? 0),
      });
    } catch (error) {
      this.logger.error('Error getting cache statistics', { error });
      return err(fromDatabaseError(error));
    }
  }
}
