/**
 * SearchHistoryDAO - Data Access Object for recorded searches
 */

import { DatabaseConnection } from '../connection';
import {
  DatabaseResult,
  DEFAULT_SEARCH_FILTER,
  SearchHistoryEntry,
  SearchHistoryRow,
} from '../models';
import { HistoryQuery, SearchHistoryStore } from '../stores';
import { createLogger } from '../../utils/logger';
import { err, fromDatabaseError, ok } from '../../utils/errors';
import { parseSearchFilter } from '../../utils/validation';
import { escapeLike } from './NewsDAO';

export const toSearchHistoryEntry = (
  row: SearchHistoryRow,
): SearchHistoryEntry => {
  const filter = parseSearchFilter(row.filter_json);
  return {
    id: row.id,
    userId: row.user_id,
    query: row.query,
    filter: filter.success ? filter.data : { ...DEFAULT_SEARCH_FILTER },
    timestamp: new Date(row.searched_at),
    resultCount: Number(row.result_count),
    searchDuration: Number(row.search_duration_ms),
  };
};

export class SearchHistoryDAO implements SearchHistoryStore {
  private logger = createLogger('SearchHistoryDAO');

  constructor(private readonly db: DatabaseConnection) {}

  async insert(
    entry: SearchHistoryEntry,
  ): Promise<DatabaseResult<SearchHistoryEntry>> {
    try {
      const result = await this.db.query<SearchHistoryRow>(
        `
          INSERT INTO search_history (
            id, user_id, query, filter_json, searched_at,
            result_count, search_duration_ms
          )
          VALUES ($1, $2, $3, $4::jsonb, $5, $6, $7)
          ON CONFLICT (id) DO UPDATE SET
            query = EXCLUDED.query,
            filter_json = EXCLUDED.filter_json,
            searched_at = EXCLUDED.searched_at,
            result_count = EXCLUDED.result_count,
            search_duration_ms = EXCLUDED.search_duration_ms
          RETURNING *
        `,
        [
          entry.id,
          entry.userId,
          entry.query,
          JSON.stringify(entry.filter),
          entry.timestamp,
          entry.resultCount,
          Math.round(entry.searchDuration),
        ],
      );

      const row = result.rows[0];
      return ok(row ? toSearchHistoryEntry(row) : entry);
    } catch (error) {
      this.logger.error('Error recording search', {
        error,
        userId: entry.userId,
      });
      return err(fromDatabaseError(error));
    }
  }

  /**
   * Lists a user's searches, newest first
   */
  async list(
    userId: string,
    options: HistoryQuery = {},
  ): Promise<DatabaseResult<SearchHistoryEntry[]>> {
    try {
      const conditions = ['user_id = $1'];
      const values: unknown[] = [userId];

      if (options.query) {
        values.push(`%${escapeLike(options.query)}%`);
        conditions.push(`query ILIKE $${values.length}`);
      }
      if (options.since) {
        values.push(options.since);
        conditions.push(`searched_at >= $${values.length}`);
      }

      let text = `SELECT * FROM search_history WHERE ${conditions.join(' AND ')}
        ORDER BY searched_at DESC`;
      if (options.limit !== undefined) {
        values.push(options.limit);
        text += ` LIMIT $${values.length}`;
      }

      const result = await this.db.query<SearchHistoryRow>(text, values);
      return ok(result.rows.map(toSearchHistoryEntry));
    } catch (error) {
      this.logger.error('Error getting search history', { error, userId });
      return err(fromDatabaseError(error));
    }
  }

  /**
   * Deletes a user's history, or only entries before the cutoff
   */
  async clear(userId: string, olderThan?: Date): Promise<DatabaseResult<number>> {
    try {
      const result = olderThan
        ? await this.db.query(
            'DELETE FROM search_history WHERE user_id = $1 AND searched_at < $2',
            [userId, olderThan],
          )
        : await this.db.query('DELETE FROM search_history WHERE user_id = $1', [
            userId,
          ]);

      const deleted = result.rowCount ?? 0;
      this.logger.info('Search history cleared', { userId, deleted });
      return ok(deleted);
    } catch (error) {
      this.logger.error('Error clearing search history', { error, userId });
      return err(fromDatabaseError(error));
    }
  }

  /**
   * Drops entries older than the cutoff, then everything past the newest
   * maxEntries
   */
  async enforceRetention(
    userId: string,
    olderThan: Date,
    maxEntries: number,
  ): Promise<DatabaseResult<number>> {
    try {
      const deleted = await this.db.transaction(async (query) => {
        const expired = await query(
          'DELETE FROM search_history WHERE user_id = $1 AND searched_at < $2',
          [userId, olderThan],
        );
        const overflow = await query(
          `DELETE FROM search_history
           WHERE user_id = $1 AND id NOT IN (
             SELECT id FROM search_history WHERE user_id = $1
             ORDER BY searched_at DESC LIMIT $2
           )`,
          [userId, maxEntries],
        );
        return (expired.rowCount ?? 0) + (overflow.rowCount ?? 0);
      });

      if (deleted > 0) {
        this.logger.debug('Search history trimmed', { userId, deleted });
      }
      return ok(deleted);
    } catch (error) {
      this.logger.error('Error trimming search history', { error, userId });
      return err(fromDatabaseError(error));
    }
  }
}
