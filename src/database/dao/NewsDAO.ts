/**
 * NewsDAO - Data Access Object for cached news articles and their
 * full-text mirror
 */

import { DatabaseConnection, QueryFn } from '../connection';
import {
  DatabaseResult,
  DEFAULT_RETENTION_POLICY,
  NewsDatabaseStats,
  NewsRecord,
  NewsRecordInput,
  NewsRow,
  RetentionPolicy,
  SentimentLabel,
  SourceStatistics,
  UserSentimentProfile,
  sentimentLabelFor,
} from '../models';
import { NewsStore, TitleMatch } from '../stores';
import { createLogger } from '../../utils/logger';
import { err, fromDatabaseError, ok } from '../../utils/errors';
import { parseKeywords } from '../../utils/validation';

const DAY_MS = 24 * 60 * 60 * 1000;

// Document indexed for an article: title, summary, content and keywords
const FTS_DOCUMENT = `to_tsvector('simple',
  n.title || ' ' || n.summary || ' ' || n.content || ' ' ||
  COALESCE((SELECT string_agg(k, ' ') FROM jsonb_array_elements_text(n.keywords) AS k), ''))`;

const SENTIMENT_LABELS: readonly SentimentLabel[] = [
  'positive',
  'neutral',
  'negative',
];

const toSentimentLabel = (value: string, score: number): SentimentLabel =>
  SENTIMENT_LABELS.find((label) => label === value) ?? sentimentLabelFor(score);

export const toNewsRecord = (row: NewsRow): NewsRecord => {
  const sentimentScore = Number(row.sentiment_score);
  return {
    id: row.id,
    title: row.title,
    summary: row.summary,
    content: row.content,
    url: row.url,
    source: row.source,
    publishedAt: new Date(row.published_at),
    keywords: parseKeywords(row.keywords),
    imageUrl: row.image_url ?? undefined,
    sentimentScore,
    sentimentLabel: toSentimentLabel(row.sentiment_label, sentimentScore),
    isBookmarked: row.is_bookmarked,
    cachedAt: new Date(row.cached_at),
    userId: row.user_id,
  };
};

// Escapes LIKE wildcards so user input matches literally
export const escapeLike = (value: string): string =>
  value.replace(/[\\%_]/g, (char) => `\\${char}`);

interface CountRow {
  count: number;
}

interface StatsRow {
  total: number;
  bookmarked: number;
  fresh: number;
}

interface SourceStatsRow {
  source: string;
  article_count: number;
  avg_sentiment: number | null;
  bookmarked_count: number;
  latest_article_date: Date | null;
}

interface SentimentProfileRow {
  avg_sentiment: number | null;
  bookmarked_count: number;
  total_count: number;
}

export class NewsDAO implements NewsStore {
  private logger = createLogger('NewsDAO');

  constructor(private readonly db: DatabaseConnection) {}

  /**
   * Gets one article by its (id, user) key
   */
  async getArticle(
    userId: string,
    id: string,
  ): Promise<DatabaseResult<NewsRecord | null>> {
    try {
      const result = await this.db.query<NewsRow>(
        'SELECT * FROM news_articles WHERE user_id = $1 AND id = $2',
        [userId, id],
      );
      const row = result.rows[0];
      return ok(row ? toNewsRecord(row) : null);
    } catch (error) {
      this.logger.error('Error getting article', { error, userId, id });
      return err(fromDatabaseError(error));
    }
  }

  /**
   * Checks whether an article is cached for the user
   */
  async hasArticle(userId: string, id: string): Promise<DatabaseResult<boolean>> {
    try {
      const result = await this.db.query(
        'SELECT 1 FROM news_articles WHERE user_id = $1 AND id = $2',
        [userId, id],
      );
      return ok(result.rows.length > 0);
    } catch (error) {
      this.logger.error('Error checking article existence', {
        error,
        userId,
        id,
      });
      return err(fromDatabaseError(error));
    }
  }

  /**
   * Inserts or replaces articles in one transaction and refreshes their
   * full-text documents. cachedAt is stamped here.
   */
  async upsertArticles(
    records: NewsRecordInput[],
  ): Promise<DatabaseResult<number>> {
    if (records.length === 0) {
      return ok(0);
    }

    try {
      const cachedAt = new Date();
      const written = await this.db.transaction(async (query) => {
        let count = 0;
        for (const record of records) {
          count += await this.writeArticle(query, record, cachedAt);
        }
        return count;
      });

      this.logger.info('Articles cached', { count: written });
      return ok(written);
    } catch (error) {
      this.logger.error('Error caching articles', {
        error,
        count: records.length,
      });
      return err(fromDatabaseError(error));
    }
  }

  private async writeArticle(
    query: QueryFn,
    record: NewsRecordInput,
    cachedAt: Date,
  ): Promise<number> {
    const result = await query(
      `
        INSERT INTO news_articles (
          id, user_id, title, summary, content, url, source, published_at,
          keywords, image_url, sentiment_score, sentiment_label,
          is_bookmarked, cached_at
        )
        VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9::jsonb, $10, $11, $12, $13, $14)
        ON CONFLICT (id, user_id) DO UPDATE SET
          title = EXCLUDED.title,
          summary = EXCLUDED.summary,
          content = EXCLUDED.content,
          url = EXCLUDED.url,
          source = EXCLUDED.source,
          published_at = EXCLUDED.published_at,
          keywords = EXCLUDED.keywords,
          image_url = EXCLUDED.image_url,
          sentiment_score = EXCLUDED.sentiment_score,
          sentiment_label = EXCLUDED.sentiment_label,
          is_bookmarked = EXCLUDED.is_bookmarked,
          cached_at = EXCLUDED.cached_at
      `,
      [
        record.id,
        record.userId,
        record.title,
        record.summary,
        record.content,
        record.url,
        record.source,
        record.publishedAt,
        JSON.stringify(record.keywords),
        record.imageUrl ?? null,
        record.sentimentScore,
        record.sentimentLabel,
        record.isBookmarked,
        cachedAt,
      ],
    );

    await query(
      `
        INSERT INTO news_fts (news_id, user_id, document)
        SELECT n.id, n.user_id, ${FTS_DOCUMENT}
        FROM news_articles n
        WHERE n.id = $1 AND n.user_id = $2
        ON CONFLICT (news_id, user_id) DO UPDATE SET document = EXCLUDED.document
      `,
      [record.id, record.userId],
    );

    return result.rowCount ?? 0;
  }

  /**
   * Updates the bookmark flag; false when the article is not cached
   */
  async updateBookmark(
    userId: string,
    id: string,
    isBookmarked: boolean,
  ): Promise<DatabaseResult<boolean>> {
    try {
      const result = await this.db.query(
        'UPDATE news_articles SET is_bookmarked = $3 WHERE user_id = $1 AND id = $2',
        [userId, id, isBookmarked],
      );
      const updated = (result.rowCount ?? 0) > 0;
      if (!updated) {
        this.logger.warn('Bookmark target not cached', { userId, id });
      }
      return ok(updated);
    } catch (error) {
      this.logger.error('Error updating bookmark', { error, userId, id });
      return err(fromDatabaseError(error));
    }
  }

  /**
   * Corrects sentiment scores; labels are derived from the new score
   */
  async batchUpdateSentiment(
    userId: string,
    scores: Record<string, number>,
  ): Promise<DatabaseResult<number>> {
    const entries = Object.entries(scores);
    if (entries.length === 0) {
      return ok(0);
    }

    try {
      const updated = await this.db.transaction(async (query) => {
        let count = 0;
        for (const [id, score] of entries) {
          const result = await query(
            `UPDATE news_articles
             SET sentiment_score = $3, sentiment_label = $4
             WHERE user_id = $1 AND id = $2`,
            [userId, id, score, sentimentLabelFor(score)],
          );
          count += result.rowCount ?? 0;
        }
        return count;
      });
      return ok(updated);
    } catch (error) {
      this.logger.error('Error updating sentiment', { error, userId });
      return err(fromDatabaseError(error));
    }
  }

  /**
   * Gets the personalized feed ordered by date, then sentiment
   */
  async getPersonalizedNews(
    userId: string,
    limit: number,
    offset = 0,
  ): Promise<DatabaseResult<NewsRecord[]>> {
    return this.list(
      'personalized news',
      `SELECT * FROM news_articles WHERE user_id = $1
       ORDER BY published_at DESC, sentiment_score DESC
       LIMIT $2 OFFSET $3`,
      [userId, limit, offset],
    );
  }

  /**
   * Gets articles cached within the last 24 hours
   */
  async getFreshNews(
    userId: string,
    limit: number,
  ): Promise<DatabaseResult<NewsRecord[]>> {
    return this.list(
      'fresh news',
      `SELECT * FROM news_articles WHERE user_id = $1 AND cached_at >= $2
       ORDER BY published_at DESC LIMIT $3`,
      [userId, new Date(Date.now() - DAY_MS), limit],
    );
  }

  async getBookmarkedNews(
    userId: string,
    limit: number,
  ): Promise<DatabaseResult<NewsRecord[]>> {
    return this.list(
      'bookmarked news',
      `SELECT * FROM news_articles WHERE user_id = $1 AND is_bookmarked = TRUE
       ORDER BY published_at DESC LIMIT $2`,
      [userId, limit],
    );
  }

  async getNewsByDateRange(
    userId: string,
    startDate: Date,
    endDate: Date,
    limit: number,
  ): Promise<DatabaseResult<NewsRecord[]>> {
    return this.list(
      'news by date range',
      `SELECT * FROM news_articles
       WHERE user_id = $1 AND published_at BETWEEN $2 AND $3
       ORDER BY published_at DESC LIMIT $4`,
      [userId, startDate, endDate, limit],
    );
  }

  async getNewsBySentiment(
    userId: string,
    minScore: number,
    maxScore: number,
    limit: number,
  ): Promise<DatabaseResult<NewsRecord[]>> {
    return this.list(
      'news by sentiment',
      `SELECT * FROM news_articles
       WHERE user_id = $1 AND sentiment_score BETWEEN $2 AND $3
       ORDER BY published_at DESC LIMIT $4`,
      [userId, minScore, maxScore, limit],
    );
  }

  /**
   * Case-insensitive substring search over title, summary and keywords
   */
  async searchNews(
    userId: string,
    query: string,
    limit: number,
  ): Promise<DatabaseResult<NewsRecord[]>> {
    const pattern = `%${escapeLike(query)}%`;
    return this.list(
      'news search',
      `SELECT * FROM news_articles
       WHERE user_id = $1
         AND (title ILIKE $2 OR summary ILIKE $2 OR keywords::text ILIKE $2)
       ORDER BY published_at DESC LIMIT $3`,
      [userId, pattern, limit],
    );
  }

  /**
   * Full-text search against the tsvector mirror. The query uses web search
   * syntax, e.g. `"a" OR "b"`.
   */
  async fullTextSearch(
    userId: string,
    query: string,
    limit: number,
  ): Promise<DatabaseResult<NewsRecord[]>> {
    try {
      const result = await this.db.query<NewsRow>(
        `SELECT n.* FROM news_articles n
         JOIN news_fts f ON f.news_id = n.id AND f.user_id = n.user_id
         WHERE n.user_id = $1 AND f.document @@ websearch_to_tsquery('simple', $2)
         ORDER BY ts_rank(f.document, websearch_to_tsquery('simple', $2)) DESC
         LIMIT $3`,
        [userId, query, limit],
      );
      return ok(result.rows.map(toNewsRecord));
    } catch (error) {
      this.logger.warn('Full-text search failed', {
        error: error instanceof Error ? error.message : error,
        userId,
      });
      return err(fromDatabaseError(error));
    }
  }

  /**
   * Rebuilds the full-text mirror when it is empty but articles exist.
   * Returns the number of documents written.
   */
  async ensureFullTextIndex(): Promise<DatabaseResult<number>> {
    try {
      const indexed = await this.db.query<CountRow>(
        'SELECT COUNT(*)::int AS count FROM news_fts',
      );
      if ((indexed.rows[0]?.count ?? 0) > 0) {
        return ok(0);
      }

      const result = await this.db.query(
        `INSERT INTO news_fts (news_id, user_id, document)
         SELECT n.id, n.user_id, ${FTS_DOCUMENT}
         FROM news_articles n
         ON CONFLICT (news_id, user_id) DO NOTHING`,
      );
      const written = result.rowCount ?? 0;
      if (written > 0) {
        this.logger.info('Full-text index repopulated', { documents: written });
      }
      return ok(written);
    } catch (error) {
      this.logger.error('Error rebuilding full-text index', { error });
      return err(fromDatabaseError(error));
    }
  }

  /**
   * Deletes articles outside both the retention window and the newest
   * keepCount by publish date
   */
  async cleanupOldArticles(
    userId: string,
    policy: RetentionPolicy = DEFAULT_RETENTION_POLICY,
  ): Promise<DatabaseResult<number>> {
    try {
      const cutoff = new Date(Date.now() - policy.retentionDays * DAY_MS);
      const result = await this.db.query(
        `DELETE FROM news_articles
         WHERE user_id = $1 AND id NOT IN (
           SELECT id FROM (
             SELECT id, cached_at,
               ROW_NUMBER() OVER (ORDER BY published_at DESC) AS position
             FROM news_articles WHERE user_id = $1
           ) ranked
           WHERE cached_at >= $2 OR position <= $3
         )`,
        [userId, cutoff, policy.keepCount],
      );

      const deleted = result.rowCount ?? 0;
      this.logger.info('Old articles cleaned up', { userId, deleted });
      return ok(deleted);
    } catch (error) {
      this.logger.error('Error cleaning up articles', { error, userId });
      return err(fromDatabaseError(error));
    }
  }

  async getDatabaseStats(
    userId: string,
  ): Promise<DatabaseResult<NewsDatabaseStats>> {
    try {
      const result = await this.db.query<StatsRow>(
        `SELECT
           COUNT(*)::int AS total,
           COUNT(*) FILTER (WHERE is_bookmarked)::int AS bookmarked,
           COUNT(*) FILTER (WHERE cached_at >= $2)::int AS fresh
         FROM news_articles WHERE user_id = $1`,
        [userId, new Date(Date.now() - DAY_MS)],
      );
      const row = result.rows[0];
      return ok({
        total: Number(row?.total ?? 0),
        bookmarked: Number(row?.bookmarked ?? 0),
        fresh: Number(row?.fresh ?? 0),
      });
    } catch (error) {
      this.logger.error('Error getting database stats', { error, userId });
      return err(fromDatabaseError(error));
    }
  }

  /**
   * Per-source breakdown ordered by article count
   */
  async getSourceStatistics(
    userId: string,
    limit: number,
  ): Promise<DatabaseResult<SourceStatistics[]>> {
    try {
      const result = await this.db.query<SourceStatsRow>(
        `SELECT
           source,
           COUNT(*)::int AS article_count,
           AVG(sentiment_score)::float8 AS avg_sentiment,
           COUNT(*) FILTER (WHERE is_bookmarked)::int AS bookmarked_count,
           MAX(published_at) AS latest_article_date
         FROM news_articles WHERE user_id = $1
         GROUP BY source
         ORDER BY article_count DESC
         LIMIT $2`,
        [userId, limit],
      );

      return ok(
        result.rows.map((row) => ({
          source: row.source,
          articleCount: Number(row.article_count),
          avgSentiment: Number(row.avg_sentiment ?? 0),
          bookmarkedCount: Number(row.bookmarked_count),
          latestArticleDate: row.latest_article_date
            ? new Date(row.latest_article_date)
            : null,
        })),
      );
    } catch (error) {
      this.logger.error('Error getting source statistics', { error, userId });
      return err(fromDatabaseError(error));
    }
  }

  /**
   * Average sentiment and bookmark counts of articles cached since `since`
   */
  async getUserSentimentProfile(
    userId: string,
    since: Date,
  ): Promise<DatabaseResult<UserSentimentProfile>> {
    try {
      const result = await this.db.query<SentimentProfileRow>(
        `SELECT
           AVG(sentiment_score)::float8 AS avg_sentiment,
           COUNT(*) FILTER (WHERE is_bookmarked)::int AS bookmarked_count,
           COUNT(*)::int AS total_count
         FROM news_articles WHERE user_id = $1 AND cached_at >= $2`,
        [userId, since],
      );
      const row = result.rows[0];
      const average = row?.avg_sentiment;
      return ok({
        avgSentiment:
          average === null || average === undefined ? null : Number(average),
        bookmarkedCount: Number(row?.bookmarked_count ?? 0),
        totalCount: Number(row?.total_count ?? 0),
      });
    } catch (error) {
      this.logger.error('Error getting sentiment profile', { error, userId });
      return err(fromDatabaseError(error));
    }
  }

  /**
   * Titles starting with the prefix, grouped case-insensitively
   */
  async getTitleSuggestions(
    userId: string,
    prefix: string,
    limit: number,
  ): Promise<DatabaseResult<TitleMatch[]>> {
    try {
      const result = await this.db.query<TitleMatch>(
        `SELECT MIN(title) AS title, COUNT(*)::int AS frequency
         FROM news_articles
         WHERE user_id = $1 AND LOWER(title) LIKE $2
         GROUP BY LOWER(title)
         ORDER BY frequency DESC
         LIMIT $3`,
        [userId, `${escapeLike(prefix.toLowerCase())}%`, limit],
      );
      return ok(
        result.rows.map((row) => ({
          title: row.title,
          frequency: Number(row.frequency),
        })),
      );
    } catch (error) {
      this.logger.error('Error getting title suggestions', { error, userId });
      return err(fromDatabaseError(error));
    }
  }

  private async list(
    operation: string,
    text: string,
    params: unknown[],
  ): Promise<DatabaseResult<NewsRecord[]>> {
    try {
      const result = await this.db.query<NewsRow>(text, params);
      return ok(result.rows.map(toNewsRecord));
    } catch (error) {
      this.logger.error(`Error getting ${operation}`, { error });
      return err(fromDatabaseError(error));
    }
  }
}
