/**
 * Local store schema. Every statement is idempotent.
 */

export const NEWS_TABLE = 'news_articles';
export const FTS_TABLE = 'news_fts';

export const SCHEMA_STATEMENTS: readonly string[] = [
  `CREATE TABLE IF NOT EXISTS news_articles (
    id TEXT NOT NULL,
    user_id TEXT NOT NULL,
    title TEXT NOT NULL,
    summary TEXT NOT NULL DEFAULT '',
    content TEXT NOT NULL DEFAULT '',
    url TEXT NOT NULL DEFAULT '',
    source TEXT NOT NULL DEFAULT 'Unknown',
    published_at TIMESTAMPTZ NOT NULL,
    keywords JSONB NOT NULL DEFAULT '[]'::jsonb,
    image_url TEXT,
    sentiment_score DOUBLE PRECISION NOT NULL DEFAULT 0,
    sentiment_label TEXT NOT NULL DEFAULT 'neutral'
      CHECK (sentiment_label IN ('positive', 'neutral', 'negative')),
    is_bookmarked BOOLEAN NOT NULL DEFAULT FALSE,
    cached_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    PRIMARY KEY (id, user_id)
  )`,
  `CREATE INDEX IF NOT EXISTS idx_news_user_published
    ON news_articles (user_id, published_at DESC)`,
  `CREATE INDEX IF NOT EXISTS idx_news_user_bookmarked
    ON news_articles (user_id, is_bookmarked)`,
  `CREATE INDEX IF NOT EXISTS idx_news_user_cached
    ON news_articles (user_id, cached_at DESC)`,
  `CREATE INDEX IF NOT EXISTS idx_news_user_source
    ON news_articles (user_id, source)`,
  `CREATE INDEX IF NOT EXISTS idx_news_user_sentiment
    ON news_articles (user_id, sentiment_score)`,

  // Full-text mirror of title/summary/content/keywords
  `CREATE TABLE IF NOT EXISTS news_fts (
    news_id TEXT NOT NULL,
    user_id TEXT NOT NULL,
    document TSVECTOR NOT NULL,
    PRIMARY KEY (news_id, user_id),
    FOREIGN KEY (news_id, user_id)
      REFERENCES news_articles (id, user_id) ON DELETE CASCADE
  )`,
  `CREATE INDEX IF NOT EXISTS idx_news_fts_document
    ON news_fts USING GIN (document)`,

  `CREATE TABLE IF NOT EXISTS sync_metadata (
    id TEXT PRIMARY KEY,
    table_name TEXT NOT NULL,
    sync_direction TEXT NOT NULL,
    last_sync_time TIMESTAMPTZ,
    sync_status TEXT NOT NULL
      CHECK (sync_status IN ('idle', 'syncing', 'completed', 'failed')),
    record_count INTEGER NOT NULL DEFAULT 0,
    error_message TEXT,
    metadata JSONB,
    created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    UNIQUE (table_name, sync_direction)
  )`,

  `CREATE TABLE IF NOT EXISTS search_history (
    id TEXT PRIMARY KEY,
    user_id TEXT NOT NULL,
    query TEXT NOT NULL,
    filter_json JSONB NOT NULL DEFAULT '{}'::jsonb,
    searched_at TIMESTAMPTZ NOT NULL,
    result_count INTEGER NOT NULL DEFAULT 0,
    search_duration_ms INTEGER NOT NULL DEFAULT 0
  )`,
  `CREATE INDEX IF NOT EXISTS idx_search_history_user_time
    ON search_history (user_id, searched_at DESC)`,

  `CREATE TABLE IF NOT EXISTS response_cache (
    cache_key TEXT PRIMARY KEY,
    payload JSONB NOT NULL,
    cached_at TIMESTAMPTZ NOT NULL,
    expires_at TIMESTAMPTZ NOT NULL
  )`,
  `CREATE INDEX IF NOT EXISTS idx_response_cache_expires
    ON response_cache (expires_at)`,
];
