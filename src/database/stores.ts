/**
 * Storage contracts consumed by the services. The DAOs implement them on
 * PostgreSQL; tests supply in-memory implementations.
 */

import {
  CacheStoreStatistics,
  DatabaseResult,
  NewsDatabaseStats,
  NewsRecord,
  NewsRecordInput,
  ResponseCacheEntry,
  RetentionPolicy,
  SearchHistoryEntry,
  SourceStatistics,
  SyncDirection,
  SyncMetadata,
  SyncStatistics,
  UpsertSyncMetadataData,
  UserSentimentProfile,
} from './models';

export interface TitleMatch {
  title: string;
  frequency: number;
}

export interface NewsStore {
  getArticle(userId: string, id: string): Promise<DatabaseResult<NewsRecord | null>>;
  hasArticle(userId: string, id: string): Promise<DatabaseResult<boolean>>;
  upsertArticles(records: NewsRecordInput[]): Promise<DatabaseResult<number>>;
  updateBookmark(
    userId: string,
    id: string,
    isBookmarked: boolean,
  ): Promise<DatabaseResult<boolean>>;
  batchUpdateSentiment(
    userId: string,
    scores: Record<string, number>,
  ): Promise<DatabaseResult<number>>;

  getPersonalizedNews(
    userId: string,
    limit: number,
    offset?: number,
  ): Promise<DatabaseResult<NewsRecord[]>>;
  getFreshNews(userId: string, limit: number): Promise<DatabaseResult<NewsRecord[]>>;
  getBookmarkedNews(userId: string, limit: number): Promise<DatabaseResult<NewsRecord[]>>;
  getNewsByDateRange(
    userId: string,
    startDate: Date,
    endDate: Date,
    limit: number,
  ): Promise<DatabaseResult<NewsRecord[]>>;
  getNewsBySentiment(
    userId: string,
    minScore: number,
    maxScore: number,
    limit: number,
  ): Promise<DatabaseResult<NewsRecord[]>>;
  searchNews(
    userId: string,
    query: string,
    limit: number,
  ): Promise<DatabaseResult<NewsRecord[]>>;
  fullTextSearch(
    userId: string,
    query: string,
    limit: number,
  ): Promise<DatabaseResult<NewsRecord[]>>;
  ensureFullTextIndex(): Promise<DatabaseResult<number>>;

  cleanupOldArticles(
    userId: string,
    policy?: RetentionPolicy,
  ): Promise<DatabaseResult<number>>;
  getDatabaseStats(userId: string): Promise<DatabaseResult<NewsDatabaseStats>>;
  getSourceStatistics(
    userId: string,
    limit: number,
  ): Promise<DatabaseResult<SourceStatistics[]>>;
  getUserSentimentProfile(
    userId: string,
    since: Date,
  ): Promise<DatabaseResult<UserSentimentProfile>>;
  getTitleSuggestions(
    userId: string,
    prefix: string,
    limit: number,
  ): Promise<DatabaseResult<TitleMatch[]>>;
}

export interface SyncMetadataStore {
  get(
    tableName: string,
    syncDirection: SyncDirection,
  ): Promise<DatabaseResult<SyncMetadata | null>>;
  // lastSyncTime undefined keeps the stored value
  upsert(
    data: UpsertSyncMetadataData,
    lastSyncTime?: Date,
  ): Promise<DatabaseResult<SyncMetadata>>;
  list(): Promise<DatabaseResult<SyncMetadata[]>>;
  getStatistics(): Promise<DatabaseResult<SyncStatistics>>;
  cleanup(olderThan: Date): Promise<DatabaseResult<number>>;
}

export interface HistoryQuery {
  limit?: number;
  query?: string;
  since?: Date;
}

export interface SearchHistoryStore {
  insert(entry: SearchHistoryEntry): Promise<DatabaseResult<SearchHistoryEntry>>;
  // newest first
  list(
    userId: string,
    options?: HistoryQuery,
  ): Promise<DatabaseResult<SearchHistoryEntry[]>>;
  clear(userId: string, olderThan?: Date): Promise<DatabaseResult<number>>;
  enforceRetention(
    userId: string,
    olderThan: Date,
    maxEntries: number,
  ): Promise<DatabaseResult<number>>;
}

export interface CacheStore {
  get(cacheKey: string): Promise<DatabaseResult<ResponseCacheEntry | null>>;
  put(entry: ResponseCacheEntry): Promise<DatabaseResult<void>>;
  delete(cacheKey: string): Promise<DatabaseResult<boolean>>;
  deletePrefix(prefix: string): Promise<DatabaseResult<number>>;
  clear(): Promise<DatabaseResult<number>>;
  purgeExpired(now: Date): Promise<DatabaseResult<number>>;
  getStatistics(now: Date): Promise<DatabaseResult<CacheStoreStatistics>>;
}
