/**
 * NewsRepository - the feed, remote search and bookmarks, served through the
 * response cache and written into the local store
 */

import { NewsRecord, NewsRecordInput, UserKeyword } from '../database/models';
import { NewsStore } from '../database/stores';
import { NewsGateway } from '../remote/NewsApiClient';
import {
  CacheResult,
  CacheService,
  DEFAULT_CACHE_TTL_MS,
  SEARCH_CACHE_TTL_MS,
  personalizedNewsKey,
  searchResultsKey,
} from './CacheService';
import { ConnectivityMonitor } from './ConnectivityMonitor';
import { createLogger } from '../utils/logger';
import {
  AppError,
  ConnectivityError,
  Result,
  StorageError,
  err,
  ok,
  toAppError,
} from '../utils/errors';
import { decodeNewsRecords } from '../utils/validation';

export class NewsRepository {
  private logger = createLogger('NewsRepository');

  constructor(
    private readonly gateway: NewsGateway,
    private readonly newsStore: NewsStore,
    private readonly cache: CacheService,
    private readonly connectivity: ConnectivityMonitor,
  ) {}

  /**
   * The personalized feed. Fresh pages are cached for an hour and written
   * to the local store.
   */
  async getPersonalizedNews(
    userId: string,
    page = 1,
    limit = 20,
  ): Promise<Result<CacheResult<NewsRecord[]>, AppError>> {
    return this.cache.fetch(
      personalizedNewsKey(userId, page, limit),
      async () => {
        const records = await this.gateway.fetchPersonalizedNews(userId, limit);
        return this.storeFresh(records);
      },
      decodeNewsRecords,
      { ttlMs: DEFAULT_CACHE_TTL_MS },
    );
  }

  /**
   * Remote search; results are cached for 15 minutes
   */
  async searchNews(
    userId: string,
    query: string,
    page = 1,
    limit = 20,
  ): Promise<Result<CacheResult<NewsRecord[]>, AppError>> {
    return this.cache.fetch(
      searchResultsKey(query, page, limit),
      async () => {
        const records = await this.gateway.searchNews(userId, query, page, limit);
        return this.stamp(records);
      },
      decodeNewsRecords,
      { ttlMs: SEARCH_CACHE_TTL_MS },
    );
  }

  /**
   * All news, remote only
   */
  async getAllNews(
    userId: string,
    page = 1,
    limit = 20,
  ): Promise<Result<NewsRecord[], AppError>> {
    return this.remoteOnly('getAllNews', async () =>
      this.stamp(await this.gateway.fetchNews(userId, page, limit)),
    );
  }

  /**
   * The user's interests, remote only
   */
  async getUserKeywords(
    userId: string,
  ): Promise<Result<UserKeyword[], AppError>> {
    return this.remoteOnly('getUserKeywords', () =>
      this.gateway.fetchUserKeywords(userId),
    );
  }

  /**
   * Local bookmark write. The API does not accept bookmark mutations yet,
   * so the change stays local until the upload phase can carry it.
   */
  async toggleBookmark(
    userId: string,
    articleId: string,
    isBookmarked: boolean,
  ): Promise<Result<boolean, AppError>> {
    const result = await this.newsStore.updateBookmark(
      userId,
      articleId,
      isBookmarked,
    );
    if (!result.success) {
      return result;
    }

    if (!result.data) {
      return err(
        new StorageError(`Article ${articleId} is not cached`, undefined, 'NOT_FOUND'),
      );
    }

    // cached pages still carry the old flag
    await this.cache.invalidatePrefix(`news_personalized_${userId}_`);
    this.logger.info('Bookmark updated', { userId, articleId, isBookmarked });
    return ok(isBookmarked);
  }

  private async storeFresh(records: NewsRecordInput[]): Promise<NewsRecord[]> {
    const stamped = this.stamp(records);
    const written = await this.newsStore.upsertArticles(stamped);
    if (!written.success) {
      this.logger.warn('Could not write fresh articles locally', {
        error: written.error.message,
      });
    }
    return stamped;
  }

  private stamp(records: NewsRecordInput[]): NewsRecord[] {
    const cachedAt = new Date();
    return records.map((record) => ({ ...record, cachedAt }));
  }

  private async remoteOnly<T>(
    operation: string,
    call: () => Promise<T>,
  ): Promise<Result<T, AppError>> {
    if (!(await this.isOnline())) {
      return err(new ConnectivityError('No internet connection'));
    }

    try {
      return ok(await call());
    } catch (error) {
      this.logger.warn(`${operation} failed`, { error });
      return err(toAppError(error));
    }
  }

  private async isOnline(): Promise<boolean> {
    try {
      return await this.connectivity.isConnected();
    } catch (error) {
      this.logger.warn('Connectivity check failed', { error });
      return false;
    }
  }
}
