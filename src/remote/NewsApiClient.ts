/**
 * HTTP gateway to the remote news API. Stateless; no caching here.
 */

import axios, { AxiosInstance, AxiosResponse } from 'axios';
import { NewsRecordInput, UserKeyword } from '../database/models';
import { createLogger } from '../utils/logger';
import { RemoteError, errorMessage } from '../utils/errors';
import {
  decodeRemoteArticles,
  decodeUserKeyword,
  errorBodySchema,
  keywordsResponseSchema,
  newsResponseSchema,
} from '../utils/validation';

export interface SessionProvider {
  // null means anonymous
  getAccessToken(): Promise<string | null>;
}

export class StaticSessionProvider implements SessionProvider {
  constructor(private readonly token?: string) {}

  async getAccessToken(): Promise<string | null> {
    return this.token ?? null;
  }
}

export interface NewsGateway {
  fetchNews(
    userId: string,
    page: number,
    limit: number,
  ): Promise<NewsRecordInput[]>;
  fetchPersonalizedNews(
    userId: string,
    limit: number,
  ): Promise<NewsRecordInput[]>;
  searchNews(
    userId: string,
    query: string,
    page: number,
    limit: number,
  ): Promise<NewsRecordInput[]>;
  fetchUserKeywords(userId: string): Promise<UserKeyword[]>;
}

export interface NewsApiClientOptions {
  baseUrl: string;
  timeoutMs?: number;
  session?: SessionProvider;
  http?: AxiosInstance;
}

export const DEFAULT_TIMEOUT_MS = 10000;

export class NewsApiClient implements NewsGateway {
  private logger = createLogger('NewsApiClient');
  private http: AxiosInstance;
  private session: SessionProvider;

  constructor(options: NewsApiClientOptions) {
    this.session = options.session ?? new StaticSessionProvider();
    this.http =
      options.http ??
      axios.create({
        baseURL: options.baseUrl,
        timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
        headers: { Accept: 'application/json' },
      });
  }

  /**
   * GET /api/news - paginated news for everyone
   */
  async fetchNews(
    userId: string,
    page: number,
    limit: number,
  ): Promise<NewsRecordInput[]> {
    const response = await this.get('/api/news', { page, limit }, false);
    return this.decodeArticles(response, userId);
  }

  /**
   * GET /api/news/personalized - requires a session when one exists
   */
  async fetchPersonalizedNews(
    userId: string,
    limit: number,
  ): Promise<NewsRecordInput[]> {
    const response = await this.get(
      '/api/news/personalized',
      { limit },
      true,
    );
    return this.decodeArticles(response, userId);
  }

  /**
   * The API has no search endpoint yet; the page is filtered here by
   * title and summary
   */
  async searchNews(
    userId: string,
    query: string,
    page: number,
    limit: number,
  ): Promise<NewsRecordInput[]> {
    const needle = query.toLowerCase();
    const articles = await this.fetchNews(userId, page, limit);
    return articles.filter(
      (article) =>
        article.title.toLowerCase().includes(needle) ||
        article.summary.toLowerCase().includes(needle),
    );
  }

  /**
   * GET /api/keywords - the user's interests
   */
  async fetchUserKeywords(userId: string): Promise<UserKeyword[]> {
    const response = await this.get('/api/keywords', { userId }, true);
    const body = keywordsResponseSchema.safeParse(response.data);
    if (!body.success) {
      throw new RemoteError('Malformed keywords response', response.status);
    }

    const keywords: UserKeyword[] = [];
    for (const item of body.data.data.interests) {
      const decoded = decodeUserKeyword(item, userId);
      if (decoded.success) {
        keywords.push(decoded.data);
      } else {
        this.logger.warn('Skipping malformed keyword', {
          error: decoded.error.message,
        });
      }
    }
    return keywords;
  }

  private decodeArticles(
    response: AxiosResponse<unknown>,
    userId: string,
  ): NewsRecordInput[] {
    const body = newsResponseSchema.safeParse(response.data);
    if (!body.success) {
      throw new RemoteError('Malformed news response', response.status);
    }

    const { articles, rejected } = decodeRemoteArticles(
      body.data.articles,
      userId,
    );
    if (rejected > 0) {
      this.logger.warn('Skipped articles without an id', { rejected });
    }
    return articles;
  }

  private async get(
    path: string,
    params: Record<string, string | number>,
    authenticated: boolean,
  ): Promise<AxiosResponse<unknown>> {
    const headers: Record<string, string> = {};
    if (authenticated) {
      const token = await this.session.getAccessToken();
      if (token) {
        headers.Authorization = `Bearer ${token}`;
      }
    }

    let response: AxiosResponse<unknown>;
    try {
      response = await this.http.get<unknown>(path, {
        params,
        headers,
        validateStatus: () => true,
      });
    } catch (error) {
      this.logger.warn('Request failed', { path, error: errorMessage(error) });
      throw new RemoteError(`Network error: ${errorMessage(error)}`);
    }

    if (response.status < 200 || response.status >= 300) {
      const body = errorBodySchema.safeParse(response.data);
      const message = body.success
        ? body.data.message
        : `Request failed with status ${response.status}`;
      this.logger.warn('Remote returned an error', {
        path,
        status: response.status,
        message,
      });
      throw new RemoteError(message, response.status);
    }

    return response;
  }
}
