/**
 * SearchEngine - relevance-ranked local search, filtering, suggestions and
 * search history
 */

import { randomUUID } from 'crypto';
import {
  DEFAULT_SEARCH_FILTER,
  FilteredSearchResult,
  NewsRecord,
  ScoredResult,
  SearchAnalytics,
  SearchFilter,
  SearchHistoryEntry,
  SearchMethod,
  SearchSuggestion,
  SemanticSearchResult,
  SuggestionType,
  UserSentimentProfile,
  emptySearchAnalytics,
} from '../../database/models';
import { NewsStore, SearchHistoryStore } from '../../database/stores';
import { TfIdfIndex, buildFullTextQuery, tokenize } from './textAnalysis';
import {
  combineScores,
  engagementScore,
  recencyScore,
  sentimentAlignmentScore,
  sourceAuthorityScore,
} from './RelevanceScorer';
import {
  activeFilterCount,
  matchesKeywords,
  matchesSentiment,
  queryComplexity,
  sortRecords,
} from './filters';
import { SuggestionCache, suggestionCacheKey } from './SuggestionCache';
import { SuggestionDebouncer } from './SuggestionDebouncer';
import { createLogger } from '../../utils/logger';
import {
  AppError,
  Result,
  SearchDegradationError,
  err,
  errorMessage,
  ok,
  toAppError,
} from '../../utils/errors';
import { SearchFilterInput, parseSearchFilter } from '../../utils/validation';

const DAY_MS = 24 * 60 * 60 * 1000;
const SENTIMENT_WINDOW_DAYS = 30;
const KEYWORD_SAMPLE_SIZE = 200;
const SOURCE_SAMPLE_SIZE = 50;

export interface SearchEngineOptions {
  historyRetentionDays: number;
  maxHistoryEntries: number;
  suggestionDebounceMs: number;
}

export const DEFAULT_SEARCH_ENGINE_OPTIONS: SearchEngineOptions = {
  historyRetentionDays: 90,
  maxHistoryEntries: 1000,
  suggestionDebounceMs: 300,
};

export type SearchHistoryInput = Omit<SearchHistoryEntry, 'id'> & {
  id?: string;
};

const ALL_SUGGESTION_TYPES: readonly SuggestionType[] = [
  'keyword',
  'source',
  'title',
  'historical',
];

export class SearchEngine {
  private logger = createLogger('SearchEngine');
  private readonly options: SearchEngineOptions;
  private readonly suggestionCache: SuggestionCache;
  // One debouncer per user, so bursts from different users do not cancel each other
  private readonly debouncers = new Map<string, SuggestionDebouncer<SearchSuggestion>>();
  private fullTextReady = false;

  constructor(
    private readonly newsStore: NewsStore,
    private readonly historyStore: SearchHistoryStore,
    options: Partial<SearchEngineOptions> = {},
    private readonly now: () => Date = () => new Date(),
  ) {
    this.options = { ...DEFAULT_SEARCH_ENGINE_OPTIONS, ...options };
    this.suggestionCache = new SuggestionCache(undefined, undefined, () =>
      this.now().getTime(),
    );
  }

  /**
   * Full-text candidates ranked by TF-IDF and the secondary signals.
   * Results whose tfidf component is below the threshold are dropped.
   */
  async semanticSearch(
    query: string,
    userId: string,
    limit = 20,
    threshold = 0.1,
  ): Promise<Result<SemanticSearchResult, AppError>> {
    const startedAt = Date.now();

    try {
      const candidates = await this.findCandidates(query, userId, limit * 3);
      if (!candidates.success) {
        return candidates;
      }

      const { records, method } = candidates.data;
      const queryTerms = tokenize(query);
      const index = new TfIdfIndex(records);
      const profile = await this.sentimentProfile(userId);

      const scored: ScoredResult[] = [];
      for (const record of records) {
        const tfidf = index.score(record, queryTerms);
        if (tfidf >= threshold) {
          scored.push(this.scoreRecord(record, tfidf, profile));
        }
      }

      scored.sort((a, b) => b.relevanceScore - a.relevanceScore);
      const results = scored.slice(0, limit);
      const searchDuration = Date.now() - startedAt;

      // recordSearchHistory never rejects; the search does not wait for it
      void this.recordSearchHistory({
        userId,
        query,
        filter: { ...DEFAULT_SEARCH_FILTER, query },
        timestamp: this.now(),
        resultCount: results.length,
        searchDuration,
      });

      return ok({
        results,
        totalResults: scored.length,
        searchDuration,
        metadata: {
          method,
          candidateCount: records.length,
          threshold,
          averageScore:
            results.length === 0
              ? 0
              : results.reduce((sum, item) => sum + item.relevanceScore, 0) /
                results.length,
        },
      });
    } catch (error) {
      this.logger.error('Semantic search failed', {
        userId,
        error: errorMessage(error),
      });
      return err(toAppError(error));
    }
  }

  /**
   * Scores an arbitrary list with the search signals; no threshold, no
   * truncation
   */
  async rankByRelevance(
    results: NewsRecord[],
    query: string,
    userId: string,
  ): Promise<Result<ScoredResult[], AppError>> {
    try {
      if (results.length === 0) return ok([]);

      const queryTerms = tokenize(query);
      const index = new TfIdfIndex(results);
      const profile = await this.sentimentProfile(userId);

      const scored = results.map((record) =>
        this.scoreRecord(record, index.score(record, queryTerms), profile),
      );
      scored.sort((a, b) => b.relevanceScore - a.relevanceScore);
      return ok(scored);
    } catch (error) {
      this.logger.error('Relevance ranking failed', {
        userId,
        error: errorMessage(error),
      });
      return err(toAppError(error));
    }
  }

  /**
   * Narrows the date range or the personalized feed by every criterion of
   * the filter, then sorts and truncates
   */
  async filterByMultipleCriteria(
    input: SearchFilterInput,
    userId: string,
  ): Promise<Result<FilteredSearchResult, AppError>> {
    const startedAt = Date.now();
    const parsed = parseSearchFilter(input);
    if (!parsed.success) {
      return parsed;
    }
    const filter = parsed.data;

    try {
      const indexesUsed: string[] = [];
      const base = filter.dateRange
        ? await this.newsStore.getNewsByDateRange(
            userId,
            filter.dateRange.startDate,
            filter.dateRange.endDate,
            filter.limit * 2,
          )
        : await this.newsStore.getPersonalizedNews(
            userId,
            filter.limit * 2,
            filter.offset,
          );
      if (!base.success) {
        return base;
      }
      indexesUsed.push(
        filter.dateRange ? 'publishedAt_index' : 'userId_publishedAt_index',
      );

      let results = base.data;
      const totalCount = results.length;

      if (filter.query) {
        const needle = filter.query.toLowerCase();
        results = results.filter(
          (record) =>
            record.title.toLowerCase().includes(needle) ||
            record.summary.toLowerCase().includes(needle) ||
            record.content.toLowerCase().includes(needle),
        );
      }

      if (filter.sources && filter.sources.length > 0) {
        const sources = new Set(filter.sources.map((s) => s.toLowerCase()));
        results = results.filter((record) =>
          sources.has(record.source.toLowerCase()),
        );
        indexesUsed.push('source_index');
      }

      const { sentiments, keywords } = filter;
      if (sentiments) {
        results = results.filter((record) =>
          matchesSentiment(
            sentiments,
            record.sentimentScore,
            record.sentimentLabel,
          ),
        );
        indexesUsed.push('sentiment_index');
      }

      if (keywords) {
        results = results.filter((record) =>
          matchesKeywords(
            keywords,
            record.keywords,
            `${record.title} ${record.summary} ${record.content}`,
          ),
        );
      }

      if (filter.isBookmarked !== undefined) {
        results = results.filter(
          (record) => record.isBookmarked === filter.isBookmarked,
        );
        indexesUsed.push('bookmark_index');
      }

      const relevance = await this.relevanceFor(results, filter, userId);
      if (relevance) {
        const min = filter.minRelevanceScore ?? 0;
        const max = filter.maxRelevanceScore ?? 1;
        results = results.filter((record) => {
          const score = relevance.get(record.id) ?? 0;
          return score >= min && score <= max;
        });
      }

      results = sortRecords(results, filter.sortBy, filter.sortOrder, relevance);

      return ok({
        results: results.slice(0, filter.limit),
        totalCount,
        searchDuration: Date.now() - startedAt,
        indexesUsed,
        filterCount: activeFilterCount(filter),
        queryComplexity: queryComplexity(filter),
      });
    } catch (error) {
      this.logger.error('Multi-criteria filtering failed', {
        userId,
        error: errorMessage(error),
      });
      return err(toAppError(error));
    }
  }

  /**
   * Keyword, source, title and history suggestions for a prefix.
   * Each source soft-fails to nothing; lists are cached for 30 minutes.
   */
  async getSearchSuggestions(
    prefix: string,
    userId: string,
    limit = 10,
    types?: SuggestionType[],
  ): Promise<Result<SearchSuggestion[], AppError>> {
    const cacheKey = suggestionCacheKey(userId, prefix, types);
    const cached = this.suggestionCache.get(cacheKey);
    if (cached) {
      return ok(cached.slice(0, limit));
    }

    const normalized = prefix.toLowerCase().trim();
    if (normalized.length === 0) {
      return ok([]);
    }

    try {
      const wanted = new Set(
        types && types.length > 0 ? types : ALL_SUGGESTION_TYPES,
      );
      const collected: SearchSuggestion[] = [];

      if (wanted.has('keyword')) {
        collected.push(...(await this.keywordSuggestions(normalized, userId)));
      }
      if (wanted.has('source')) {
        collected.push(
          ...(await this.sourceSuggestions(normalized, userId, limit)),
        );
      }
      if (wanted.has('title')) {
        collected.push(
          ...(await this.titleSuggestions(normalized, userId, limit)),
        );
      }
      if (wanted.has('historical')) {
        collected.push(
          ...(await this.historySuggestions(normalized, userId, limit)),
        );
      }

      const unique = dedupeSuggestions(collected).sort(
        (a, b) =>
          b.relevanceScore - a.relevanceScore || b.frequency - a.frequency,
      );

      this.suggestionCache.set(cacheKey, unique);
      return ok(unique.slice(0, limit));
    } catch (error) {
      this.logger.error('Search suggestions failed', {
        userId,
        error: errorMessage(error),
      });
      return err(toAppError(error));
    }
  }

  /**
   * Suggestions for as-you-type input: only the last call of a burst runs,
   * earlier ones resolve to an empty list
   */
  getDebouncedSuggestions(
    prefix: string,
    userId: string,
    limit = 10,
    types?: SuggestionType[],
  ): Promise<SearchSuggestion[]> {
    return this.debouncerFor(userId).run(async () => {
      const result = await this.getSearchSuggestions(
        prefix,
        userId,
        limit,
        types,
      );
      return result.success ? result.data : [];
    });
  }

  /**
   * Stores a search and applies retention. Never rejects.
   */
  async recordSearchHistory(entry: SearchHistoryInput): Promise<void> {
    try {
      const stored = await this.historyStore.insert({
        ...entry,
        id: entry.id ?? randomUUID(),
      });
      if (!stored.success) {
        this.logger.warn('Failed to record search history', {
          error: stored.error.message,
        });
        return;
      }

      const trimmed = await this.historyStore.enforceRetention(
        entry.userId,
        new Date(
          this.now().getTime() - this.options.historyRetentionDays * DAY_MS,
        ),
        this.options.maxHistoryEntries,
      );
      if (!trimmed.success) {
        this.logger.warn('Failed to trim search history', {
          error: trimmed.error.message,
        });
      }
    } catch (error) {
      this.logger.warn('Failed to record search history', {
        error: errorMessage(error),
      });
    }
  }

  /**
   * History newest first, optionally narrowed to queries containing `query`
   */
  async getSearchHistory(
    userId: string,
    limit = 50,
    query?: string,
  ): Promise<Result<SearchHistoryEntry[], AppError>> {
    return this.historyStore.list(userId, { limit, query });
  }

  async clearSearchHistory(
    userId: string,
    olderThan?: Date,
  ): Promise<Result<number, AppError>> {
    const cleared = await this.historyStore.clear(userId, olderThan);
    if (cleared.success) {
      this.suggestionCache.clear();
    }
    return cleared;
  }

  /**
   * Aggregates over the user's history, optionally only the last
   * `dateRangeDays` days. Falls back to zeros when storage fails.
   */
  async getSearchAnalytics(
    userId: string,
    dateRangeDays?: number,
  ): Promise<SearchAnalytics> {
    const since =
      dateRangeDays === undefined
        ? undefined
        : new Date(this.now().getTime() - dateRangeDays * DAY_MS);

    const history = await this.historyStore.list(userId, { since });
    if (!history.success) {
      this.logger.warn('Search analytics unavailable', {
        userId,
        error: history.error.message,
      });
      return emptySearchAnalytics();
    }

    return summarizeHistory(history.data, dateRangeDays ?? -1);
  }

  dispose(): void {
    for (const debouncer of this.debouncers.values()) {
      debouncer.cancel();
    }
    this.debouncers.clear();
    this.suggestionCache.clear();
  }

  private debouncerFor(userId: string): SuggestionDebouncer<SearchSuggestion> {
    let debouncer = this.debouncers.get(userId);
    if (!debouncer) {
      debouncer = new SuggestionDebouncer(this.options.suggestionDebounceMs);
      this.debouncers.set(userId, debouncer);
    }
    return debouncer;
  }

  private async findCandidates(
    query: string,
    userId: string,
    limit: number,
  ): Promise<Result<{ records: NewsRecord[]; method: SearchMethod }, AppError>> {
    const fullTextQuery = buildFullTextQuery(query);
    if (fullTextQuery.length === 0) {
      return ok({ records: [], method: 'semantic' });
    }

    await this.ensureFullTextIndex();
    const fullText = await this.newsStore.fullTextSearch(
      userId,
      fullTextQuery,
      limit,
    );
    if (fullText.success) {
      return ok({ records: fullText.data, method: 'semantic' });
    }

    const degradation = new SearchDegradationError(
      `Full-text search unavailable: ${fullText.error.message}`,
      'substring',
    );
    this.logger.warn('Falling back to substring search', {
      error: degradation.message,
    });

    const basic = await this.newsStore.searchNews(userId, query.trim(), limit);
    if (!basic.success) {
      return basic;
    }
    return ok({ records: basic.data, method: 'fallback' });
  }

  private async ensureFullTextIndex(): Promise<void> {
    if (this.fullTextReady) return;
    const result = await this.newsStore.ensureFullTextIndex();
    if (result.success) {
      this.fullTextReady = true;
    } else {
      this.logger.warn('Full-text index maintenance failed', {
        error: result.error.message,
      });
    }
  }

  private async sentimentProfile(
    userId: string,
  ): Promise<UserSentimentProfile | null> {
    const since = new Date(
      this.now().getTime() - SENTIMENT_WINDOW_DAYS * DAY_MS,
    );
    try {
      const profile = await this.newsStore.getUserSentimentProfile(
        userId,
        since,
      );
      return profile.success ? profile.data : null;
    } catch (error) {
      this.logger.debug('Sentiment profile unavailable', {
        error: errorMessage(error),
      });
      return null;
    }
  }

  private scoreRecord(
    record: NewsRecord,
    tfidf: number,
    profile: UserSentimentProfile | null,
  ): ScoredResult {
    const scoreBreakdown = {
      tfidf,
      recency: recencyScore(record.publishedAt, this.now()),
      sourceAuthority: sourceAuthorityScore(record.source),
      engagement: engagementScore(record),
      sentimentAlignment: sentimentAlignmentScore(record, profile),
    };
    return {
      newsModel: record,
      relevanceScore: combineScores(scoreBreakdown),
      scoreBreakdown,
    };
  }

  // Relevance is only computed when the filter needs it
  private async relevanceFor(
    records: NewsRecord[],
    filter: SearchFilter,
    userId: string,
  ): Promise<Map<string, number> | undefined> {
    const bounded =
      filter.minRelevanceScore !== undefined ||
      filter.maxRelevanceScore !== undefined;
    if (!bounded && filter.sortBy !== 'relevanceScore') {
      return undefined;
    }

    const ranked = await this.rankByRelevance(
      records,
      filter.query ?? '',
      userId,
    );
    if (!ranked.success) {
      return undefined;
    }
    return new Map(
      ranked.data.map((item) => [item.newsModel.id, item.relevanceScore]),
    );
  }

  private async keywordSuggestions(
    prefix: string,
    userId: string,
  ): Promise<SearchSuggestion[]> {
    const recent = await this.newsStore.getPersonalizedNews(
      userId,
      KEYWORD_SAMPLE_SIZE,
    );
    if (!recent.success) return [];

    const frequency = new Map<string, number>();
    for (const record of recent.data) {
      for (const keyword of record.keywords) {
        if (keyword.toLowerCase().startsWith(prefix)) {
          frequency.set(keyword, (frequency.get(keyword) ?? 0) + 1);
        }
      }
    }

    return [...frequency.entries()].map(([text, count]): SearchSuggestion => ({
      text,
      type: 'keyword',
      frequency: count,
      relevanceScore: 0.7 + Math.min(count / 100, 0.3),
    }));
  }

  private async sourceSuggestions(
    prefix: string,
    userId: string,
    limit: number,
  ): Promise<SearchSuggestion[]> {
    const stats = await this.newsStore.getSourceStatistics(
      userId,
      SOURCE_SAMPLE_SIZE,
    );
    if (!stats.success) return [];

    return stats.data
      .filter((stat) => stat.source.toLowerCase().startsWith(prefix))
      .slice(0, limit)
      .map((stat): SearchSuggestion => ({
        text: stat.source,
        type: 'source',
        frequency: stat.articleCount,
        relevanceScore: 0.8,
      }));
  }

  private async titleSuggestions(
    prefix: string,
    userId: string,
    limit: number,
  ): Promise<SearchSuggestion[]> {
    const titles = await this.newsStore.getTitleSuggestions(
      userId,
      prefix,
      limit,
    );
    if (!titles.success) return [];

    return titles.data.map((match): SearchSuggestion => ({
      text: match.title,
      type: 'title',
      frequency: match.frequency,
      relevanceScore: 0.6,
    }));
  }

  private async historySuggestions(
    prefix: string,
    userId: string,
    limit: number,
  ): Promise<SearchSuggestion[]> {
    const history = await this.historyStore.list(userId, {
      limit,
      query: prefix,
    });
    if (!history.success) return [];

    return history.data
      .filter((entry) => entry.query.toLowerCase().startsWith(prefix))
      .map((entry): SearchSuggestion => ({
        text: entry.query,
        type: 'historical',
        frequency: 1,
        relevanceScore: 0.5,
      }));
  }
}

/**
 * Case-insensitive dedup keeping the most relevant suggestion per text
 */
export const dedupeSuggestions = (
  suggestions: SearchSuggestion[],
): SearchSuggestion[] => {
  const seen = new Map<string, SearchSuggestion>();
  for (const suggestion of suggestions) {
    const key = suggestion.text.toLowerCase();
    const existing = seen.get(key);
    if (!existing || suggestion.relevanceScore > existing.relevanceScore) {
      seen.set(key, suggestion);
    }
  }
  return [...seen.values()];
};

export const summarizeHistory = (
  entries: SearchHistoryEntry[],
  dateRange: number,
): SearchAnalytics => {
  if (entries.length === 0) {
    return { ...emptySearchAnalytics(), dateRange };
  }

  const frequency = new Map<string, number>();
  const byHour: Record<number, number> = {};
  let resultTotal = 0;
  let durationTotal = 0;

  for (const entry of entries) {
    frequency.set(entry.query, (frequency.get(entry.query) ?? 0) + 1);
    const hour = entry.timestamp.getUTCHours();
    byHour[hour] = (byHour[hour] ?? 0) + 1;
    resultTotal += entry.resultCount;
    durationTotal += entry.searchDuration;
  }

  const mostFrequentQueries = [...frequency.entries()]
    .sort((a, b) => b[1] - a[1])
    .slice(0, 10)
    .map(([query, count]) => ({ query, frequency: count }));

  return {
    totalSearches: entries.length,
    averageResultCount: resultTotal / entries.length,
    averageSearchDuration: durationTotal / entries.length,
    uniqueQueries: frequency.size,
    mostFrequentQueries,
    searchPatterns: { byHour },
    dateRange,
  };
};
