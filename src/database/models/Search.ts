/**
 * Search models - filters, scored results and suggestions
 */

import { NewsRecord, SentimentLabel } from './News';

export type SortBy =
  | 'publishedAt'
  | 'sentimentScore'
  | 'title'
  | 'source'
  | 'relevanceScore'
  | 'engagement';

export type SortOrder = 'ascending' | 'descending';

export interface DateRange {
  startDate: Date;
  endDate: Date;
}

export interface SentimentFilter {
  labels?: SentimentLabel[];
  minScore?: number;
  maxScore?: number;
  includePositive: boolean;
  includeNegative: boolean;
  includeNeutral: boolean;
}

export type KeywordMatchStrategy = 'or' | 'and';

export interface KeywordFilter {
  exactKeywords?: string[];
  fuzzyKeywords?: string[];
  excludeKeywords?: string[];
  minMatchCount?: number;
  strategy: KeywordMatchStrategy;
  caseSensitive: boolean;
}

export interface SearchFilter {
  query?: string;
  sources?: string[];
  dateRange?: DateRange;
  sentiments?: SentimentFilter;
  keywords?: KeywordFilter;
  minRelevanceScore?: number;
  maxRelevanceScore?: number;
  isBookmarked?: boolean;
  limit: number;
  offset: number;
  sortBy: SortBy;
  sortOrder: SortOrder;
}

export interface ScoreBreakdown {
  tfidf: number;
  recency: number;
  sourceAuthority: number;
  engagement: number;
  sentimentAlignment: number;
}

export interface ScoredResult {
  newsModel: NewsRecord;
  relevanceScore: number;
  scoreBreakdown: ScoreBreakdown;
}

export type SuggestionType = 'keyword' | 'source' | 'title' | 'historical';

export interface SearchSuggestion {
  text: string;
  type: SuggestionType;
  frequency: number;
  relevanceScore: number;
}

export type SearchMethod = 'semantic' | 'fallback';

export interface SemanticSearchResult {
  results: ScoredResult[];
  totalResults: number;
  searchDuration: number; // ms
  metadata: {
    method: SearchMethod;
    candidateCount: number;
    threshold: number;
    averageScore: number;
  };
}

export interface FilteredSearchResult {
  results: NewsRecord[];
  totalCount: number;
  searchDuration: number; // ms
  indexesUsed: string[];
  filterCount: number;
  queryComplexity: number;
}

export const DEFAULT_SENTIMENT_FILTER: SentimentFilter = {
  includePositive: true,
  includeNegative: true,
  includeNeutral: true,
};

export const DEFAULT_KEYWORD_FILTER: KeywordFilter = {
  strategy: 'or',
  caseSensitive: false,
};

export const DEFAULT_SEARCH_FILTER: SearchFilter = {
  limit: 20,
  offset: 0,
  sortBy: 'publishedAt',
  sortOrder: 'descending',
};
