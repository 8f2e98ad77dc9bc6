/**
 * Search history model - one row per completed search
 */

import { SearchFilter } from './Search';

export interface SearchHistoryEntry {
  id: string;
  query: string;
  filter: SearchFilter;
  timestamp: Date;
  resultCount: number;
  searchDuration: number; // ms
  userId: string;
}

export interface SearchHistoryRow {
  id: string;
  user_id: string;
  query: string;
  filter_json: unknown;
  searched_at: Date;
  result_count: number;
  search_duration_ms: number;
}

export interface HistoryRetention {
  retentionDays: number;
  maxEntries: number;
}

export interface QueryFrequency {
  query: string;
  frequency: number;
}

export interface SearchAnalytics {
  totalSearches: number;
  averageResultCount: number;
  averageSearchDuration: number;
  uniqueQueries: number;
  mostFrequentQueries: QueryFrequency[];
  searchPatterns: {
    byHour: Record<number, number>;
  };
  dateRange: number; // days, -1 when unbounded
}

export const emptySearchAnalytics = (): SearchAnalytics => ({
  totalSearches: 0,
  averageResultCount: 0,
  averageSearchDuration: 0,
  uniqueQueries: 0,
  mostFrequentQueries: [],
  searchPatterns: { byHour: {} },
  dateRange: -1,
});
