/**
 * Predicates and ordering for multi-criteria filtering
 */

import {
  KeywordFilter,
  NewsRecord,
  SearchFilter,
  SentimentFilter,
  SentimentLabel,
  SortBy,
  SortOrder,
} from '../../database/models';
import { engagementScore } from './RelevanceScorer';

export const matchesSentiment = (
  filter: SentimentFilter,
  score: number,
  label: SentimentLabel,
): boolean => {
  if (filter.labels && !filter.labels.includes(label)) return false;
  if (filter.minScore !== undefined && score < filter.minScore) return false;
  if (filter.maxScore !== undefined && score > filter.maxScore) return false;

  if (score > 0.1 && !filter.includePositive) return false;
  if (score < -0.1 && !filter.includeNegative) return false;
  if (score >= -0.1 && score <= 0.1 && !filter.includeNeutral) return false;

  return true;
};

/**
 * Exclusions reject first. Under `or` the first hit accepts, under `and` the
 * first miss rejects; minMatchCount, when set, counts every hit instead.
 */
export const matchesKeywords = (
  filter: KeywordFilter,
  articleKeywords: string[],
  articleText: string,
): boolean => {
  const normalize = (value: string): string =>
    filter.caseSensitive ? value : value.toLowerCase();
  const text = normalize(articleText);
  const keywords = articleKeywords.map(normalize);
  const counting = filter.minMatchCount !== undefined;

  for (const excluded of filter.excludeKeywords ?? []) {
    const keyword = normalize(excluded);
    if (keywords.includes(keyword) || text.includes(keyword)) {
      return false;
    }
  }

  const exactHit = (keyword: string): boolean =>
    keywords.includes(keyword) || text.includes(keyword);
  const fuzzyHit = (keyword: string): boolean =>
    keywords.some(
      (articleKeyword) =>
        articleKeyword.includes(keyword) || keyword.includes(articleKeyword),
    ) || text.includes(keyword);

  const checks: [string[], (keyword: string) => boolean][] = [
    [filter.exactKeywords ?? [], exactHit],
    [filter.fuzzyKeywords ?? [], fuzzyHit],
  ];

  let matchCount = 0;
  let total = 0;
  for (const [list, hit] of checks) {
    for (const candidate of list) {
      total++;
      if (hit(normalize(candidate))) {
        matchCount++;
        if (!counting && filter.strategy === 'or') return true;
      } else if (!counting && filter.strategy === 'and') {
        return false;
      }
    }
  }

  if (filter.minMatchCount !== undefined) {
    return matchCount >= filter.minMatchCount;
  }
  if (filter.strategy === 'and') {
    return matchCount === total;
  }
  return matchCount > 0;
};

const hasText = (value: string | undefined): boolean =>
  value !== undefined && value.length > 0;

const hasItems = (value: string[] | undefined): boolean =>
  value !== undefined && value.length > 0;

export const activeFilterCount = (filter: SearchFilter): number => {
  let count = 0;
  if (hasText(filter.query)) count++;
  if (hasItems(filter.sources)) count++;
  if (filter.dateRange) count++;
  if (filter.sentiments) count++;
  if (filter.keywords) count++;
  if (
    filter.minRelevanceScore !== undefined ||
    filter.maxRelevanceScore !== undefined
  ) {
    count++;
  }
  if (filter.isBookmarked !== undefined) count++;
  return count;
};

export const queryComplexity = (filter: SearchFilter): number => {
  let complexity = 0;
  if (hasText(filter.query)) complexity += 2;
  if (filter.dateRange) complexity += 1;
  if (hasItems(filter.sources)) complexity += 1;
  if (filter.sentiments) complexity += 2;
  if (filter.keywords) complexity += 3;
  if (filter.isBookmarked !== undefined) complexity += 1;
  if (
    filter.minRelevanceScore !== undefined ||
    filter.maxRelevanceScore !== undefined
  ) {
    complexity += 2;
  }
  return complexity;
};

const compareText = (a: string, b: string): number =>
  a < b ? -1 : a > b ? 1 : 0;

const compareBy = (
  sortBy: SortBy,
  a: NewsRecord,
  b: NewsRecord,
  relevance?: ReadonlyMap<string, number>,
): number => {
  switch (sortBy) {
    case 'publishedAt':
      return a.publishedAt.getTime() - b.publishedAt.getTime();
    case 'sentimentScore':
      return a.sentimentScore - b.sentimentScore;
    case 'title':
      return compareText(a.title, b.title);
    case 'source':
      return compareText(a.source, b.source);
    case 'engagement':
      return engagementScore(a) - engagementScore(b);
    case 'relevanceScore':
      // without scores the incoming order is kept
      return relevance
        ? (relevance.get(a.id) ?? 0) - (relevance.get(b.id) ?? 0)
        : 0;
  }
};

/**
 * Stable sort; returns a new array
 */
export const sortRecords = (
  records: NewsRecord[],
  sortBy: SortBy,
  sortOrder: SortOrder,
  relevance?: ReadonlyMap<string, number>,
): NewsRecord[] => {
  const direction = sortOrder === 'ascending' ? 1 : -1;
  return [...records].sort(
    (a, b) => direction * compareBy(sortBy, a, b, relevance),
  );
};
