/**
 * Signals combined into a relevance score
 */

import {
  NewsRecord,
  ScoreBreakdown,
  UserSentimentProfile,
} from '../../database/models';

const DAY_MS = 24 * 60 * 60 * 1000;

export const SOURCE_AUTHORITY: Readonly<Record<string, number>> = {
  reuters: 0.95,
  bbc: 0.93,
  cnn: 0.85,
  ap: 0.92,
  bloomberg: 0.88,
  'wall street journal': 0.9,
  'new york times': 0.87,
  'washington post': 0.85,
};

export const DEFAULT_SOURCE_AUTHORITY = 0.5;

export const SCORE_WEIGHTS: Readonly<ScoreBreakdown> = {
  tfidf: 0.4,
  recency: 0.25,
  sourceAuthority: 0.2,
  engagement: 0.1,
  sentimentAlignment: 0.05,
};

const SCORE_FACTORS: readonly (keyof ScoreBreakdown)[] = [
  'tfidf',
  'recency',
  'sourceAuthority',
  'engagement',
  'sentimentAlignment',
];

/**
 * exp(-days / 30) over whole days since publication
 */
export const recencyScore = (publishedAt: Date, now: Date): number => {
  const days = Math.max(
    0,
    Math.floor((now.getTime() - publishedAt.getTime()) / DAY_MS),
  );
  return Math.exp(-days / 30);
};

export const sourceAuthorityScore = (source: string): number =>
  SOURCE_AUTHORITY[source.toLowerCase()] ?? DEFAULT_SOURCE_AUTHORITY;

export const engagementScore = (record: NewsRecord): number => {
  let score = record.isBookmarked ? 0.4 : 0;
  score += Math.abs(record.sentimentScore) * 0.2;
  score += Math.min(record.keywords.length / 10, 0.3);
  return Math.min(score, 1);
};

/**
 * Closeness of the article's sentiment to what the user has been reading,
 * plus a bonus for users who bookmark. Neutral 0.5 without history.
 */
export const sentimentAlignmentScore = (
  record: NewsRecord,
  profile: UserSentimentProfile | null,
): number => {
  if (!profile || profile.avgSentiment === null || profile.totalCount === 0) {
    return 0.5;
  }

  const delta = Math.abs(record.sentimentScore - profile.avgSentiment);
  const alignment = 1 - Math.min(delta / 2, 1);
  const bookmarkRate = profile.bookmarkedCount / profile.totalCount;
  return Math.min(alignment + bookmarkRate * 0.2, 1);
};

/**
 * Weighted mean of the breakdown, clamped to [0, 1]
 */
export const combineScores = (breakdown: ScoreBreakdown): number => {
  let weighted = 0;
  let totalWeight = 0;

  for (const factor of SCORE_FACTORS) {
    weighted += breakdown[factor] * SCORE_WEIGHTS[factor];
    totalWeight += SCORE_WEIGHTS[factor];
  }

  if (totalWeight === 0) return 0;
  return Math.min(Math.max(weighted / totalWeight, 0), 1);
};
