/**
 * News model - an article cached in the local store for one user
 */

export type SentimentLabel = 'positive' | 'neutral' | 'negative';

export interface NewsRecord {
  id: string;
  title: string;
  summary: string;
  content: string;
  url: string;
  source: string;
  publishedAt: Date;
  keywords: string[];
  imageUrl?: string;
  sentimentScore: number; // -1..1
  sentimentLabel: SentimentLabel;
  isBookmarked: boolean;
  cachedAt: Date; // assigned by the local store on write
  userId: string;
}

// Fields a caller supplies on write; cachedAt is always stamped by the store
export type NewsRecordInput = Omit<NewsRecord, 'cachedAt'> & {
  cachedAt?: Date;
};

export interface NewsRow {
  id: string;
  user_id: string;
  title: string;
  summary: string;
  content: string;
  url: string;
  source: string;
  published_at: Date;
  keywords: unknown;
  image_url: string | null;
  sentiment_score: number;
  sentiment_label: string;
  is_bookmarked: boolean;
  cached_at: Date;
}

export interface NewsDatabaseStats {
  total: number;
  bookmarked: number;
  fresh: number; // cached within the last 24 hours
}

export interface SourceStatistics {
  source: string;
  articleCount: number;
  avgSentiment: number;
  bookmarkedCount: number;
  latestArticleDate: Date | null;
}

export interface UserSentimentProfile {
  avgSentiment: number | null;
  bookmarkedCount: number;
  totalCount: number;
}

export interface RetentionPolicy {
  keepCount: number;
  retentionDays: number;
}

export const DEFAULT_RETENTION_POLICY: RetentionPolicy = {
  keepCount: 1000,
  retentionDays: 7,
};

export interface UserKeyword {
  id: string;
  userId: string;
  keyword: string;
  weight: number;
  isActive: boolean;
  createdAt: Date;
  updatedAt?: Date;
}

export const sentimentLabelFor = (score: number): SentimentLabel => {
  if (score >= 0.1) return 'positive';
  if (score <= -0.1) return 'negative';
  return 'neutral';
};
