/**
 * Decoders for remote payloads and search filters
 */

import { z } from 'zod';
import {
  NewsRecord,
  NewsRecordInput,
  SearchFilter,
  UserKeyword,
  sentimentLabelFor,
} from '../database/models';
import { Result, ValidationError, err, fromZodError, ok } from './errors';

const optionalText = z.string().nullish();

const optionalNumber = z
  .union([z.number(), z.string()])
  .nullish()
  .transform((value) => {
    if (value === null || value === undefined || value === '') return undefined;
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  });

const identifier = z
  .union([z.string().min(1), z.number()])
  .transform((value) => String(value));

const sentimentLabelSchema = z.enum(['positive', 'neutral', 'negative']);

/**
 * Keyword ladder: string array, JSON array string, comma-delimited string
 */
export const parseKeywords = (value: unknown): string[] => {
  if (Array.isArray(value)) {
    return value
      .filter((item): item is string => typeof item === 'string')
      .map((item) => item.trim())
      .filter((item) => item.length > 0);
  }

  if (typeof value !== 'string') {
    return [];
  }

  const trimmed = value.trim();
  if (trimmed.length === 0) {
    return [];
  }

  if (trimmed.startsWith('[')) {
    try {
      const parsed: unknown = JSON.parse(trimmed);
      if (Array.isArray(parsed)) {
        return parseKeywords(parsed);
      }
    } catch {
      // not JSON, fall through to the delimited form
    }
  }

  return trimmed
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
};

const parseDate = (value: string | null | undefined): Date | undefined => {
  if (!value) return undefined;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? undefined : date;
};

const remoteArticleSchema = z.object({
  id: identifier,
  title: optionalText,
  summary: optionalText,
  description: optionalText,
  content: optionalText,
  body: optionalText,
  url: optionalText,
  source: optionalText,
  published_at: optionalText,
  publishedAt: optionalText,
  keywords: z.unknown(),
  image_url: optionalText,
  imageUrl: optionalText,
  sentiment_score: optionalNumber,
  sentiment_label: optionalText,
  is_bookmarked: z.boolean().nullish(),
});

/**
 * Decodes one remote article, filling every missing field with its fallback.
 * Only a missing id is fatal.
 */
export const decodeRemoteArticle = (
  raw: unknown,
  userId: string,
  now: Date = new Date(),
): Result<NewsRecordInput, ValidationError> => {
  const parsed = remoteArticleSchema.safeParse(raw);
  if (!parsed.success) {
    return err(fromZodError(parsed.error));
  }

  const article = parsed.data;
  const sentimentScore = article.sentiment_score ?? 0;
  const label = sentimentLabelSchema.safeParse(article.sentiment_label);

  return ok({
    id: article.id,
    title: article.title || 'No Title',
    summary: article.summary ?? article.description ?? '',
    content: article.content ?? article.body ?? '',
    url: article.url ?? '',
    source: article.source || 'Unknown',
    publishedAt:
      parseDate(article.published_at) ?? parseDate(article.publishedAt) ?? now,
    keywords: parseKeywords(article.keywords),
    imageUrl: article.image_url ?? article.imageUrl ?? undefined,
    sentimentScore,
    sentimentLabel: label.success
      ? label.data
      : sentimentLabelFor(sentimentScore),
    isBookmarked: article.is_bookmarked ?? false,
    // Records always belong to the requesting user
    userId,
  });
};

/**
 * Decodes a list of remote articles, dropping entries without an id
 */
export const decodeRemoteArticles = (
  items: unknown[],
  userId: string,
  now: Date = new Date(),
): { articles: NewsRecordInput[]; rejected: number } => {
  const articles: NewsRecordInput[] = [];
  let rejected = 0;

  for (const item of items) {
    const decoded = decodeRemoteArticle(item, userId, now);
    if (decoded.success) {
      articles.push(decoded.data);
    } else {
      rejected++;
    }
  }

  return { articles, rejected };
};

const storedNewsRecordSchema = z.object({
  id: z.string(),
  title: z.string(),
  summary: z.string(),
  content: z.string(),
  url: z.string(),
  source: z.string(),
  publishedAt: z.coerce.date(),
  keywords: z.unknown().transform(parseKeywords),
  imageUrl: z.string().optional(),
  sentimentScore: z.number(),
  sentimentLabel: sentimentLabelSchema,
  isBookmarked: z.boolean(),
  cachedAt: z.coerce.date(),
  userId: z.string(),
});

/**
 * Decodes records that went through JSON, e.g. a cached response
 */
export const decodeNewsRecords = (payload: unknown): NewsRecord[] | null => {
  const parsed = z.array(storedNewsRecordSchema).safeParse(payload);
  return parsed.success ? parsed.data : null;
};

export const newsResponseSchema = z.object({
  success: z.literal(true),
  articles: z.array(z.unknown()),
});

export const keywordsResponseSchema = z.object({
  data: z.object({
    interests: z.array(z.unknown()),
  }),
});

export const errorBodySchema = z.object({
  message: z.string(),
});

const remoteKeywordSchema = z.object({
  id: identifier,
  interest_category: optionalText,
  keyword: optionalText,
  priority_level: optionalNumber,
  weight: optionalNumber,
  is_active: z.boolean().nullish(),
  created_at: optionalText,
  updated_at: optionalText,
});

/**
 * Decodes a user interest; priority levels (1-5) are scaled to a 0..1 weight
 */
export const decodeUserKeyword = (
  raw: unknown,
  userId: string,
  now: Date = new Date(),
): Result<UserKeyword, ValidationError> => {
  const parsed = remoteKeywordSchema.safeParse(raw);
  if (!parsed.success) {
    return err(fromZodError(parsed.error));
  }

  const item = parsed.data;
  const keyword = item.interest_category ?? item.keyword;
  if (!keyword) {
    return err(new ValidationError('Keyword text is missing', { id: item.id }));
  }

  return ok({
    id: item.id,
    userId,
    keyword,
    weight:
      item.priority_level !== undefined
        ? item.priority_level / 5
        : (item.weight ?? 1),
    isActive: item.is_active ?? true,
    createdAt: parseDate(item.created_at) ?? now,
    updatedAt: parseDate(item.updated_at),
  });
};

const sentimentFilterSchema = z.object({
  labels: z.array(sentimentLabelSchema).optional(),
  minScore: z.number().min(-1).max(1).optional(),
  maxScore: z.number().min(-1).max(1).optional(),
  includePositive: z.boolean().default(true),
  includeNegative: z.boolean().default(true),
  includeNeutral: z.boolean().default(true),
});

const keywordFilterSchema = z.object({
  exactKeywords: z.array(z.string()).optional(),
  fuzzyKeywords: z.array(z.string()).optional(),
  excludeKeywords: z.array(z.string()).optional(),
  minMatchCount: z.number().int().positive().optional(),
  strategy: z.enum(['or', 'and']).default('or'),
  caseSensitive: z.boolean().default(false),
});

export const searchFilterSchema = z
  .object({
    query: z.string().optional(),
    sources: z.array(z.string()).optional(),
    dateRange: z
      .object({
        startDate: z.coerce.date(),
        endDate: z.coerce.date(),
      })
      .refine((range) => range.startDate <= range.endDate, {
        message: 'startDate must not be after endDate',
      })
      .optional(),
    sentiments: sentimentFilterSchema.optional(),
    keywords: keywordFilterSchema.optional(),
    minRelevanceScore: z.number().min(0).max(1).optional(),
    maxRelevanceScore: z.number().min(0).max(1).optional(),
    isBookmarked: z.boolean().optional(),
    limit: z.number().int().positive().max(500).default(20),
    offset: z.number().int().nonnegative().default(0),
    sortBy: z
      .enum([
        'publishedAt',
        'sentimentScore',
        'title',
        'source',
        'relevanceScore',
        'engagement',
      ])
      .default('publishedAt'),
    sortOrder: z.enum(['ascending', 'descending']).default('descending'),
  })
  .strip();

export type SearchFilterInput = z.input<typeof searchFilterSchema>;

/**
 * Validates a filter and applies defaults. Also used to read filters back
 * from search history, where dates arrive as ISO strings.
 */
export const parseSearchFilter = (
  input: unknown,
): Result<SearchFilter, ValidationError> => {
  const parsed = searchFilterSchema.safeParse(input);
  if (!parsed.success) {
    return err(fromZodError(parsed.error));
  }
  return ok(parsed.data);
};
