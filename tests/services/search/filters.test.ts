import {
  DEFAULT_KEYWORD_FILTER,
  DEFAULT_SEARCH_FILTER,
  DEFAULT_SENTIMENT_FILTER,
} from '../../../src/database/models';
import {
  activeFilterCount,
  matchesKeywords,
  matchesSentiment,
  queryComplexity,
  sortRecords,
} from '../../../src/services/search/filters';
import { buildArticle, daysAgo } from '../../helpers/factories';

describe('filters', () => {
  describe('matchesSentiment', () => {
    it('should accept every polarity by default', () => {
      expect(matchesSentiment(DEFAULT_SENTIMENT_FILTER, 0.5, 'positive')).toBe(true);
      expect(matchesSentiment(DEFAULT_SENTIMENT_FILTER, -0.5, 'negative')).toBe(true);
      expect(matchesSentiment(DEFAULT_SENTIMENT_FILTER, 0.1, 'neutral')).toBe(true);
    });

    it('should reject excluded polarities', () => {
      const filter = { ...DEFAULT_SENTIMENT_FILTER, includePositive: false };

      expect(matchesSentiment(filter, 0.5, 'positive')).toBe(false);
      expect(matchesSentiment(filter, 0.1, 'neutral')).toBe(true);
    });

    it('should apply labels and score bounds', () => {
      expect(
        matchesSentiment(
          { ...DEFAULT_SENTIMENT_FILTER, labels: ['negative'] },
          0.5,
          'positive',
        ),
      ).toBe(false);
      expect(
        matchesSentiment({ ...DEFAULT_SENTIMENT_FILTER, minScore: 0.6 }, 0.5, 'positive'),
      ).toBe(false);
      expect(
        matchesSentiment({ ...DEFAULT_SENTIMENT_FILTER, maxScore: 0.6 }, 0.5, 'positive'),
      ).toBe(true);
    });
  });

  describe('matchesKeywords', () => {
    it('should accept the first hit under or', () => {
      const filter = { ...DEFAULT_KEYWORD_FILTER, exactKeywords: ['missing', 'vote'] };

      expect(matchesKeywords(filter, ['budget'], 'City vote tonight')).toBe(true);
    });

    it('should require every keyword under and', () => {
      const filter = {
        ...DEFAULT_KEYWORD_FILTER,
        strategy: 'and' as const,
        exactKeywords: ['budget', 'vote'],
      };

      expect(matchesKeywords(filter, ['budget'], 'nothing here')).toBe(false);
      expect(matchesKeywords(filter, ['budget'], 'the vote')).toBe(true);
    });

    it('should reject excluded keywords before anything else', () => {
      const filter = {
        ...DEFAULT_KEYWORD_FILTER,
        exactKeywords: ['vote'],
        excludeKeywords: ['Sports'],
      };

      expect(matchesKeywords(filter, ['vote'], 'sports vote')).toBe(false);
    });

    it('should match fuzzy keywords by containment', () => {
      const filter = { ...DEFAULT_KEYWORD_FILTER, fuzzyKeywords: ['elect'] };

      expect(matchesKeywords(filter, ['elections'], '')).toBe(true);
      expect(matchesKeywords(filter, ['weather'], 'sunny')).toBe(false);
    });

    it('should count hits when minMatchCount is set', () => {
      const filter = {
        ...DEFAULT_KEYWORD_FILTER,
        exactKeywords: ['a1', 'b1', 'c1'],
        minMatchCount: 2,
      };

      expect(matchesKeywords(filter, ['a1', 'b1'], '')).toBe(true);
      expect(matchesKeywords({ ...filter, minMatchCount: 3 }, ['a1', 'b1'], '')).toBe(
        false,
      );
    });

    it('should honour case sensitivity', () => {
      const filter = {
        ...DEFAULT_KEYWORD_FILTER,
        caseSensitive: true,
        exactKeywords: ['Vote'],
      };

      expect(matchesKeywords(filter, [], 'vote')).toBe(false);
      expect(matchesKeywords(filter, [], 'Vote')).toBe(true);
    });
  });

  it('should count active filters and weigh their complexity', () => {
    const filter = {
      ...DEFAULT_SEARCH_FILTER,
      query: 'budget',
      sources: ['City Desk'],
      keywords: DEFAULT_KEYWORD_FILTER,
      minRelevanceScore: 0.2,
    };

    expect(activeFilterCount(filter)).toBe(4);
    expect(queryComplexity(filter)).toBe(8);
    expect(activeFilterCount({ ...DEFAULT_SEARCH_FILTER, query: '' })).toBe(0);
  });

  describe('sortRecords', () => {
    const b = buildArticle({ title: 'b', publishedAt: daysAgo(1) });
    const a = buildArticle({ title: 'a', publishedAt: daysAgo(3) });
    const c = buildArticle({ title: 'c', publishedAt: daysAgo(2) });

    it('should sort by title ascending', () => {
      expect(sortRecords([b, a, c], 'title', 'ascending').map((r) => r.title)).toEqual([
        'a',
        'b',
        'c',
      ]);
    });

    it('should sort by date descending without mutating the input', () => {
      const input = [a, b, c];

      expect(sortRecords(input, 'publishedAt', 'descending')).toEqual([b, c, a]);
      expect(input).toEqual([a, b, c]);
    });

    it('should sort by supplied relevance scores', () => {
      const relevance = new Map([
        [a.id, 0.2],
        [b.id, 0.9],
        [c.id, 0.5],
      ]);

      expect(sortRecords([a, b, c], 'relevanceScore', 'descending', relevance)).toEqual([
        b,
        c,
        a,
      ]);
      expect(sortRecords([a, b, c], 'relevanceScore', 'descending')).toEqual([a, b, c]);
    });
  });
});
