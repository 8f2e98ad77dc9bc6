import {
  DEFAULT_SOURCE_AUTHORITY,
  combineScores,
  engagementScore,
  recencyScore,
  sentimentAlignmentScore,
  sourceAuthorityScore,
} from '../../../src/services/search/RelevanceScorer';
import { NOW, buildArticle, daysAgo } from '../../helpers/factories';

describe('RelevanceScorer', () => {
  describe('recencyScore', () => {
    it('should decay over whole days', () => {
      expect(recencyScore(NOW, NOW)).toBe(1);
      expect(recencyScore(daysAgo(30), NOW)).toBeCloseTo(Math.exp(-1));
      expect(recencyScore(daysAgo(1.5), NOW)).toBeCloseTo(Math.exp(-1 / 30));
    });

    it('should treat future dates as fresh', () => {
      expect(recencyScore(daysAgo(-3), NOW)).toBe(1);
    });
  });

  it('should look up source authority case-insensitively', () => {
    expect(sourceAuthorityScore('Reuters')).toBe(0.95);
    expect(sourceAuthorityScore('Wall Street Journal')).toBe(0.9);
    expect(sourceAuthorityScore('Local Wire')).toBe(DEFAULT_SOURCE_AUTHORITY);
  });

  describe('engagementScore', () => {
    it('should add bookmark, sentiment strength and keyword richness', () => {
      const record = buildArticle({
        isBookmarked: true,
        sentimentScore: -0.5,
        keywords: ['a', 'b', 'c', 'd', 'e'],
      });

      expect(engagementScore(record)).toBeCloseTo(0.8);
    });

    it('should be zero for a plain article', () => {
      expect(engagementScore(buildArticle())).toBe(0);
    });
  });

  describe('sentimentAlignmentScore', () => {
    it('should be neutral without a profile', () => {
      expect(sentimentAlignmentScore(buildArticle(), null)).toBe(0.5);
      expect(
        sentimentAlignmentScore(buildArticle(), {
          avgSentiment: null,
          bookmarkedCount: 0,
          totalCount: 0,
        }),
      ).toBe(0.5);
    });

    it('should combine closeness and bookmark rate', () => {
      const record = buildArticle({ sentimentScore: -0.5 });

      expect(
        sentimentAlignmentScore(record, {
          avgSentiment: 0.5,
          bookmarkedCount: 1,
          totalCount: 4,
        }),
      ).toBeCloseTo(0.55);
    });
  });

  describe('combineScores', () => {
    it('should take the weighted mean', () => {
      expect(
        combineScores({
          tfidf: 1,
          recency: 0,
          sourceAuthority: 0,
          engagement: 0,
          sentimentAlignment: 0,
        }),
      ).toBeCloseTo(0.4);
    });

    it('should clamp to one', () => {
      expect(
        combineScores({
          tfidf: 3,
          recency: 1,
          sourceAuthority: 1,
          engagement: 1,
          sentimentAlignment: 1,
        }),
      ).toBe(1);
    });
  });
});
