import {
  TfIdfIndex,
  buildFullTextQuery,
  documentText,
  tokenize,
} from '../../../src/services/search/textAnalysis';
import { buildArticle } from '../../helpers/factories';

describe('textAnalysis', () => {
  describe('tokenize', () => {
    it('should lowercase, split on punctuation and drop single characters', () => {
      expect(tokenize('Hello, World! a 서울 news-feed')).toEqual([
        'hello',
        'world',
        '서울',
        'news',
        'feed',
      ]);
    });

    it('should return nothing for blank text', () => {
      expect(tokenize('   ')).toEqual([]);
    });
  });

  it('should join title, summary, content and keywords', () => {
    const record = buildArticle({
      title: 'T',
      summary: 'S',
      content: 'C',
      keywords: ['k1', 'k2'],
    });

    expect(documentText(record)).toBe('T S C k1 k2');
  });

  describe('buildFullTextQuery', () => {
    it('should quote each term and join with OR', () => {
      expect(buildFullTextQuery('  climate  change ')).toBe('"climate" OR "change"');
    });

    it('should drop operator characters and double quotes', () => {
      expect(buildFullTextQuery('a*b:c')).toBe('"abc"');
      expect(buildFullTextQuery('say "hi"')).toBe('"say" OR """hi"""');
    });

    it('should return an empty query for blank input', () => {
      expect(buildFullTextQuery('  ')).toBe('');
    });
  });

  describe('TfIdfIndex', () => {
    const election = buildArticle({
      title: 'Election results',
      summary: 'election night',
      content: 'x',
    });
    const weather = buildArticle({
      title: 'Weather today',
      summary: 'sunny',
      content: 'clear',
    });

    it('should weight term frequency by inverse document frequency', () => {
      const index = new TfIdfIndex([election, weather]);

      expect(index.size).toBe(2);
      expect(index.score(election, ['election'])).toBeCloseTo((2 / 4) * Math.log(2));
      expect(index.score(weather, ['election'])).toBe(0);
    });

    it('should average over the query terms', () => {
      const index = new TfIdfIndex([election, weather]);

      expect(index.score(election, ['election', 'weather'])).toBeCloseTo(
        ((2 / 4) * Math.log(2)) / 2,
      );
    });

    it('should score zero when a term is in every candidate', () => {
      const index = new TfIdfIndex([election]);

      expect(index.score(election, ['election'])).toBe(0);
    });

    it('should score zero without query terms', () => {
      expect(new TfIdfIndex([election]).score(election, [])).toBe(0);
    });
  });
});
