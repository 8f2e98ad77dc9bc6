import { SearchSuggestion } from '../../../src/database/models';
import {
  SuggestionCache,
  suggestionCacheKey,
} from '../../../src/services/search/SuggestionCache';

const suggestion = (text: string): SearchSuggestion => ({
  text,
  type: 'keyword',
  frequency: 1,
  relevanceScore: 0.7,
});

describe('SuggestionCache', () => {
  let clock: number;
  const now = () => clock;

  beforeEach(() => {
    clock = 0;
  });

  it('should build keys from user, prefix and types', () => {
    expect(suggestionCacheKey('u1', 'bud')).toBe('u1_bud_all');
    expect(suggestionCacheKey('u1', 'bud', [])).toBe('u1_bud_all');
    expect(suggestionCacheKey('u1', 'bud', ['keyword', 'source'])).toBe(
      'u1_bud_keyword,source',
    );
  });

  it('should return stored suggestions until the ttl passes', () => {
    const cache = new SuggestionCache(1000, 10, now);
    cache.set('k', [suggestion('budget')]);

    clock = 999;
    expect(cache.get('k')).toEqual([suggestion('budget')]);
    clock = 1000;
    expect(cache.get('k')).toBeNull();
    expect(cache.size).toBe(0);
  });

  it('should evict the oldest key past the limit', () => {
    const cache = new SuggestionCache(1000, 2, now);
    cache.set('first', []);
    clock = 1;
    cache.set('second', []);
    clock = 2;
    cache.set('third', []);

    expect(cache.has('first')).toBe(false);
    expect(cache.has('second')).toBe(true);
    expect(cache.has('third')).toBe(true);
  });

  it('should clear every slot', () => {
    const cache = new SuggestionCache(1000, 10, now);
    cache.set('k', []);

    cache.clear();

    expect(cache.size).toBe(0);
  });
});
