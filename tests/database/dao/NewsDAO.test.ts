import { NewsDAO, escapeLike, toNewsRecord } from '../../../src/database/dao/NewsDAO';
import { NewsRow } from '../../../src/database/models';
import { StorageError } from '../../../src/utils/errors';
import { buildArticle, queryResult } from '../../helpers/factories';
import { createTestDatabase, paramsOf, sqlOf } from '../../helpers/database';

const row = (overrides: Partial<NewsRow> = {}): NewsRow => ({
  id: 'a1',
  user_id: 'u1',
  title: 'Budget approved',
  summary: 'The council approved the budget',
  content: 'Full text',
  url: 'https://news.example.com/a1',
  source: 'City Desk',
  published_at: new Date('2024-06-14T08:00:00.000Z'),
  keywords: ['budget', 'council'],
  image_url: null,
  sentiment_score: 0.4,
  sentiment_label: 'positive',
  is_bookmarked: false,
  cached_at: new Date('2024-06-14T09:00:00.000Z'),
  ...overrides,
});

describe('NewsDAO', () => {
  let database: ReturnType<typeof createTestDatabase>;
  let newsDAO: NewsDAO;

  beforeEach(() => {
    database = createTestDatabase();
    newsDAO = new NewsDAO(database.db);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('toNewsRecord', () => {
    it('should map a row to a record', () => {
      expect(toNewsRecord(row())).toEqual({
        id: 'a1',
        title: 'Budget approved',
        summary: 'The council approved the budget',
        content: 'Full text',
        url: 'https://news.example.com/a1',
        source: 'City Desk',
        publishedAt: new Date('2024-06-14T08:00:00.000Z'),
        keywords: ['budget', 'council'],
        imageUrl: undefined,
        sentimentScore: 0.4,
        sentimentLabel: 'positive',
        isBookmarked: false,
        cachedAt: new Date('2024-06-14T09:00:00.000Z'),
        userId: 'u1',
      });
    });

    it('should derive an unknown label from the score', () => {
      const record = toNewsRecord(
        row({ sentiment_label: 'unknown', sentiment_score: -0.5, keywords: 'a,b' }),
      );

      expect(record.sentimentLabel).toBe('negative');
      expect(record.keywords).toEqual(['a', 'b']);
    });
  });

  it('should escape LIKE wildcards', () => {
    expect(escapeLike('50%_off\\')).toBe('50\\%\\_off\\\\');
  });

  describe('getArticle', () => {
    it('should return the article for the user', async () => {
      database.query.mockResolvedValueOnce(queryResult([row()]));

      const result = await newsDAO.getArticle('u1', 'a1');

      expect(result.success && result.data?.title).toBe('Budget approved');
      expect(paramsOf(database.query, 0)).toEqual(['u1', 'a1']);
    });

    it('should return null when missing', async () => {
      database.query.mockResolvedValueOnce(queryResult([]));

      expect(await newsDAO.getArticle('u1', 'nope')).toEqual({
        success: true,
        data: null,
      });
    });

    it('should return a StorageError when the query fails', async () => {
      database.query.mockRejectedValueOnce(new Error('connection reset'));

      const result = await newsDAO.getArticle('u1', 'a1');

      expect(result.success).toBe(false);
      expect(!result.success && result.error).toBeInstanceOf(StorageError);
    });
  });

  describe('upsertArticles', () => {
    it('should write each article and its full-text document in one transaction', async () => {
      database.query.mockResolvedValue(queryResult([], 1));
      const records = [buildArticle({ id: 'x1' }), buildArticle({ id: 'x2' })];

      const result = await newsDAO.upsertArticles(records);

      expect(result).toEqual({ success: true, data: 2 });
      expect(database.transaction).toHaveBeenCalledTimes(1);
      expect(database.query).toHaveBeenCalledTimes(4);
      expect(sqlOf(database.query, 0)).toContain('ON CONFLICT (id, user_id) DO UPDATE');
      expect(sqlOf(database.query, 1)).toContain('INSERT INTO news_fts');
      expect(paramsOf(database.query, 1)).toEqual(['x1', 'user-1']);
      expect(paramsOf(database.query, 0)?.[8]).toBe('[]');
    });

    it('should skip the database for an empty batch', async () => {
      expect(await newsDAO.upsertArticles([])).toEqual({ success: true, data: 0 });
      expect(database.transaction).not.toHaveBeenCalled();
    });

    it('should fail when the transaction fails', async () => {
      database.query.mockRejectedValueOnce(
        Object.assign(new Error('null value'), { code: '23502' }),
      );

      const result = await newsDAO.upsertArticles([buildArticle()]);

      expect(!result.success && result.error.code).toBe('NOT_NULL_VIOLATION');
    });
  });

  it('should report whether a bookmark update hit a row', async () => {
    database.query
      .mockResolvedValueOnce(queryResult([], 1))
      .mockResolvedValueOnce(queryResult([], 0));

    expect(await newsDAO.updateBookmark('u1', 'a1', true)).toEqual({
      success: true,
      data: true,
    });
    expect(await newsDAO.updateBookmark('u1', 'zz', true)).toEqual({
      success: true,
      data: false,
    });
    expect(paramsOf(database.query, 0)).toEqual(['u1', 'a1', true]);
  });

  it('should relabel sentiment on batch update', async () => {
    database.query.mockResolvedValue(queryResult([], 1));

    const result = await newsDAO.batchUpdateSentiment('u1', { a1: -0.3, a2: 0.05 });

    expect(result).toEqual({ success: true, data: 2 });
    expect(paramsOf(database.query, 0)).toEqual(['u1', 'a1', -0.3, 'negative']);
    expect(paramsOf(database.query, 1)).toEqual(['u1', 'a2', 0.05, 'neutral']);
  });

  it('should page the personalized feed', async () => {
    database.query.mockResolvedValueOnce(queryResult([row()]));

    const result = await newsDAO.getPersonalizedNews('u1', 20, 40);

    expect(result.success && result.data).toHaveLength(1);
    expect(paramsOf(database.query, 0)).toEqual(['u1', 20, 40]);
  });

  it('should escape the substring pattern of searchNews', async () => {
    database.query.mockResolvedValueOnce(queryResult([]));

    await newsDAO.searchNews('u1', '100%', 10);

    expect(paramsOf(database.query, 0)).toEqual(['u1', '%100\\%%', 10]);
  });

  it('should pass the web-search query to full-text search', async () => {
    database.query.mockResolvedValueOnce(queryResult([row()]));

    const result = await newsDAO.fullTextSearch('u1', '"budget" OR "vote"', 30);

    expect(result.success && result.data[0].id).toBe('a1');
    expect(sqlOf(database.query, 0)).toContain("websearch_to_tsquery('simple', $2)");
    expect(paramsOf(database.query, 0)).toEqual(['u1', '"budget" OR "vote"', 30]);
  });

  describe('ensureFullTextIndex', () => {
    it('should leave a populated index alone', async () => {
      database.query.mockResolvedValueOnce(queryResult([{ count: 12 }]));

      expect(await newsDAO.ensureFullTextIndex()).toEqual({ success: true, data: 0 });
      expect(database.query).toHaveBeenCalledTimes(1);
    });

    it('should repopulate an empty index', async () => {
      database.query
        .mockResolvedValueOnce(queryResult([{ count: 0 }]))
        .mockResolvedValueOnce(queryResult([], 5));

      expect(await newsDAO.ensureFullTextIndex()).toEqual({ success: true, data: 5 });
      expect(sqlOf(database.query, 1)).toContain('INSERT INTO news_fts');
    });
  });

  it('should clean up by retention window and keep count', async () => {
    database.query.mockResolvedValueOnce(queryResult([], 3));

    const result = await newsDAO.cleanupOldArticles('u1', {
      keepCount: 50,
      retentionDays: 7,
    });

    expect(result).toEqual({ success: true, data: 3 });
    expect(paramsOf(database.query, 0)?.[2]).toBe(50);
  });

  it('should convert aggregate rows', async () => {
    database.query
      .mockResolvedValueOnce(queryResult([{ total: 10, bookmarked: 2, fresh: 4 }]))
      .mockResolvedValueOnce(
        queryResult([{ avg_sentiment: null, bookmarked_count: 0, total_count: 0 }]),
      );

    expect(await newsDAO.getDatabaseStats('u1')).toEqual({
      success: true,
      data: { total: 10, bookmarked: 2, fresh: 4 },
    });
    expect(
      await newsDAO.getUserSentimentProfile('u1', new Date('2024-06-01T00:00:00.000Z')),
    ).toEqual({
      success: true,
      data: { avgSentiment: null, bookmarkedCount: 0, totalCount: 0 },
    });
  });

  it('should map source statistics', async () => {
    const latest = new Date('2024-06-14T08:00:00.000Z');
    database.query.mockResolvedValueOnce(
      queryResult([
        {
          source: 'City Desk',
          article_count: 3,
          avg_sentiment: 0.2,
          bookmarked_count: 1,
          latest_article_date: latest,
        },
      ]),
    );

    expect(await newsDAO.getSourceStatistics('u1', 50)).toEqual({
      success: true,
      data: [
        {
          source: 'City Desk',
          articleCount: 3,
          avgSentiment: 0.2,
          bookmarkedCount: 1,
          latestArticleDate: latest,
        },
      ],
    });
  });

  it('should look up title suggestions by lowercase prefix', async () => {
    database.query.mockResolvedValueOnce(
      queryResult([{ title: 'Budget approved', frequency: 2 }]),
    );

    const result = await newsDAO.getTitleSuggestions('u1', 'BUD', 5);

    expect(result).toEqual({
      success: true,
      data: [{ title: 'Budget approved', frequency: 2 }],
    });
    expect(paramsOf(database.query, 0)).toEqual(['u1', 'bud%', 5]);
  });
});
