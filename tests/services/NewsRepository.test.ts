import { CacheService, personalizedNewsKey } from '../../src/services/CacheService';
import { ManualConnectivityMonitor } from '../../src/services/ConnectivityMonitor';
import { NewsRepository } from '../../src/services/NewsRepository';
import { ConnectivityError, RemoteError, StorageError, err } from '../../src/utils/errors';
import { InMemoryCacheStore, InMemoryNewsStore } from '../helpers/inMemoryStores';
import { FakeGateway, createFakeGateway } from '../helpers/fakeGateway';
import { NOW, buildArticle } from '../helpers/factories';

describe('NewsRepository', () => {
  let gateway: FakeGateway;
  let newsStore: InMemoryNewsStore;
  let cacheStore: InMemoryCacheStore;
  let connectivity: ManualConnectivityMonitor;
  let cache: CacheService;
  let repository: NewsRepository;

  beforeEach(() => {
    gateway = createFakeGateway();
    newsStore = new InMemoryNewsStore(() => NOW);
    cacheStore = new InMemoryCacheStore();
    connectivity = new ManualConnectivityMonitor();
    cache = new CacheService(cacheStore, connectivity, () => NOW);
    repository = new NewsRepository(gateway, newsStore, cache, connectivity);
  });

  const goOffline = () =>
    connectivity.setStatus({ isConnected: false, networkType: 'none' });

  describe('getPersonalizedNews', () => {
    it('should fetch, store locally and cache the page', async () => {
      gateway.fetchPersonalizedNews.mockResolvedValueOnce([
        buildArticle({ id: 'p1', userId: 'u1', title: 'Rates fall' }),
      ]);

      const result = await repository.getPersonalizedNews('u1');

      expect(result.success && result.data.source).toBe('remote');
      expect(result.success && result.data.data.map((record) => record.id)).toEqual([
        'p1',
      ]);
      expect(gateway.fetchPersonalizedNews).toHaveBeenCalledWith('u1', 20);
      expect(newsStore.all('u1').map((record) => record.title)).toEqual(['Rates fall']);
      expect(await cacheStore.get(personalizedNewsKey('u1', 1, 20))).toMatchObject({
        success: true,
        data: { cacheKey: 'news_personalized_u1_p1_l20' },
      });
    });

    it('should serve the cached page offline with revived dates', async () => {
      gateway.fetchPersonalizedNews.mockResolvedValueOnce([
        buildArticle({ id: 'p1', userId: 'u1', publishedAt: NOW }),
      ]);
      await repository.getPersonalizedNews('u1');
      goOffline();

      const result = await repository.getPersonalizedNews('u1');

      expect(result.success && result.data.source).toBe('cache');
      expect(result.success && result.data.data[0].publishedAt).toEqual(NOW);
      expect(gateway.fetchPersonalizedNews).toHaveBeenCalledTimes(1);
    });

    it('should fail offline without a cached page', async () => {
      goOffline();

      const result = await repository.getPersonalizedNews('u1', 1, 20);

      expect(!result.success && result.error).toBeInstanceOf(ConnectivityError);
    });

    it('should still return fresh data when the local write fails', async () => {
      gateway.fetchPersonalizedNews.mockResolvedValueOnce([buildArticle({ id: 'p1' })]);
      jest
        .spyOn(newsStore, 'upsertArticles')
        .mockResolvedValueOnce(err(new StorageError('read-only')));

      const result = await repository.getPersonalizedNews('u1');

      expect(result.success && result.data.data).toHaveLength(1);
    });
  });

  it('should cache remote search results under the search key', async () => {
    gateway.searchNews.mockResolvedValueOnce([buildArticle({ id: 's1' })]);

    const result = await repository.searchNews('u1', 'rates', 1, 10);

    expect(result.success && result.data.cacheKey).toBe('search_rates_p1_l10');
    expect(gateway.searchNews).toHaveBeenCalledWith('u1', 'rates', 1, 10);
  });

  describe('remote-only reads', () => {
    it('should fail fast when offline', async () => {
      goOffline();

      const news = await repository.getAllNews('u1');
      const keywords = await repository.getUserKeywords('u1');

      expect(!news.success && news.error.message).toBe('No internet connection');
      expect(!keywords.success && keywords.error.kind).toBe('connectivity');
      expect(gateway.fetchNews).not.toHaveBeenCalled();
    });

    it('should return remote errors as results', async () => {
      gateway.fetchNews.mockRejectedValueOnce(new RemoteError('Down', 500));

      const result = await repository.getAllNews('u1', 3, 5);

      expect(!result.success && result.error.message).toBe('Down');
      expect(gateway.fetchNews).toHaveBeenCalledWith('u1', 3, 5);
    });

    it('should return the user keywords', async () => {
      gateway.fetchUserKeywords.mockResolvedValueOnce([
        {
          id: 'k1',
          userId: 'u1',
          keyword: 'economy',
          weight: 1,
          isActive: true,
          createdAt: NOW,
        },
      ]);

      const result = await repository.getUserKeywords('u1');

      expect(result.success && result.data.map((item) => item.keyword)).toEqual([
        'economy',
      ]);
    });
  });

  describe('toggleBookmark', () => {
    it('should update the record and drop cached feed pages', async () => {
      newsStore.seed([buildArticle({ id: 'b1', userId: 'u1' })]);
      await cache.put(personalizedNewsKey('u1', 1, 20), []);
      await cache.put('search_rates_p1_l20', []);

      const result = await repository.toggleBookmark('u1', 'b1', true);

      expect(result).toEqual({ success: true, data: true });
      expect(newsStore.all('u1')[0].isBookmarked).toBe(true);
      expect(await cacheStore.get(personalizedNewsKey('u1', 1, 20))).toEqual({
        success: true,
        data: null,
      });
      expect(await cacheStore.get('search_rates_p1_l20')).toMatchObject({
        data: { cacheKey: 'search_rates_p1_l20' },
      });
    });

    it('should report articles that are not cached', async () => {
      const result = await repository.toggleBookmark('u1', 'missing', true);

      expect(!result.success && result.error.code).toBe('NOT_FOUND');
    });
  });
});
