/**
 * Composition root: wires storage, remote client, connectivity, cache,
 * repository, sync and search into one data layer
 */

import { AppConfig } from './config';
import { DatabaseConnection } from './database/connection';
import {
  NewsDAO,
  ResponseCacheDAO,
  SearchHistoryDAO,
  SyncMetadataDAO,
} from './database/dao';
import { NewsApiClient, StaticSessionProvider } from './remote/NewsApiClient';
import { CacheService } from './services/CacheService';
import {
  ConnectivityMonitor,
  NetworkConnectivityMonitor,
} from './services/ConnectivityMonitor';
import { NewsRepository } from './services/NewsRepository';
import { RetryPolicy } from './services/sync/RetryPolicy';
import { SyncManager } from './services/sync/SyncManager';
import { SearchEngine } from './services/search/SearchEngine';
import { createLogger } from './utils/logger';
import { errorMessage } from './utils/errors';

export interface DataLayerOverrides {
  connectivity?: ConnectivityMonitor;
}

export class DataLayer {
  private logger = createLogger('DataLayer');
  private initialized = false;

  readonly database: DatabaseConnection;
  readonly newsStore: NewsDAO;
  readonly metadataStore: SyncMetadataDAO;
  readonly historyStore: SearchHistoryDAO;
  readonly cacheStore: ResponseCacheDAO;
  readonly api: NewsApiClient;
  readonly connectivity: ConnectivityMonitor;
  readonly cache: CacheService;
  readonly repository: NewsRepository;
  readonly sync: SyncManager;
  readonly search: SearchEngine;

  constructor(
    private readonly config: AppConfig,
    overrides: DataLayerOverrides = {},
  ) {
    this.database = new DatabaseConnection(config.database);
    this.newsStore = new NewsDAO(this.database);
    this.metadataStore = new SyncMetadataDAO(this.database);
    this.historyStore = new SearchHistoryDAO(this.database);
    this.cacheStore = new ResponseCacheDAO(this.database);

    this.api = new NewsApiClient({
      baseUrl: config.api.baseUrl,
      timeoutMs: config.api.timeoutMs,
      session: new StaticSessionProvider(config.api.token),
    });

    this.connectivity =
      overrides.connectivity ??
      new NetworkConnectivityMonitor({
        hostname: new URL(config.api.baseUrl).hostname,
      });

    this.cache = new CacheService(this.cacheStore, this.connectivity);
    this.repository = new NewsRepository(
      this.api,
      this.newsStore,
      this.cache,
      this.connectivity,
    );

    this.sync = new SyncManager(
      {
        gateway: this.api,
        newsStore: this.newsStore,
        metadataStore: this.metadataStore,
        connectivity: this.connectivity,
        retryPolicy: new RetryPolicy({
          maxRetries: config.sync.maxRetries,
          baseDelayMs: config.sync.baseDelayMs,
          maxDelayMs: config.sync.maxDelayMs,
        }),
      },
      {
        cronExpression: config.sync.cronExpression,
        enableAutoSync: config.sync.enableAutoSync,
        syncOnlyOnWifi: config.sync.syncOnlyOnWifi,
        conflictStrategy: config.sync.conflictStrategy,
      },
    );

    this.search = new SearchEngine(this.newsStore, this.historyStore, {
      historyRetentionDays: config.search.historyRetentionDays,
      maxHistoryEntries: config.search.maxHistoryEntries,
    });
  }

  /**
   * Connects storage, ensures the schema and starts background work
   */
  async init(): Promise<void> {
    if (this.initialized) return;

    await this.database.connect();
    await this.database.initializeSchema();

    const indexed = await this.newsStore.ensureFullTextIndex();
    if (!indexed.success) {
      this.logger.warn('Full-text index not ready', {
        error: indexed.error.message,
      });
    }

    const purged = await this.cache.purgeExpired();
    this.logger.debug('Expired cache entries purged', { purged });

    this.connectivity.start();
    this.sync.start();
    this.initialized = true;

    this.logger.info('Data layer initialized', {
      autoSync: this.config.sync.enableAutoSync,
      baseUrl: this.config.api.baseUrl,
    });
  }

  async dispose(): Promise<void> {
    this.sync.dispose();
    this.search.dispose();
    this.connectivity.stop();

    try {
      await this.database.disconnect();
    } catch (error) {
      this.logger.error('Failed to close database', {
        error: errorMessage(error),
      });
    }

    this.initialized = false;
    this.logger.info('Data layer disposed');
  }
}

export const createDataLayer = (
  config: AppConfig,
  overrides?: DataLayerOverrides,
): DataLayer => new DataLayer(config, overrides);
