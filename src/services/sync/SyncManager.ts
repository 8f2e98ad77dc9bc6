/**
 * SyncManager - reconciles the local news store with the remote API
 *
 * State machine: idle -> syncing -> completed | failed -> idle.
 * At most one sync runs at a time; scheduled, reconnect and manual syncs
 * share the same guard.
 */

import { EventEmitter } from 'events';
import cron, { ScheduledTask } from 'node-cron';
import {
  NewsRecordInput,
  SyncStatistics,
  SyncStatus,
} from '../../database/models';
import { NEWS_TABLE } from '../../database/schema';
import { NewsStore, SyncMetadataStore } from '../../database/stores';
import { NewsGateway } from '../../remote/NewsApiClient';
import { ConnectivityMonitor, ConnectivityStatus } from '../ConnectivityMonitor';
import { RetryPolicy } from './RetryPolicy';
import {
  ConflictResolution,
  ConflictStrategy,
  resolveConflict,
} from './ConflictResolver';
import { createLogger } from '../../utils/logger';
import {
  AppError,
  ConflictResolutionError,
  ConnectivityError,
  Result,
  SyncInProgressError,
  errorMessage,
} from '../../utils/errors';

const DAY_MS = 24 * 60 * 60 * 1000;
const SYNC_DIRECTION = 'bidirectional';

export interface SyncOptions {
  userId?: string;
  background?: boolean;
  forceFullSync?: boolean;
}

export interface SyncResult {
  success: boolean;
  recordsSynced: number;
  durationMs: number;
  errorMessage?: string;
  status: SyncStatus;
  timestamp: Date;
  // a sync was already running; nothing was started
  rejected?: boolean;
  // background sync skipped by the Wi-Fi-only policy
  skipped?: boolean;
}

export interface SyncState {
  status: SyncStatus;
  progress: number; // 0..1
  currentOperation?: string;
  totalItems: number;
  processedItems: number;
  errorMessage?: string;
}

export type SyncStateListener = (state: SyncState) => void;
export type SyncResultListener = (result: SyncResult) => void;

/**
 * Pushes local mutations to the remote API
 */
export interface UploadGateway {
  uploadChanges(userId: string, since: Date | null): Promise<number>;
}

// The API does not accept per-field mutations yet
export class NoopUploadGateway implements UploadGateway {
  async uploadChanges(): Promise<number> {
    return 0;
  }
}

export interface SyncManagerOptions {
  conflictStrategy: ConflictStrategy;
  syncOnlyOnWifi: boolean;
  enableAutoSync: boolean;
  cronExpression: string;
  defaultUserId: string;
  batchSize: number;
  resetDelayMs: number;
  reconnectDelayMs: number;
}

export const DEFAULT_SYNC_OPTIONS: SyncManagerOptions = {
  conflictStrategy: 'serverWins',
  syncOnlyOnWifi: false,
  enableAutoSync: true,
  cronExpression: '*/15 * * * *',
  defaultUserId: 'default',
  batchSize: 100,
  resetDelayMs: 2000,
  reconnectDelayMs: 2000,
};

export interface SyncManagerDependencies {
  gateway: NewsGateway;
  newsStore: NewsStore;
  metadataStore: SyncMetadataStore;
  connectivity: ConnectivityMonitor;
  retryPolicy?: RetryPolicy;
  uploadGateway?: UploadGateway;
}

const STATE_EVENT = 'state';
const RESULT_EVENT = 'result';

const idleState = (): SyncState => ({
  status: 'idle',
  progress: 0,
  totalItems: 0,
  processedItems: 0,
});

export class SyncManager {
  private logger = createLogger('SyncManager');
  private emitter = new EventEmitter();
  private state: SyncState = idleState();
  private inFlight = false;
  private disposed = false;

  private readonly options: SyncManagerOptions;
  private readonly gateway: NewsGateway;
  private readonly newsStore: NewsStore;
  private readonly metadataStore: SyncMetadataStore;
  private readonly connectivity: ConnectivityMonitor;
  private readonly retryPolicy: RetryPolicy;
  private readonly uploadGateway: UploadGateway;

  private task: ScheduledTask | null = null;
  private retryTimer: NodeJS.Timeout | null = null;
  private resetTimer: NodeJS.Timeout | null = null;
  private reconnectTimer: NodeJS.Timeout | null = null;
  private unsubscribeConnectivity: (() => void) | null = null;
  private lastConnectivity: ConnectivityStatus | null = null;
  private retryAttempt = 0;

  constructor(
    dependencies: SyncManagerDependencies,
    options: Partial<SyncManagerOptions> = {},
  ) {
    this.gateway = dependencies.gateway;
    this.newsStore = dependencies.newsStore;
    this.metadataStore = dependencies.metadataStore;
    this.connectivity = dependencies.connectivity;
    this.retryPolicy = dependencies.retryPolicy ?? new RetryPolicy();
    this.uploadGateway = dependencies.uploadGateway ?? new NoopUploadGateway();
    this.options = { ...DEFAULT_SYNC_OPTIONS, ...options };
  }

  getState(): SyncState {
    return { ...this.state };
  }

  onStateChange(listener: SyncStateListener): () => void {
    this.emitter.on(STATE_EVENT, listener);
    return () => {
      this.emitter.off(STATE_EVENT, listener);
    };
  }

  onResult(listener: SyncResultListener): () => void {
    this.emitter.on(RESULT_EVENT, listener);
    return () => {
      this.emitter.off(RESULT_EVENT, listener);
    };
  }

  /**
   * Starts periodic background sync and reconnect-triggered resumption
   */
  start(): void {
    if (this.disposed) return;

    if (this.options.enableAutoSync && !this.task) {
      this.task = cron.schedule(this.options.cronExpression, () => {
        this.runScheduledSync();
      });
      this.logger.info('Background sync scheduled', {
        cron: this.options.cronExpression,
      });
    }

    if (!this.unsubscribeConnectivity) {
      this.unsubscribeConnectivity = this.connectivity.onChange((status) => {
        this.handleConnectivityChange(status);
      });
    }
  }

  /**
   * Stops scheduling, cancels pending timers and drops all listeners
   */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;

    this.task?.stop();
    this.task = null;
    this.clearTimer('retryTimer');
    this.clearTimer('resetTimer');
    this.clearTimer('reconnectTimer');
    this.unsubscribeConnectivity?.();
    this.unsubscribeConnectivity = null;
    this.emitter.removeAllListeners();
    this.state = idleState();
    this.logger.info('Sync manager disposed');
  }

  /**
   * Runs one download/upload cycle. Never rejects: every outcome, including
   * a refused concurrent call, is reported as a SyncResult.
   */
  async syncWithRemote(options: SyncOptions = {}): Promise<SyncResult> {
    const startedAt = Date.now();

    if (this.inFlight || this.state.status === 'syncing') {
      const error = new SyncInProgressError();
      this.logger.debug('Sync rejected', { reason: error.message });
      return {
        success: false,
        recordsSynced: 0,
        durationMs: 0,
        errorMessage: error.message,
        status: this.state.status,
        timestamp: new Date(),
        rejected: true,
      };
    }

    if (this.disposed) {
      return {
        success: false,
        recordsSynced: 0,
        durationMs: 0,
        errorMessage: 'Sync manager disposed',
        status: this.state.status,
        timestamp: new Date(),
        rejected: true,
      };
    }

    this.inFlight = true;
    const userId = options.userId ?? this.options.defaultUserId;
    const background = options.background ?? false;

    try {
      if (background && this.options.syncOnlyOnWifi) {
        const networkType = await this.connectivity.getNetworkType();
        if (networkType !== 'wifi') {
          this.logger.info('Background sync skipped off Wi-Fi', {
            networkType,
          });
          return {
            success: true,
            recordsSynced: 0,
            durationMs: Date.now() - startedAt,
            status: this.state.status,
            timestamp: new Date(),
            skipped: true,
          };
        }
      }

      return await this.runSync(userId, options, startedAt);
    } catch (error) {
      // runSync reports its own failures; this only guards the guard itself
      const message = errorMessage(error);
      this.logger.error('Unexpected sync error', { error: message });
      if (this.getState().status === 'syncing') {
        this.setState({
          status: 'failed',
          currentOperation: undefined,
          errorMessage: message,
        });
      }
      return {
        success: false,
        recordsSynced: 0,
        durationMs: Date.now() - startedAt,
        errorMessage: message,
        status: 'failed',
        timestamp: new Date(),
      };
    } finally {
      this.inFlight = false;
    }
  }

  /**
   * Full sync ignoring the last sync time
   */
  async forceFullSync(userId?: string): Promise<SyncResult> {
    return this.syncWithRemote({ userId, forceFullSync: true });
  }

  /**
   * Looks up the local copy and applies the strategy. Lookup failures fall
   * back to the server copy.
   */
  async resolveConflict(
    remote: NewsRecordInput,
    strategy: ConflictStrategy = this.options.conflictStrategy,
  ): Promise<ConflictResolution> {
    const local = await this.newsStore.getArticle(remote.userId, remote.id);
    if (!local.success) {
      const error = new ConflictResolutionError(
        `Could not read local copy: ${local.error.message}`,
        remote.id,
      );
      this.logger.warn('Conflict resolution failed, server wins', {
        recordId: error.recordId,
        error: error.message,
      });
      return { action: 'write', record: remote };
    }
    return resolveConflict(remote, local.data, strategy);
  }

  async getSyncStatistics(): Promise<Result<SyncStatistics, AppError>> {
    return this.metadataStore.getStatistics();
  }

  /**
   * Deletes settled metadata rows older than the retention period
   */
  async cleanupSyncMetadata(
    retentionDays = 30,
  ): Promise<Result<number, AppError>> {
    return this.metadataStore.cleanup(
      new Date(Date.now() - retentionDays * DAY_MS),
    );
  }

  private async runSync(
    userId: string,
    options: SyncOptions,
    startedAt: number,
  ): Promise<SyncResult> {
    const background = options.background ?? false;
    this.clearTimer('resetTimer');
    this.setState({
      status: 'syncing',
      progress: 0,
      currentOperation: 'Checking connectivity',
      totalItems: 0,
      processedItems: 0,
      errorMessage: undefined,
    });

    try {
      if (!(await this.connectivity.isConnected())) {
        throw new ConnectivityError();
      }

      const lastSyncTime = await this.readLastSyncTime();
      const incremental = !options.forceFullSync && lastSyncTime !== null;
      const since = incremental ? lastSyncTime : null;

      this.setState({ progress: 0.1, currentOperation: 'Downloading from server' });
      const downloaded = await this.download(userId);

      this.setState({ progress: 0.6, currentOperation: 'Uploading local changes' });
      const uploaded = await this.uploadGateway.uploadChanges(userId, since);

      this.setState({ progress: 0.9, currentOperation: 'Saving sync metadata' });
      const saved = await this.metadataStore.upsert(
        {
          tableName: NEWS_TABLE,
          syncDirection: SYNC_DIRECTION,
          syncStatus: 'completed',
          recordCount: downloaded + uploaded,
          metadata: {
            downloadedRecords: downloaded,
            uploadedRecords: uploaded,
            incrementalSync: incremental,
          },
        },
        new Date(startedAt),
      );
      if (!saved.success) {
        throw saved.error;
      }

      const result: SyncResult = {
        success: true,
        recordsSynced: downloaded + uploaded,
        durationMs: Date.now() - startedAt,
        status: 'completed',
        timestamp: new Date(),
      };

      this.retryAttempt = 0;
      this.setState({
        status: 'completed',
        progress: 1,
        currentOperation: undefined,
      });
      this.emitter.emit(RESULT_EVENT, result);
      this.logger.info('Sync completed', {
        userId,
        downloaded,
        uploaded,
        incremental,
        durationMs: result.durationMs,
      });

      this.scheduleReset();
      return result;
    } catch (error) {
      return this.fail(error, userId, background, startedAt);
    }
  }

  private async fail(
    error: unknown,
    userId: string,
    background: boolean,
    startedAt: number,
  ): Promise<SyncResult> {
    const message = errorMessage(error);
    this.logger.error('Sync failed', { userId, error: message });

    const saved = await this.metadataStore.upsert({
      tableName: NEWS_TABLE,
      syncDirection: SYNC_DIRECTION,
      syncStatus: 'failed',
      recordCount: 0,
      errorMessage: message,
    });
    if (!saved.success) {
      this.logger.warn('Could not record failed sync', {
        error: saved.error.message,
      });
    }

    const result: SyncResult = {
      success: false,
      recordsSynced: 0,
      durationMs: Date.now() - startedAt,
      errorMessage: message,
      status: 'failed',
      timestamp: new Date(),
    };

    this.setState({
      status: 'failed',
      currentOperation: undefined,
      errorMessage: message,
    });
    this.emitter.emit(RESULT_EVENT, result);

    if (!background) {
      this.scheduleRetry(userId);
    }
    return result;
  }

  private async download(userId: string): Promise<number> {
    const remote = await this.retryPolicy.execute(() =>
      this.gateway.fetchPersonalizedNews(userId, this.options.batchSize),
    );

    this.setState({ totalItems: remote.length, processedItems: 0 });

    const accepted: NewsRecordInput[] = [];
    for (const [index, record] of remote.entries()) {
      const resolution = await this.resolveConflict(record);
      if (resolution.action === 'write') {
        accepted.push(resolution.record);
      }
      this.setState({
        processedItems: index + 1,
        progress: 0.1 + 0.5 * ((index + 1) / remote.length),
      });
    }

    if (accepted.length === 0) {
      return 0;
    }

    const written = await this.newsStore.upsertArticles(accepted);
    if (!written.success) {
      throw written.error;
    }
    return accepted.length;
  }

  private async readLastSyncTime(): Promise<Date | null> {
    const metadata = await this.metadataStore.get(NEWS_TABLE, SYNC_DIRECTION);
    if (!metadata.success) {
      this.logger.warn('Could not read sync metadata, running full sync', {
        error: metadata.error.message,
      });
      return null;
    }
    return metadata.data?.lastSyncTime ?? null;
  }

  // A failed sync keeps its state until the next attempt, so a tick also
  // runs from failed unless a foreground retry is already pending
  private runScheduledSync(): void {
    const { status } = this.state;
    if (this.inFlight || status === 'syncing' || status === 'completed') {
      this.logger.debug('Scheduled sync skipped', { status });
      return;
    }
    if (this.retryTimer) {
      this.logger.debug('Scheduled sync skipped, retry pending');
      return;
    }
    this.launch({ background: true });
  }

  private handleConnectivityChange(status: ConnectivityStatus): void {
    const wasConnected = this.lastConnectivity?.isConnected ?? false;
    this.lastConnectivity = status;

    if (
      this.disposed ||
      !status.isConnected ||
      wasConnected ||
      this.state.status !== 'failed' ||
      this.reconnectTimer
    ) {
      return;
    }

    this.logger.info('Connectivity restored, resuming sync', {
      networkType: status.networkType,
    });
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      if (this.state.status === 'failed') {
        this.launch({ background: true });
      }
    }, this.options.reconnectDelayMs);
  }

  private scheduleRetry(userId: string): void {
    if (this.disposed || this.retryTimer) return;

    if (this.retryAttempt >= this.retryPolicy.options.maxRetries) {
      this.logger.warn('Sync retries exhausted', { attempts: this.retryAttempt });
      this.retryAttempt = 0;
      return;
    }

    const delay = this.retryPolicy.calculateDelay(this.retryAttempt);
    this.retryAttempt++;
    this.logger.info('Sync retry scheduled', {
      attempt: this.retryAttempt,
      delayMs: Math.round(delay),
    });

    this.retryTimer = setTimeout(() => {
      this.retryTimer = null;
      if (this.state.status === 'failed') {
        this.launch({ userId });
      }
    }, delay);
  }

  private scheduleReset(): void {
    this.clearTimer('resetTimer');
    if (this.disposed) return;
    this.resetTimer = setTimeout(() => {
      this.resetTimer = null;
      if (this.state.status === 'completed') {
        this.setState(idleState());
      }
    }, this.options.resetDelayMs);
  }

  private launch(options: SyncOptions): void {
    this.syncWithRemote(options).catch((error: unknown) => {
      this.logger.error('Triggered sync failed', { error: errorMessage(error) });
    });
  }

  private clearTimer(
    name: 'retryTimer' | 'resetTimer' | 'reconnectTimer',
  ): void {
    const timer = this[name];
    if (timer) {
      clearTimeout(timer);
      this[name] = null;
    }
  }

  // A sync still running at dispose() finishes without touching state
  private setState(patch: Partial<SyncState>): void {
    if (this.disposed) return;
    this.state = { ...this.state, ...patch };
    this.emitter.emit(STATE_EVENT, this.getState());
  }
}
