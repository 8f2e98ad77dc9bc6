/**
 * Sync metadata model - one live row per (table, direction)
 */

export type SyncStatus = 'idle' | 'syncing' | 'completed' | 'failed';

export type SyncDirection = 'download' | 'upload' | 'bidirectional';

export interface SyncMetadataDetails {
  downloadedRecords?: number;
  uploadedRecords?: number;
  incrementalSync?: boolean;
  [key: string]: unknown;
}

export interface SyncMetadata {
  id: string;
  tableName: string;
  syncDirection: SyncDirection;
  lastSyncTime: Date | null;
  syncStatus: SyncStatus;
  recordCount: number;
  errorMessage?: string;
  metadata?: SyncMetadataDetails;
  createdAt: Date;
  updatedAt: Date;
}

export interface UpsertSyncMetadataData {
  tableName: string;
  syncDirection: SyncDirection;
  syncStatus: SyncStatus;
  recordCount: number;
  errorMessage?: string;
  metadata?: SyncMetadataDetails;
}

export interface SyncMetadataRow {
  id: string;
  table_name: string;
  sync_direction: string;
  last_sync_time: Date | null;
  sync_status: string;
  record_count: number;
  error_message: string | null;
  metadata: unknown;
  created_at: Date;
  updated_at: Date;
}

export interface FailedSyncSummary {
  tableName: string;
  syncDirection: SyncDirection;
  errorMessage: string;
  lastSyncTime: Date | null;
}

export interface SyncStatistics {
  totalTables: number;
  byStatus: Partial<Record<SyncStatus, number>>;
  totalRecords: number;
  lastSyncTime: Date | null;
  failedSyncs: FailedSyncSummary[];
}

export const syncMetadataId = (
  tableName: string,
  syncDirection: SyncDirection,
): string => `${tableName}_${syncDirection}`;

/**
 * Aggregates metadata rows into sync statistics
 */
export const summarizeSyncMetadata = (
  rows: SyncMetadata[],
): SyncStatistics => {
  const byStatus: Partial<Record<SyncStatus, number>> = {};
  let totalRecords = 0;
  let lastSyncTime: Date | null = null;
  const failedSyncs: FailedSyncSummary[] = [];

  for (const row of rows) {
    byStatus[row.syncStatus] = (byStatus[row.syncStatus] ?? 0) + 1;
    totalRecords += row.recordCount;

    if (
      row.lastSyncTime &&
      (!lastSyncTime || row.lastSyncTime.getTime() > lastSyncTime.getTime())
    ) {
      lastSyncTime = row.lastSyncTime;
    }

    if (row.syncStatus === 'failed') {
      failedSyncs.push({
        tableName: row.tableName,
        syncDirection: row.syncDirection,
        errorMessage: row.errorMessage ?? 'Unknown error',
        lastSyncTime: row.lastSyncTime,
      });
    }
  }

  return {
    totalTables: rows.length,
    byStatus,
    totalRecords,
    lastSyncTime,
    failedSyncs,
  };
};
