/**
 * SyncMetadataDAO - Data Access Object for sync bookkeeping rows
 */

import { z } from 'zod';
import { DatabaseConnection } from '../connection';
import {
  DatabaseResult,
  SyncDirection,
  SyncMetadata,
  SyncMetadataDetails,
  SyncMetadataRow,
  SyncStatistics,
  SyncStatus,
  UpsertSyncMetadataData,
  summarizeSyncMetadata,
  syncMetadataId,
} from '../models';
import { SyncMetadataStore } from '../stores';
import { createLogger } from '../../utils/logger';
import { err, fromDatabaseError, ok } from '../../utils/errors';

const SYNC_STATUSES: readonly SyncStatus[] = [
  'idle',
  'syncing',
  'completed',
  'failed',
];
const SYNC_DIRECTIONS: readonly SyncDirection[] = [
  'download',
  'upload',
  'bidirectional',
];

const detailsSchema = z
  .object({
    downloadedRecords: z.number().optional(),
    uploadedRecords: z.number().optional(),
    incrementalSync: z.boolean().optional(),
  })
  .passthrough();

const toDetails = (value: unknown): SyncMetadataDetails | undefined => {
  const parsed = detailsSchema.safeParse(value);
  return parsed.success ? parsed.data : undefined;
};

export const toSyncMetadata = (row: SyncMetadataRow): SyncMetadata => ({
  id: row.id,
  tableName: row.table_name,
  syncDirection:
    SYNC_DIRECTIONS.find((direction) => direction === row.sync_direction) ??
    'bidirectional',
  lastSyncTime: row.last_sync_time ? new Date(row.last_sync_time) : null,
  syncStatus:
    SYNC_STATUSES.find((status) => status === row.sync_status) ?? 'idle',
  recordCount: Number(row.record_count),
  errorMessage: row.error_message ?? undefined,
  metadata: toDetails(row.metadata),
  createdAt: new Date(row.created_at),
  updatedAt: new Date(row.updated_at),
});

export class SyncMetadataDAO implements SyncMetadataStore {
  private logger = createLogger('SyncMetadataDAO');

  constructor(private readonly db: DatabaseConnection) {}

  /**
   * Gets the row for a table and direction
   */
  async get(
    tableName: string,
    syncDirection: SyncDirection,
  ): Promise<DatabaseResult<SyncMetadata | null>> {
    try {
      const result = await this.db.query<SyncMetadataRow>(
        'SELECT * FROM sync_metadata WHERE table_name = $1 AND sync_direction = $2',
        [tableName, syncDirection],
      );
      const row = result.rows[0];
      return ok(row ? toSyncMetadata(row) : null);
    } catch (error) {
      this.logger.error('Error getting sync metadata', {
        error,
        tableName,
        syncDirection,
      });
      return err(fromDatabaseError(error));
    }
  }

  /**
   * Writes the outcome of a sync attempt. Without lastSyncTime the stored
   * value is kept.
   */
  async upsert(
    data: UpsertSyncMetadataData,
    lastSyncTime?: Date,
  ): Promise<DatabaseResult<SyncMetadata>> {
    try {
      const result = await this.db.query<SyncMetadataRow>(
        `
          INSERT INTO sync_metadata (
            id, table_name, sync_direction, last_sync_time, sync_status,
            record_count, error_message, metadata
          )
          VALUES ($1, $2, $3, $4, $5, $6, $7, $8::jsonb)
          ON CONFLICT (id) DO UPDATE SET
            last_sync_time = COALESCE(EXCLUDED.last_sync_time, sync_metadata.last_sync_time),
            sync_status = EXCLUDED.sync_status,
            record_count = EXCLUDED.record_count,
            error_message = EXCLUDED.error_message,
            metadata = EXCLUDED.metadata,
            updated_at = NOW()
          RETURNING *
        `,
        [
          syncMetadataId(data.tableName, data.syncDirection),
          data.tableName,
          data.syncDirection,
          lastSyncTime ?? null,
          data.syncStatus,
          data.recordCount,
          data.errorMessage ?? null,
          data.metadata ? JSON.stringify(data.metadata) : null,
        ],
      );

      const row = result.rows[0];
      if (!row) {
        return err(fromDatabaseError(new Error('Upsert returned no row')));
      }

      this.logger.debug('Sync metadata saved', {
        tableName: data.tableName,
        status: data.syncStatus,
      });
      return ok(toSyncMetadata(row));
    } catch (error) {
      this.logger.error('Error saving sync metadata', { error, data });
      return err(fromDatabaseError(error));
    }
  }

  async list(): Promise<DatabaseResult<SyncMetadata[]>> {
    try {
      const result = await this.db.query<SyncMetadataRow>(
        'SELECT * FROM sync_metadata ORDER BY updated_at DESC',
      );
      return ok(result.rows.map(toSyncMetadata));
    } catch (error) {
      this.logger.error('Error listing sync metadata', { error });
      return err(fromDatabaseError(error));
    }
  }

  async getStatistics(): Promise<DatabaseResult<SyncStatistics>> {
    const rows = await this.list();
    if (!rows.success) {
      return rows;
    }
    return ok(summarizeSyncMetadata(rows.data));
  }

  /**
   * Deletes settled rows not updated since the cutoff
   */
  async cleanup(olderThan: Date): Promise<DatabaseResult<number>> {
    try {
      const result = await this.db.query(
        `DELETE FROM sync_metadata
         WHERE updated_at < $1 AND sync_status <> 'syncing'`,
        [olderThan],
      );
      const deleted = result.rowCount ?? 0;
      this.logger.info('Sync metadata cleaned up', { deleted });
      return ok(deleted);
    } catch (error) {
      this.logger.error('Error cleaning up sync metadata', { error });
      return err(fromDatabaseError(error));
    }
  }
}
