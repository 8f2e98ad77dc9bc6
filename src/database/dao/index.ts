/**
 * DAO (Data Access Object) exports
 */

export * from './NewsDAO';
export * from './SyncMetadataDAO';
export * from './SearchHistoryDAO';
export * from './ResponseCacheDAO';
