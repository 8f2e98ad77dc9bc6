export * from './SyncManager';
export * from './RetryPolicy';
export * from './ConflictResolver';
