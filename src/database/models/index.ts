/**
 * Database models index - exports all model types and interfaces
 */

import { StorageError, Result } from '../../utils/errors';

export * from './News';
export * from './SyncMetadata';
export * from './SearchHistory';
export * from './Search';
export * from './Cache';

// Common database result type
export type DatabaseResult<T> = Result<T, StorageError>;
