/**
 * Service exports
 */

export * from './CacheService';
export * from './ConnectivityMonitor';
export * from './NewsRepository';
export * from './sync';
export * from './search';
