/**
 * Error taxonomy and Result helpers for the data layer
 */

import { ZodError } from 'zod';
import logger from './logger';

export type ErrorKind =
  | 'connectivity'
  | 'remote'
  | 'conflict_resolution'
  | 'search_degradation'
  | 'storage'
  | 'sync_in_progress'
  | 'validation'
  | 'internal';

// Base error class
export class AppError extends Error {
  constructor(
    public readonly kind: ErrorKind,
    message: string,
    public readonly code: string,
    public readonly isOperational = true,
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ConnectivityError extends AppError {
  constructor(message = 'No network connectivity available') {
    super('connectivity', message, 'NO_CONNECTIVITY');
    this.name = 'ConnectivityError';
  }
}

export class RemoteError extends AppError {
  constructor(
    message: string,
    public readonly statusCode?: number,
  ) {
    super('remote', message, statusCode ? 'SERVER_ERROR' : 'NETWORK_ERROR');
    this.name = 'RemoteError';
  }
}

export class ConflictResolutionError extends AppError {
  constructor(
    message: string,
    public readonly recordId: string,
  ) {
    super('conflict_resolution', message, 'CONFLICT_RESOLUTION_FAILED');
    this.name = 'ConflictResolutionError';
  }
}

export class SearchDegradationError extends AppError {
  constructor(
    message: string,
    public readonly fallback: string,
  ) {
    super('search_degradation', message, 'SEARCH_DEGRADED');
    this.name = 'SearchDegradationError';
  }
}

export class StorageError extends AppError {
  constructor(
    message: string,
    originalError?: unknown,
    code = 'DATABASE_ERROR',
  ) {
    super('storage', message, code);
    this.name = 'StorageError';
    if (originalError instanceof Error) {
      this.stack = originalError.stack;
    }
  }
}

export class SyncInProgressError extends AppError {
  constructor() {
    super('sync_in_progress', 'Sync already in progress', 'SYNC_IN_PROGRESS');
    this.name = 'SyncInProgressError';
  }
}

export class ValidationError extends AppError {
  constructor(
    message: string,
    public readonly details?: unknown,
  ) {
    super('validation', message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

export type Result<T, E = AppError> =
  | { success: true; data: T }
  | { success: false; error: E };

export const ok = <T>(data: T): Result<T, never> => ({ success: true, data });

export const err = <E>(error: E): Result<never, E> => ({
  success: false,
  error,
});

// Validation error handler
export const fromZodError = (error: ZodError): ValidationError => {
  const messages = error.errors.map((issue) => {
    const path = issue.path.join('.');
    return `${path}: ${issue.message}`;
  });

  return new ValidationError(
    `Validation failed: ${messages.join(', ')}`,
    error.errors,
  );
};

const pgErrorCode = (error: Error): string | undefined => {
  if (!('code' in error)) return undefined;
  const { code } = error;
  return typeof code === 'string' ? code : undefined;
};

// Database error handler
export const fromDatabaseError = (error: unknown): StorageError => {
  if (!(error instanceof Error)) {
    return new StorageError('Database operation failed');
  }

  logger.debug('Database error details', {
    name: error.name,
    message: error.message,
  });

  switch (pgErrorCode(error)) {
    case '23505': // unique_violation
      return new StorageError('Resource already exists', error, 'CONFLICT');
    case '23503': // foreign_key_violation
      return new StorageError(
        'Referenced resource does not exist',
        error,
        'FOREIGN_KEY_VIOLATION',
      );
    case '23502': // not_null_violation
      return new StorageError(
        'Required field is missing',
        error,
        'NOT_NULL_VIOLATION',
      );
    case '23514': // check_violation
      return new StorageError(
        'Data violates constraint',
        error,
        'CHECK_VIOLATION',
      );
    default:
      return new StorageError(
        `Database operation failed: ${error.message}`,
        error,
      );
  }
};

export const toAppError = (error: unknown): AppError => {
  if (error instanceof AppError) return error;
  if (error instanceof ZodError) return fromZodError(error);
  if (error instanceof Error) {
    return new AppError('internal', error.message, 'INTERNAL_ERROR', false);
  }
  return new AppError('internal', String(error), 'INTERNAL_ERROR', false);
};

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
