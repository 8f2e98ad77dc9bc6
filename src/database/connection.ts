/**
 * PostgreSQL pool for the local store
 */

import { Pool, PoolClient, QueryResult, QueryResultRow } from 'pg';
import { createLogger } from '../utils/logger';
import { errorMessage } from '../utils/errors';
import { SCHEMA_STATEMENTS } from './schema';

const logger = createLogger('DatabaseConnection');

const NOT_CONNECTED = 'Database not connected. Call connect() first.';

export interface DatabaseConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  ssl?: boolean;
  max?: number; // pool size
  idleTimeoutMillis?: number;
  connectionTimeoutMillis?: number;
  slowQueryMs?: number;
}

export type QueryFn = <T extends QueryResultRow = QueryResultRow>(
  text: string,
  params?: unknown[],
) => Promise<QueryResult<T>>;

export interface PoolStatus {
  connected: boolean;
  totalCount?: number;
  idleCount?: number;
  waitingCount?: number;
}

// First line of a statement, for log output
const describeStatement = (text: string): string =>
  text.trim().split('\n')[0].slice(0, 120);

export class DatabaseConnection {
  private pool: Pool | null = null;
  private readonly slowQueryMs: number;

  constructor(private readonly config: DatabaseConfig) {
    this.slowQueryMs = config.slowQueryMs ?? 500;
  }

  get isConnected(): boolean {
    return this.pool !== null;
  }

  /**
   * Opens the pool and checks it with a round trip. A second call is a no-op.
   */
  async connect(): Promise<void> {
    if (this.pool) return;

    const pool = new Pool({
      host: this.config.host,
      port: this.config.port,
      database: this.config.database,
      user: this.config.user,
      password: this.config.password,
      ssl: this.config.ssl,
      max: this.config.max || 20,
      idleTimeoutMillis: this.config.idleTimeoutMillis || 30000,
      connectionTimeoutMillis: this.config.connectionTimeoutMillis || 2000,
    });

    // An idle client losing its server must not take the process down
    pool.on('error', (error) => {
      logger.error('Idle database client failed', { error: error.message });
    });

    try {
      await this.ping(pool);
    } catch (error) {
      logger.error('Failed to connect to the local store', {
        host: this.config.host,
        database: this.config.database,
        error: errorMessage(error),
      });
      await pool.end();
      throw error;
    }

    this.pool = pool;
    logger.info('Local store connected', {
      host: this.config.host,
      database: this.config.database,
    });
  }

  /**
   * Creates tables and indexes that are missing, in one transaction
   */
  async initializeSchema(): Promise<void> {
    await this.transaction(async (query) => {
      for (const statement of SCHEMA_STATEMENTS) {
        await query(statement);
      }
    });
    logger.info('Local store schema ensured', {
      statements: SCHEMA_STATEMENTS.length,
    });
  }

  async query<T extends QueryResultRow = QueryResultRow>(
    text: string,
    params?: unknown[],
  ): Promise<QueryResult<T>> {
    const pool = this.requirePool();
    const start = Date.now();

    try {
      const result = await pool.query<T>(text, params);
      this.logTiming(text, Date.now() - start, result.rowCount);
      return result;
    } catch (error) {
      logger.error('Query failed', {
        statement: describeStatement(text),
        paramCount: params?.length ?? 0,
        error: errorMessage(error),
      });
      throw error;
    }
  }

  /**
   * Runs the callback on one client between BEGIN and COMMIT. Any failure
   * rolls back and rethrows the original error.
   */
  async transaction<T>(callback: (query: QueryFn) => Promise<T>): Promise<T> {
    const client = await this.requirePool().connect();

    try {
      await client.query('BEGIN');
      const result = await callback(this.clientQuery(client));
      await client.query('COMMIT');
      return result;
    } catch (error) {
      try {
        await client.query('ROLLBACK');
      } catch (rollbackError) {
        logger.error('Rollback failed', { error: errorMessage(rollbackError) });
      }
      throw error;
    } finally {
      client.release();
    }
  }

  async disconnect(): Promise<void> {
    const pool = this.pool;
    if (!pool) return;

    this.pool = null;
    await pool.end();
    logger.info('Local store connection closed');
  }

  getStatus(): PoolStatus {
    if (!this.pool) {
      return { connected: false };
    }

    return {
      connected: true,
      totalCount: this.pool.totalCount,
      idleCount: this.pool.idleCount,
      waitingCount: this.pool.waitingCount,
    };
  }

  private async ping(pool: Pool): Promise<void> {
    const client = await pool.connect();
    try {
      await client.query('SELECT NOW()');
    } finally {
      client.release();
    }
  }

  private clientQuery(client: PoolClient): QueryFn {
    return async (text, params) => {
      const start = Date.now();
      const result = await client.query(text, params);
      this.logTiming(text, Date.now() - start, result.rowCount);
      return result;
    };
  }

  private logTiming(text: string, durationMs: number, rowCount: number | null): void {
    const meta = { statement: describeStatement(text), durationMs, rowCount };
    if (durationMs >= this.slowQueryMs) {
      logger.warn('Slow query', meta);
    } else {
      logger.debug('Query executed', meta);
    }
  }

  private requirePool(): Pool {
    if (!this.pool) {
      throw new Error(NOT_CONNECTED);
    }
    return this.pool;
  }
}

export default DatabaseConnection;
