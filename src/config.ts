import dotenv from 'dotenv';
import { z } from 'zod';
import { fromZodError } from './utils/errors';

dotenv.config();

const booleanFlag = (defaultValue: boolean) =>
  z
    .enum(['true', 'false'])
    .optional()
    .transform((value) =>
      value === undefined ? defaultValue : value === 'true',
    );

const intValue = (defaultValue: number) =>
  z.coerce.number().int().nonnegative().default(defaultValue);

const envSchema = z.object({
  NODE_ENV: z.string().default('development'),
  LOG_LEVEL: z.string().default('info'),

  NEWS_API_BASE_URL: z.string().url().default('http://localhost:3000'),
  NEWS_API_TIMEOUT_MS: intValue(10000),
  API_TOKEN: z.string().min(1).optional(),

  DB_HOST: z.string().default('localhost'),
  DB_PORT: intValue(5432),
  DB_NAME: z.string().default('news_core'),
  DB_USER: z.string().default('postgres'),
  DB_PASSWORD: z.string().default(''),
  DB_SSL: booleanFlag(false),
  DB_POOL_MAX: intValue(20),
  DB_IDLE_TIMEOUT: intValue(30000),
  DB_CONNECTION_TIMEOUT: intValue(2000),
  DB_SLOW_QUERY_MS: intValue(500),

  SYNC_CRON: z.string().default('*/15 * * * *'),
  SYNC_AUTO: booleanFlag(true),
  SYNC_WIFI_ONLY: booleanFlag(false),
  SYNC_CONFLICT_STRATEGY: z
    .enum(['serverWins', 'clientWins', 'merge'])
    .default('serverWins'),
  SYNC_MAX_RETRIES: intValue(3),
  SYNC_BASE_DELAY_MS: intValue(1000),
  SYNC_MAX_DELAY_MS: intValue(30000),

  SEARCH_HISTORY_RETENTION_DAYS: intValue(90),
  SEARCH_HISTORY_MAX_ENTRIES: intValue(1000),
});

export type ConflictStrategyName = z.infer<
  typeof envSchema
>['SYNC_CONFLICT_STRATEGY'];

export interface AppConfig {
  nodeEnv: string;
  logLevel: string;
  api: {
    baseUrl: string;
    timeoutMs: number;
    token?: string;
  };
  database: {
    host: string;
    port: number;
    database: string;
    user: string;
    password: string;
    ssl: boolean;
    max: number;
    idleTimeoutMillis: number;
    connectionTimeoutMillis: number;
    slowQueryMs: number;
  };
  sync: {
    cronExpression: string;
    enableAutoSync: boolean;
    syncOnlyOnWifi: boolean;
    conflictStrategy: ConflictStrategyName;
    maxRetries: number;
    baseDelayMs: number;
    maxDelayMs: number;
  };
  search: {
    historyRetentionDays: number;
    maxHistoryEntries: number;
  };
}

/**
 * Builds the typed configuration from environment variables.
 * Throws a ValidationError naming every invalid variable.
 */
export const loadConfig = (
  env: NodeJS.ProcessEnv = process.env,
): AppConfig => {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw fromZodError(parsed.error);
  }

  const vars = parsed.data;
  return {
    nodeEnv: vars.NODE_ENV,
    logLevel: vars.LOG_LEVEL,
    api: {
      baseUrl: vars.NEWS_API_BASE_URL,
      timeoutMs: vars.NEWS_API_TIMEOUT_MS,
      token: vars.API_TOKEN,
    },
    database: {
      host: vars.DB_HOST,
      port: vars.DB_PORT,
      database: vars.DB_NAME,
      user: vars.DB_USER,
      password: vars.DB_PASSWORD,
      ssl: vars.DB_SSL,
      max: vars.DB_POOL_MAX,
      idleTimeoutMillis: vars.DB_IDLE_TIMEOUT,
      connectionTimeoutMillis: vars.DB_CONNECTION_TIMEOUT,
      slowQueryMs: vars.DB_SLOW_QUERY_MS,
    },
    sync: {
      cronExpression: vars.SYNC_CRON,
      enableAutoSync: vars.SYNC_AUTO,
      syncOnlyOnWifi: vars.SYNC_WIFI_ONLY,
      conflictStrategy: vars.SYNC_CONFLICT_STRATEGY,
      maxRetries: vars.SYNC_MAX_RETRIES,
      baseDelayMs: vars.SYNC_BASE_DELAY_MS,
      maxDelayMs: vars.SYNC_MAX_DELAY_MS,
    },
    search: {
      historyRetentionDays: vars.SEARCH_HISTORY_RETENTION_DAYS,
      maxHistoryEntries: vars.SEARCH_HISTORY_MAX_ENTRIES,
    },
  };
};
