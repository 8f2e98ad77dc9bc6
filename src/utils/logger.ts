/**
 * winston logging for the data layer. One root logger; every component logs
 * through a child tagged with its name.
 */

import winston from 'winston';
import path from 'path';

export interface LoggingOptions {
  level: string;
  nodeEnv: string;
  filePath: string;
  verbose: boolean;
}

const LOG_FILE_MAX_BYTES = 5 * 1024 * 1024;

const readOptions = (env: NodeJS.ProcessEnv): LoggingOptions => ({
  level: env.LOG_LEVEL || 'info',
  nodeEnv: env.NODE_ENV || 'development',
  filePath: env.LOG_FILE_PATH || 'logs/news-core.log',
  verbose: Boolean(env.VERBOSE_TESTS),
});

// Error values in metadata keep their name, message and stack
const serializeErrors = winston.format((info) => {
  for (const [key, value] of Object.entries(info)) {
    if (value instanceof Error) {
      info[key] = { name: value.name, message: value.message, stack: value.stack };
    }
  }
  return info;
});

const jsonFormat = winston.format.combine(
  serializeErrors(),
  winston.format.timestamp(),
  winston.format.errors({ stack: true }),
  winston.format.json(),
);

const lineFormat = winston.format.combine(
  serializeErrors(),
  winston.format.colorize(),
  winston.format.timestamp({ format: 'HH:mm:ss.SSS' }),
  winston.format.printf(({ timestamp, level, message, service, ...meta }) => {
    const scope = service ? ` ${String(service)}:` : '';
    const details = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    return `${String(timestamp)} ${level}${scope} ${String(message)}${details}`;
  }),
);

const fileTransports = (filePath: string) => {
  const logFile = path.resolve(filePath);
  return [
    new winston.transports.File({
      filename: logFile,
      maxsize: LOG_FILE_MAX_BYTES,
      maxFiles: 5,
      tailable: true,
    }),
    new winston.transports.File({
      filename: path.join(path.dirname(logFile), 'error.log'),
      level: 'error',
      maxsize: LOG_FILE_MAX_BYTES,
      maxFiles: 5,
      tailable: true,
    }),
  ];
};

/**
 * Console output everywhere (silent under test unless VERBOSE_TESTS is set);
 * rotating JSON files for all entries and for errors in production
 */
export const buildLogger = (options: LoggingOptions): winston.Logger => {
  const production = options.nodeEnv === 'production';
  const consoleTransport = new winston.transports.Console({
    format: production ? jsonFormat : lineFormat,
    silent: options.nodeEnv === 'test' && !options.verbose,
  });

  return winston.createLogger({
    level: options.level,
    format: jsonFormat,
    defaultMeta: { service: 'news-core' },
    transports: production
      ? [consoleTransport, ...fileTransports(options.filePath)]
      : [consoleTransport],
  });
};

const rootLogger = buildLogger(readOptions(process.env));

export type Logger = winston.Logger;

export const createLogger = (service: string): Logger =>
  rootLogger.child({ service });

/**
 * Applies the configured level; children read it from the root
 */
export const setLogLevel = (level: string): void => {
  rootLogger.level = level;
};

export default rootLogger;
