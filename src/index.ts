import { loadConfig } from './config';
import { createDataLayer } from './app';
import { createLogger, setLogLevel } from './utils/logger';

export * from './app';
export * from './config';
export * from './database/models';
export * from './database/stores';
export * from './database/dao';
export { DatabaseConnection } from './database/connection';
export * from './remote/NewsApiClient';
export * from './services';
export * from './utils/errors';
export * from './utils/validation';

const logger = createLogger('Main');

/**
 * Runs the data layer as a standalone process: background sync and
 * connectivity monitoring until a shutdown signal arrives
 */
const main = async (): Promise<void> => {
  const config = loadConfig();
  setLogLevel(config.logLevel);
  const dataLayer = createDataLayer(config);

  await dataLayer.init();
  logger.info(`📝 Environment: ${config.nodeEnv}`);

  const gracefulShutdown = (signal: string): void => {
    logger.info(`📊 Received ${signal}. Starting graceful shutdown...`);

    // Force shutdown after 10 seconds
    setTimeout(() => {
      logger.error('❌ Forced shutdown after timeout');
      process.exit(1);
    }, 10000).unref();

    dataLayer.dispose().then(
      () => {
        logger.info('✅ Data layer stopped');
        process.exit(0);
      },
      (error: unknown) => {
        logger.error('Shutdown failed:', error);
        process.exit(1);
      },
    );
  };

  process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => gracefulShutdown('SIGINT'));

  process.on(
    'unhandledRejection',
    (reason: unknown, promise: Promise<unknown>) => {
      logger.error('Unhandled Rejection at:', promise, 'reason:', reason);
      process.exit(1);
    },
  );
};

if (require.main === module) {
  main().catch((error: unknown) => {
    logger.error('Failed to start data layer:', error);
    process.exit(1);
  });
}
