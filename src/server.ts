import 'dotenv/config';
import { startServer, stopServer } from './server-control';
import { getConfig, getConfigSummary } from './core/config';
import { logger } from './core/logger';

const config = getConfig();

logger.info({ config: getConfigSummary(config) }, 'Configuration loaded');

// Start the server
startServer(config.PORT, config.SYNC_INTERVAL_MS).catch((error: unknown) => {
  logger.error({ error }, 'Failed to start server');
  process.exit(1);
});

/**
 * Graceful shutdown handler
 */
async function gracefulShutdown(signal: string) {
  logger.info(`${signal} received, starting graceful shutdown`);

  try {
    await stopServer();
    process.exit(0);
  } catch (error) {
    logger.error({ error }, 'Error during graceful shutdown');
    process.exit(1);
  }
}

// Graceful shutdown handlers
process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => void gracefulShutdown('SIGINT'));

// Handle unhandled promise rejections
process.on('unhandledRejection', (reason) => {
  logger.error({ reason }, 'Unhandled promise rejection, shutting down');
  void gracefulShutdown('unhandledRejection');
});
