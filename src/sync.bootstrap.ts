import 'dotenv/config';
import { getConfig, getConfigSummary, validateConfig } from './core/config';
import { logger } from './core/logger';
import { syncWorker } from './workers/sync.worker';
import { BootstrapOptions, parseBootstrapArgs, runSyncOnce } from './workers/sync.worker.boot';

const config = getConfig();

function setupShutdownHandlers(): void {
  const shutdown = async (signal: string) => {
    logger.info(`${signal} received, shutting down sync worker`);
    syncWorker.stopSync();
    await syncWorker.drain();
    logger.info('Sync worker shutdown completed');
    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));
}

async function main(): Promise<void> {
  let options: BootstrapOptions;
  try {
    options = parseBootstrapArgs(process.argv.slice(2), config);
  } catch (error) {
    logger.error({ error }, 'Invalid command line arguments');
    process.exit(1);
  }

  const issues = validateConfig(config);
  if (issues.length > 0) {
    logger.error({ issues }, 'Configuration is not usable for a sync run');
    process.exit(1);
  }

  logger.info({ config: getConfigSummary(config), ...options }, 'Starting sync worker bootstrap');

  if (options.runOnce) {
    process.exit(await runSyncOnce(syncWorker, options.only));
  }

  syncWorker.startSync(options.intervalMs);
  setupShutdownHandlers();
  logger.info('Sync worker is running. Press Ctrl+C to stop.');
}

main().catch((error: unknown) => {
  logger.error({ error }, 'Sync worker failed');
  process.exit(1);
});
