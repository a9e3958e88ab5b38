import { Server } from 'http';
import { app } from './app';
import { logger } from './core/logger';
import { syncWorker } from './workers/sync.worker';

let server: Server | null = null;
let isShuttingDown = false;
let isStarted = false;

/**
 * Start the HTTP server and, when an interval is given, the periodic sync
 */
export async function startServer(port: number = 3000, syncIntervalMs: number = 0): Promise<Server> {
  if (isStarted) {
    throw new Error('Server is already started');
  }

  return new Promise((resolve, reject) => {
    const listening = app.listen(port, () => {
      logger.info(`Server running on port ${port}`);
      isStarted = true;
      server = listening;

      if (syncIntervalMs > 0) {
        syncWorker.startSync(syncIntervalMs);
      } else {
        logger.info('Periodic sync disabled, use POST /api/sync to run');
      }

      resolve(listening);
    });

    listening.on('error', (error) => {
      logger.error({ error }, 'Server error');
      reject(error);
    });
  });
}

/**
 * Stop the server gracefully: stop the schedule, let an in-flight run finish, close.
 */
export async function stopServer(): Promise<void> {
  if (!isStarted || isShuttingDown) {
    return;
  }

  isShuttingDown = true;
  logger.info('Starting graceful shutdown');

  if (syncWorker.getStatus().isRunning) {
    syncWorker.stopSync();
  }
  await syncWorker.drain();

  await new Promise<void>((resolve) => {
    if (!server) {
      resolve();
      return;
    }
    server.close(() => {
      logger.info('Server stopped accepting new connections');
      resolve();
    });
  });

  logger.info('Graceful shutdown completed');
  isStarted = false;
  isShuttingDown = false;
  server = null;
}

/**
 * Check if server is currently running
 */
export function isServerRunning(): boolean {
  return isStarted && !isShuttingDown;
}
