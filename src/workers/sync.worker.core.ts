import { getConfig } from '../core/config';
import { SyncInProgressError, ValidationError } from '../core/errors';
import { syncLogger as logger } from '../core/logger';
import { SyncRunReport } from '../core/types';
import { buildSyncDependencies } from './sync.worker.deps';
import { runSync } from './sync.worker.run';
import { SyncDependencies, SyncRunOptions, SyncState, SyncStatus } from './sync.worker.types';

export class SyncWorker {
  private state: SyncState = {
    isRunning: false,
  };
  private inFlight: Promise<SyncRunReport> | null = null;
  private deps: SyncDependencies | null = null;

  // Dependencies are resolved on first use so importing the worker needs no configuration
  constructor(private readonly resolveDeps: () => SyncDependencies) {}

  /**
   * Start periodic sync with specified interval.
   * Returns false when a schedule is already active; that schedule is left as it is.
   */
  startSync(intervalMs: number = 15000): boolean {
    if (!Number.isInteger(intervalMs) || intervalMs <= 0) {
      throw ValidationError.invalidInterval(intervalMs);
    }

    if (this.state.isRunning) {
      logger.warn({ intervalMs: this.state.intervalMs }, 'Sync worker is already running');
      return false;
    }

    this.state.isRunning = true;
    this.state.intervalMs = intervalMs;
    this.state.intervalId = setInterval(() => {
      if (this.inFlight) {
        logger.warn({ startedAt: this.state.currentRunStartedAt }, 'Previous sync still running, skipping tick');
        return;
      }
      this.runOnce().catch((error: unknown) => {
        logger.error({ error }, 'Error during periodic sync');
      });
    }, intervalMs);

    logger.info({ intervalMs }, 'Sync worker started');
    return true;
  }

  /**
   * Stop periodic sync
   */
  stopSync(): void {
    if (!this.state.isRunning) {
      logger.warn('Sync worker is not running');
      return;
    }

    if (this.state.intervalId) {
      clearInterval(this.state.intervalId);
      this.state.intervalId = undefined;
    }

    this.state.isRunning = false;
    this.state.intervalMs = undefined;
    logger.info('Sync worker stopped');
  }

  /**
   * Perform a single sync run. Only one run may be in flight at a time.
   */
  async runOnce(options: SyncRunOptions = {}): Promise<SyncRunReport> {
    if (this.inFlight && this.state.currentRunStartedAt) {
      throw new SyncInProgressError(this.state.currentRunStartedAt);
    }

    this.state.currentRunStartedAt = new Date().toISOString();
    const run = this.execute(options);
    this.inFlight = run;

    try {
      return await run;
    } finally {
      this.inFlight = null;
      this.state.currentRunStartedAt = undefined;
    }
  }

  private async execute(options: SyncRunOptions): Promise<SyncRunReport> {
    try {
      const report = await runSync(this.getDeps(), options);
      this.state.lastReport = report;
      this.state.lastError = undefined;
      return report;
    } catch (error) {
      this.state.lastError = error instanceof Error ? error.message : String(error);
      logger.error({ error }, 'Sync run failed');
      throw error;
    }
  }

  private getDeps(): SyncDependencies {
    if (!this.deps) {
      this.deps = this.resolveDeps();
    }
    return this.deps;
  }

  /**
   * Wait for the in-flight run, if any (used on shutdown)
   */
  async drain(): Promise<void> {
    if (!this.inFlight) {
      return;
    }
    logger.info('Waiting for in-flight sync to finish');
    // A failed run has already been recorded and logged by execute()
    await this.inFlight.catch(() => undefined);
  }

  /**
   * Get sync worker status
   */
  getStatus(): SyncStatus {
    return {
      isRunning: this.state.isRunning,
      intervalMs: this.state.intervalMs,
      inProgress: this.inFlight !== null,
      currentRunStartedAt: this.state.currentRunStartedAt,
      lastReport: this.state.lastReport,
      lastError: this.state.lastError,
    };
  }
}

// Singleton instance wired from process configuration
export const syncWorker = new SyncWorker(() => buildSyncDependencies(getConfig()));
