import { AppConfig } from '../core/config.types';
import { parseIntWithValidation } from '../core/config.utils';
import { ValidationError } from '../core/errors';
import { syncLogger as logger } from '../core/logger';
import { SyncWorker } from './sync.worker.core';

export interface BootstrapOptions {
  runOnce: boolean;
  // 0 means no schedule
  intervalMs: number;
  only?: string[];
}

const readArg = (argv: readonly string[], name: string): string | undefined => {
  const prefix = `--${name}=`;
  return argv.find((arg) => arg.startsWith(prefix))?.slice(prefix.length);
};

/**
 * Read the headless worker flags: --once, --interval=<ms>, --only=<name,name>.
 * Without --interval the configured SYNC_INTERVAL_MS applies.
 */
export function parseBootstrapArgs(
  argv: readonly string[],
  config: Pick<AppConfig, 'SYNC_INTERVAL_MS'>
): BootstrapOptions {
  const intervalArg = readArg(argv, 'interval');
  let intervalMs = config.SYNC_INTERVAL_MS;
  if (intervalArg !== undefined) {
    try {
      intervalMs = parseIntWithValidation(intervalArg, 1);
    } catch {
      throw ValidationError.invalidInterval(intervalArg);
    }
  }

  const onlyArg = readArg(argv, 'only');
  const only = onlyArg
    ?.split(',')
    .map((name) => name.trim())
    .filter(Boolean);

  return {
    runOnce: argv.includes('--once') || intervalMs <= 0,
    intervalMs,
    only: only && only.length > 0 ? only : undefined,
  };
}

/**
 * Run a single sync and turn it into a process exit code.
 * Marketplace failures are reported but still exit 0; a failed run (feed, config) exits 1.
 */
export async function runSyncOnce(worker: Pick<SyncWorker, 'runOnce'>, only?: string[]): Promise<number> {
  logger.info({ only }, 'Running sync once');

  try {
    const report = await worker.runOnce({ only });

    for (const outcome of report.outcomes) {
      if (outcome.status === 'failed') {
        logger.error({ marketplace: outcome.marketplace, error: outcome.error }, 'Marketplace was not synced');
      } else {
        logger.info({
          marketplace: outcome.marketplace,
          active: outcome.result.activeOffers.length,
          total: outcome.result.allOffers.length,
          prices: outcome.result.priceUpdates.length,
        }, 'Marketplace synced');
      }
    }
    return 0;
  } catch (error) {
    logger.error({ error }, 'Sync run failed');
    return 1;
  }
}
