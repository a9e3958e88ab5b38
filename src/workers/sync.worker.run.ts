import { DomainError, ValidationError } from '../core/errors';
import { syncLogger } from '../core/logger';
import { SyncRunReport, TargetOutcome } from '../core/types';
import { syncMarketplace } from '../services/sync.service';
import { mapLimit } from '../utils/mapLimit';
import { incrementSyncRuns, recordMarketplaceSync } from '../utils/metrics';
import { SyncDependencies, SyncRunOptions, SyncTarget } from './sync.worker.types';

/**
 * Pick the targets named in `only`, or all of them
 */
export function selectTargets(targets: SyncTarget[], only?: string[]): SyncTarget[] {
  if (!only) {
    return targets;
  }

  const known = targets.map((target) => target.settings.name);
  const unknown = only.filter((name) => !known.includes(name));
  if (unknown.length > 0) {
    throw ValidationError.unknownMarketplaces(unknown, known);
  }

  return targets.filter((target) => only.includes(target.settings.name));
}

function describeFailure(error: unknown): Extract<TargetOutcome, { status: 'failed' }>['error'] {
  if (error instanceof DomainError) {
    return { name: error.name, code: error.code, message: error.message };
  }
  if (error instanceof Error) {
    return { name: error.name, message: error.message };
  }
  return { name: 'Error', message: String(error) };
}

/**
 * Load the feed once and sync every selected marketplace.
 *
 * A marketplace failure is logged and recorded in the report; the remaining marketplaces
 * still run. Feed failures abort the run since nothing can be reconciled without it.
 */
export async function runSync(deps: SyncDependencies, options: SyncRunOptions = {}): Promise<SyncRunReport> {
  const targets = selectTargets(deps.targets, options.only);
  const startedAt = new Date().toISOString();
  incrementSyncRuns();

  syncLogger.info({ targets: targets.map((target) => target.settings.name) }, 'Sync run started');
  const feed = await deps.loadFeed();

  const outcomes = await mapLimit(targets, deps.concurrency, async (target): Promise<TargetOutcome> => {
    const marketplace = target.settings.name;
    try {
      const result = await syncMarketplace(feed, target.client, target.settings, { now: deps.now });
      recordMarketplaceSync(true);
      return { marketplace, status: 'success', result };
    } catch (error) {
      recordMarketplaceSync(false);
      syncLogger.error({ marketplace, error }, 'Marketplace sync failed');
      return { marketplace, status: 'failed', error: describeFailure(error) };
    }
  });

  const report: SyncRunReport = {
    startedAt,
    finishedAt: new Date().toISOString(),
    feedSize: feed.length,
    outcomes,
  };

  syncLogger.info(
    {
      feedSize: report.feedSize,
      succeeded: outcomes.filter((outcome) => outcome.status === 'success').length,
      failed: outcomes.filter((outcome) => outcome.status === 'failed').length,
    },
    'Sync run finished'
  );
  return report;
}
