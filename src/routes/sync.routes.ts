import { Router, NextFunction, Request, Response } from 'express';
import { SyncScheduleConflictError } from '../core/errors';
import { httpLogger as logger } from '../core/logger';
import { StartSyncRequestSchema, SyncRequestSchema, SyncRunReport } from '../core/types';
import { validateBody } from '../middleware/validate';
import { syncWorker } from '../workers/sync.worker';

const router = Router();

// Trimmed view of a run: counts instead of full update lists
export function summarizeReport(report: SyncRunReport) {
  return {
    startedAt: report.startedAt,
    finishedAt: report.finishedAt,
    feedSize: report.feedSize,
    marketplaces: report.outcomes.map((outcome) =>
      outcome.status === 'success'
        ? {
            marketplace: outcome.marketplace,
            status: outcome.status,
            stockUpdates: outcome.result.allOffers.length,
            activeOffers: outcome.result.activeOffers.length,
            priceUpdates: outcome.result.priceUpdates.length,
            stockBatches: outcome.result.stockBatches,
            priceBatches: outcome.result.priceBatches,
          }
        : {
            marketplace: outcome.marketplace,
            status: outcome.status,
            error: outcome.error,
          }
    ),
  };
}

// POST /sync - Manual sync trigger
router.post('/', validateBody(SyncRequestSchema), async (req: Request, res: Response, next: NextFunction) => {
  try {
    const { marketplaces } = SyncRequestSchema.parse(req.body);
    logger.info({ req: { id: req.id }, marketplaces }, 'Manual sync requested');

    const report = await syncWorker.runOnce({ only: marketplaces });

    res.json({
      success: true,
      data: summarizeReport(report),
    });
  } catch (error) {
    next(error);
  }
});

// GET /sync/status - Get sync worker status
router.get('/status', (req: Request, res: Response) => {
  const { lastReport, ...status } = syncWorker.getStatus();
  res.json({
    success: true,
    data: {
      ...status,
      lastReport: lastReport ? summarizeReport(lastReport) : null,
    },
  });
});

// POST /sync/start - Start periodic sync
router.post('/start', validateBody(StartSyncRequestSchema), (req: Request, res: Response, next: NextFunction) => {
  try {
    const { intervalMs } = StartSyncRequestSchema.parse(req.body);

    if (!syncWorker.startSync(intervalMs)) {
      throw new SyncScheduleConflictError(syncWorker.getStatus().intervalMs);
    }

    res.json({
      success: true,
      message: `Sync worker started with interval ${intervalMs}ms`
    });
  } catch (error) {
    next(error);
  }
});

// POST /sync/stop - Stop periodic sync
router.post('/stop', (req: Request, res: Response) => {
  syncWorker.stopSync();

  res.json({
    success: true,
    message: 'Sync worker stopped'
  });
});

export { router as syncRoutes };
