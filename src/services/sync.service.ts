import { syncLogger } from '../core/logger';
import { FeedRecord, MarketplaceSettings, MarketplaceSyncResult } from '../core/types';
import { MarketplaceClient } from '../marketplaces';
import { metrics } from '../utils/metrics';
import { assertBatchSize, partition } from '../utils/partition';
import { fetchCatalogIds } from './catalog.service';
import { reconcileCatalog } from './reconcile.service';

export interface SyncOptions {
  // Clock for the shared stock update timestamp
  now?: () => Date;
}

/**
 * Bring one marketplace account in line with the feed.
 *
 * Fetches the catalog, reconciles it against the feed, then submits stock batches followed
 * by price batches, one request at a time in order. A failed batch stops the sync; batches
 * already sent stay applied.
 */
export async function syncMarketplace(
  feed: readonly FeedRecord[],
  client: MarketplaceClient,
  settings: MarketplaceSettings,
  options: SyncOptions = {}
): Promise<MarketplaceSyncResult> {
  const log = syncLogger.child({ marketplace: settings.name });
  assertBatchSize(settings.stockBatchSize);
  assertBatchSize(settings.priceBatchSize);

  const catalogIds = await fetchCatalogIds(client);
  const catalogSize = catalogIds.size;

  const now = options.now ? options.now() : new Date();
  const { stockUpdates, priceUpdates } = reconcileCatalog(feed, catalogIds, settings, now);
  log.info(
    {
      catalogSize,
      matched: priceUpdates.length,
      zeroed: stockUpdates.length - priceUpdates.length,
    },
    'Catalog reconciled'
  );

  const stockBatches = partition(stockUpdates, settings.stockBatchSize);
  for (const [index, batch] of stockBatches.entries()) {
    await client.submitStockBatch(batch);
    metrics.increment('stockBatches');
    metrics.increment('stockUpdates', batch.length);
    log.debug({ batch: index + 1, of: stockBatches.length, size: batch.length }, 'Stock batch submitted');
  }

  const priceBatches = partition(priceUpdates, settings.priceBatchSize);
  for (const [index, batch] of priceBatches.entries()) {
    await client.submitPriceBatch(batch);
    metrics.increment('priceBatches');
    metrics.increment('priceUpdates', batch.length);
    log.debug({ batch: index + 1, of: priceBatches.length, size: batch.length }, 'Price batch submitted');
  }

  const activeOffers = stockUpdates.filter((update) => update.count !== 0);
  log.info(
    {
      stockUpdates: stockUpdates.length,
      priceUpdates: priceUpdates.length,
      active: activeOffers.length,
      stockBatches: stockBatches.length,
      priceBatches: priceBatches.length,
    },
    'Marketplace synced'
  );

  return {
    marketplace: settings.name,
    activeOffers,
    allOffers: stockUpdates,
    priceUpdates,
    stockBatches: stockBatches.length,
    priceBatches: priceBatches.length,
  };
}
