import { FeedRecord, MarketplaceSettings, OfferId, PriceUpdate, Reconciliation, StockUpdate } from '../core/types';
import { classifyQuantity } from './normalize.quantity';
import { normalizePrice } from './normalize.price';

/**
 * ISO-8601 UTC timestamp with second precision, e.g. 2025-01-01T00:00:00Z
 */
export function toUpdateTimestamp(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

/**
 * Merge the supplier feed against a marketplace catalog.
 *
 * `catalogIds` is consumed: matched identifiers are removed as the feed is walked, so a
 * catalog entry is matched at most once (first feed occurrence wins). Whatever remains
 * afterwards is listed on the marketplace but missing from the feed and gets a zero stock
 * update. Stock updates come out in feed order followed by remaining catalog order and all
 * share one timestamp. Prices are only produced for matched identifiers.
 *
 * Any malformed quantity or price on a matched record aborts the whole reconciliation.
 */
export function reconcile(
  feed: readonly FeedRecord[],
  catalogIds: Set<OfferId>,
  settings: Pick<MarketplaceSettings, 'currency'>,
  now: Date = new Date()
): Reconciliation {
  const timestamp = toUpdateTimestamp(now);
  const stockUpdates: StockUpdate[] = [];
  const priceUpdates: PriceUpdate[] = [];

  for (const record of feed) {
    const offerId = String(record.code);
    if (!catalogIds.has(offerId)) {
      continue;
    }

    const count = classifyQuantity(record.rawQuantity, offerId);
    const priceValue = normalizePrice(record.rawPrice, offerId);

    stockUpdates.push({ offerId, count, timestamp });
    priceUpdates.push({ offerId, priceValue, currency: settings.currency });
    catalogIds.delete(offerId);
  }

  for (const offerId of catalogIds) {
    stockUpdates.push({ offerId, count: 0, timestamp });
  }

  return { stockUpdates, priceUpdates };
}

/**
 * Reconcile against a copy of the catalog, leaving the caller's set untouched
 */
export function reconcileCatalog(
  feed: readonly FeedRecord[],
  catalogIds: ReadonlySet<OfferId>,
  settings: Pick<MarketplaceSettings, 'currency'>,
  now?: Date
): Reconciliation {
  return reconcile(feed, new Set(catalogIds), settings, now);
}
