import { syncLogger } from '../core/logger';
import { OfferId } from '../core/types';
import { MarketplaceClient } from '../marketplaces';
import { incrementCatalogPages } from '../utils/metrics';

/**
 * Collect every offer identifier listed on a marketplace.
 *
 * Pages are requested one at a time, starting from an empty cursor, until the API
 * returns an empty cursor, the reported total has been reached, or a page comes back
 * empty. Identifiers keep catalog order; repeats across pages are collapsed.
 */
export async function fetchCatalogIds(client: MarketplaceClient): Promise<Set<OfferId>> {
  const offerIds = new Set<OfferId>();
  let received = 0;
  let cursor = '';

  for (;;) {
    const page = await client.fetchCatalogPage(cursor);
    incrementCatalogPages();

    for (const offerId of page.offerIds) {
      offerIds.add(offerId);
    }
    received += page.offerIds.length;

    const exhausted =
      page.nextCursor === '' ||
      page.offerIds.length === 0 ||
      (page.total !== undefined && received >= page.total);

    if (exhausted) {
      break;
    }
    cursor = page.nextCursor;
  }

  syncLogger.info({ marketplace: client.name, offers: offerIds.size }, 'Catalog fetched');
  return offerIds;
}
