import { OfferId, PriceUpdate, StockUpdate } from '../core/types';

export interface CatalogPage {
  offerIds: OfferId[];
  // Empty string when there are no more pages
  nextCursor: string;
  // Total catalog size, for APIs that report it instead of an end-of-list cursor
  total?: number;
}

/**
 * Everything the sync needs from one marketplace account
 */
export interface MarketplaceClient {
  readonly name: string;
  fetchCatalogPage(cursor: string): Promise<CatalogPage>;
  submitStockBatch(batch: StockUpdate[]): Promise<void>;
  submitPriceBatch(batch: PriceUpdate[]): Promise<void>;
}
