import { AxiosInstance } from 'axios';
import { z } from 'zod';
import { OzonCredentials } from '../core/config.types';
import { CatalogFetchError, DispatchError } from '../core/errors';
import { marketplaceLogger } from '../core/logger';
import { MarketplaceSettings, PriceUpdate, StockUpdate } from '../core/types';
import { createHttpClient, describeHttpFailure } from './http';
import { CatalogPage, MarketplaceClient } from './marketplace.types';

export const OZON_BASE_URL = 'https://api-seller.ozon.ru';
export const OZON_PAGE_LIMIT = 1000;

const OzonProductListSchema = z.object({
  result: z.object({
    items: z.array(z.object({ offer_id: z.coerce.string() })),
    last_id: z.string().nullish(),
    total: z.number().int().nonnegative().optional(),
  }),
});

/**
 * Ozon Seller API: catalog listing plus stock and price imports
 */
export class OzonClient implements MarketplaceClient {
  constructor(
    readonly name: string,
    private readonly http: AxiosInstance
  ) {}

  static create(settings: MarketplaceSettings, credentials: OzonCredentials, timeoutMs: number): OzonClient {
    return new OzonClient(
      settings.name,
      createHttpClient({
        baseURL: OZON_BASE_URL,
        timeoutMs,
        headers: {
          'Client-Id': credentials.clientId,
          'Api-Key': credentials.apiKey,
        },
      })
    );
  }

  async fetchCatalogPage(cursor: string): Promise<CatalogPage> {
    let body: unknown;
    try {
      const response = await this.http.post('/v2/product/list', {
        filter: { visibility: 'ALL' },
        last_id: cursor,
        limit: OZON_PAGE_LIMIT,
      });
      body = response.data;
    } catch (error) {
      const { reason, httpStatus } = describeHttpFailure(error);
      throw CatalogFetchError.fromCause(this.name, cursor, reason, httpStatus);
    }

    const parsed = OzonProductListSchema.safeParse(body);
    if (!parsed.success) {
      throw CatalogFetchError.fromCause(this.name, cursor, 'unexpected product list response');
    }

    const { items, last_id, total } = parsed.data.result;
    marketplaceLogger.debug({ marketplace: this.name, cursor, received: items.length, total }, 'Catalog page fetched');

    return {
      offerIds: items.map((item) => item.offer_id),
      nextCursor: last_id ?? '',
      total,
    };
  }

  async submitStockBatch(batch: StockUpdate[]): Promise<void> {
    const stocks = batch.map((update) => ({
      offer_id: update.offerId,
      stock: update.count,
    }));

    try {
      await this.http.post('/v1/product/import/stocks', { stocks });
    } catch (error) {
      const { reason, httpStatus } = describeHttpFailure(error);
      throw DispatchError.fromCause(this.name, 'stock', batch.length, reason, httpStatus);
    }
  }

  async submitPriceBatch(batch: PriceUpdate[]): Promise<void> {
    const prices = batch.map((update) => ({
      auto_action_enabled: 'UNKNOWN',
      currency_code: update.currency,
      offer_id: update.offerId,
      old_price: '0',
      price: String(update.priceValue),
    }));

    try {
      await this.http.post('/v1/product/import/prices', { prices });
    } catch (error) {
      const { reason, httpStatus } = describeHttpFailure(error);
      throw DispatchError.fromCause(this.name, 'price', batch.length, reason, httpStatus);
    }
  }
}
