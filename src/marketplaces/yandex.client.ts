import { AxiosInstance } from 'axios';
import { z } from 'zod';
import { YandexCredentials } from '../core/config.types';
import { CatalogFetchError, DispatchError } from '../core/errors';
import { marketplaceLogger } from '../core/logger';
import { MarketplaceSettings, PriceUpdate, StockUpdate } from '../core/types';
import { createHttpClient, describeHttpFailure } from './http';
import { CatalogPage, MarketplaceClient } from './marketplace.types';

export const YANDEX_BASE_URL = 'https://api.partner.market.yandex.ru';
export const YANDEX_PAGE_LIMIT = 200;

const OfferMappingEntriesSchema = z.object({
  result: z.object({
    offerMappingEntries: z.array(
      z.object({
        offer: z.object({ shopSku: z.coerce.string() }),
      })
    ),
    paging: z
      .object({
        nextPageToken: z.string().nullish(),
      })
      .optional(),
  }),
});

/**
 * Yandex Market Partner API for one campaign. Stock updates carry the campaign's warehouse.
 */
export class YandexMarketClient implements MarketplaceClient {
  constructor(
    readonly name: string,
    private readonly campaignId: string,
    private readonly warehouseId: string,
    private readonly http: AxiosInstance
  ) {}

  static create(
    settings: MarketplaceSettings & { warehouseId: string },
    credentials: YandexCredentials,
    timeoutMs: number
  ): YandexMarketClient {
    return new YandexMarketClient(
      settings.name,
      credentials.campaignId,
      settings.warehouseId,
      createHttpClient({
        baseURL: YANDEX_BASE_URL,
        timeoutMs,
        headers: {
          Authorization: `Bearer ${credentials.token}`,
        },
      })
    );
  }

  async fetchCatalogPage(cursor: string): Promise<CatalogPage> {
    let body: unknown;
    try {
      const response = await this.http.get(`/campaigns/${this.campaignId}/offer-mapping-entries`, {
        params: { page_token: cursor, limit: YANDEX_PAGE_LIMIT },
      });
      body = response.data;
    } catch (error) {
      const { reason, httpStatus } = describeHttpFailure(error);
      throw CatalogFetchError.fromCause(this.name, cursor, reason, httpStatus);
    }

    const parsed = OfferMappingEntriesSchema.safeParse(body);
    if (!parsed.success) {
      throw CatalogFetchError.fromCause(this.name, cursor, 'unexpected offer mapping response');
    }

    const { offerMappingEntries, paging } = parsed.data.result;
    marketplaceLogger.debug({ marketplace: this.name, cursor, received: offerMappingEntries.length }, 'Catalog page fetched');

    return {
      offerIds: offerMappingEntries.map((entry) => entry.offer.shopSku),
      nextCursor: paging?.nextPageToken ?? '',
    };
  }

  async submitStockBatch(batch: StockUpdate[]): Promise<void> {
    const skus = batch.map((update) => ({
      sku: update.offerId,
      warehouseId: Number(this.warehouseId),
      items: [
        {
          count: update.count,
          type: 'FIT',
          updatedAt: update.timestamp,
        },
      ],
    }));

    try {
      await this.http.put(`/campaigns/${this.campaignId}/offers/stocks`, { skus });
    } catch (error) {
      const { reason, httpStatus } = describeHttpFailure(error);
      throw DispatchError.fromCause(this.name, 'stock', batch.length, reason, httpStatus);
    }
  }

  async submitPriceBatch(batch: PriceUpdate[]): Promise<void> {
    const offers = batch.map((update) => ({
      id: update.offerId,
      price: {
        value: update.priceValue,
        currencyId: update.currency,
      },
    }));

    try {
      await this.http.post(`/campaigns/${this.campaignId}/offer-prices/updates`, { offers });
    } catch (error) {
      const { reason, httpStatus } = describeHttpFailure(error);
      throw DispatchError.fromCause(this.name, 'price', batch.length, reason, httpStatus);
    }
  }
}
