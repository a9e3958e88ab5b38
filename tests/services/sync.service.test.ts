import { describe, it, expect, beforeEach } from 'vitest';
import { syncMarketplace } from '../../src/services/sync.service';
import { DispatchError, InvalidBatchSizeError, MalformedQuantityError } from '../../src/core/errors';
import { FeedRecord, MarketplaceSettings } from '../../src/core/types';
import { metrics } from '../../src/utils/metrics';
import { FakeMarketplace } from '../helpers/fake-marketplace';

const NOW = new Date('2025-01-01T00:00:00.000Z');
const STAMP = '2025-01-01T00:00:00Z';
const now = () => NOW;

const settings = (overrides: Partial<MarketplaceSettings> = {}): MarketplaceSettings => ({
  name: 'ozon',
  kind: 'ozon',
  stockBatchSize: 100,
  priceBatchSize: 1000,
  currency: 'RUB',
  ...overrides,
});

const record = (code: string, rawQuantity: string, rawPrice = '500.00'): FeedRecord => ({ code, rawQuantity, rawPrice });

describe('syncMarketplace', () => {
  beforeEach(() => {
    metrics.reset();
  });

  it('should submit reconciled updates and report active and all offers', async () => {
    const client = FakeMarketplace.withCatalog('ozon', ['48852', '99999']);
    const feed = [record('48852', '3', "24'570.00 руб.")];

    const result = await syncMarketplace(feed, client, settings(), { now });

    expect(result).toEqual({
      marketplace: 'ozon',
      activeOffers: [{ offerId: '48852', count: 3, timestamp: STAMP }],
      allOffers: [
        { offerId: '48852', count: 3, timestamp: STAMP },
        { offerId: '99999', count: 0, timestamp: STAMP },
      ],
      priceUpdates: [{ offerId: '48852', priceValue: 24570, currency: 'RUB' }],
      stockBatches: 1,
      priceBatches: 1,
    });
    expect(client.stockBatches).toEqual([result.allOffers]);
    expect(client.priceBatches).toEqual([result.priceUpdates]);
  });

  it('should split stock updates by the stock batch size', async () => {
    const client = FakeMarketplace.withCatalog('yandex-fbs', ['a', 'b', 'c', 'd', 'e']);

    const result = await syncMarketplace([], client, settings({ stockBatchSize: 2 }), { now });

    expect(client.stockBatches.map((batch) => batch.map((update) => update.offerId))).toEqual([
      ['a', 'b'],
      ['c', 'd'],
      ['e'],
    ]);
    expect(result.stockBatches).toBe(3);
    expect(result.priceBatches).toBe(0);
    expect(result.activeOffers).toEqual([]);
  });

  it('should send every stock batch before the first price batch', async () => {
    const client = FakeMarketplace.withCatalog('ozon', ['a', 'b', 'c']);
    const feed = [record('a', '5'), record('b', '6'), record('c', '7')];

    await syncMarketplace(feed, client, settings({ stockBatchSize: 2, priceBatchSize: 2 }), { now });

    expect(client.calls).toEqual(['stock', 'stock', 'price', 'price']);
  });

  it('should keep earlier batches when a later one fails', async () => {
    const client = FakeMarketplace.withCatalog('ozon', ['a', 'b', 'c']);
    const failure = DispatchError.fromCause('ozon', 'stock', 1, 'HTTP 500', 500);
    client.stockError = { atBatch: 2, error: failure };

    await expect(syncMarketplace([], client, settings({ stockBatchSize: 2 }), { now })).rejects.toBe(failure);

    expect(client.stockBatches).toHaveLength(1);
    expect(client.priceBatches).toEqual([]);
  });

  it('should reject an invalid batch size before contacting the marketplace', async () => {
    const client = FakeMarketplace.withCatalog('ozon', ['a']);

    await expect(syncMarketplace([], client, settings({ priceBatchSize: 0 }), { now })).rejects.toBeInstanceOf(
      InvalidBatchSizeError
    );
    expect(client.cursors).toEqual([]);
  });

  it('should submit nothing when a matched record is malformed', async () => {
    const client = FakeMarketplace.withCatalog('ozon', ['a', 'b']);
    const feed = [record('a', '3'), record('b', 'n/a')];

    await expect(syncMarketplace(feed, client, settings(), { now })).rejects.toBeInstanceOf(MalformedQuantityError);
    expect(client.calls).toEqual([]);
  });

  it('should send nothing for an empty catalog', async () => {
    const client = FakeMarketplace.withCatalog('ozon', []);

    const result = await syncMarketplace([record('a', '3')], client, settings(), { now });

    expect(result.allOffers).toEqual([]);
    expect(client.calls).toEqual([]);
  });

  it('should count batches and updates', async () => {
    const client = FakeMarketplace.withCatalog('ozon', ['a', 'b', 'c']);

    await syncMarketplace([record('a', '>10')], client, settings({ stockBatchSize: 2 }), { now });

    expect(metrics.getMetrics()).toMatchObject({
      catalogPages: 2,
      stockBatches: 2,
      stockUpdates: 3,
      priceBatches: 1,
      priceUpdates: 1,
    });
  });
});
