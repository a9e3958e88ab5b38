import { describe, it, expect } from 'vitest';
import { getConfigSummary, loadConfig, validateConfig } from '../../src/core/config';

const FULL_ENV = {
  FEED_URL: 'https://supplier.test/stock.zip',
  OZON_CLIENT_ID: '12345',
  OZON_API_KEY: 'test-secret',
  YANDEX_TOKEN: 'test-token',
  YANDEX_FBS_CAMPAIGN_ID: '21000001',
  YANDEX_FBS_WAREHOUSE_ID: '7001',
  YANDEX_DBS_CAMPAIGN_ID: '21000002',
  YANDEX_DBS_WAREHOUSE_ID: '7002',
};

describe('loadConfig', () => {
  it('should apply defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config.PORT).toBe(3000);
    expect(config.SYNC_INTERVAL_MS).toBe(0);
    expect(config.SYNC_CONCURRENCY).toBe(1);
    expect(config.HTTP_TIMEOUT_MS).toBe(30000);
    expect(config.feed).toEqual({ url: undefined, headerRow: 17 });
    expect(config.targets).toEqual([]);
  });

  it('should enable every marketplace with complete credentials, Ozon first', () => {
    const config = loadConfig(FULL_ENV);

    expect(config.targets.map((target) => target.settings.name)).toEqual(['ozon', 'yandex-fbs', 'yandex-dbs']);
    expect(config.targets[0]).toEqual({
      kind: 'ozon',
      settings: { name: 'ozon', kind: 'ozon', stockBatchSize: 100, priceBatchSize: 1000, currency: 'RUB' },
      credentials: { clientId: '12345', apiKey: 'test-secret' },
    });
    expect(config.targets[2]).toEqual({
      kind: 'yandex',
      settings: {
        name: 'yandex-dbs',
        kind: 'yandex',
        stockBatchSize: 2000,
        priceBatchSize: 500,
        currency: 'RUR',
        warehouseId: '7002',
      },
      credentials: { token: 'test-token', campaignId: '21000002' },
    });
  });

  it('should skip targets with incomplete credentials', () => {
    const config = loadConfig({
      OZON_CLIENT_ID: '12345',
      YANDEX_TOKEN: 'test-token',
      YANDEX_FBS_CAMPAIGN_ID: '21000001',
      YANDEX_FBS_WAREHOUSE_ID: '7001',
      YANDEX_DBS_CAMPAIGN_ID: '21000002',
    });

    expect(config.targets.map((target) => target.settings.name)).toEqual(['yandex-fbs']);
  });

  it('should reject a non-numeric warehouse id', () => {
    const config = loadConfig({
      YANDEX_TOKEN: 'test-token',
      YANDEX_FBS_CAMPAIGN_ID: '21000001',
      YANDEX_FBS_WAREHOUSE_ID: 'main',
    });

    expect(config.targets).toEqual([]);
  });

  it('should read batch size overrides', () => {
    const config = loadConfig({ ...FULL_ENV, OZON_STOCK_BATCH_SIZE: '50', YANDEX_PRICE_BATCH_SIZE: '250' });

    expect(config.targets[0]?.settings.stockBatchSize).toBe(50);
    expect(config.targets[1]?.settings.priceBatchSize).toBe(250);
  });

  it('should fall back to defaults for invalid numbers', () => {
    const config = loadConfig({ PORT: 'abc', SYNC_CONCURRENCY: '0', OZON_STOCK_BATCH_SIZE: '-5', ...FULL_ENV });

    expect(config.PORT).toBe(3000);
    expect(config.SYNC_CONCURRENCY).toBe(1);
    expect(config.targets[0]?.settings.stockBatchSize).toBe(100);
  });

  it('should treat blank values as unset', () => {
    const config = loadConfig({ FEED_URL: '   ', FEED_HEADER_ROW: '' });

    expect(config.feed).toEqual({ url: undefined, headerRow: 17 });
  });

  it('should leave the log level to the logger', () => {
    expect(loadConfig({ LOG_LEVEL: 'debug' })).not.toHaveProperty('LOG_LEVEL');
  });

  it('should return a frozen object', () => {
    expect(Object.isFrozen(loadConfig({}))).toBe(true);
  });
});

describe('validateConfig', () => {
  it('should accept a complete configuration', () => {
    expect(validateConfig(loadConfig(FULL_ENV))).toEqual([]);
  });

  it('should list every problem', () => {
    expect(validateConfig(loadConfig({}))).toEqual(['FEED_URL must be set', 'No marketplace has complete credentials']);
  });
});

describe('getConfigSummary', () => {
  it('should describe targets without credentials', () => {
    const summary = getConfigSummary(loadConfig({ ...FULL_ENV, SYNC_INTERVAL_MS: '60000' }));

    expect(summary).toEqual({
      port: 3000,
      sync: { intervalMs: 60000, concurrency: 1 },
      http: { timeoutMs: 30000 },
      feed: { configured: true, headerRow: 17 },
      targets: [
        { name: 'ozon', stockBatchSize: 100, priceBatchSize: 1000 },
        { name: 'yandex-fbs', stockBatchSize: 2000, priceBatchSize: 500 },
        { name: 'yandex-dbs', stockBatchSize: 2000, priceBatchSize: 500 },
      ],
    });
    expect(JSON.stringify(summary)).not.toContain('test-secret');
  });
});
