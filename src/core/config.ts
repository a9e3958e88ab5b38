/**
 * Centralized Sync Configuration
 *
 * Environment-driven configuration with typed defaults:
 * - HTTP surface and scheduling
 * - Supplier feed location
 * - Marketplace credentials and batch limits
 */
import { z } from 'zod';
import { logger } from './logger';
import { AppConfig, MarketplaceTarget } from './config.types';
import { Env, parseNonNegativeInt, parsePositiveInt, readString } from './config.utils';

export const OZON_DEFAULTS = {
  stockBatchSize: 100,
  priceBatchSize: 1000,
  currency: 'RUB',
} as const;

export const YANDEX_DEFAULTS = {
  stockBatchSize: 2000,
  priceBatchSize: 500,
  currency: 'RUR',
} as const;

const OzonEnvSchema = z.object({
  OZON_CLIENT_ID: z.string().min(1),
  OZON_API_KEY: z.string().min(1),
});

const YandexCampaignSchema = z.object({
  token: z.string().min(1),
  campaignId: z.string().min(1),
  warehouseId: z.string().regex(/^\d+$/, 'warehouse id must be numeric'),
});

// Yandex campaigns share one token; each has its own campaign and warehouse
const YANDEX_CAMPAIGNS = [
  { name: 'yandex-fbs', campaignKey: 'YANDEX_FBS_CAMPAIGN_ID', warehouseKey: 'YANDEX_FBS_WAREHOUSE_ID' },
  { name: 'yandex-dbs', campaignKey: 'YANDEX_DBS_CAMPAIGN_ID', warehouseKey: 'YANDEX_DBS_WAREHOUSE_ID' },
] as const;

function loadOzonTarget(env: Env): MarketplaceTarget | null {
  const raw = {
    OZON_CLIENT_ID: readString(env, 'OZON_CLIENT_ID'),
    OZON_API_KEY: readString(env, 'OZON_API_KEY'),
  };
  const parsed = OzonEnvSchema.safeParse(raw);

  if (!parsed.success) {
    if (raw.OZON_CLIENT_ID || raw.OZON_API_KEY) {
      logger.warn('Ozon credentials are incomplete, Ozon sync disabled');
    }
    return null;
  }

  return {
    kind: 'ozon',
    settings: {
      name: 'ozon',
      kind: 'ozon',
      stockBatchSize: parsePositiveInt(env, 'OZON_STOCK_BATCH_SIZE', OZON_DEFAULTS.stockBatchSize),
      priceBatchSize: parsePositiveInt(env, 'OZON_PRICE_BATCH_SIZE', OZON_DEFAULTS.priceBatchSize),
      currency: OZON_DEFAULTS.currency,
    },
    credentials: {
      clientId: parsed.data.OZON_CLIENT_ID,
      apiKey: parsed.data.OZON_API_KEY,
    },
  };
}

function loadYandexTargets(env: Env): MarketplaceTarget[] {
  const token = readString(env, 'YANDEX_TOKEN');
  const stockBatchSize = parsePositiveInt(env, 'YANDEX_STOCK_BATCH_SIZE', YANDEX_DEFAULTS.stockBatchSize);
  const priceBatchSize = parsePositiveInt(env, 'YANDEX_PRICE_BATCH_SIZE', YANDEX_DEFAULTS.priceBatchSize);
  const targets: MarketplaceTarget[] = [];

  for (const campaign of YANDEX_CAMPAIGNS) {
    const raw = {
      token,
      campaignId: readString(env, campaign.campaignKey),
      warehouseId: readString(env, campaign.warehouseKey),
    };
    const parsed = YandexCampaignSchema.safeParse(raw);

    if (!parsed.success) {
      if (raw.campaignId || raw.warehouseId) {
        logger.warn({ marketplace: campaign.name }, 'Yandex campaign settings are incomplete, campaign disabled');
      }
      continue;
    }

    targets.push({
      kind: 'yandex',
      settings: {
        name: campaign.name,
        kind: 'yandex',
        stockBatchSize,
        priceBatchSize,
        currency: YANDEX_DEFAULTS.currency,
        warehouseId: parsed.data.warehouseId,
      },
      credentials: {
        token: parsed.data.token,
        campaignId: parsed.data.campaignId,
      },
    });
  }

  return targets;
}

/**
 * Build the application configuration from an environment map
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const ozon = loadOzonTarget(env);

  return Object.freeze({
    PORT: parsePositiveInt(env, 'PORT', 3000),

    SYNC_INTERVAL_MS: parseNonNegativeInt(env, 'SYNC_INTERVAL_MS', 0), // 0 disables the schedule
    SYNC_CONCURRENCY: parsePositiveInt(env, 'SYNC_CONCURRENCY', 1),

    HTTP_TIMEOUT_MS: parsePositiveInt(env, 'HTTP_TIMEOUT_MS', 30000),

    feed: {
      url: readString(env, 'FEED_URL'),
      headerRow: parseNonNegativeInt(env, 'FEED_HEADER_ROW', 17),
    },

    targets: Object.freeze([...(ozon ? [ozon] : []), ...loadYandexTargets(env)]),
  });
}

let cached: AppConfig | null = null;

/**
 * Process-wide configuration, read once from process.env
 */
export function getConfig(): AppConfig {
  if (!cached) {
    cached = loadConfig();
  }
  return cached;
}

/**
 * Check if configuration is usable for a sync run
 */
export function validateConfig(config: AppConfig): string[] {
  const issues: string[] = [];

  if (!config.feed.url) {
    issues.push('FEED_URL must be set');
  }

  if (config.targets.length === 0) {
    issues.push('No marketplace has complete credentials');
  }

  const names = config.targets.map((target) => target.settings.name);
  if (new Set(names).size !== names.length) {
    issues.push('Marketplace names must be unique');
  }

  return issues;
}

/**
 * Get configuration summary for logging (no credentials)
 */
export function getConfigSummary(config: AppConfig): Record<string, unknown> {
  return {
    port: config.PORT,
    sync: {
      intervalMs: config.SYNC_INTERVAL_MS,
      concurrency: config.SYNC_CONCURRENCY,
    },
    http: {
      timeoutMs: config.HTTP_TIMEOUT_MS,
    },
    feed: {
      configured: Boolean(config.feed.url),
      headerRow: config.feed.headerRow,
    },
    targets: config.targets.map((target) => ({
      name: target.settings.name,
      stockBatchSize: target.settings.stockBatchSize,
      priceBatchSize: target.settings.priceBatchSize,
    })),
  };
}
