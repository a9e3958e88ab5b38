import { MarketplaceSettings } from './types';

export interface OzonCredentials {
  clientId: string;
  apiKey: string;
}

export interface YandexCredentials {
  token: string;
  campaignId: string;
}

export type MarketplaceTarget =
  | {
      kind: 'ozon';
      settings: MarketplaceSettings;
      credentials: OzonCredentials;
    }
  | {
      kind: 'yandex';
      settings: MarketplaceSettings & { warehouseId: string };
      credentials: YandexCredentials;
    };

export interface FeedConfig {
  url?: string;
  headerRow: number;
}

export interface AppConfig {
  // HTTP surface
  readonly PORT: number;

  // Sync scheduling
  readonly SYNC_INTERVAL_MS: number;
  readonly SYNC_CONCURRENCY: number;

  // Outbound HTTP
  readonly HTTP_TIMEOUT_MS: number;

  readonly feed: FeedConfig;
  readonly targets: readonly MarketplaceTarget[];
}
