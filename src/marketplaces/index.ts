import { MarketplaceTarget } from '../core/config.types';
import { MarketplaceClient } from './marketplace.types';
import { OzonClient } from './ozon.client';
import { YandexMarketClient } from './yandex.client';

export type { CatalogPage, MarketplaceClient } from './marketplace.types';

/**
 * Build the API client for a configured marketplace target
 */
export function createMarketplaceClient(target: MarketplaceTarget, timeoutMs: number): MarketplaceClient {
  switch (target.kind) {
    case 'ozon':
      return OzonClient.create(target.settings, target.credentials, timeoutMs);
    case 'yandex':
      return YandexMarketClient.create(target.settings, target.credentials, timeoutMs);
  }
}
