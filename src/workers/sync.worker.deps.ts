import axios from 'axios';
import { AppConfig } from '../core/config.types';
import { ConfigError } from '../core/errors';
import { loadFeed } from '../feed/feed.source';
import { createMarketplaceClient } from '../marketplaces';
import { SyncDependencies } from './sync.worker.types';

/**
 * Wire the feed loader and marketplace clients from configuration
 */
export function buildSyncDependencies(config: AppConfig): SyncDependencies {
  const feedUrl = config.feed.url;
  if (!feedUrl) {
    throw ConfigError.missing('FEED_URL');
  }

  const feedHttp = axios.create({ timeout: config.HTTP_TIMEOUT_MS });

  return {
    loadFeed: () => loadFeed({ url: feedUrl, headerRow: config.feed.headerRow, http: feedHttp }),
    targets: config.targets.map((target) => ({
      settings: target.settings,
      client: createMarketplaceClient(target, config.HTTP_TIMEOUT_MS),
    })),
    concurrency: config.SYNC_CONCURRENCY,
  };
}
