import { FeedRecord, MarketplaceSettings, SyncRunReport } from '../core/types';
import { MarketplaceClient } from '../marketplaces';

export type FeedLoader = () => Promise<FeedRecord[]>;

export interface SyncTarget {
  settings: MarketplaceSettings;
  client: MarketplaceClient;
}

// Everything a sync run needs, resolved from configuration
export interface SyncDependencies {
  loadFeed: FeedLoader;
  targets: SyncTarget[];
  concurrency: number;
  now?: () => Date;
}

export interface SyncRunOptions {
  // Restrict the run to these marketplace names
  only?: string[];
}

// Sync worker state
export interface SyncState {
  isRunning: boolean;
  intervalMs?: number;
  intervalId?: NodeJS.Timeout;
  currentRunStartedAt?: string;
  lastReport?: SyncRunReport;
  lastError?: string;
}

export interface SyncStatus {
  isRunning: boolean;
  intervalMs?: number;
  inProgress: boolean;
  currentRunStartedAt?: string;
  lastReport?: SyncRunReport;
  lastError?: string;
}
