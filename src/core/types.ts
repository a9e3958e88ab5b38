import { z } from 'zod';

// Base types
export type OfferId = string;
export type StockCount = number;
export type PriceValue = number;
export type MarketplaceKind = 'ozon' | 'yandex';

// One supplier-reported product, as read from the feed
export interface FeedRecord {
  code: string;
  rawQuantity: string;
  rawPrice: string;
}

export const FeedRecordSchema = z.object({
  code: z.coerce.string(),
  rawQuantity: z.coerce.string(),
  rawPrice: z.coerce.string(),
});

export interface StockUpdate {
  offerId: OfferId;
  count: StockCount;
  timestamp: string; // ISO-8601, second precision, shared by one reconciliation pass
}

export interface PriceUpdate {
  offerId: OfferId;
  priceValue: PriceValue;
  currency: string;
}

// Per-marketplace configuration record
export interface MarketplaceSettings {
  name: string;
  kind: MarketplaceKind;
  stockBatchSize: number;
  priceBatchSize: number;
  currency: string;
  warehouseId?: string;
}

export interface Reconciliation {
  stockUpdates: StockUpdate[];
  priceUpdates: PriceUpdate[];
}

// Sync results
export interface MarketplaceSyncResult {
  marketplace: string;
  activeOffers: StockUpdate[];
  allOffers: StockUpdate[];
  priceUpdates: PriceUpdate[];
  stockBatches: number;
  priceBatches: number;
}

export type TargetOutcome =
  | {
      marketplace: string;
      status: 'success';
      result: MarketplaceSyncResult;
    }
  | {
      marketplace: string;
      status: 'failed';
      error: {
        name: string;
        code?: string;
        message: string;
      };
    };

export interface SyncRunReport {
  startedAt: string;
  finishedAt: string;
  feedSize: number;
  outcomes: TargetOutcome[];
}

// API Request DTOs
export const SyncRequestSchema = z.object({
  marketplaces: z.array(z.string().min(1)).min(1).optional(),
});

export const StartSyncRequestSchema = z.object({
  intervalMs: z.number().int().positive().default(15000),
});

export interface ErrorResponse {
  success: false;
  error: {
    name: string;
    message: string;
    code: string;
    statusCode: number;
    timestamp: string;
    details?: Record<string, unknown>;
  };
}
