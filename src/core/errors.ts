import { ErrorResponse, OfferId } from './types';

// Base domain error class
export abstract class DomainError extends Error {
  abstract readonly code: string;
  abstract readonly statusCode: number;
  readonly timestamp: string;

  constructor(message: string, public readonly details?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.timestamp = new Date().toISOString();
  }
}

// Feed quantity token that is neither a known literal nor an integer (422)
export class MalformedQuantityError extends DomainError {
  readonly code = 'MALFORMED_QUANTITY';
  readonly statusCode = 422;

  constructor(
    message: string,
    public readonly rawQuantity: string,
    public readonly offerId?: OfferId,
    details?: Record<string, unknown>
  ) {
    super(message, { rawQuantity, offerId, ...details });
  }

  static forToken(rawQuantity: string, offerId?: OfferId): MalformedQuantityError {
    const where = offerId !== undefined ? ` for offer ${offerId}` : '';
    return new MalformedQuantityError(
      `Malformed quantity "${rawQuantity}"${where}. Expected ">10" or a base-10 integer.`,
      rawQuantity,
      offerId
    );
  }
}

// Feed price string without any digits before the first period (422)
export class MalformedPriceError extends DomainError {
  readonly code = 'MALFORMED_PRICE';
  readonly statusCode = 422;

  constructor(
    message: string,
    public readonly rawPrice: string,
    public readonly offerId?: OfferId,
    details?: Record<string, unknown>
  ) {
    super(message, { rawPrice, offerId, ...details });
  }

  static forString(rawPrice: string, offerId?: OfferId): MalformedPriceError {
    const where = offerId !== undefined ? ` for offer ${offerId}` : '';
    return new MalformedPriceError(
      `Malformed price "${rawPrice}"${where}. No digits before the fractional part.`,
      rawPrice,
      offerId
    );
  }
}

// Caller asked for batches of zero or negative size (400)
export class InvalidBatchSizeError extends DomainError {
  readonly code = 'INVALID_BATCH_SIZE';
  readonly statusCode = 400;

  constructor(public readonly batchSize: number) {
    super(`Invalid batch size: ${batchSize}. Batch size must be a positive integer.`, { batchSize });
  }
}

// Transport-level failures talking to a marketplace (502)
export abstract class MarketplaceError extends DomainError {
  readonly statusCode = 502;

  constructor(
    message: string,
    public readonly marketplace: string,
    public readonly httpStatus?: number,
    details?: Record<string, unknown>
  ) {
    super(message, { marketplace, httpStatus, ...details });
  }
}

export class CatalogFetchError extends MarketplaceError {
  readonly code = 'CATALOG_FETCH_FAILURE';

  static fromCause(marketplace: string, cursor: string, reason: string, httpStatus?: number): CatalogFetchError {
    return new CatalogFetchError(
      `Failed to fetch catalog page from ${marketplace} (cursor "${cursor}"): ${reason}`,
      marketplace,
      httpStatus,
      { cursor }
    );
  }
}

export class DispatchError extends MarketplaceError {
  readonly code = 'DISPATCH_FAILURE';

  static fromCause(
    marketplace: string,
    kind: 'stock' | 'price',
    batchSize: number,
    reason: string,
    httpStatus?: number
  ): DispatchError {
    return new DispatchError(
      `Failed to submit ${kind} batch of ${batchSize} to ${marketplace}: ${reason}`,
      marketplace,
      httpStatus,
      { kind, batchSize }
    );
  }
}

// Supplier feed could not be downloaded, unpacked or read (502)
export class FeedError extends DomainError {
  readonly code = 'FEED_ERROR';
  readonly statusCode = 502;

  static missingWorkbook(entries: string[]): FeedError {
    return new FeedError('Feed archive contains no .xls or .xlsx workbook', { entries });
  }

  static missingColumns(columns: string[]): FeedError {
    return new FeedError(`Feed workbook is missing columns: ${columns.join(', ')}`, { columns });
  }
}

// Validation error for invalid input (400)
export class ValidationError extends DomainError {
  readonly code = 'VALIDATION_ERROR';
  readonly statusCode = 400;

  constructor(
    message: string,
    public readonly field?: string,
    public readonly value?: unknown,
    details?: Record<string, unknown>
  ) {
    super(message, { field, value, ...details });
  }

  static unknownMarketplaces(names: string[], known: string[]): ValidationError {
    return new ValidationError(
      `Unknown marketplaces: ${names.join(', ')}. Configured: ${known.join(', ') || 'none'}`,
      'marketplaces',
      names
    );
  }

  static invalidInterval(value: unknown): ValidationError {
    return new ValidationError(
      `Invalid sync interval: ${String(value)}. Interval must be a positive integer of milliseconds.`,
      'intervalMs',
      value
    );
  }
}

// A run is already in flight (409)
export class SyncInProgressError extends DomainError {
  readonly code = 'SYNC_IN_PROGRESS';
  readonly statusCode = 409;

  constructor(public readonly startedAt: string) {
    super(`A sync run started at ${startedAt} is still in progress`, { startedAt });
  }
}

// A periodic schedule is already active (409)
export class SyncScheduleConflictError extends DomainError {
  readonly code = 'SYNC_ALREADY_SCHEDULED';
  readonly statusCode = 409;

  constructor(public readonly intervalMs?: number) {
    super(`Sync worker is already running with interval ${intervalMs ?? 'unknown'}ms`, { intervalMs });
  }
}

// Missing or invalid process configuration (500)
export class ConfigError extends DomainError {
  readonly code = 'CONFIG_ERROR';
  readonly statusCode = 500;

  static missing(key: string): ConfigError {
    return new ConfigError(`Missing required configuration: ${key}`, { key });
  }
}

// Error factory for creating standardized error responses
export class ErrorFactory {
  static createErrorResponse(error: DomainError): ErrorResponse {
    return {
      success: false,
      error: {
        name: error.name,
        message: error.message,
        code: error.code,
        statusCode: error.statusCode,
        timestamp: error.timestamp,
        details: error.details,
      },
    };
  }
}
