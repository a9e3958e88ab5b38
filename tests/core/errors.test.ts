import { describe, it, expect } from 'vitest';
import {
  CatalogFetchError,
  ConfigError,
  DispatchError,
  DomainError,
  ErrorFactory,
  FeedError,
  InvalidBatchSizeError,
  MalformedPriceError,
  MalformedQuantityError,
  MarketplaceError,
  SyncInProgressError,
  SyncScheduleConflictError,
  ValidationError,
} from '../../src/core/errors';

describe('Core Errors', () => {
  describe('record errors', () => {
    it('should describe a malformed quantity with its offer', () => {
      const error = MalformedQuantityError.forToken('abc', '48852');

      expect(error).toBeInstanceOf(DomainError);
      expect(error.name).toBe('MalformedQuantityError');
      expect(error.code).toBe('MALFORMED_QUANTITY');
      expect(error.statusCode).toBe(422);
      expect(error.message).toBe('Malformed quantity "abc" for offer 48852. Expected ">10" or a base-10 integer.');
      expect(error.details).toEqual({ rawQuantity: 'abc', offerId: '48852' });
    });

    it('should describe a malformed price without an offer', () => {
      const error = MalformedPriceError.forString('.99');

      expect(error.code).toBe('MALFORMED_PRICE');
      expect(error.message).toBe('Malformed price ".99". No digits before the fractional part.');
      expect(error.offerId).toBeUndefined();
    });

    it('should describe an invalid batch size', () => {
      const error = new InvalidBatchSizeError(0);

      expect(error.statusCode).toBe(400);
      expect(error.message).toBe('Invalid batch size: 0. Batch size must be a positive integer.');
      expect(error.details).toEqual({ batchSize: 0 });
    });
  });

  describe('marketplace errors', () => {
    it('should carry marketplace, status and cursor for catalog failures', () => {
      const error = CatalogFetchError.fromCause('ozon', 'WzEwXQ==', 'HTTP 503', 503);

      expect(error).toBeInstanceOf(MarketplaceError);
      expect(error.statusCode).toBe(502);
      expect(error.code).toBe('CATALOG_FETCH_FAILURE');
      expect(error.details).toEqual({ marketplace: 'ozon', httpStatus: 503, cursor: 'WzEwXQ==' });
    });

    it('should carry kind and batch size for dispatch failures', () => {
      const error = DispatchError.fromCause('yandex-fbs', 'price', 500, 'HTTP 400 Bad Request', 400);

      expect(error.message).toBe('Failed to submit price batch of 500 to yandex-fbs: HTTP 400 Bad Request');
      expect(error.details).toEqual({ marketplace: 'yandex-fbs', httpStatus: 400, kind: 'price', batchSize: 500 });
    });
  });

  describe('run errors', () => {
    it('should list the archive entries when no workbook is found', () => {
      const error = FeedError.missingWorkbook(['readme.txt']);
      expect(error.code).toBe('FEED_ERROR');
      expect(error.details).toEqual({ entries: ['readme.txt'] });
    });

    it('should name unknown marketplaces and the configured ones', () => {
      const error = ValidationError.unknownMarketplaces(['wb'], ['ozon', 'yandex-fbs']);
      expect(error.message).toBe('Unknown marketplaces: wb. Configured: ozon, yandex-fbs');
      expect(error.field).toBe('marketplaces');
    });

    it('should say none when nothing is configured', () => {
      expect(ValidationError.unknownMarketplaces(['ozon'], []).message).toBe('Unknown marketplaces: ozon. Configured: none');
    });

    it('should report a conflicting run', () => {
      const error = new SyncInProgressError('2025-01-01T00:00:00.000Z');
      expect(error.statusCode).toBe(409);
      expect(error.message).toBe('A sync run started at 2025-01-01T00:00:00.000Z is still in progress');
    });

    it('should report an active schedule', () => {
      const error = new SyncScheduleConflictError(60000);
      expect(error.statusCode).toBe(409);
      expect(error.code).toBe('SYNC_ALREADY_SCHEDULED');
      expect(error.message).toBe('Sync worker is already running with interval 60000ms');
    });

    it('should name missing configuration', () => {
      expect(ConfigError.missing('FEED_URL').message).toBe('Missing required configuration: FEED_URL');
    });
  });

  describe('ErrorFactory', () => {
    it('should build the API error body', () => {
      const error = new InvalidBatchSizeError(-1);

      expect(ErrorFactory.createErrorResponse(error)).toEqual({
        success: false,
        error: {
          name: 'InvalidBatchSizeError',
          message: error.message,
          code: 'INVALID_BATCH_SIZE',
          statusCode: 400,
          timestamp: error.timestamp,
          details: { batchSize: -1 },
        },
      });
    });
  });
});
