import pino, { Logger } from 'pino';

/**
 * Root structured logger. Level comes from LOG_LEVEL (tests run with "silent").
 */
export const logger: Logger = pino({
  level: process.env['LOG_LEVEL'] || 'info',
  base: { service: 'marketplace-stock-sync' },
  timestamp: pino.stdTimeFunctions.isoTime,
  formatters: {
    level: (label: string) => ({ level: label }),
  },
});

// Module loggers
export const syncLogger: Logger = logger.child({ module: 'sync' });
export const feedLogger: Logger = logger.child({ module: 'feed' });
export const marketplaceLogger: Logger = logger.child({ module: 'marketplace' });
export const httpLogger: Logger = logger.child({ module: 'http' });
