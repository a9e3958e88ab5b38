import { Request, Response, NextFunction } from 'express';
import { httpLogger as logger } from '../core/logger';
import { incrementRequests, incrementErrors } from '../utils/metrics';

export const requestLoggerMiddleware = (req: Request, res: Response, next: NextFunction) => {
  const startTime = Date.now();

  logger.info({
    method: req.method,
    url: req.url,
    requestId: req.id,
    userAgent: req.get('User-Agent'),
  }, 'Request started');

  res.on('finish', () => {
    logger.info({
      method: req.method,
      url: req.url,
      status: res.statusCode,
      durationMs: Date.now() - startTime,
      requestId: req.id,
    }, 'Request completed');

    incrementRequests();
    if (res.statusCode >= 400) {
      incrementErrors();
    }
  });

  next();
};
