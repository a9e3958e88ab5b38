import { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { httpLogger as logger } from '../core/logger';
import { DomainError, ErrorFactory } from '../core/errors';

const handleZodValidationError = (error: z.ZodError, res: Response) => {
  const fieldErrors = error.errors.map(err => ({
    field: err.path.join('.'),
    message: err.message,
  }));

  return res.status(400).json({
    success: false,
    error: {
      name: 'ValidationError',
      message: `Validation failed: ${fieldErrors.map(e => `${e.field}: ${e.message}`).join(', ')}`,
      code: 'VALIDATION_ERROR',
      statusCode: 400,
      timestamp: new Date().toISOString(),
      details: { fieldErrors }
    },
  });
};

const handleMalformedJson = (res: Response) => {
  return res.status(400).json({
    success: false,
    error: {
      name: 'ValidationError',
      message: 'Malformed JSON body',
      code: 'VALIDATION_ERROR',
      statusCode: 400,
      timestamp: new Date().toISOString(),
    },
  });
};

const handleGenericError = (error: Error, res: Response) => {
  const isDevelopment = process.env['NODE_ENV'] === 'development';
  return res.status(500).json({
    success: false,
    error: {
      name: 'InternalServerError',
      message: 'Internal server error',
      code: 'INTERNAL_SERVER_ERROR',
      statusCode: 500,
      timestamp: new Date().toISOString(),
      ...(isDevelopment && { stack: error.stack }),
    },
  });
};

export const errorHandler = (error: Error, req: Request, res: Response, _next: NextFunction) => {
  logger.error({ error, req: { id: req.id, method: req.method, url: req.url } }, 'Request error');

  if (error instanceof DomainError) {
    return res.status(error.statusCode).json(ErrorFactory.createErrorResponse(error));
  }

  if (error instanceof z.ZodError) {
    return handleZodValidationError(error, res);
  }

  if (error instanceof SyntaxError && 'body' in error) {
    return handleMalformedJson(res);
  }

  return handleGenericError(error, res);
};
