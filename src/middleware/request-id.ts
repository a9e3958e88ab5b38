import { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';

const MAX_REQUEST_ID_LENGTH = 128;

export const requestIdMiddleware = (req: Request, res: Response, next: NextFunction) => {
  // Attach request ID from header or generate UUID
  const incoming = req.headers['x-request-id'];
  const headerId = typeof incoming === 'string' && incoming.length <= MAX_REQUEST_ID_LENGTH ? incoming : undefined;
  req.id = headerId || uuidv4();
  res.setHeader('x-request-id', req.id);
  next();
};
