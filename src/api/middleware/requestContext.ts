import type { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { createRequestLogger } from '../../logger.js';

const MAX_REQUEST_ID_LENGTH = 128;

/**
 * Take the correlation id from X-Request-Id (or generate one), echo it back
 * and bind a child logger to it.
 */
export function requestContext(req: Request, res: Response, next: NextFunction): void {
  const header = req.get('X-Request-Id');
  const requestId = header && header.length <= MAX_REQUEST_ID_LENGTH ? header : uuidv4();

  req.requestId = requestId;
  req.log = createRequestLogger(requestId);
  res.setHeader('X-Request-Id', requestId);
  next();
}
