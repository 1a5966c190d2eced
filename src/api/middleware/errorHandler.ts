import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { LifecycleError } from '../../lifecycle/errors.js';
import { logger } from '../../logger.js';
import { formatIssues } from './validate.js';

/**
 * Last middleware in the chain: turns thrown errors into the JSON error shape.
 * Lifecycle errors keep their status code; anything else is a 500.
 */
export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  const log = req.log ?? logger;

  if (err instanceof LifecycleError) {
    log.warn({ code: err.code, path: req.path }, err.message);
    res.status(err.statusCode).json({ success: false, error: err.toJSON() });
    return;
  }

  if (err instanceof ZodError) {
    res.status(400).json({
      success: false,
      error: { code: 'VALIDATION_ERROR', message: 'Validation failed', details: { issues: formatIssues(err) } },
    });
    return;
  }

  // Malformed JSON from express.json()
  if (err instanceof SyntaxError && 'status' in err && err.status === 400) {
    res.status(400).json({ success: false, error: { code: 'VALIDATION_ERROR', message: 'Malformed JSON body' } });
    return;
  }

  log.error({ err, path: req.path }, 'unhandled error');
  res.status(500).json({
    success: false,
    error: {
      code: 'INTERNAL_ERROR',
      message: process.env.NODE_ENV === 'production' ? 'Internal server error' : errorText(err),
    },
  });
}

function errorText(err: unknown): string {
  return err instanceof Error ? err.message : 'Internal server error';
}

export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({ success: false, error: { code: 'NOT_FOUND', message: 'Not found' } });
}
