import type { Request, Response, NextFunction, RequestHandler } from 'express';
import crypto from 'crypto';

const MAX_ACTOR_ID_LENGTH = 256;

/**
 * Hash an API key for comparison (SHA-256).
 */
export function hashApiKey(key: string): string {
  return crypto.createHash('sha256').update(key).digest('hex');
}

function keysMatch(presented: string, expectedHash: string): boolean {
  const presentedHash = Buffer.from(hashApiKey(presented), 'hex');
  return crypto.timingSafeEqual(presentedHash, Buffer.from(expectedHash, 'hex'));
}

/**
 * Bearer API key authentication.
 *
 * The service is called by trusted back ends holding the shared key; the
 * user on whose behalf they act is named by X-Actor-Id and checked against
 * the access-control service per lifecycle action.
 */
export function authenticate(apiKey: string): RequestHandler {
  const expectedHash = hashApiKey(apiKey);

  return (req: Request, res: Response, next: NextFunction): void => {
    const authHeader = req.headers.authorization;
    const token = authHeader?.startsWith('Bearer ') ? authHeader.substring(7) : undefined;

    if (!token || !keysMatch(token, expectedHash)) {
      res.status(401).json({
        success: false,
        error: { code: 'UNAUTHORIZED', message: 'Missing or invalid Authorization header' },
      });
      return;
    }

    const actorId = req.get('X-Actor-Id')?.trim();
    if (!actorId || actorId.length > MAX_ACTOR_ID_LENGTH) {
      res.status(400).json({
        success: false,
        error: { code: 'VALIDATION_ERROR', message: 'X-Actor-Id header is required' },
      });
      return;
    }

    req.actorId = actorId;
    req.log = req.log?.child({ actorId });
    next();
  };
}
