/**
 * Request properties set by our middleware.
 */

import type { Logger } from '../logger.js';

declare global {
  namespace Express {
    interface Request {
      /** Correlation id from X-Request-Id, or generated (requestContext). */
      requestId?: string;

      /** Logger bound to the request id (requestContext). */
      log?: Logger;

      /** Acting user from X-Actor-Id (authenticate). */
      actorId?: string;
    }
  }
}

// This export is required for TypeScript to treat this as a module
export {};
