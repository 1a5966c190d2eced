import 'express-async-errors';
import express from 'express';
import helmet from 'helmet';
import { authenticate } from './api/middleware/auth.js';
import { errorHandler, notFoundHandler } from './api/middleware/errorHandler.js';
import { createApiRateLimiter, type RateLimitSettings } from './api/middleware/rateLimit.js';
import { requestContext } from './api/middleware/requestContext.js';
import { createFpoRouter } from './api/routes/fpos.js';
import { createHealthRouter } from './api/routes/health.js';
import type { Services } from './services.js';

export interface AppOptions {
  services: Services;
  apiKey: string;
  rateLimit: RateLimitSettings;
  /** Probed by GET /health; omit when there is no database behind the stores. */
  checkDatabase?: () => Promise<void>;
}

export function createApp(options: AppOptions): express.Express {
  const app = express();

  app.disable('x-powered-by');
  app.use(helmet());
  app.use(express.json({ limit: '1mb' }));
  app.use(requestContext);

  // Health check (no auth required)
  app.use(createHealthRouter(options.checkDatabase));

  // API routes (require API key auth, rate limited)
  app.use(
    '/api/fpos',
    createApiRateLimiter(options.rateLimit),
    authenticate(options.apiKey),
    createFpoRouter(options.services),
  );

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
