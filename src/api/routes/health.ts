import { Router } from 'express';
import { errorMessage } from '../../lifecycle/errors.js';

export const SERVICE_VERSION = '0.1.0';

/**
 * GET /health. When a database check is given, a failing check turns the
 * response into a 503.
 */
export function createHealthRouter(checkDatabase?: () => Promise<void>): Router {
  const router = Router();

  router.get('/health', async (req, res) => {
    let database: 'ok' | 'unavailable' | 'skipped' = 'skipped';
    if (checkDatabase) {
      try {
        await checkDatabase();
        database = 'ok';
      } catch (error) {
        req.log?.error({ err: errorMessage(error) }, 'health check: database unavailable');
        database = 'unavailable';
      }
    }

    const healthy = database !== 'unavailable';
    res.status(healthy ? 200 : 503).json({
      success: healthy,
      data: {
        status: healthy ? 'ok' : 'degraded',
        version: SERVICE_VERSION,
        checks: { database },
        timestamp: new Date().toISOString(),
      },
    });
  });

  return router;
}
