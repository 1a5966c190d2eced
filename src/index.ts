import { HttpAccessControlClient } from './accessControl/httpClient.js';
import { createApp } from './app.js';
import { DrizzleAuditLedger } from './audit/drizzleAuditLedger.js';
import { ConfigError, initConfig, type Config } from './config/index.js';
import { closeDb, getDb, pingDb } from './db/connection.js';
import { logger } from './logger.js';
import { createServices } from './services.js';
import { DrizzleOrganizationStore } from './store/drizzleOrganizationStore.js';

const SHUTDOWN_TIMEOUT_MS = 10000;

async function main(): Promise<void> {
  // ─── Initialize Configuration ────────────────────────────────────

  let config: Config;
  try {
    config = initConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.fatal({ issues: error.issues }, 'invalid configuration');
      process.exit(1);
    }
    throw error;
  }
  logger.level = config.logLevel;

  // Log DATABASE_URL with password redacted
  logger.info({ database: config.databaseUrl.replace(/:([^@/]+)@/, ':****@') }, 'configuration validated');

  // ─── Wire Services ────────────────────────────────────────────────

  const db = getDb(config.databaseUrl);
  await pingDb(db);
  logger.info('database connection established');

  const services = createServices({
    store: new DrizzleOrganizationStore(db),
    ledger: new DrizzleAuditLedger(db),
    accessControl: new HttpAccessControlClient({
      baseUrl: config.accessControlBaseUrl,
      apiKey: config.accessControlApiKey,
    }),
    settings: config,
  });

  const app = createApp({
    services,
    apiKey: config.apiKey,
    rateLimit: { windowMs: config.rateLimitWindowMs, max: config.rateLimitMaxRequests },
    checkDatabase: () => pingDb(db),
  });

  // ─── Start Server ─────────────────────────────────────────────────

  const server = app.listen(config.port, () => {
    logger.info({ port: config.port, env: config.nodeEnv }, 'FPO lifecycle service listening');
  });

  server.on('error', (err: NodeJS.ErrnoException) => {
    if (err.code === 'EADDRINUSE') {
      logger.fatal({ port: config.port }, 'port is already in use');
    } else {
      logger.fatal({ err }, 'server error');
    }
    process.exit(1);
  });

  // ─── Graceful Shutdown ────────────────────────────────────────────

  const gracefulShutdown = (signal: string) => {
    logger.info({ signal }, 'shutting down gracefully');

    server.close(() => {
      logger.info('HTTP server closed');
      closeDb()
        .then(() => logger.info('database connection closed'))
        .catch((error: unknown) => logger.error({ err: error }, 'error closing database'))
        .finally(() => process.exit(0));
    });

    // Force shutdown after 10 seconds
    setTimeout(() => {
      logger.error('forced shutdown after timeout');
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS).unref();
  };

  process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => gracefulShutdown('SIGINT'));
}

main().catch((error: unknown) => {
  logger.fatal({ err: error }, 'startup failed');
  process.exit(1);
});
