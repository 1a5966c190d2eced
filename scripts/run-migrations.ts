import 'dotenv/config';
import { migrate } from 'drizzle-orm/node-postgres/migrator';
import { closeDb, getDb } from '../src/db/connection.js';
import { logger } from '../src/logger.js';

const MIGRATIONS_FOLDER = './src/db/migrations';

async function runMigrations(): Promise<void> {
  const connectionString = process.env.DATABASE_URL;
  if (!connectionString) {
    logger.fatal('DATABASE_URL environment variable not set');
    process.exit(1);
  }

  const db = getDb(connectionString);
  try {
    logger.info({ folder: MIGRATIONS_FOLDER }, 'running migrations');
    await migrate(db, { migrationsFolder: MIGRATIONS_FOLDER });
    logger.info('migrations completed');
  } finally {
    await closeDb();
  }
}

runMigrations().catch((error: unknown) => {
  logger.fatal({ err: error }, 'migration failed');
  process.exit(1);
});
