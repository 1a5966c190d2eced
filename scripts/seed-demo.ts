/**
 * Registers a sample FPO and submits it for verification, so a local
 * instance has something to approve.
 *
 * Usage: npm run seed
 */

// Load .env BEFORE any other imports that might read env vars
import 'dotenv/config';

import { HttpAccessControlClient } from '../src/accessControl/httpClient.js';
import { DrizzleAuditLedger } from '../src/audit/drizzleAuditLedger.js';
import { initConfig } from '../src/config/index.js';
import { closeDb, getDb } from '../src/db/connection.js';
import { logger } from '../src/logger.js';
import { createServices } from '../src/services.js';
import { DrizzleOrganizationStore } from '../src/store/drizzleOrganizationStore.js';

const SEED_ACTOR = 'seed-script';

async function seed(): Promise<void> {
  const config = initConfig();
  const db = getDb(config.databaseUrl);

  const services = createServices({
    store: new DrizzleOrganizationStore(db),
    ledger: new DrizzleAuditLedger(db),
    accessControl: new HttpAccessControlClient({
      baseUrl: config.accessControlBaseUrl,
      apiKey: config.accessControlApiKey,
    }),
    settings: config,
  });

  try {
    const existing = await services.store.findByRegistrationNumber('DEMO-FPO-0001');
    if (existing) {
      logger.info({ orgId: existing.id, status: existing.status }, 'demo organization already present');
      return;
    }

    const record = await services.registry.register(
      {
        name: 'Demo Farmers Producer Organization',
        registrationNumber: 'DEMO-FPO-0001',
        description: 'Sample organization created by the seed script',
        metadata: { state: 'Maharashtra', district: 'Pune', crops: ['onion', 'grapes'] },
        ceoProfile: { firstName: 'Demo', lastName: 'Ceo', phoneNumber: '+910000000000' },
      },
      SEED_ACTOR,
      'seed-register',
    );

    const result = await services.lifecycle.submit(record.id, SEED_ACTOR, 'seeded for local testing', 'seed-submit');
    if (!result.ok) {
      logger.warn({ orgId: record.id, err: result.error.toJSON() }, 'demo organization registered but not submitted');
      return;
    }
    logger.info({ orgId: record.id, status: result.status }, 'demo organization ready for verification');
  } finally {
    await closeDb();
  }
}

seed().catch((error: unknown) => {
  logger.fatal({ err: error }, 'seed failed');
  process.exit(1);
});
