import { asc, count, desc, eq } from 'drizzle-orm';
import { v4 as uuidv4 } from 'uuid';
import type { Database } from '../db/connection.js';
import { fpoAuditLogs, fpoOrganizations, type AuditLogEntry } from '../db/schema.js';
import { normalizeListOptions, toPage, type ListOptions, type Page } from '../store/organizationStore.js';
import { computeEntryHash, type AuditLedger, type NewAuditEntry } from './auditLedger.js';

/**
 * PostgreSQL-backed audit ledger.
 *
 * Appends for one organization are serialized by locking its row for the
 * duration of the insert, so the hash chain never forks.
 */
export class DrizzleAuditLedger implements AuditLedger {
  constructor(private readonly db: Database) {}

  async append(entry: NewAuditEntry): Promise<AuditLogEntry> {
    return this.db.transaction(async (tx) => {
      await tx
        .select({ id: fpoOrganizations.id })
        .from(fpoOrganizations)
        .where(eq(fpoOrganizations.id, entry.fpoId))
        .for('update');

      const [last] = await tx
        .select({ entryHash: fpoAuditLogs.entryHash })
        .from(fpoAuditLogs)
        .where(eq(fpoAuditLogs.fpoId, entry.fpoId))
        .orderBy(desc(fpoAuditLogs.sequence))
        .limit(1);

      const previousHash = last?.entryHash ?? null;

      const [inserted] = await tx
        .insert(fpoAuditLogs)
        .values({
          ...entry,
          id: uuidv4(),
          entryHash: computeEntryHash(entry, previousHash),
          previousHash,
        })
        .returning();

      return inserted;
    });
  }

  async history(fpoId: string, options?: ListOptions): Promise<Page<AuditLogEntry>> {
    const { limit, offset } = normalizeListOptions(options);

    const [items, [{ total }]] = await Promise.all([
      this.db
        .select()
        .from(fpoAuditLogs)
        .where(eq(fpoAuditLogs.fpoId, fpoId))
        .orderBy(asc(fpoAuditLogs.performedAt), asc(fpoAuditLogs.sequence))
        .limit(limit)
        .offset(offset),
      this.db.select({ total: count() }).from(fpoAuditLogs).where(eq(fpoAuditLogs.fpoId, fpoId)),
    ]);

    return toPage(items, total, limit, offset);
  }
}
