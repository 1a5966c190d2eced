import { v4 as uuidv4 } from 'uuid';
import type { AuditLogEntry } from '../db/schema.js';
import { normalizeListOptions, toPage, type ListOptions, type Page } from '../store/organizationStore.js';
import { computeEntryHash, type AuditLedger, type NewAuditEntry } from './auditLedger.js';

/**
 * In-memory audit ledger with the same ordering and chaining rules as the
 * PostgreSQL ledger.
 */
export class MemoryAuditLedger implements AuditLedger {
  private readonly entries: AuditLogEntry[] = [];
  private nextSequence = 1;

  async append(entry: NewAuditEntry): Promise<AuditLogEntry> {
    const last = this.entriesFor(entry.fpoId).at(-1);
    const previousHash = last?.entryHash ?? null;

    const stored: AuditLogEntry = {
      ...structuredClone(entry),
      id: uuidv4(),
      sequence: this.nextSequence++,
      entryHash: computeEntryHash(entry, previousHash),
      previousHash,
    };
    this.entries.push(stored);
    return structuredClone(stored);
  }

  async history(fpoId: string, options?: ListOptions): Promise<Page<AuditLogEntry>> {
    const { limit, offset } = normalizeListOptions(options);
    const all = this.entriesFor(fpoId).sort(
      (a, b) => a.performedAt.getTime() - b.performedAt.getTime() || a.sequence - b.sequence,
    );
    return toPage(all.slice(offset, offset + limit).map((e) => structuredClone(e)), all.length, limit, offset);
  }

  /** Every entry across organizations, in append order. */
  all(): AuditLogEntry[] {
    return this.entries.map((e) => structuredClone(e));
  }

  private entriesFor(fpoId: string): AuditLogEntry[] {
    return this.entries.filter((e) => e.fpoId === fpoId);
  }
}
