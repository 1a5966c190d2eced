/**
 * Append-only ledger of lifecycle transition attempts.
 *
 * Entries are never updated. Each organization's entries form a hash chain:
 * an entry's hash covers its own fields and the hash of the entry before it,
 * so `verifyChain` can detect a row that was altered or removed after the fact.
 */

import crypto from 'node:crypto';
import type { AuditLogEntry } from '../db/schema.js';
import type { ListOptions, Page } from '../store/organizationStore.js';

/** Fields supplied by the writer; id, sequence and hashes are assigned by the ledger. */
export type NewAuditEntry = Omit<AuditLogEntry, 'id' | 'sequence' | 'entryHash' | 'previousHash'>;

export interface AuditLedger {
  append(entry: NewAuditEntry): Promise<AuditLogEntry>;
  /** Entries for one organization, oldest first. */
  history(fpoId: string, options?: ListOptions): Promise<Page<AuditLogEntry>>;
}

export interface ChainVerification {
  valid: boolean;
  checked: number;
  /** Id of the first entry whose hash does not match. */
  brokenAt?: string;
}

/**
 * Serialize with object keys sorted at every level, so the hash does not
 * depend on the key order a JSON column hands back.
 */
export function canonicalJson(value: unknown): string {
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value) ?? 'null';
  }
  if (value instanceof Date) {
    return JSON.stringify(value.toISOString());
  }
  if (Array.isArray(value)) {
    return `[${value.map(canonicalJson).join(',')}]`;
  }
  const entries = Object.entries(value)
    .filter(([, v]) => v !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${canonicalJson(v)}`).join(',')}}`;
}

export function computeEntryHash(entry: NewAuditEntry, previousHash: string | null): string {
  const payload = canonicalJson({
    fpoId: entry.fpoId,
    action: entry.action,
    outcome: entry.outcome,
    previousState: entry.previousState,
    newState: entry.newState,
    reason: entry.reason,
    performedBy: entry.performedBy,
    performedAt: entry.performedAt.toISOString(),
    details: entry.details ?? null,
    requestId: entry.requestId ?? null,
    previousHash,
  });
  return crypto.createHash('sha256').update(payload).digest('hex');
}

/**
 * Recompute the chain over an organization's full history, in append order.
 */
export function verifyChain(entries: AuditLogEntry[]): ChainVerification {
  const ordered = [...entries].sort((a, b) => a.sequence - b.sequence);
  let previousHash: string | null = null;
  for (const [index, entry] of ordered.entries()) {
    const expected = computeEntryHash(entry, previousHash);
    if (entry.previousHash !== previousHash || entry.entryHash !== expected) {
      return { valid: false, checked: index, brokenAt: entry.id };
    }
    previousHash = entry.entryHash;
  }
  return { valid: true, checked: ordered.length };
}
