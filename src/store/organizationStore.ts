/**
 * Persistence contract for organization records.
 *
 * Every write is conditioned on the record's version: `update` and
 * `softDelete` return null when the stored version no longer matches,
 * which callers surface as a concurrent modification.
 */

import type { OrganizationRecord } from '../db/schema.js';
import type { FpoStatus } from '../lifecycle/states.js';
import type { CeoProfile } from '../lifecycle/types.js';

/** Fields a write may change. Identity, version and creation time are managed by the store. */
export type OrganizationPatch = Partial<Omit<OrganizationRecord, 'id' | 'version' | 'createdAt' | 'updatedAt'>>;

export interface ListOptions {
  limit?: number;
  offset?: number;
}

export interface Page<T> {
  items: T[];
  total: number;
  limit: number;
  offset: number;
  hasMore: boolean;
}

export const DEFAULT_PAGE_SIZE = 50;
export const MAX_PAGE_SIZE = 500;

export interface OrganizationStore {
  /** Throws ConflictError when the id, external reference or registration number is taken. */
  insert(record: OrganizationRecord): Promise<OrganizationRecord>;
  /** Soft-deleted records are returned only when `includeDeleted` is set. */
  findById(id: string, options?: { includeDeleted?: boolean }): Promise<OrganizationRecord | null>;
  findByExternalRef(externalOrgRef: string): Promise<OrganizationRecord | null>;
  findByRegistrationNumber(registrationNumber: string): Promise<OrganizationRecord | null>;
  listByStatus(status: FpoStatus, options?: ListOptions): Promise<Page<OrganizationRecord>>;
  update(id: string, expectedVersion: number, patch: OrganizationPatch, now: Date): Promise<OrganizationRecord | null>;
  softDelete(id: string, expectedVersion: number, now: Date): Promise<OrganizationRecord | null>;
}

export function normalizeListOptions(options?: ListOptions): { limit: number; offset: number } {
  const limit = Math.min(Math.max(options?.limit ?? DEFAULT_PAGE_SIZE, 1), MAX_PAGE_SIZE);
  const offset = Math.max(options?.offset ?? 0, 0);
  return { limit, offset };
}

export function toPage<T>(items: T[], total: number, limit: number, offset: number): Page<T> {
  return { items, total, limit, offset, hasMore: offset + items.length < total };
}

export interface NewOrganizationFields {
  id: string;
  name: string;
  registrationNumber?: string | null;
  description?: string | null;
  metadata?: Record<string, unknown>;
  ceoProfile?: CeoProfile | null;
  parentFpoId?: string | null;
}

/**
 * A freshly registered record: DRAFT, version 1, no setup attempts or progress.
 */
export function newOrganizationRecord(fields: NewOrganizationFields, now: Date): OrganizationRecord {
  return {
    id: fields.id,
    externalOrgRef: null,
    name: fields.name,
    registrationNumber: fields.registrationNumber ?? null,
    description: fields.description ?? null,
    metadata: fields.metadata ?? {},
    ceoProfile: fields.ceoProfile ?? null,
    parentFpoId: fields.parentFpoId ?? null,
    status: 'DRAFT',
    previousStatus: null,
    statusReason: null,
    statusChangedAt: null,
    statusChangedBy: null,
    verificationStatus: null,
    verifiedAt: null,
    verifiedBy: null,
    verificationNotes: null,
    setupAttempts: 0,
    lastSetupAt: null,
    setupProgress: {},
    setupErrors: null,
    ceoUserId: null,
    version: 1,
    createdAt: now,
    updatedAt: now,
    deletedAt: null,
  };
}
