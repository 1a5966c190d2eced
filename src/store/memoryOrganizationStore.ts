/**
 * In-memory organization store.
 *
 * Used by the test suites and for running the service without PostgreSQL.
 * Returns deep copies so callers can never mutate stored state through a
 * returned record.
 */

import type { OrganizationRecord } from '../db/schema.js';
import { ConflictError } from '../lifecycle/errors.js';
import type { FpoStatus } from '../lifecycle/states.js';
import {
  normalizeListOptions,
  toPage,
  type ListOptions,
  type OrganizationPatch,
  type OrganizationStore,
  type Page,
} from './organizationStore.js';

function copy<T>(value: T): T {
  return structuredClone(value);
}

export class MemoryOrganizationStore implements OrganizationStore {
  private readonly records = new Map<string, OrganizationRecord>();

  async insert(record: OrganizationRecord): Promise<OrganizationRecord> {
    if (this.records.has(record.id)) {
      throw new ConflictError(`Organization ${record.id} already exists`, { id: record.id });
    }
    // Uniqueness spans erased rows too, as the table's unique indexes do
    if (record.externalOrgRef && this.anyRecord((r) => r.externalOrgRef === record.externalOrgRef)) {
      throw new ConflictError(`External organization ${record.externalOrgRef} is already linked`, {
        externalOrgRef: record.externalOrgRef,
      });
    }
    if (record.registrationNumber && this.anyRecord((r) => r.registrationNumber === record.registrationNumber)) {
      throw new ConflictError(`Registration number ${record.registrationNumber} is already registered`, {
        registrationNumber: record.registrationNumber,
      });
    }
    this.records.set(record.id, copy(record));
    return copy(record);
  }

  async findById(id: string, options?: { includeDeleted?: boolean }): Promise<OrganizationRecord | null> {
    const record = this.records.get(id);
    if (!record) return null;
    if (record.deletedAt && !options?.includeDeleted) return null;
    return copy(record);
  }

  async findByExternalRef(externalOrgRef: string): Promise<OrganizationRecord | null> {
    const record = this.findLive((r) => r.externalOrgRef === externalOrgRef);
    return record ? copy(record) : null;
  }

  async findByRegistrationNumber(registrationNumber: string): Promise<OrganizationRecord | null> {
    const record = this.findLive((r) => r.registrationNumber === registrationNumber);
    return record ? copy(record) : null;
  }

  async listByStatus(status: FpoStatus, options?: ListOptions): Promise<Page<OrganizationRecord>> {
    const { limit, offset } = normalizeListOptions(options);
    const matching = [...this.records.values()]
      .filter((r) => r.status === status && !r.deletedAt)
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime());
    return toPage(matching.slice(offset, offset + limit).map(copy), matching.length, limit, offset);
  }

  async update(
    id: string,
    expectedVersion: number,
    patch: OrganizationPatch,
    now: Date,
  ): Promise<OrganizationRecord | null> {
    const current = this.records.get(id);
    if (!current || current.deletedAt || current.version !== expectedVersion) {
      return null;
    }
    const next: OrganizationRecord = {
      ...current,
      ...copy(patch),
      version: current.version + 1,
      updatedAt: now,
    };
    this.records.set(id, next);
    return copy(next);
  }

  async softDelete(id: string, expectedVersion: number, now: Date): Promise<OrganizationRecord | null> {
    return this.update(id, expectedVersion, { deletedAt: now }, now);
  }

  private anyRecord(predicate: (record: OrganizationRecord) => boolean): boolean {
    return [...this.records.values()].some(predicate);
  }

  private findLive(predicate: (record: OrganizationRecord) => boolean): OrganizationRecord | undefined {
    for (const record of this.records.values()) {
      if (!record.deletedAt && predicate(record)) return record;
    }
    return undefined;
  }
}
