import { and, asc, count, eq, isNull, sql } from 'drizzle-orm';
import type { Database } from '../db/connection.js';
import { fpoOrganizations, type OrganizationRecord } from '../db/schema.js';
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

interface PostgresError extends Error {
  code: string;
  constraint?: string;
  detail?: string;
}

// 23505: unique_violation
function isUniqueViolation(error: unknown): error is PostgresError {
  return error instanceof Error && 'code' in error && error.code === '23505';
}

/**
 * PostgreSQL-backed organization store.
 */
export class DrizzleOrganizationStore implements OrganizationStore {
  constructor(private readonly db: Database) {}

  async insert(record: OrganizationRecord): Promise<OrganizationRecord> {
    try {
      const [inserted] = await this.db.insert(fpoOrganizations).values(record).returning();
      return inserted;
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictError(`Organization conflicts with an existing record: ${error.detail ?? error.message}`, {
          constraint: error.constraint,
        });
      }
      throw error;
    }
  }

  async findById(id: string, options?: { includeDeleted?: boolean }): Promise<OrganizationRecord | null> {
    const condition = options?.includeDeleted
      ? eq(fpoOrganizations.id, id)
      : and(eq(fpoOrganizations.id, id), isNull(fpoOrganizations.deletedAt));

    const [record] = await this.db.select().from(fpoOrganizations).where(condition).limit(1);
    return record ?? null;
  }

  async findByExternalRef(externalOrgRef: string): Promise<OrganizationRecord | null> {
    const [record] = await this.db
      .select()
      .from(fpoOrganizations)
      .where(and(eq(fpoOrganizations.externalOrgRef, externalOrgRef), isNull(fpoOrganizations.deletedAt)))
      .limit(1);
    return record ?? null;
  }

  async findByRegistrationNumber(registrationNumber: string): Promise<OrganizationRecord | null> {
    const [record] = await this.db
      .select()
      .from(fpoOrganizations)
      .where(
        and(eq(fpoOrganizations.registrationNumber, registrationNumber), isNull(fpoOrganizations.deletedAt)),
      )
      .limit(1);
    return record ?? null;
  }

  async listByStatus(status: FpoStatus, options?: ListOptions): Promise<Page<OrganizationRecord>> {
    const { limit, offset } = normalizeListOptions(options);
    const condition = and(eq(fpoOrganizations.status, status), isNull(fpoOrganizations.deletedAt));

    const [items, [{ total }]] = await Promise.all([
      this.db
        .select()
        .from(fpoOrganizations)
        .where(condition)
        .orderBy(asc(fpoOrganizations.createdAt), asc(fpoOrganizations.id))
        .limit(limit)
        .offset(offset),
      this.db.select({ total: count() }).from(fpoOrganizations).where(condition),
    ]);

    return toPage(items, total, limit, offset);
  }

  async update(
    id: string,
    expectedVersion: number,
    patch: OrganizationPatch,
    now: Date,
  ): Promise<OrganizationRecord | null> {
    const [updated] = await this.db
      .update(fpoOrganizations)
      .set({
        ...patch,
        version: sql`${fpoOrganizations.version} + 1`,
        updatedAt: now,
      })
      .where(
        and(
          eq(fpoOrganizations.id, id),
          eq(fpoOrganizations.version, expectedVersion),
          isNull(fpoOrganizations.deletedAt),
        ),
      )
      .returning();
    return updated ?? null;
  }

  async softDelete(id: string, expectedVersion: number, now: Date): Promise<OrganizationRecord | null> {
    return this.update(id, expectedVersion, { deletedAt: now }, now);
  }
}
