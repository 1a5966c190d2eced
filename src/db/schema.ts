import {
  pgTable,
  uuid,
  text,
  timestamp,
  integer,
  bigserial,
  jsonb,
  index,
  uniqueIndex,
  type AnyPgColumn,
} from 'drizzle-orm/pg-core';
import { relations } from 'drizzle-orm';
import { FPO_STATUSES } from '../lifecycle/states.js';
import type {
  AuditOutcome,
  CeoProfile,
  SetupErrors,
  SetupProgress,
  VerificationStatus,
} from '../lifecycle/types.js';

const VERIFICATION_STATUSES: [VerificationStatus, ...VerificationStatus[]] = ['PENDING', 'VERIFIED', 'REJECTED'];
const AUDIT_OUTCOMES: [AuditOutcome, ...AuditOutcome[]] = ['succeeded', 'failed'];

// ─── FPO Organizations ───────────────────────────────────────────

export const fpoOrganizations = pgTable(
  'fpo_organizations',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    // Reference in the access-control service; null until provisioned
    externalOrgRef: text('external_org_ref').unique(),
    name: text('name').notNull(),
    registrationNumber: text('registration_number'),
    description: text('description'),
    metadata: jsonb('metadata').$type<Record<string, unknown>>().notNull().default({}),
    // Null for organizations synced from the access-control service
    ceoProfile: jsonb('ceo_profile').$type<CeoProfile>(),
    parentFpoId: uuid('parent_fpo_id').references((): AnyPgColumn => fpoOrganizations.id),

    // Lifecycle
    status: text('status', { enum: FPO_STATUSES }).notNull().default('DRAFT'),
    previousStatus: text('previous_status', { enum: FPO_STATUSES }),
    statusReason: text('status_reason'),
    statusChangedAt: timestamp('status_changed_at', { withTimezone: true }),
    statusChangedBy: text('status_changed_by'),

    // Verification
    verificationStatus: text('verification_status', { enum: VERIFICATION_STATUSES }),
    verifiedAt: timestamp('verified_at', { withTimezone: true }),
    verifiedBy: text('verified_by'),
    verificationNotes: text('verification_notes'),

    // Provisioning
    setupAttempts: integer('setup_attempts').notNull().default(0),
    lastSetupAt: timestamp('last_setup_at', { withTimezone: true }),
    setupProgress: jsonb('setup_progress').$type<SetupProgress>().notNull().default({}),
    setupErrors: jsonb('setup_errors').$type<SetupErrors>(),
    ceoUserId: text('ceo_user_id'),

    // Optimistic concurrency token, bumped on every write
    version: integer('version').notNull().default(1),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
    // Compliance erasure only; ARCHIVED is the normal end of life
    deletedAt: timestamp('deleted_at', { withTimezone: true }),
  },
  (table) => [
    index('idx_fpo_organizations_status').on(table.status),
    uniqueIndex('idx_fpo_organizations_registration').on(table.registrationNumber),
    index('idx_fpo_organizations_ceo').on(table.ceoUserId),
    index('idx_fpo_organizations_parent').on(table.parentFpoId),
  ],
);

// ─── FPO Audit Logs ──────────────────────────────────────────────

export const fpoAuditLogs = pgTable(
  'fpo_audit_logs',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    sequence: bigserial('sequence', { mode: 'number' }).notNull(),
    fpoId: uuid('fpo_id')
      .notNull()
      .references(() => fpoOrganizations.id),
    action: text('action').notNull(),
    outcome: text('outcome', { enum: AUDIT_OUTCOMES }).notNull(),
    previousState: text('previous_state', { enum: FPO_STATUSES }),
    newState: text('new_state', { enum: FPO_STATUSES }).notNull(),
    reason: text('reason').notNull().default(''),
    performedBy: text('performed_by').notNull(),
    performedAt: timestamp('performed_at', { withTimezone: true }).notNull(),
    details: jsonb('details').$type<Record<string, unknown>>(),
    requestId: text('request_id'),
    // Hash chain per organization (SHA-256 over this entry and the previous hash)
    entryHash: text('entry_hash').notNull(),
    previousHash: text('previous_hash'),
  },
  (table) => [
    index('idx_fpo_audit_logs_fpo').on(table.fpoId, table.sequence),
    index('idx_fpo_audit_logs_performed_at').on(table.performedAt),
    index('idx_fpo_audit_logs_action').on(table.action),
  ],
);

// ─── Relations ───────────────────────────────────────────────────

export const fpoOrganizationsRelations = relations(fpoOrganizations, ({ one, many }) => ({
  parent: one(fpoOrganizations, {
    fields: [fpoOrganizations.parentFpoId],
    references: [fpoOrganizations.id],
    relationName: 'fpo_hierarchy',
  }),
  children: many(fpoOrganizations, { relationName: 'fpo_hierarchy' }),
  auditLogs: many(fpoAuditLogs),
}));

export const fpoAuditLogsRelations = relations(fpoAuditLogs, ({ one }) => ({
  organization: one(fpoOrganizations, {
    fields: [fpoAuditLogs.fpoId],
    references: [fpoOrganizations.id],
  }),
}));

// ─── Types ───────────────────────────────────────────────────────

export type OrganizationRecord = typeof fpoOrganizations.$inferSelect;
export type AuditLogEntry = typeof fpoAuditLogs.$inferSelect;
