import { v4 as uuidv4 } from 'uuid';
import { callExternal, classifyExternalFailure, type ExternalCallPolicy } from '../accessControl/callExternal.js';
import type { AccessControlService, ExternalOrganization } from '../accessControl/types.js';
import type { AuditLedger, NewAuditEntry } from '../audit/auditLedger.js';
import type { OrganizationRecord } from '../db/schema.js';
import {
  AuditWriteError,
  ConcurrentModificationError,
  ConflictError,
  NotFoundError,
  errorMessage,
} from '../lifecycle/errors.js';
import type { FpoStatus } from '../lifecycle/states.js';
import type { CeoProfile, SetupProgress } from '../lifecycle/types.js';
import { logger as rootLogger, type Logger } from '../logger.js';
import {
  newOrganizationRecord,
  type ListOptions,
  type OrganizationStore,
  type Page,
} from '../store/organizationStore.js';

export interface RegisterInput {
  name: string;
  registrationNumber?: string | null;
  description?: string | null;
  metadata?: Record<string, unknown>;
  ceoProfile: CeoProfile;
  parentFpoId?: string | null;
}

export interface SyncResult {
  record: OrganizationRecord;
  /** False when a local record already referenced the external organization. */
  created: boolean;
}

export interface OrganizationRegistryOptions {
  store: OrganizationStore;
  ledger: AuditLedger;
  accessControl: AccessControlService;
  policy: ExternalCallPolicy;
  logger?: Logger;
  now?: () => Date;
}

/**
 * Creation, lookup and erasure of organization records. Lifecycle changes
 * after registration go through the LifecycleController.
 */
export class OrganizationRegistry {
  private readonly store: OrganizationStore;
  private readonly ledger: AuditLedger;
  private readonly accessControl: AccessControlService;
  private readonly policy: ExternalCallPolicy;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: OrganizationRegistryOptions) {
    this.store = options.store;
    this.ledger = options.ledger;
    this.accessControl = options.accessControl;
    this.policy = options.policy;
    this.logger = options.logger ?? rootLogger;
    this.now = options.now ?? (() => new Date());
  }

  async register(input: RegisterInput, actorId: string, requestId: string): Promise<OrganizationRecord> {
    if (input.registrationNumber) {
      await this.assertRegistrationNumberFree(input.registrationNumber);
    }
    if (input.parentFpoId) {
      const parent = await this.store.findById(input.parentFpoId);
      if (!parent) throw new NotFoundError('Parent organization', input.parentFpoId);
    }

    const now = this.now();
    const record = await this.store.insert(
      newOrganizationRecord(
        {
          id: uuidv4(),
          name: input.name,
          registrationNumber: input.registrationNumber,
          description: input.description,
          metadata: input.metadata,
          ceoProfile: input.ceoProfile,
          parentFpoId: input.parentFpoId,
        },
        now,
      ),
    );

    await this.audit(record, 'register', null, '', actorId, requestId, now, null);
    this.logger.info({ requestId, orgId: record.id, actorId }, 'organization registered');
    return record;
  }

  async get(orgId: string): Promise<OrganizationRecord> {
    const record = await this.store.findById(orgId);
    if (!record) throw new NotFoundError('Organization', orgId);
    return record;
  }

  listByStatus(status: FpoStatus, options?: ListOptions): Promise<Page<OrganizationRecord>> {
    return this.store.listByStatus(status, options);
  }

  /**
   * Link an organization that already exists in the access-control service.
   * Returns the existing local record when one is already linked.
   */
  async syncFromAccessControl(
    externalOrgRef: string,
    actorId: string,
    requestId: string,
    options: { signal?: AbortSignal } = {},
  ): Promise<SyncResult> {
    const existing = await this.store.findByExternalRef(externalOrgRef);
    if (existing) {
      return { record: existing, created: false };
    }

    const log = this.logger.child({ requestId, actorId, externalOrgRef });
    let external: ExternalOrganization | null;
    try {
      external = await callExternal(
        'getOrganization',
        (s) => this.accessControl.getOrganization(externalOrgRef, { signal: s }),
        { policy: this.policy, signal: options.signal, logger: log },
      );
    } catch (error) {
      throw classifyExternalFailure('getOrganization', error);
    }
    if (!external) throw new NotFoundError('External organization', externalOrgRef);

    if (external.registrationNumber) {
      await this.assertRegistrationNumberFree(external.registrationNumber);
    }

    const setupProgress: SetupProgress = { org_created: true, roles_assigned: true };
    if (external.ceoUserId) setupProgress.ceo_created = true;

    const now = this.now();
    const draft = newOrganizationRecord(
      {
        id: uuidv4(),
        name: external.name,
        registrationNumber: external.registrationNumber,
        description: external.description,
        metadata: external.metadata,
      },
      now,
    );
    const record = await this.store.insert({
      ...draft,
      externalOrgRef,
      status: 'ACTIVE',
      statusReason: 'synced from access control',
      statusChangedAt: now,
      statusChangedBy: actorId,
      setupProgress,
      ceoUserId: external.ceoUserId ?? null,
    });

    await this.audit(record, 'sync', null, 'synced from access control', actorId, requestId, now, {
      externalOrgRef,
    });
    log.info({ orgId: record.id }, 'organization synced from access control');
    return { record, created: true };
  }

  /**
   * Compliance erasure: soft-deletes the record. Its audit history stays readable.
   */
  async erase(orgId: string, actorId: string, reason: string, requestId: string): Promise<OrganizationRecord> {
    const record = await this.get(orgId);
    const now = this.now();
    const erased = await this.store.softDelete(orgId, record.version, now);
    if (!erased) throw new ConcurrentModificationError(orgId, record.version);

    await this.audit(erased, 'erase', erased.status, reason, actorId, requestId, now, { deletedAt: now.toISOString() });
    this.logger.info({ requestId, orgId, actorId }, 'organization erased');
    return erased;
  }

  private async assertRegistrationNumberFree(registrationNumber: string): Promise<void> {
    const holder = await this.store.findByRegistrationNumber(registrationNumber);
    if (holder) {
      throw new ConflictError(`Registration number ${registrationNumber} is already registered`, {
        registrationNumber,
        orgId: holder.id,
      });
    }
  }

  private async audit(
    record: OrganizationRecord,
    action: string,
    previousState: FpoStatus | null,
    reason: string,
    actorId: string,
    requestId: string,
    performedAt: Date,
    details: Record<string, unknown> | null,
  ): Promise<void> {
    const entry: NewAuditEntry = {
      fpoId: record.id,
      action,
      outcome: 'succeeded',
      previousState,
      newState: record.status,
      reason,
      performedBy: actorId,
      performedAt,
      details,
      requestId,
    };
    try {
      await this.ledger.append(entry);
    } catch (error) {
      this.logger.fatal({ entry, err: errorMessage(error) }, 'audit write failed after commit; record and ledger have drifted');
      throw new AuditWriteError(record.id, action, errorMessage(error));
    }
  }
}
