/**
 * Lifecycle controller.
 *
 * The only writer of an organization's lifecycle fields. Each transition
 * loads the record, checks the actor's permission with the access-control
 * service, validates the action against the transition table, runs
 * provisioning when the target is PENDING_SETUP, commits the new status
 * conditioned on the version read at load time, and appends an audit entry.
 *
 * Every outcome is returned as a TransitionResult carrying the
 * organization's true current status; only unexpected store failures throw.
 */

import { callExternal, classifyExternalFailure, type ExternalCallPolicy } from '../accessControl/callExternal.js';
import type { AccessControlService } from '../accessControl/types.js';
import type { AuditLedger, NewAuditEntry } from '../audit/auditLedger.js';
import type { AuditLogEntry, OrganizationRecord } from '../db/schema.js';
import { logger as rootLogger, type Logger } from '../logger.js';
import type { ProvisioningOrchestrator, ProvisioningOutcome } from '../provisioning/provisioningOrchestrator.js';
import type { ListOptions, OrganizationPatch, OrganizationStore, Page } from '../store/organizationStore.js';
import {
  AuditWriteError,
  CancelledError,
  ConcurrentModificationError,
  ForbiddenError,
  LifecycleError,
  NotFoundError,
  RetryExhaustedError,
  TimeoutError,
  errorMessage,
} from './errors.js';
import type { FpoStatus, RequestableAction } from './states.js';
import { validateTransition } from './transitionValidator.js';
import type { SetupErrors } from './types.js';

/** Resource name used for permission checks. */
export const FPO_RESOURCE = 'fpo';

/** Permission checked instead of `retry-setup` when the attempt limit is overridden. */
export const RETRY_OVERRIDE_PERMISSION = 'retry-setup-override';

export interface TransitionRequest {
  orgId: string;
  action: RequestableAction;
  actorId: string;
  reason: string;
  requestId: string;
  signal?: AbortSignal;
  /** Only meaningful for `retry-setup`: skip the attempt limit. */
  overrideRetryLimit?: boolean;
}

export type TransitionResult =
  | { ok: true; status: FpoStatus; record: OrganizationRecord; provisioning?: ProvisioningOutcome }
  | { ok: false; status: FpoStatus | null; error: LifecycleError };

export interface TransitionOptions {
  signal?: AbortSignal;
}

export interface RetrySetupOptions extends TransitionOptions {
  overrideRetryLimit?: boolean;
}

export interface LifecycleControllerOptions {
  store: OrganizationStore;
  ledger: AuditLedger;
  accessControl: AccessControlService;
  orchestrator: ProvisioningOrchestrator;
  policy: ExternalCallPolicy;
  transitionTimeoutMs: number;
  logger?: Logger;
  now?: () => Date;
}

interface Deadline {
  signal: AbortSignal;
  dispose(): void;
}

export class LifecycleController {
  private readonly store: OrganizationStore;
  private readonly ledger: AuditLedger;
  private readonly accessControl: AccessControlService;
  private readonly orchestrator: ProvisioningOrchestrator;
  private readonly policy: ExternalCallPolicy;
  private readonly transitionTimeoutMs: number;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: LifecycleControllerOptions) {
    this.store = options.store;
    this.ledger = options.ledger;
    this.accessControl = options.accessControl;
    this.orchestrator = options.orchestrator;
    this.policy = options.policy;
    this.transitionTimeoutMs = options.transitionTimeoutMs;
    this.logger = options.logger ?? rootLogger;
    this.now = options.now ?? (() => new Date());
  }

  // ─── Operations ────────────────────────────────────────────────

  submit(orgId: string, actorId: string, reason: string, requestId: string, options?: TransitionOptions) {
    return this.transition({ orgId, action: 'submit', actorId, reason, requestId, ...options });
  }

  approve(orgId: string, actorId: string, reason: string, requestId: string, options?: TransitionOptions) {
    return this.transition({ orgId, action: 'approve', actorId, reason, requestId, ...options });
  }

  reject(orgId: string, actorId: string, reason: string, requestId: string, options?: TransitionOptions) {
    return this.transition({ orgId, action: 'reject', actorId, reason, requestId, ...options });
  }

  resubmit(orgId: string, actorId: string, reason: string, requestId: string, options?: TransitionOptions) {
    return this.transition({ orgId, action: 'resubmit', actorId, reason, requestId, ...options });
  }

  beginSetup(orgId: string, actorId: string, reason: string, requestId: string, options?: TransitionOptions) {
    return this.transition({ orgId, action: 'begin-setup', actorId, reason, requestId, ...options });
  }

  retrySetup(orgId: string, actorId: string, reason: string, requestId: string, options?: RetrySetupOptions) {
    return this.transition({ orgId, action: 'retry-setup', actorId, reason, requestId, ...options });
  }

  suspend(orgId: string, actorId: string, reason: string, requestId: string, options?: TransitionOptions) {
    return this.transition({ orgId, action: 'suspend', actorId, reason, requestId, ...options });
  }

  deactivate(orgId: string, actorId: string, reason: string, requestId: string, options?: TransitionOptions) {
    return this.transition({ orgId, action: 'deactivate', actorId, reason, requestId, ...options });
  }

  reinstate(orgId: string, actorId: string, reason: string, requestId: string, options?: TransitionOptions) {
    return this.transition({ orgId, action: 'reinstate', actorId, reason, requestId, ...options });
  }

  reactivate(orgId: string, actorId: string, reason: string, requestId: string, options?: TransitionOptions) {
    return this.transition({ orgId, action: 'reactivate', actorId, reason, requestId, ...options });
  }

  archive(orgId: string, actorId: string, reason: string, requestId: string, options?: TransitionOptions) {
    return this.transition({ orgId, action: 'archive', actorId, reason, requestId, ...options });
  }

  /**
   * Audit entries for an organization, oldest first. Erased organizations
   * keep their history.
   */
  async getHistory(orgId: string, options?: ListOptions): Promise<Page<AuditLogEntry>> {
    const record = await this.store.findById(orgId, { includeDeleted: true });
    if (!record) throw new NotFoundError('Organization', orgId);
    return this.ledger.history(orgId, options);
  }

  // ─── Transition ────────────────────────────────────────────────

  async transition(request: TransitionRequest): Promise<TransitionResult> {
    const log = this.logger.child({
      requestId: request.requestId,
      orgId: request.orgId,
      action: request.action,
      actorId: request.actorId,
    });
    const deadline = this.startDeadline(request.signal);
    try {
      return await this.run(request, deadline.signal, log);
    } finally {
      deadline.dispose();
    }
  }

  private async run(request: TransitionRequest, signal: AbortSignal, log: Logger): Promise<TransitionResult> {
    const { orgId, action } = request;

    // 1. Load
    const record = await this.store.findById(orgId, { includeDeleted: true });
    // Not audited: ledger rows reference an existing organization
    if (!record) {
      log.warn('transition rejected: organization not found');
      return { ok: false, status: null, error: new NotFoundError('Organization', orgId) };
    }
    if (record.deletedAt) {
      return this.fail(record, request, new NotFoundError('Organization', orgId), log, null);
    }

    // 2. Permission
    const permission =
      action === 'retry-setup' && request.overrideRetryLimit ? RETRY_OVERRIDE_PERMISSION : action;
    let allowed: boolean;
    try {
      allowed = await callExternal(
        'checkPermission',
        (s) =>
          this.accessControl.checkPermission(
            { actorId: request.actorId, resource: FPO_RESOURCE, action: permission, orgId },
            { signal: s },
          ),
        { policy: this.policy, signal, logger: log },
      );
    } catch (error) {
      return this.fail(record, request, classifyExternalFailure('checkPermission', error), log);
    }
    if (!allowed) {
      return this.fail(record, request, new ForbiddenError(request.actorId, permission, orgId), log);
    }

    // 3. Validate
    const validation = validateTransition(record.status, action);
    if (!validation.ok) {
      return this.fail(record, request, validation.error, log);
    }

    // 4. Retry gate
    if (action === 'retry-setup' && !request.overrideRetryLimit) {
      try {
        this.orchestrator.assertCanRetry(record);
      } catch (error) {
        if (error instanceof RetryExhaustedError) return this.fail(record, request, error, log);
        throw error;
      }
    }

    // 5. Provisioning, collapsed into its outcome
    let working = record;
    let target = validation.to;
    let provisioning: ProvisioningOutcome | undefined;
    if (target === 'PENDING_SETUP') {
      try {
        const run = await this.orchestrator.runSetup(record, { signal, logger: log });
        working = run.record;
        provisioning = run.outcome;
      } catch (error) {
        if (error instanceof ConcurrentModificationError) {
          return this.concurrentModification(orgId, error, log);
        }
        if (signal.aborted && error instanceof LifecycleError) {
          // Progress saved before the abort stays; the status does not move
          const latest = (await this.store.findById(orgId)) ?? record;
          return this.fail(latest, request, error, log);
        }
        throw error;
      }

      const resolution = validateTransition(
        'PENDING_SETUP',
        provisioning.status === 'succeeded' ? 'setup-succeeded' : 'setup-failed',
      );
      if (!resolution.ok) return this.fail(working, request, resolution.error, log);
      target = resolution.to;
    }

    if (signal.aborted) {
      const reason: unknown = signal.reason;
      const error = reason instanceof LifecycleError ? reason : new CancelledError('transition');
      return this.fail(working, request, error, log);
    }

    // 6. Commit; from here on the signal is ignored
    const now = this.now();
    const patch: OrganizationPatch = {
      ...bookkeeping(request, working, provisioning, now),
      previousStatus: record.status,
      status: target,
      statusReason: request.reason,
      statusChangedAt: now,
      statusChangedBy: request.actorId,
    };
    const committed = await this.store.update(orgId, working.version, patch, now);
    if (!committed) {
      return this.concurrentModification(orgId, new ConcurrentModificationError(orgId, working.version), log);
    }

    // 7. Audit
    const entry: NewAuditEntry = {
      fpoId: orgId,
      action,
      outcome: 'succeeded',
      previousState: record.status,
      newState: committed.status,
      reason: request.reason,
      performedBy: request.actorId,
      performedAt: now,
      details: auditDetails(request, provisioning),
      requestId: request.requestId,
    };
    try {
      await this.ledger.append(entry);
    } catch (error) {
      log.fatal({ entry, err: errorMessage(error) }, 'audit write failed after commit; record and ledger have drifted');
      return { ok: false, status: committed.status, error: new AuditWriteError(orgId, action, errorMessage(error)) };
    }

    log.info({ from: record.status, to: committed.status, provisioning }, 'transition committed');
    return { ok: true, status: committed.status, record: committed, provisioning };
  }

  // ─── Helpers ───────────────────────────────────────────────────

  /**
   * Record a failed attempt and return it. Cancellation leaves no audit entry.
   * The reported status defaults to the record's own.
   */
  private async fail(
    record: OrganizationRecord,
    request: TransitionRequest,
    error: LifecycleError,
    log: Logger,
    reportedStatus: FpoStatus | null = record.status,
  ): Promise<TransitionResult> {
    log.warn({ code: error.code, status: record.status }, `transition rejected: ${error.message}`);

    if (!(error instanceof CancelledError)) {
      const entry: NewAuditEntry = {
        fpoId: record.id,
        action: request.action,
        outcome: 'failed',
        previousState: record.status,
        newState: record.status,
        reason: request.reason,
        performedBy: request.actorId,
        performedAt: this.now(),
        details: { ...(auditDetails(request, undefined) ?? {}), error: error.toJSON() },
        requestId: request.requestId,
      };
      try {
        await this.ledger.append(entry);
      } catch (appendError) {
        log.fatal({ entry, err: errorMessage(appendError) }, 'audit write for a failed attempt failed');
      }
    }

    return { ok: false, status: reportedStatus, error };
  }

  private async concurrentModification(
    orgId: string,
    error: ConcurrentModificationError,
    log: Logger,
  ): Promise<TransitionResult> {
    const latest = await this.store.findById(orgId);
    log.warn({ code: error.code }, 'transition lost a concurrent modification race');
    return { ok: false, status: latest?.status ?? null, error };
  }

  /**
   * One signal for the whole transition: aborted with CancelledError when the
   * caller's signal fires, or with TimeoutError when the deadline passes.
   */
  private startDeadline(callerSignal?: AbortSignal): Deadline {
    const controller = new AbortController();
    const timeoutMs = this.transitionTimeoutMs;
    const onCallerAbort = () => controller.abort(new CancelledError('transition'));

    if (callerSignal?.aborted) {
      onCallerAbort();
    } else {
      callerSignal?.addEventListener('abort', onCallerAbort, { once: true });
    }
    const timer = setTimeout(() => controller.abort(new TimeoutError('transition', timeoutMs)), timeoutMs);

    return {
      signal: controller.signal,
      dispose() {
        clearTimeout(timer);
        callerSignal?.removeEventListener('abort', onCallerAbort);
      },
    };
  }
}

function bookkeeping(
  request: TransitionRequest,
  record: OrganizationRecord,
  provisioning: ProvisioningOutcome | undefined,
  now: Date,
): OrganizationPatch {
  const patch: OrganizationPatch = {};

  switch (request.action) {
    case 'submit':
      patch.verificationStatus = 'PENDING';
      break;
    case 'approve':
      patch.verificationStatus = 'VERIFIED';
      patch.verifiedAt = now;
      patch.verifiedBy = request.actorId;
      patch.verificationNotes = request.reason;
      break;
    case 'reject':
      patch.verificationStatus = 'REJECTED';
      patch.verifiedAt = null;
      patch.verifiedBy = request.actorId;
      patch.verificationNotes = request.reason;
      break;
    case 'resubmit':
      patch.verificationStatus = null;
      break;
    default:
      break;
  }

  if (provisioning?.status === 'succeeded') {
    patch.setupErrors = null;
    patch.lastSetupAt = now;
  } else if (provisioning?.status === 'failed') {
    const setupErrors: SetupErrors = {};
    setupErrors[provisioning.step] = provisioning.cause;
    patch.setupAttempts = record.setupAttempts + 1;
    patch.setupErrors = setupErrors;
    patch.lastSetupAt = now;
  }

  return patch;
}

function auditDetails(
  request: TransitionRequest,
  provisioning: ProvisioningOutcome | undefined,
): Record<string, unknown> | null {
  const details: Record<string, unknown> = {};
  if (request.overrideRetryLimit) details.overrideRetryLimit = true;
  if (provisioning) details.provisioning = provisioning;
  return Object.keys(details).length > 0 ? details : null;
}
