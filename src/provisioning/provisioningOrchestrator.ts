/**
 * Provisioning orchestrator.
 *
 * Creates an organization's resources in the access-control service as an
 * ordered, resumable sequence of steps. After each step succeeds its flag in
 * `setupProgress` is persisted, together with the reference the step
 * produced, before the next step starts. A step whose flag is already set is
 * skipped, so a retry re-enters at the first step that never completed.
 * Creation calls carry the organization id as their idempotency key, so a
 * transport retry or a racing run gets back the resource already created.
 *
 * The orchestrator never changes `status` and never retries the sequence on
 * its own; resolving the outcome is the lifecycle controller's job.
 */

import { callExternal, isTransientError, type ExternalCallPolicy } from '../accessControl/callExternal.js';
import { CEO_ROLE } from '../accessControl/roleCatalog.js';
import type { AccessControlService } from '../accessControl/types.js';
import type { OrganizationRecord } from '../db/schema.js';
import { ConcurrentModificationError, RetryExhaustedError, errorMessage } from '../lifecycle/errors.js';
import { SETUP_STEPS, completedSteps, type SetupProgress, type SetupStep } from '../lifecycle/types.js';
import { logger as rootLogger, type Logger } from '../logger.js';
import type { OrganizationPatch, OrganizationStore } from '../store/organizationStore.js';

export type ProvisioningOutcome =
  | { status: 'succeeded'; completedSteps: SetupStep[] }
  | { status: 'failed'; step: SetupStep; cause: string; transient: boolean };

export interface SetupRun {
  outcome: ProvisioningOutcome;
  /** The record as last persisted, including progress saved during this run. */
  record: OrganizationRecord;
}

export interface RunSetupOptions {
  signal?: AbortSignal;
  logger?: Logger;
}

export interface ProvisioningOrchestratorOptions {
  store: OrganizationStore;
  accessControl: AccessControlService;
  policy: ExternalCallPolicy;
  maxSetupAttempts: number;
  now?: () => Date;
}

/** The record as a step sees it; steps with checkpoints replace it as they save. */
interface StepState {
  record: OrganizationRecord;
}

/** A step could not run because an earlier step's result is missing from the record. */
class MissingPrerequisiteError extends Error {
  constructor(step: SetupStep, missing: string) {
    super(`cannot run ${step}: ${missing} is not set`);
    this.name = 'MissingPrerequisiteError';
  }
}

export class ProvisioningOrchestrator {
  readonly maxSetupAttempts: number;
  private readonly store: OrganizationStore;
  private readonly accessControl: AccessControlService;
  private readonly policy: ExternalCallPolicy;
  private readonly now: () => Date;

  constructor(options: ProvisioningOrchestratorOptions) {
    this.store = options.store;
    this.accessControl = options.accessControl;
    this.policy = options.policy;
    this.maxSetupAttempts = options.maxSetupAttempts;
    this.now = options.now ?? (() => new Date());
  }

  private canRetry(record: OrganizationRecord): boolean {
    return record.setupAttempts < this.maxSetupAttempts;
  }

  /**
   * Throws RetryExhaustedError once the record has used up its setup attempts.
   * Callers with the retry override skip this gate.
   */
  assertCanRetry(record: OrganizationRecord): void {
    if (!this.canRetry(record)) {
      throw new RetryExhaustedError(record.id, record.setupAttempts, this.maxSetupAttempts);
    }
  }

  /**
   * Run every step not yet recorded as complete.
   *
   * A failed external step is returned as a `failed` outcome. Aborts rethrow
   * the signal's reason and a lost version race throws
   * ConcurrentModificationError; in both cases the progress saved so far stays.
   */
  async runSetup(record: OrganizationRecord, options: RunSetupOptions = {}): Promise<SetupRun> {
    const { signal } = options;
    const log = (options.logger ?? rootLogger).child({ orgId: record.id });
    let current = record;

    for (const step of SETUP_STEPS) {
      if (current.setupProgress[step] === true) {
        log.debug({ step }, 'setup step already complete, skipping');
        continue;
      }
      if (signal?.aborted) throw signal.reason;

      const state: StepState = { record: current };
      let produced: OrganizationPatch;
      try {
        produced = await this.perform(step, state, signal, log);
      } catch (error) {
        if (error instanceof ConcurrentModificationError) throw error;
        if (signal?.aborted) throw signal.reason;
        const outcome: ProvisioningOutcome = {
          status: 'failed',
          step,
          cause: errorMessage(error),
          transient: isTransientError(error),
        };
        log.warn({ step, cause: outcome.cause, transient: outcome.transient }, 'setup step failed');
        return { outcome, record: state.record };
      }

      current = await this.save(state.record, produced, step);
      log.info({ step }, 'setup step complete');
    }

    return {
      outcome: { status: 'succeeded', completedSteps: completedSteps(current.setupProgress) },
      record: current,
    };
  }

  /** Persist a step's (or checkpoint's) flag with its patch under the record's version. */
  private async save(
    record: OrganizationRecord,
    patch: OrganizationPatch,
    flag: keyof SetupProgress,
  ): Promise<OrganizationRecord> {
    const setupProgress: SetupProgress = { ...record.setupProgress };
    setupProgress[flag] = true;
    const saved = await this.store.update(record.id, record.version, { ...patch, setupProgress }, this.now());
    if (!saved) {
      throw new ConcurrentModificationError(record.id, record.version);
    }
    return saved;
  }

  private async perform(
    step: SetupStep,
    state: StepState,
    signal: AbortSignal | undefined,
    log: Logger,
  ): Promise<OrganizationPatch> {
    const { record } = state;
    const call = <T>(operation: string, fn: (signal: AbortSignal) => Promise<T>): Promise<T> =>
      callExternal(operation, fn, { policy: this.policy, signal, logger: log });

    switch (step) {
      case 'org_created': {
        const externalOrgRef = await call('createOrganization', (s) =>
          this.accessControl.createOrganization(
            {
              localId: record.id,
              name: record.name,
              description: record.description,
              registrationNumber: record.registrationNumber,
              metadata: record.metadata,
            },
            { signal: s },
          ),
        );
        return { externalOrgRef };
      }

      case 'ceo_created': {
        const profile = record.ceoProfile;
        if (!profile) throw new MissingPrerequisiteError(step, 'ceoProfile');
        const ceoUserId = await call('createUser', (s) =>
          this.accessControl.createUser({ localId: record.id, profile }, { signal: s }),
        );
        return { ceoUserId };
      }

      case 'roles_assigned': {
        const { externalOrgRef, ceoUserId } = record;
        if (!externalOrgRef) throw new MissingPrerequisiteError(step, 'externalOrgRef');
        if (!ceoUserId) throw new MissingPrerequisiteError(step, 'ceoUserId');

        if (record.setupProgress.catalog_applied !== true) {
          await call('assignDefaultRolesAndPermissions', (s) =>
            this.accessControl.assignDefaultRolesAndPermissions(externalOrgRef, { signal: s }),
          );
          state.record = await this.save(record, {}, 'catalog_applied');
        }
        await call('assignRole', (s) => this.accessControl.assignRole(ceoUserId, externalOrgRef, CEO_ROLE, { signal: s }));
        return {};
      }
    }
  }
}
