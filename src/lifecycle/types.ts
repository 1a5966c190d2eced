/**
 * Value types shared by the organization record, the provisioning
 * orchestrator and the HTTP surface.
 */

/** Provisioning steps, in the order they run. */
export const SETUP_STEPS = ['org_created', 'ceo_created', 'roles_assigned'] as const;

export type SetupStep = (typeof SETUP_STEPS)[number];

/**
 * Points inside a step that makes more than one external call. Saved like a
 * step, so a resumed run does not repeat the calls before it.
 */
export type SetupCheckpoint = 'catalog_applied';

/** Which provisioning steps (and checkpoints) have completed; an absent key means not yet. */
export type SetupProgress = Partial<Record<SetupStep | SetupCheckpoint, boolean>>;

/** Per-step error messages from the most recent failed setup attempt. */
export type SetupErrors = Partial<Record<SetupStep, string>>;

export type VerificationStatus = 'PENDING' | 'VERIFIED' | 'REJECTED';

/** Identity of the CEO account created in the access-control service. */
export interface CeoProfile {
  firstName: string;
  lastName: string;
  phoneNumber: string;
  email?: string;
}

export type AuditOutcome = 'succeeded' | 'failed';

export function completedSteps(progress: SetupProgress): SetupStep[] {
  return SETUP_STEPS.filter((step) => progress[step] === true);
}
