/**
 * FPO lifecycle states, actions and the directed transition table.
 */

export const FPO_STATUSES = [
  'DRAFT',
  'PENDING_VERIFICATION',
  'REJECTED',
  'VERIFIED',
  'PENDING_SETUP',
  'SETUP_FAILED',
  'ACTIVE',
  'SUSPENDED',
  'INACTIVE',
  'ARCHIVED',
] as const;

export type FpoStatus = (typeof FPO_STATUSES)[number];

/** Actions a caller may request through the lifecycle controller. */
export const REQUESTABLE_ACTIONS = [
  'submit',
  'approve',
  'reject',
  'resubmit',
  'begin-setup',
  'retry-setup',
  'suspend',
  'deactivate',
  'reinstate',
  'reactivate',
  'archive',
] as const;

export type RequestableAction = (typeof REQUESTABLE_ACTIONS)[number];

/** Actions only the controller itself uses to resolve a provisioning outcome. */
export type InternalAction = 'setup-succeeded' | 'setup-failed';

export type LifecycleAction = RequestableAction | InternalAction;

export const TRANSITIONS: Readonly<Record<FpoStatus, Partial<Record<LifecycleAction, FpoStatus>>>> = {
  DRAFT: { submit: 'PENDING_VERIFICATION' },
  PENDING_VERIFICATION: { approve: 'VERIFIED', reject: 'REJECTED' },
  REJECTED: { resubmit: 'DRAFT', archive: 'ARCHIVED' },
  VERIFIED: { 'begin-setup': 'PENDING_SETUP' },
  PENDING_SETUP: { 'setup-succeeded': 'ACTIVE', 'setup-failed': 'SETUP_FAILED' },
  SETUP_FAILED: { 'retry-setup': 'PENDING_SETUP', archive: 'ARCHIVED' },
  ACTIVE: { suspend: 'SUSPENDED', deactivate: 'INACTIVE' },
  SUSPENDED: { reinstate: 'ACTIVE', archive: 'ARCHIVED' },
  INACTIVE: { reactivate: 'ACTIVE', archive: 'ARCHIVED' },
  ARCHIVED: {},
};

const STATUS_SET: ReadonlySet<string> = new Set(FPO_STATUSES);
const ACTION_SET: ReadonlySet<string> = new Set(REQUESTABLE_ACTIONS);

export function isFpoStatus(value: string): value is FpoStatus {
  return STATUS_SET.has(value);
}

export function isRequestableAction(value: string): value is RequestableAction {
  return ACTION_SET.has(value);
}

/** ARCHIVED is the only status without outgoing transitions. */
export function isTerminalStatus(status: FpoStatus): boolean {
  return Object.keys(TRANSITIONS[status]).length === 0;
}
