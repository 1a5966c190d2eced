/**
 * Transition validator.
 *
 * Maps (current status, requested action) to the target status, or to an
 * InvalidTransitionError. Pure: consults nothing but the transition table.
 */

import { InvalidTransitionError } from './errors.js';
import { TRANSITIONS, REQUESTABLE_ACTIONS } from './states.js';
import type { FpoStatus, LifecycleAction, RequestableAction } from './states.js';

export type ValidationResult =
  | { ok: true; from: FpoStatus; to: FpoStatus }
  | { ok: false; error: InvalidTransitionError };

export function validateTransition(current: FpoStatus, action: LifecycleAction): ValidationResult {
  const target = TRANSITIONS[current][action];
  if (target === undefined) {
    return { ok: false, error: new InvalidTransitionError(current, action) };
  }
  return { ok: true, from: current, to: target };
}

/** Actions a caller may request from the given status. */
export function allowedActions(status: FpoStatus): RequestableAction[] {
  return REQUESTABLE_ACTIONS.filter((action) => TRANSITIONS[status][action] !== undefined);
}
