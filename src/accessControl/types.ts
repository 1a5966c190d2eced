/**
 * Contract of the external identity and access-control service.
 *
 * The lifecycle core only ever talks to this interface; the HTTP client is
 * one implementation and the test suites use an in-process fake.
 */

import type { CeoProfile } from '../lifecycle/types.js';

export interface CallOptions {
  signal?: AbortSignal;
}

export interface PermissionQuery {
  actorId: string;
  resource: string;
  action: string;
  orgId: string;
}

export interface CreateOrganizationInput {
  /** Local organization id, sent as the idempotency key. */
  localId: string;
  name: string;
  description?: string | null;
  registrationNumber?: string | null;
  metadata: Record<string, unknown>;
}

export interface CreateUserInput {
  /** Local id of the organization the user is created for; keys the call's idempotency. */
  localId: string;
  profile: CeoProfile;
}

export interface ExternalOrganization {
  id: string;
  name: string;
  registrationNumber?: string;
  description?: string;
  /** Set when the organization already has a CEO account. */
  ceoUserId?: string;
  metadata: Record<string, unknown>;
}

export interface AccessControlService {
  checkPermission(query: PermissionQuery, options?: CallOptions): Promise<boolean>;
  /**
   * Returns the external organization reference. Repeating the call for the
   * same `localId` returns the organization the first call created.
   */
  createOrganization(input: CreateOrganizationInput, options?: CallOptions): Promise<string>;
  /**
   * Returns the external user reference. Repeating the call for the same
   * `localId` returns the user the first call created.
   */
  createUser(input: CreateUserInput, options?: CallOptions): Promise<string>;
  assignDefaultRolesAndPermissions(externalOrgRef: string, options?: CallOptions): Promise<void>;
  assignRole(userId: string, externalOrgRef: string, role: string, options?: CallOptions): Promise<void>;
  getOrganization(externalOrgRef: string, options?: CallOptions): Promise<ExternalOrganization | null>;
}

/**
 * Failure reported by the access-control service or the transport to it.
 * `transient` marks failures worth retrying unchanged (unavailable, rate
 * limited, network errors); everything else is an application-level rejection.
 */
export class AccessControlError extends Error {
  constructor(
    public readonly operation: string,
    message: string,
    public readonly transient: boolean,
    public readonly status?: number,
  ) {
    super(message);
    this.name = 'AccessControlError';
  }
}

export function isTransientStatus(status: number): boolean {
  return status === 429 || status === 408 || status >= 500;
}
