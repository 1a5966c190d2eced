import type { FpoStatus, LifecycleAction } from './states.js';

export type LifecycleErrorCode =
  | 'NOT_FOUND'
  | 'FORBIDDEN'
  | 'INVALID_TRANSITION'
  | 'CONCURRENT_MODIFICATION'
  | 'RETRY_EXHAUSTED'
  | 'TIMEOUT'
  | 'CANCELLED'
  | 'EXTERNAL_SERVICE_ERROR'
  | 'CONFLICT'
  | 'VALIDATION_ERROR'
  | 'AUDIT_WRITE_FAILED';

/**
 * Base class for every error the lifecycle subsystem reports to callers.
 * `retryable` tells the caller whether repeating the same request unchanged
 * can succeed.
 */
export class LifecycleError extends Error {
  constructor(
    public readonly code: LifecycleErrorCode,
    message: string,
    public readonly statusCode: number = 500,
    public readonly retryable: boolean = false,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'LifecycleError';
  }

  toJSON(): { code: LifecycleErrorCode; message: string; retryable: boolean; details?: Record<string, unknown> } {
    return {
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      ...(this.details && { details: this.details }),
    };
  }
}

export class NotFoundError extends LifecycleError {
  constructor(resource: string, id: string) {
    super('NOT_FOUND', `${resource} not found: ${id}`, 404, false, { resource, id });
    this.name = 'NotFoundError';
  }
}

export class ForbiddenError extends LifecycleError {
  constructor(actorId: string, action: string, orgId: string) {
    super('FORBIDDEN', `Actor ${actorId} is not allowed to ${action} organization ${orgId}`, 403, false, {
      actorId,
      action,
      orgId,
    });
    this.name = 'ForbiddenError';
  }
}

export class InvalidTransitionError extends LifecycleError {
  constructor(
    public readonly from: FpoStatus,
    public readonly action: LifecycleAction,
  ) {
    super('INVALID_TRANSITION', `Action "${action}" is not valid from status ${from}`, 409, false, {
      from,
      action,
    });
    this.name = 'InvalidTransitionError';
  }
}

export class ConcurrentModificationError extends LifecycleError {
  constructor(orgId: string, expectedVersion: number) {
    super(
      'CONCURRENT_MODIFICATION',
      `Organization ${orgId} was modified concurrently; reload and retry`,
      409,
      true,
      { orgId, expectedVersion },
    );
    this.name = 'ConcurrentModificationError';
  }
}

export class RetryExhaustedError extends LifecycleError {
  constructor(orgId: string, attempts: number, maxAttempts: number) {
    super(
      'RETRY_EXHAUSTED',
      `Setup for organization ${orgId} failed ${attempts} times (limit ${maxAttempts}); archive or escalate`,
      409,
      false,
      { orgId, attempts, maxAttempts },
    );
    this.name = 'RetryExhaustedError';
  }
}

export class TimeoutError extends LifecycleError {
  constructor(operation: string, timeoutMs: number) {
    super('TIMEOUT', `${operation} timed out after ${timeoutMs}ms`, 504, true, { operation, timeoutMs });
    this.name = 'TimeoutError';
  }
}

export class CancelledError extends LifecycleError {
  constructor(operation: string) {
    super('CANCELLED', `${operation} was cancelled`, 499, true, { operation });
    this.name = 'CancelledError';
  }
}

export class ExternalServiceError extends LifecycleError {
  constructor(operation: string, cause: string, details?: Record<string, unknown>) {
    super('EXTERNAL_SERVICE_ERROR', `${operation} failed: ${cause}`, 502, true, { operation, ...details });
    this.name = 'ExternalServiceError';
  }
}

export class ConflictError extends LifecycleError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('CONFLICT', message, 409, false, details);
    this.name = 'ConflictError';
  }
}

export class ValidationError extends LifecycleError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('VALIDATION_ERROR', message, 400, false, details);
    this.name = 'ValidationError';
  }
}

/** The record commit succeeded but its ledger entry could not be written. */
export class AuditWriteError extends LifecycleError {
  constructor(orgId: string, action: string, cause: string) {
    super('AUDIT_WRITE_FAILED', `Audit entry for ${action} on ${orgId} could not be written: ${cause}`, 500, false, {
      orgId,
      action,
    });
    this.name = 'AuditWriteError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
