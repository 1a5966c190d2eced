/**
 * Bounded calls to the access-control service.
 *
 * Each attempt gets its own timeout. Only transient failures are retried,
 * with exponential backoff (backoffMs, 2x, 4x, ...). If the caller's signal
 * aborts, the pending attempt is abandoned and the signal's reason is thrown.
 */

import type { Logger } from '../logger.js';
import { ExternalServiceError, LifecycleError, TimeoutError, errorMessage } from '../lifecycle/errors.js';
import { AccessControlError } from './types.js';

export interface ExternalCallPolicy {
  timeoutMs: number;
  /** Total attempts, including the first. */
  attempts: number;
  backoffMs: number;
}

export interface ExternalCallOptions {
  policy: ExternalCallPolicy;
  signal?: AbortSignal;
  logger?: Logger;
}

export class ExternalTimeoutError extends AccessControlError {
  constructor(
    operation: string,
    public readonly timeoutMs: number,
  ) {
    super(operation, `${operation} timed out after ${timeoutMs}ms`, true);
    this.name = 'ExternalTimeoutError';
  }
}

export function isTransientError(error: unknown): boolean {
  return error instanceof AccessControlError && error.transient;
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

async function runAttempt<T>(
  operation: string,
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  parent: AbortSignal | undefined,
  logger: Logger | undefined,
): Promise<T> {
  const controller = new AbortController();
  const onParentAbort = () => controller.abort(parent?.reason);
  parent?.addEventListener('abort', onParentAbort, { once: true });

  const timer = setTimeout(() => controller.abort(new ExternalTimeoutError(operation, timeoutMs)), timeoutMs);

  const aborted = new Promise<never>((_, reject) => {
    controller.signal.addEventListener('abort', () => reject(controller.signal.reason), { once: true });
  });

  const call = fn(controller.signal);
  // A call that settles after we stopped waiting for it must not surface as an unhandled rejection
  call.catch((error: unknown) => {
    if (controller.signal.aborted) {
      logger?.debug({ operation, err: errorMessage(error) }, 'abandoned external call settled with an error');
    }
  });

  try {
    return await Promise.race([call, aborted]);
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener('abort', onParentAbort);
  }
}

export async function callExternal<T>(
  operation: string,
  fn: (signal: AbortSignal) => Promise<T>,
  options: ExternalCallOptions,
): Promise<T> {
  const { policy, signal, logger } = options;

  for (let attempt = 1; ; attempt++) {
    if (signal?.aborted) throw signal.reason;

    try {
      return await runAttempt(operation, fn, policy.timeoutMs, signal, logger);
    } catch (error) {
      if (signal?.aborted) throw signal.reason;
      if (!isTransientError(error) || attempt >= policy.attempts) {
        throw error;
      }

      const delay = policy.backoffMs * Math.pow(2, attempt - 1);
      logger?.debug(
        { operation, attempt, nextDelayMs: delay, err: errorMessage(error) },
        'transient access-control failure, retrying',
      );
      await sleep(delay, signal);
    }
  }
}

/**
 * Map a failure out of `callExternal` onto the lifecycle error taxonomy.
 * Abort reasons are already lifecycle errors and pass through.
 */
export function classifyExternalFailure(operation: string, error: unknown): LifecycleError {
  if (error instanceof LifecycleError) return error;
  if (error instanceof ExternalTimeoutError) return new TimeoutError(operation, error.timeoutMs);
  if (error instanceof AccessControlError) {
    return new ExternalServiceError(operation, error.message, error.status ? { status: error.status } : undefined);
  }
  return new ExternalServiceError(operation, errorMessage(error));
}
