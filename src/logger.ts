import pino, { type Logger } from 'pino';

// Structured JSON logs; level comes from LOG_LEVEL so the logger can be
// created before the rest of the configuration is validated.
export const logger = pino({
  level: process.env.LOG_LEVEL || (process.env.NODE_ENV === 'test' ? 'silent' : 'info'),
  base: { service: 'fpo-lifecycle' },
  formatters: {
    level: (label) => ({ level: label }),
  },
  redact: {
    paths: [
      'authorization',
      'Authorization',
      'apiKey',
      'accessControlApiKey',
      'headers.authorization',
    ],
    censor: '[REDACTED]',
  },
});

/**
 * Child logger carrying the correlation id of one request.
 */
export function createRequestLogger(requestId: string, actorId?: string): Logger {
  return logger.child({
    requestId,
    ...(actorId && { actorId }),
  });
}

export type { Logger };
