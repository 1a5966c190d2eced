import rateLimit from 'express-rate-limit';

export interface RateLimitSettings {
  windowMs: number;
  max: number;
}

/**
 * Rate limiter for API routes, per client IP.
 */
export function createApiRateLimiter(settings: RateLimitSettings) {
  return rateLimit({
    windowMs: settings.windowMs,
    max: settings.max,
    message: {
      success: false,
      error: { code: 'RATE_LIMITED', message: 'Too many requests, please try again later' },
    },
    standardHeaders: true,
    legacyHeaders: false,
  });
}
