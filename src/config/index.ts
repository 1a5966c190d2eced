import { z } from 'zod';
import * as dotenv from 'dotenv';

dotenv.config();

// Helper to read a string env var, treating empty string as undefined
function env(name: string): string | undefined {
  const val = process.env[name];
  return val !== undefined && val !== '' ? val : undefined;
}

function envInt(name: string): number | undefined {
  const val = env(name);
  if (val === undefined) return undefined;
  const parsed = parseInt(val, 10);
  return isNaN(parsed) ? undefined : parsed;
}

// ─── Schema ──────────────────────────────────────────────────────

const configSchema = z.object({
  // Server
  port: z.number().int().positive().default(3000),
  nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
  apiKey: z.string().min(1),

  // Database
  databaseUrl: z.string().min(1),

  // Access-control service
  accessControlBaseUrl: z.string().url(),
  accessControlApiKey: z.string().optional(),
  accessControlTimeoutMs: z.number().int().positive().default(5000),
  accessControlRetryAttempts: z.number().int().min(1).default(3),
  accessControlRetryBackoffMs: z.number().int().min(0).default(100),

  // Lifecycle
  maxSetupAttempts: z.number().int().positive().default(3),
  transitionTimeoutMs: z.number().int().positive().default(30000),

  // Rate Limiting
  rateLimitWindowMs: z.number().int().positive().default(60000),
  rateLimitMaxRequests: z.number().int().positive().default(100),

  // Logging
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
});

export type Config = z.infer<typeof configSchema>;

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n${issues.join('\n')}`);
    this.name = 'ConfigError';
  }
}

// ─── Loader ──────────────────────────────────────────────────────

export function loadConfig(): Config {
  const rawConfig = {
    // Server
    port: envInt('PORT'),
    nodeEnv: env('NODE_ENV'),
    apiKey: env('API_KEY'),

    // Database
    databaseUrl: env('DATABASE_URL'),

    // Access-control service
    accessControlBaseUrl: env('ACCESS_CONTROL_BASE_URL'),
    accessControlApiKey: env('ACCESS_CONTROL_API_KEY'),
    accessControlTimeoutMs: envInt('ACCESS_CONTROL_TIMEOUT_MS'),
    accessControlRetryAttempts: envInt('ACCESS_CONTROL_RETRY_ATTEMPTS'),
    accessControlRetryBackoffMs: envInt('ACCESS_CONTROL_RETRY_BACKOFF_MS'),

    // Lifecycle
    maxSetupAttempts: envInt('MAX_SETUP_ATTEMPTS'),
    transitionTimeoutMs: envInt('TRANSITION_TIMEOUT_MS'),

    // Rate Limiting
    rateLimitWindowMs: envInt('RATE_LIMIT_WINDOW_MS'),
    rateLimitMaxRequests: envInt('RATE_LIMIT_MAX_REQUESTS'),

    // Logging
    logLevel: env('LOG_LEVEL'),
  };

  return validateConfig(rawConfig);
}

// ─── Validator ───────────────────────────────────────────────────

/**
 * Validate raw configuration values. Throws a ConfigError listing every
 * missing or invalid variable; the entry point turns it into a startup abort.
 */
export function validateConfig(rawConfig: unknown): Config {
  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `  - ${issue.path.join('.')}: ${issue.message}`,
    );
    throw new ConfigError(issues);
  }

  return result.data;
}

// ─── Startup ─────────────────────────────────────────────────────

/**
 * Load and validate the config once at startup for fail-fast behaviour.
 */
export function initConfig(): Config {
  return loadConfig();
}
