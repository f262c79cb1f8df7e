/**
 * Service configuration, read from the environment
 */

import { z } from 'zod';
import { DEFAULT_COURT_URL, SEARCH_DEFAULTS } from 'court-playwright';
import { LOG_LEVELS, type LogLevel } from './utils/logger.js';

const flag = z
  .string()
  .toLowerCase()
  .pipe(z.enum(['true', 'false', '1', '0', 'yes', 'no']))
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const positiveInt = z.coerce.number().int().positive();
const nonNegativeInt = z.coerce.number().int().min(0);

const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3200),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  CORS_ORIGINS: z.string().optional(),

  DATABASE_URL: z.string().min(1).default('file:court_data.db'),
  DATABASE_AUTH_TOKEN: z.string().optional(),
  HISTORY_RETENTION_DAYS: nonNegativeInt.default(0),

  COURT_BASE_URL: z.string().url().default(DEFAULT_COURT_URL),
  HEADLESS_BROWSER: flag.default('true'),
  NAVIGATION_TIMEOUT_MS: positiveInt.default(30000),

  MAX_CHALLENGE_ATTEMPTS: positiveInt.default(SEARCH_DEFAULTS.maxChallengeAttempts),
  CHALLENGE_WAIT_MS: positiveInt.default(SEARCH_DEFAULTS.challengeWaitMs),
  NAVIGATION_RETRIES: nonNegativeInt.default(SEARCH_DEFAULTS.navigationRetries),
  RESULT_POLL_ATTEMPTS: positiveInt.default(SEARCH_DEFAULTS.resultPollAttempts),
  RETRY_BACKOFF_MS: nonNegativeInt.default(SEARCH_DEFAULTS.retryBackoffMs),
  ATTEMPT_TIMEOUT_MS: positiveInt.default(SEARCH_DEFAULTS.attemptTimeoutMs),
  MAX_CONCURRENT_SEARCHES: positiveInt.default(2),
  PDF_TIMEOUT_MS: positiveInt.default(30000),
});

export interface AppConfig {
  port: number;
  env: 'development' | 'production' | 'test';
  logLevel: LogLevel;
  corsOrigins: string[] | '*';
  database: {
    url: string;
    authToken?: string;
    /** Failed attempts older than this are pruned at start-up; 0 keeps everything */
    retentionDays: number;
  };
  court: {
    baseUrl: string;
    headless: boolean;
    navigationTimeout: number;
    pdfTimeout: number;
  };
  search: {
    maxChallengeAttempts: number;
    challengeWaitMs: number;
    navigationRetries: number;
    resultPollAttempts: number;
    retryBackoffMs: number;
    attemptTimeoutMs: number;
    maxConcurrent: number;
  };
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigError';
  }
}

function nonBlank(env: NodeJS.ProcessEnv): Record<string, string> {
  const values: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') values[key] = value.trim();
  }
  return values;
}

/**
 * Parses the environment. Throws ConfigError listing every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ConfigSchema.safeParse(nonBlank(env));
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }

  const e = parsed.data;
  const origins = e.CORS_ORIGINS?.split(',').map((origin) => origin.trim()).filter(Boolean);

  return {
    port: e.PORT,
    env: e.NODE_ENV,
    logLevel: e.LOG_LEVEL,
    corsOrigins: origins && origins.length > 0 ? origins : '*',
    database: {
      url: e.DATABASE_URL,
      authToken: e.DATABASE_AUTH_TOKEN,
      retentionDays: e.HISTORY_RETENTION_DAYS,
    },
    court: {
      baseUrl: e.COURT_BASE_URL,
      headless: e.HEADLESS_BROWSER,
      navigationTimeout: e.NAVIGATION_TIMEOUT_MS,
      pdfTimeout: e.PDF_TIMEOUT_MS,
    },
    search: {
      maxChallengeAttempts: e.MAX_CHALLENGE_ATTEMPTS,
      challengeWaitMs: e.CHALLENGE_WAIT_MS,
      navigationRetries: e.NAVIGATION_RETRIES,
      resultPollAttempts: e.RESULT_POLL_ATTEMPTS,
      retryBackoffMs: e.RETRY_BACKOFF_MS,
      attemptTimeoutMs: e.ATTEMPT_TIMEOUT_MS,
      maxConcurrent: e.MAX_CONCURRENT_SEARCHES,
    },
  };
}
