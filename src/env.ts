import { z } from 'zod';
import { ConfigurationError } from './shared/errors.js';
import { HOUR_MS } from './shared/constants.js';
import { splitList } from './shared/utils.js';
import { SPAM_INDICATORS, type SpamIndicator } from './scoring/types.js';

/**
 * Schema for all environment variables consumed by the discovery core.
 * Every variable has a default; malformed values fail startup.
 */
const envSchema = z.object({
  // ---------- General ----------
  NODE_ENV: z
    .enum(['development', 'production', 'test'])
    .default('development'),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),

  // ---------- Database ----------
  DATABASE_PATH: z.string().min(1).default('./data/funding-discovery.db'),

  // ---------- Scoring ----------
  CONFIDENCE_THRESHOLD: z.coerce.number().min(0).max(1).default(0.6),
  /** Comma-separated low-trust suffixes; unset means "use the negative tier". */
  SPAM_TLDS: z
    .string()
    .optional()
    .transform((value) =>
      value === undefined
        ? undefined
        : splitList(value).map((tld) => tld.toLowerCase().replace(/^\./, '')),
    ),

  /** Comma-separated content-spam indicators to run; empty disables them. */
  CONTENT_SPAM_INDICATORS: z
    .string()
    .default('keyword-stuffing,cross-category')
    .transform((value) => splitList(value).map((indicator) => indicator.toLowerCase()))
    .pipe(z.array(z.enum(SPAM_INDICATORS))),

  // ---------- Registry ----------
  /** Retry delays in hours after the 1st, 2nd, 3rd ... failure. */
  FAILURE_BACKOFF_HOURS: z
    .string()
    .default('1,4,24,168')
    .transform((value) => splitList(value).map(Number))
    .refine((hours) => hours.length > 0, 'at least one delay is required')
    .refine(
      (hours) => hours.every((h) => Number.isFinite(h) && h > 0),
      'delays must be positive numbers',
    )
    .refine(
      (hours) => hours.every((h, i) => i === 0 || h >= (hours[i - 1] ?? 0)),
      'delays must not decrease',
    ),
  /** Minimum hours between re-checks of a high-quality domain. */
  HIGH_QUALITY_RECHECK_HOURS: z.coerce.number().nonnegative().default(0),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Parses and validates an environment record. Throws ConfigurationError
 * listing every invalid variable.
 */
export function parseEnv(source: Record<string, string | undefined>): Env {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join('.')}: ${issue.message}`,
    );
    throw new ConfigurationError('Environment validation failed', issues);
  }

  return result.data;
}

/**
 * Validates process.env. The entry point loads `.env` through
 * `dotenv/config` before any module reads the environment.
 */
export function loadEnv(): Env {
  return parseEnv(process.env);
}

/** Registry and pipeline settings derived from the environment. */
export interface CoreSettings {
  confidenceThreshold: number;
  spamTlds: string[] | undefined;
  contentSpamIndicators: SpamIndicator[];
  failureBackoffMs: number[];
  highQualityRecheckMs: number;
}

export function coreSettingsFromEnv(env: Env): CoreSettings {
  return {
    confidenceThreshold: env.CONFIDENCE_THRESHOLD,
    spamTlds: env.SPAM_TLDS,
    contentSpamIndicators: env.CONTENT_SPAM_INDICATORS,
    failureBackoffMs: env.FAILURE_BACKOFF_HOURS.map((hours) => hours * HOUR_MS),
    highQualityRecheckMs: env.HIGH_QUALITY_RECHECK_HOURS * HOUR_MS,
  };
}
