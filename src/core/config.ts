/**
 * Application Configuration — Single Source of Truth
 * Layer: Core
 *
 * All settings (port, cache location, page size, pacing, multi-value handling)
 * go through this file. Other modules import `config` instead of reading
 * process.env directly.
 *
 * Flow: dotenv loads .env into process.env; a Zod schema validates and coerces
 * (e.g. "250" → 250) at startup. Invalid input exits immediately with the
 * tree-formatted error. The result is a nested `config` object exported with
 * `as const`.
 *
 * Multi-value policy names are kept as strings here; they are turned into
 * tagged policies once, when ClientOptions are built (see clientOptions.ts).
 */
import 'dotenv/config';

import { z } from 'zod/v4';

/** Parses "a,b,c" into a trimmed, non-empty list. */
const csvList = z
  .string()
  .transform((value) =>
    value
      .split(',')
      .map((item) => item.trim())
      .filter((item) => item.length > 0),
  );

/** Env booleans: "1", "true", "yes" are true; everything else is false. */
const envBoolean = z
  .string()
  .transform((value) => ['1', 'true', 'yes'].includes(value.trim().toLowerCase()));

const policyOverrides = z
  .string()
  .transform((value, ctx) => {
    try {
      const parsed: unknown = JSON.parse(value);
      return parsed;
    } catch {
      ctx.addIssue({ code: 'custom', message: 'OC_MULTI_VALUE_OVERRIDES must be valid JSON' });
      return z.NEVER;
    }
  })
  .pipe(z.record(z.string(), z.string()));

const envSchema = z.object({
  PORT: z.coerce.number().default(3000),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),

  /** Directory holding one JSON file per cached API request. */
  OC_CACHE_DIR: z.string().min(1).default('./oc-api-cache'),
  /** Cache file name prefix; defaults to today's date (YYYY-MM-DD). */
  OC_CACHE_PREFIX: z.string().optional(),

  OC_RECS_PER_REQUEST: z.coerce.number().int().min(1).max(10_000).default(200),
  /** Pause before every live request to the API (ms). Skipped on cache hits. */
  OC_PACING_MS: z.coerce.number().min(0).default(250),
  OC_RESPONSE_TYPES: csvList.default(['metadata', 'uri-meta']),
  OC_FLATTEN_ATTRIBUTES: envBoolean.default(false),

  OC_MULTI_VALUE_NUMBER: z.string().default('first'),
  OC_MULTI_VALUE_NON_NUMBER: z.string().default('concat'),
  OC_MULTI_VALUE_DELIMITER: z.string().default('; '),
  /** JSON object of attribute key → policy name, e.g. {"Has taxonomic identifier":"json"}. */
  OC_MULTI_VALUE_OVERRIDES: policyOverrides.optional(),

  OC_COMMON_MIN_PORTION: z.coerce.number().min(0).max(1).default(0.2),
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  // eslint-disable-next-line no-console
  console.error('Invalid environment configuration:', z.treeifyError(parsed.error));
  process.exit(1);
}

const env = parsed.data;

export const config = {
  port: env.PORT,
  nodeEnv: env.NODE_ENV,
  isDev: env.NODE_ENV === 'development',
  isProd: env.NODE_ENV === 'production',

  log: {
    level: env.LOG_LEVEL,
  },

  cache: {
    dir: env.OC_CACHE_DIR,
    prefix: env.OC_CACHE_PREFIX,
  },

  api: {
    recsPerRequest: env.OC_RECS_PER_REQUEST,
    pacingMs: env.OC_PACING_MS,
    responseTypes: env.OC_RESPONSE_TYPES,
    flattenAttributes: env.OC_FLATTEN_ATTRIBUTES,
  },

  multiValue: {
    numberPolicy: env.OC_MULTI_VALUE_NUMBER,
    nonNumberPolicy: env.OC_MULTI_VALUE_NON_NUMBER,
    delimiter: env.OC_MULTI_VALUE_DELIMITER,
    overrides: env.OC_MULTI_VALUE_OVERRIDES ?? {},
  },

  attributes: {
    commonMinPortion: env.OC_COMMON_MIN_PORTION,
  },
} as const;

