/**
 * Environment configuration
 *
 * Reads process.env once (dotenv is loaded by the entry point) and maps the
 * variables onto the screening policy and enrichment settings.
 */

import { z } from 'zod';
import {
  ConfigurationError,
  createScreeningPolicy,
  type ScreeningPolicy,
} from './ScreeningPolicy.js';

// Blank values in a .env file mean "not set"
const blankAsUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const optionalNumber = z.preprocess(blankAsUndefined, z.coerce.number().nonnegative().optional());
const optionalInt = z.preprocess(blankAsUndefined, z.coerce.number().int().positive().optional());
const optionalString = z.preprocess(blankAsUndefined, z.string().optional());

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.preprocess(blankAsUndefined, z.coerce.number().int().positive().default(3000)),
  CORS_ORIGIN: z.preprocess(blankAsUndefined, z.string().default('*')),

  ANTHROPIC_API_KEY: optionalString,
  ENRICHMENT_MODEL: optionalString,
  ENRICHMENT_MAX_ATTEMPTS: optionalInt,
  ENRICHMENT_BASE_DELAY_MS: optionalNumber,
  ENRICHMENT_MAX_TOKENS: optionalInt,

  SCREENING_RATE_CEILING: optionalNumber,
  SCREENING_MIN_HOURS: optionalNumber,
  SCREENING_MIN_YEARS: optionalNumber,
  SCREENING_MAX_SPAN_YEARS: optionalNumber,
  SCREENING_TIER1_EMPLOYERS: optionalString,
});

export type AppEnv = z.infer<typeof envSchema>;

export interface EnrichmentSettings {
  apiKey?: string;
  model?: string;
  maxAttempts?: number;
  baseDelayMs?: number;
  maxTokens?: number;
}

export function loadEnv(source: NodeJS.ProcessEnv = process.env): AppEnv {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    throw new ConfigurationError('Invalid environment configuration', {
      issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }
  return result.data;
}

export function screeningPolicyFromEnv(env: AppEnv): ScreeningPolicy {
  const tier1Employers = env.SCREENING_TIER1_EMPLOYERS
    ?.split(',')
    .map((name) => name.trim())
    .filter(Boolean);

  return createScreeningPolicy({
    experience: {
      minYears: env.SCREENING_MIN_YEARS,
      maxSpanYears: env.SCREENING_MAX_SPAN_YEARS,
      tier1Employers: tier1Employers && tier1Employers.length > 0 ? tier1Employers : undefined,
    },
    compensation: {
      rateCeiling: env.SCREENING_RATE_CEILING,
      minHoursPerWeek: env.SCREENING_MIN_HOURS,
    },
  });
}

export function enrichmentSettingsFromEnv(env: AppEnv): EnrichmentSettings {
  return {
    apiKey: env.ANTHROPIC_API_KEY,
    model: env.ENRICHMENT_MODEL,
    maxAttempts: env.ENRICHMENT_MAX_ATTEMPTS,
    baseDelayMs: env.ENRICHMENT_BASE_DELAY_MS,
    maxTokens: env.ENRICHMENT_MAX_TOKENS,
  };
}
