/**
 * Screening Policy
 *
 * The thresholds and reference sets every qualification check reads.
 * Components receive the policy (or their slice of it) through their
 * constructor; nothing here is mutated after creation.
 */

import { z } from 'zod';
import defaults from './screening-defaults.json';

// =============================================================================
// TYPES
// =============================================================================

export const CURRENCIES = ['USD', 'EUR', 'GBP', 'CAD', 'INR'] as const;

export type Currency = (typeof CURRENCIES)[number];

export interface ExperiencePolicy {
  minYears: number;
  tier1Employers: readonly string[];
  presentTokens: readonly string[];
  /** Spans longer than this are treated as data-entry errors and skipped */
  maxSpanYears: number;
  rejectFutureStart: boolean;
}

export interface CompensationPolicy {
  rateCeiling: number;
  minHoursPerWeek: number;
  /** Currency the ceiling is expressed in. Rates are never converted. */
  referenceCurrency: Currency;
}

export interface LocationPolicy {
  approvedPhrases: readonly string[];
  approvedCountryCodes: readonly string[];
  exclusionPhrases: readonly string[];
}

export interface ScreeningPolicy {
  experience: ExperiencePolicy;
  compensation: CompensationPolicy;
  location: LocationPolicy;
}

export interface ScreeningPolicyOverrides {
  experience?: Partial<ExperiencePolicy>;
  compensation?: Partial<CompensationPolicy>;
  location?: Partial<LocationPolicy>;
}

export class ConfigurationError extends Error {
  constructor(
    message: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

// =============================================================================
// VALIDATION
// =============================================================================

const termList = z.array(z.string().trim().min(1)).readonly();

const screeningPolicySchema = z.object({
  experience: z.object({
    minYears: z.number().nonnegative(),
    tier1Employers: termList,
    presentTokens: termList,
    maxSpanYears: z.number().positive(),
    rejectFutureStart: z.boolean(),
  }),
  compensation: z.object({
    rateCeiling: z.number().nonnegative(),
    minHoursPerWeek: z.number().nonnegative(),
    referenceCurrency: z.enum(CURRENCIES),
  }),
  location: z.object({
    approvedPhrases: termList,
    approvedCountryCodes: termList,
    exclusionPhrases: termList,
  }),
});

// =============================================================================
// DEFAULTS
// =============================================================================

export const DEFAULT_SCREENING_POLICY: ScreeningPolicy = deepFreeze<ScreeningPolicy>({
  experience: {
    minYears: 4,
    tier1Employers: defaults.tier1Employers,
    presentTokens: defaults.presentTokens,
    maxSpanYears: 50,
    rejectFutureStart: true,
  },
  compensation: {
    rateCeiling: 100,
    minHoursPerWeek: 20,
    referenceCurrency: 'USD',
  },
  location: {
    approvedPhrases: defaults.location.approvedPhrases,
    approvedCountryCodes: defaults.location.approvedCountryCodes,
    exclusionPhrases: defaults.location.exclusionPhrases,
  },
});

/**
 * Merge overrides onto the defaults and validate the result.
 * Set-valued fields are replaced, not unioned; undefined fields keep the default.
 */
export function createScreeningPolicy(overrides: ScreeningPolicyOverrides = {}): ScreeningPolicy {
  const { experience, compensation, location } = DEFAULT_SCREENING_POLICY;
  const merged: ScreeningPolicy = {
    experience: {
      minYears: overrides.experience?.minYears ?? experience.minYears,
      tier1Employers: overrides.experience?.tier1Employers ?? experience.tier1Employers,
      presentTokens: overrides.experience?.presentTokens ?? experience.presentTokens,
      maxSpanYears: overrides.experience?.maxSpanYears ?? experience.maxSpanYears,
      rejectFutureStart: overrides.experience?.rejectFutureStart ?? experience.rejectFutureStart,
    },
    compensation: {
      rateCeiling: overrides.compensation?.rateCeiling ?? compensation.rateCeiling,
      minHoursPerWeek: overrides.compensation?.minHoursPerWeek ?? compensation.minHoursPerWeek,
      referenceCurrency: overrides.compensation?.referenceCurrency ?? compensation.referenceCurrency,
    },
    location: {
      approvedPhrases: overrides.location?.approvedPhrases ?? location.approvedPhrases,
      approvedCountryCodes: overrides.location?.approvedCountryCodes ?? location.approvedCountryCodes,
      exclusionPhrases: overrides.location?.exclusionPhrases ?? location.exclusionPhrases,
    },
  };

  const result = screeningPolicySchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigurationError('Invalid screening policy', {
      issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }

  return deepFreeze(result.data);
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object') {
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
    Object.freeze(value);
  }
  return value;
}
