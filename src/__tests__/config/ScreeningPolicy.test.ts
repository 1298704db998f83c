/**
 * Screening Policy and Environment Tests
 */

import { describe, it, expect } from '@jest/globals';
import {
  ConfigurationError,
  createScreeningPolicy,
  DEFAULT_SCREENING_POLICY,
} from '../../config/ScreeningPolicy.js';
import { enrichmentSettingsFromEnv, loadEnv, screeningPolicyFromEnv } from '../../config/env.js';

describe('createScreeningPolicy', () => {
  it('should return the defaults without overrides', () => {
    const policy = createScreeningPolicy();

    expect(policy).toEqual(DEFAULT_SCREENING_POLICY);
    expect(policy.experience.minYears).toBe(4);
    expect(policy.compensation).toEqual({ rateCeiling: 100, minHoursPerWeek: 20, referenceCurrency: 'USD' });
    expect(policy.experience.tier1Employers).toContain('Google');
  });

  it('should merge overrides field by field', () => {
    const policy = createScreeningPolicy({
      compensation: { rateCeiling: 120 },
      location: { approvedPhrases: ['Lisbon'] },
    });

    expect(policy.compensation.rateCeiling).toBe(120);
    expect(policy.compensation.minHoursPerWeek).toBe(20);
    expect(policy.location.approvedPhrases).toEqual(['Lisbon']);
    expect(policy.location.exclusionPhrases).toEqual(DEFAULT_SCREENING_POLICY.location.exclusionPhrases);
  });

  it('should freeze the result', () => {
    const policy = createScreeningPolicy();

    expect(Object.isFrozen(policy.experience)).toBe(true);
    expect(Object.isFrozen(policy.experience.tier1Employers)).toBe(true);
  });

  it('should reject invalid values', () => {
    expect(() => createScreeningPolicy({ compensation: { rateCeiling: -1 } })).toThrow(ConfigurationError);
    expect(() => createScreeningPolicy({ experience: { tier1Employers: ['  '] } })).toThrow('Invalid screening policy');
  });
});

describe('loadEnv', () => {
  it('should apply defaults to an empty environment', () => {
    const env = loadEnv({});

    expect(env.NODE_ENV).toBe('development');
    expect(env.PORT).toBe(3000);
    expect(env.CORS_ORIGIN).toBe('*');
    expect(env.ANTHROPIC_API_KEY).toBeUndefined();
  });

  it('should treat blank values as unset', () => {
    const env = loadEnv({ PORT: '', SCREENING_RATE_CEILING: '  ', ANTHROPIC_API_KEY: '' });

    expect(env.PORT).toBe(3000);
    expect(env.SCREENING_RATE_CEILING).toBeUndefined();
    expect(env.ANTHROPIC_API_KEY).toBeUndefined();
  });

  it('should reject malformed numbers', () => {
    expect(() => loadEnv({ PORT: 'eighty' })).toThrow(ConfigurationError);
    expect(() => loadEnv({ ENRICHMENT_MAX_ATTEMPTS: '0' })).toThrow('Invalid environment configuration');
  });
});

describe('screeningPolicyFromEnv', () => {
  it('should map screening variables onto the policy', () => {
    const policy = screeningPolicyFromEnv(
      loadEnv({
        SCREENING_RATE_CEILING: '85',
        SCREENING_MIN_HOURS: '30',
        SCREENING_MIN_YEARS: '3',
        SCREENING_TIER1_EMPLOYERS: 'Acme, Globex ,',
      })
    );

    expect(policy.compensation.rateCeiling).toBe(85);
    expect(policy.compensation.minHoursPerWeek).toBe(30);
    expect(policy.experience.minYears).toBe(3);
    expect(policy.experience.tier1Employers).toEqual(['Acme', 'Globex']);
    expect(policy.experience.maxSpanYears).toBe(50);
  });

  it('should keep the default employers when the list is empty', () => {
    const policy = screeningPolicyFromEnv(loadEnv({ SCREENING_TIER1_EMPLOYERS: ' , ' }));

    expect(policy.experience.tier1Employers).toEqual(DEFAULT_SCREENING_POLICY.experience.tier1Employers);
  });
});

describe('enrichmentSettingsFromEnv', () => {
  it('should map enrichment variables', () => {
    const settings = enrichmentSettingsFromEnv(
      loadEnv({
        ANTHROPIC_API_KEY: 'test-secret',
        ENRICHMENT_MODEL: 'claude-3-5-haiku-20241022',
        ENRICHMENT_MAX_ATTEMPTS: '5',
        ENRICHMENT_BASE_DELAY_MS: '500',
      })
    );

    expect(settings).toEqual({
      apiKey: 'test-secret',
      model: 'claude-3-5-haiku-20241022',
      maxAttempts: 5,
      baseDelayMs: 500,
      maxTokens: undefined,
    });
  });
});
