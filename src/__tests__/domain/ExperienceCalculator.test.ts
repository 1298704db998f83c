/**
 * Experience Calculator Tests
 *
 * Tests period reconciliation, skip rules and tier-1 detection.
 */

import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { ExperienceCalculator, parseDate } from '../../domain/services/ExperienceCalculator.js';
import { DEFAULT_SCREENING_POLICY } from '../../config/ScreeningPolicy.js';
import type { EmploymentPeriod } from '../../domain/entities/ApplicantProfile.js';

const NOW = new Date('2025-01-01T00:00:00Z');

function period(company: string, start: string, end: string): EmploymentPeriod {
  return { company, title: 'Engineer', start, end, technologies: '' };
}

describe('ExperienceCalculator', () => {
  let calculator: ExperienceCalculator;

  beforeEach(() => {
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    calculator = new ExperienceCalculator(DEFAULT_SCREENING_POLICY.experience, () => NOW);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('totals', () => {
    it('should count exactly four years for 2020-01-01 to 2024-01-01', () => {
      const summary = calculator.compute([period('Acme Corp', '2020-01-01', '2024-01-01')]);

      expect(summary.totalDays).toBe(1461);
      expect(summary.totalYears).toBe(4);
      expect(summary.countedPeriods).toBe(1);
      expect(summary.skipped).toEqual([]);
    });

    it('should sum multiple periods', () => {
      const summary = calculator.compute([
        period('Acme Corp', '2019-01-01', '2020-01-01'),
        period('Globex', '2021-01-01', '2022-01-01'),
      ]);

      expect(summary.totalDays).toBe(730);
      expect(summary.countedPeriods).toBe(2);
    });

    it('should treat an empty or present end date as the evaluation moment', () => {
      const summary = calculator.compute([
        period('Acme Corp', '2024-01-01', 'Present'),
        period('Globex', '2024-01-01', ''),
      ]);

      expect(summary.totalDays).toBe(732);
      expect(summary.countedPeriods).toBe(2);
    });

    it('should accept year-only and year-month dates', () => {
      const summary = calculator.compute([period('Acme Corp', '2022', '2022-07')]);

      expect(summary.totalDays).toBe(181);
    });

    it('should return zero for no periods', () => {
      const summary = calculator.compute([]);

      expect(summary.totalYears).toBe(0);
      expect(summary.tier1Match).toBeNull();
    });
  });

  describe('skipped periods', () => {
    it('should skip a period that starts in the future and keep the rest', () => {
      const summary = calculator.compute([
        period('Acme Corp', '2020-01-01', '2024-01-01'),
        period('Future Inc', '2026-01-01', 'present'),
      ]);

      expect(summary.totalDays).toBe(1461);
      expect(summary.skipped).toEqual([
        { index: 1, company: 'Future Inc', reason: 'start date 2026-01-01 is in the future' },
      ]);
    });

    it('should skip a period whose end precedes its start', () => {
      const summary = calculator.compute([
        period('Backwards LLC', '2022-06-01', '2021-01-01'),
        period('Acme Corp', '2023-01-01', '2024-01-01'),
      ]);

      expect(summary.totalDays).toBe(365);
      expect(summary.skipped[0]?.reason).toBe('end date 2021-01-01 precedes start date 2022-06-01');
    });

    it('should skip unparseable and missing dates', () => {
      const summary = calculator.compute([
        period('Vague Co', 'sometime', '2020-01-01'),
        period('Blank Co', '', '2020-01-01'),
        period('Odd Co', '2020-01-01', 'soon'),
      ]);

      expect(summary.countedPeriods).toBe(0);
      expect(summary.skipped.map((s) => s.reason)).toEqual([
        'unparseable start date "sometime"',
        'missing start date',
        'unparseable end date "soon"',
      ]);
    });

    it('should skip spans longer than the configured maximum', () => {
      const summary = calculator.compute([period('Ancient Guild', '1900-01-01', '2000-01-01')]);

      expect(summary.totalDays).toBe(0);
      expect(summary.skipped[0]?.reason).toBe('span of 100.0 years exceeds 50 years');
    });

    it('should count future starts when the rule is relaxed', () => {
      const relaxed = new ExperienceCalculator(
        { ...DEFAULT_SCREENING_POLICY.experience, rejectFutureStart: false },
        () => NOW
      );

      const summary = relaxed.compute([period('Future Inc', '2025-06-01', '2026-06-01')]);

      expect(summary.totalDays).toBe(365);
      expect(summary.skipped).toEqual([]);
    });

    it('should log a warning for each skipped period', () => {
      calculator.compute([period('Future Inc', '2026-01-01', 'present')]);

      expect(console.warn).toHaveBeenCalledTimes(1);
    });
  });

  describe('tier-1 detection', () => {
    it('should match tier-1 names as case-insensitive substrings', () => {
      const summary = calculator.compute([
        period('Acme Corp', '2020-01-01', '2021-01-01'),
        period('google cloud LLC', '2021-01-01', '2022-01-01'),
      ]);

      expect(summary.tier1Match).toBe('google cloud LLC');
    });

    it('should detect a tier-1 employer even when the period dates are skipped', () => {
      expect(calculator.findTier1Employer([period('Stripe', 'unknown', 'unknown')])).toBe('Stripe');
    });

    it('should return null when no employer matches', () => {
      expect(calculator.findTier1Employer([period('Initech', '2020', '2021')])).toBeNull();
    });
  });
});

describe('parseDate', () => {
  it('should parse supported formats as UTC', () => {
    expect(parseDate('2021')?.toISOString()).toBe('2021-01-01T00:00:00.000Z');
    expect(parseDate('2021-03')?.toISOString()).toBe('2021-03-01T00:00:00.000Z');
    expect(parseDate('2021-03-15')?.toISOString()).toBe('2021-03-15T00:00:00.000Z');
    expect(parseDate('2021-03-15T10:30:00Z')?.toISOString()).toBe('2021-03-15T10:30:00.000Z');
  });

  it('should reject impossible calendar dates', () => {
    expect(parseDate('2023-02-30')).toBeNull();
    expect(parseDate('2023-13')).toBeNull();
  });

  it('should reject free text', () => {
    expect(parseDate('March 2021')).toBeNull();
    expect(parseDate('')).toBeNull();
  });
});
