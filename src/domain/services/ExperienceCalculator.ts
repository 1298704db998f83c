/**
 * Experience Calculator
 *
 * Reconciles raw employment periods into total years of experience and
 * detects tier-1 employers.
 *
 * Periods that cannot be trusted are skipped, never thrown on:
 * - unparseable start or end dates
 * - a start date after the evaluation moment (configurable)
 * - an end date before the start date
 * - a span longer than `maxSpanYears` (data-entry error)
 *
 * The future-start and maximum-span rules are sanity bounds rather than
 * business rules; both live in the policy so they can be relaxed.
 *
 * Tier-1 matching is a case-insensitive substring test:
 * "Google" matches "Google Cloud LLC".
 */

import type { ExperiencePolicy } from '../../config/ScreeningPolicy.js';
import type { EmploymentPeriod } from '../entities/ApplicantProfile.js';

// =============================================================================
// TYPES
// =============================================================================

export interface SkippedPeriod {
  index: number;
  company: string;
  reason: string;
}

export interface ExperienceSummary {
  totalYears: number;
  totalDays: number;
  countedPeriods: number;
  /** Company name (as written by the applicant) of the first tier-1 match */
  tier1Match: string | null;
  skipped: SkippedPeriod[];
}

export type Clock = () => Date;

const MS_PER_DAY = 24 * 60 * 60 * 1000;
const DAYS_PER_YEAR = 365.25;

// =============================================================================
// EXPERIENCE CALCULATOR
// =============================================================================

export class ExperienceCalculator {
  private readonly presentTokens: Set<string>;
  private readonly tier1Employers: string[];

  constructor(
    private readonly policy: ExperiencePolicy,
    private readonly clock: Clock = () => new Date()
  ) {
    this.presentTokens = new Set(policy.presentTokens.map((token) => token.trim().toLowerCase()));
    this.tier1Employers = policy.tier1Employers
      .map((employer) => employer.trim().toLowerCase())
      .filter((employer) => employer.length > 0);
  }

  compute(periods: readonly EmploymentPeriod[], asOf: Date = this.clock()): ExperienceSummary {
    let totalDays = 0;
    let countedPeriods = 0;
    const skipped: SkippedPeriod[] = [];

    periods.forEach((period, index) => {
      const result = this.measure(period, asOf);
      if ('reason' in result) {
        console.warn(`[ExperienceCalculator] Skipping period ${index} (${period.company || 'unknown company'}): ${result.reason}`);
        skipped.push({ index, company: period.company, reason: result.reason });
        return;
      }
      totalDays += result.days;
      countedPeriods++;
    });

    return {
      totalYears: totalDays / DAYS_PER_YEAR,
      totalDays,
      countedPeriods,
      tier1Match: this.findTier1Employer(periods),
      skipped,
    };
  }

  /**
   * First period (in history order) whose company contains a tier-1 name.
   * Date validity does not matter here.
   */
  findTier1Employer(periods: readonly EmploymentPeriod[]): string | null {
    for (const period of periods) {
      const company = period.company.toLowerCase();
      if (this.tier1Employers.some((employer) => company.includes(employer))) {
        return period.company;
      }
    }
    return null;
  }

  // ===========================================================================
  // PRIVATE HELPERS
  // ===========================================================================

  private measure(period: EmploymentPeriod, asOf: Date): { days: number } | { reason: string } {
    const start = parseDate(period.start);
    if (!start) {
      return { reason: period.start ? `unparseable start date "${period.start}"` : 'missing start date' };
    }

    let end: Date;
    if (this.isPresent(period.end)) {
      end = asOf;
    } else {
      const parsedEnd = parseDate(period.end);
      if (!parsedEnd) {
        return { reason: `unparseable end date "${period.end}"` };
      }
      end = parsedEnd;
    }

    if (this.policy.rejectFutureStart && start.getTime() > asOf.getTime()) {
      return { reason: `start date ${period.start} is in the future` };
    }
    if (end.getTime() < start.getTime()) {
      return { reason: `end date ${period.end} precedes start date ${period.start}` };
    }

    const days = Math.floor((end.getTime() - start.getTime()) / MS_PER_DAY);
    if (days > this.policy.maxSpanYears * DAYS_PER_YEAR) {
      return { reason: `span of ${(days / DAYS_PER_YEAR).toFixed(1)} years exceeds ${this.policy.maxSpanYears} years` };
    }

    return { days };
  }

  private isPresent(value: string): boolean {
    const token = value.trim().toLowerCase();
    return token === '' || this.presentTokens.has(token);
  }
}

// =============================================================================
// DATE PARSING
// =============================================================================

const YEAR = /^(\d{4})$/;
const YEAR_MONTH = /^(\d{4})-(\d{1,2})$/;
const CALENDAR_DATE = /^(\d{4})-(\d{1,2})-(\d{1,2})$/;
const ISO_TIMESTAMP = /^\d{4}-\d{2}-\d{2}T/;

/**
 * Parse "YYYY", "YYYY-MM", "YYYY-MM-DD" (all UTC midnight) or a full ISO-8601
 * timestamp. Anything else, including impossible calendar dates, is null.
 */
export function parseDate(value: string): Date | null {
  const input = value.trim();

  let match = YEAR.exec(input);
  if (match) {
    return utcDate(Number(match[1]), 1, 1);
  }

  match = YEAR_MONTH.exec(input);
  if (match) {
    return utcDate(Number(match[1]), Number(match[2]), 1);
  }

  match = CALENDAR_DATE.exec(input);
  if (match) {
    return utcDate(Number(match[1]), Number(match[2]), Number(match[3]));
  }

  if (ISO_TIMESTAMP.test(input)) {
    const timestamp = Date.parse(input);
    return Number.isNaN(timestamp) ? null : new Date(timestamp);
  }

  return null;
}

function utcDate(year: number, month: number, day: number): Date | null {
  const date = new Date(Date.UTC(year, month - 1, day));
  // Date.UTC rolls 2023-02-30 over into March; reject instead
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }
  return date;
}
