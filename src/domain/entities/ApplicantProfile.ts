/**
 * Applicant Profile - Normalized screening input
 *
 * The record store hands over one JSON document per applicant with the
 * sections `personal`, `experience` and `salary` (snake_case on the wire).
 * Parsing is lenient: a bad employment period or a broken section becomes a
 * warning and the evaluation continues with whatever is left.
 */

import { z } from 'zod';
import { CURRENCIES, type Currency } from '../../config/ScreeningPolicy.js';

// =============================================================================
// TYPES
// =============================================================================

export interface PersonalDetails {
  readonly name: string;
  readonly location: string;
  /** Email, LinkedIn and any other contact fields, passed through untouched */
  readonly contact: Readonly<Record<string, unknown>>;
}

export interface EmploymentPeriod {
  readonly company: string;
  readonly title: string;
  readonly start: string;
  /** Date string, a "present" marker, or empty for an ongoing role */
  readonly end: string;
  readonly technologies: string;
}

export interface SalaryPreferences {
  readonly preferredRate: number;
  readonly minimumRate: number;
  readonly currency: Currency;
  readonly availabilityHoursPerWeek: number;
}

export interface ApplicantProfile {
  readonly personal: PersonalDetails | null;
  readonly experience: readonly EmploymentPeriod[];
  readonly salary: SalaryPreferences | null;
}

export interface ParsedProfile {
  profile: ApplicantProfile;
  warnings: string[];
}

export class ProfileValidationError extends Error {
  constructor(
    message: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ProfileValidationError';
  }
}

// =============================================================================
// WIRE SCHEMAS
// =============================================================================

const numeric = z
  .union([z.number(), z.string().trim().min(1).transform(Number)])
  .pipe(z.number().finite());

const text = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((value) => (value == null ? '' : String(value).trim()));

const personalSchema = z
  .object({
    name: text,
    location: text,
  })
  .passthrough();

const periodSchema = z.object({
  company: text,
  title: text,
  start: text,
  end: text,
  technologies: z
    .union([z.string(), z.array(z.string())])
    .nullish()
    .transform((value) => (Array.isArray(value) ? value.join(', ') : (value ?? '').trim())),
});

const salarySchema = z
  .object({
    preferred_rate: numeric,
    minimum_rate: numeric.optional(),
    currency: z
      .string()
      .default('USD')
      .transform((value) => value.trim().toUpperCase())
      .pipe(z.enum(CURRENCIES)),
    availability_hours_per_week: numeric.optional(),
    // Older compressed records used the short key
    availability: numeric.optional(),
  })
  .refine(
    (salary) => salary.availability_hours_per_week !== undefined || salary.availability !== undefined,
    { message: 'is required', path: ['availability_hours_per_week'] }
  );

// =============================================================================
// PARSING
// =============================================================================

/**
 * Parse a raw applicant document (object or JSON string).
 * Throws ProfileValidationError only when the document is not an object at all.
 */
export function parseApplicantProfile(raw: unknown): ParsedProfile {
  const document = typeof raw === 'string' ? parseJsonDocument(raw) : raw;

  if (!isRecord(document)) {
    throw new ProfileValidationError('Applicant profile must be a JSON object', {
      received: Array.isArray(document) ? 'array' : typeof document,
    });
  }

  const warnings: string[] = [];
  const personal = parsePersonal(document.personal, warnings);
  const experience = parseExperience(document.experience, warnings);
  const salary = parseSalary(document.salary, warnings);

  return {
    profile: { personal, experience, salary },
    warnings,
  };
}

function parsePersonal(raw: unknown, warnings: string[]): PersonalDetails | null {
  if (raw === undefined || raw === null) {
    warnings.push('personal: section missing');
    return null;
  }

  const result = personalSchema.safeParse(raw);
  if (!result.success) {
    warnings.push(`personal: ${formatIssues(result.error)}`);
    return null;
  }

  const { name, location, ...contact } = result.data;
  return { name, location, contact };
}

function parseExperience(raw: unknown, warnings: string[]): EmploymentPeriod[] {
  if (raw === undefined || raw === null) {
    warnings.push('experience: section missing');
    return [];
  }
  if (!Array.isArray(raw)) {
    warnings.push('experience: expected an array');
    return [];
  }

  const periods: EmploymentPeriod[] = [];
  raw.forEach((entry, index) => {
    const result = periodSchema.safeParse(entry);
    if (result.success) {
      periods.push(result.data);
    } else {
      warnings.push(`experience[${index}]: ${formatIssues(result.error)}`);
    }
  });
  return periods;
}

function parseSalary(raw: unknown, warnings: string[]): SalaryPreferences | null {
  if (raw === undefined || raw === null) {
    warnings.push('salary: section missing');
    return null;
  }

  const result = salarySchema.safeParse(raw);
  if (!result.success) {
    warnings.push(`salary: ${formatIssues(result.error)}`);
    return null;
  }

  const salary = result.data;
  return {
    preferredRate: salary.preferred_rate,
    minimumRate: salary.minimum_rate ?? 0,
    currency: salary.currency,
    availabilityHoursPerWeek: salary.availability_hours_per_week ?? salary.availability ?? 0,
  };
}

function parseJsonDocument(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new ProfileValidationError('Applicant profile is not valid JSON', {
      cause: error instanceof Error ? error.message : String(error),
    });
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')} ${issue.message}` : issue.message))
    .join('; ');
}
