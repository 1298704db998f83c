/**
 * Qualification Verdict - Output of the decision engine
 *
 * Built fresh for every evaluation and frozen; it has no identity beyond the
 * call that produced it.
 */

// =============================================================================
// TYPES
// =============================================================================

export const CRITERIA = ['experience', 'compensation', 'location'] as const;

export type CriterionName = (typeof CRITERIA)[number];

export interface CriterionResult {
  readonly passed: boolean;
  readonly reason: string;
}

export interface QualificationVerdict {
  readonly qualifies: boolean;
  readonly criteria: Readonly<Record<CriterionName, CriterionResult>>;
}

const CRITERION_LABELS: Record<CriterionName, string> = {
  experience: 'Experience',
  compensation: 'Compensation',
  location: 'Location',
};

// =============================================================================
// FACTORY
// =============================================================================

/**
 * Strict conjunction: qualifies only when every criterion passed.
 */
export function createVerdict(criteria: Record<CriterionName, CriterionResult>): QualificationVerdict {
  const frozen = Object.freeze({
    experience: Object.freeze({ ...criteria.experience }),
    compensation: Object.freeze({ ...criteria.compensation }),
    location: Object.freeze({ ...criteria.location }),
  });

  return Object.freeze({
    qualifies: CRITERIA.every((name) => frozen[name].passed),
    criteria: frozen,
  });
}

/**
 * One line per criterion, prefixed by its name. This is the text stored as
 * the applicant's score reason.
 */
export function formatExplanation(verdict: QualificationVerdict): string {
  return CRITERIA.map((name) => `${CRITERION_LABELS[name]}: ${verdict.criteria[name].reason}`).join('\n');
}
