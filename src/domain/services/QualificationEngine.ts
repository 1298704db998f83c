/**
 * Qualification Engine
 *
 * Composes the experience, compensation and location checks into a single
 * shortlist verdict. Deterministic for a given profile, policy and clock,
 * and free of side effects beyond warning logs for skipped periods.
 *
 * Criteria (all must pass):
 * 1. Experience: >= minYears total, OR any tier-1 employer
 * 2. Compensation: rate <= ceiling AND availability >= minimum
 * 3. Location: in an approved region
 */

import { DEFAULT_SCREENING_POLICY, type ScreeningPolicy } from '../../config/ScreeningPolicy.js';
import type { ApplicantProfile } from '../entities/ApplicantProfile.js';
import {
  createVerdict,
  type CriterionResult,
  type QualificationVerdict,
} from '../entities/QualificationVerdict.js';
import { CompensationChecker } from './CompensationChecker.js';
import { ExperienceCalculator, type Clock, type ExperienceSummary } from './ExperienceCalculator.js';
import { LocationClassifier } from './LocationClassifier.js';

export class QualificationEngine {
  private readonly experienceCalculator: ExperienceCalculator;
  private readonly locationClassifier: LocationClassifier;
  private readonly compensationChecker: CompensationChecker;

  constructor(
    private readonly policy: ScreeningPolicy = DEFAULT_SCREENING_POLICY,
    clock?: Clock
  ) {
    this.experienceCalculator = new ExperienceCalculator(policy.experience, clock);
    this.locationClassifier = new LocationClassifier(policy.location);
    this.compensationChecker = new CompensationChecker(policy.compensation);
  }

  evaluate(profile: ApplicantProfile): QualificationVerdict {
    return createVerdict({
      experience: this.evaluateExperience(profile),
      compensation: this.evaluateCompensation(profile),
      location: this.evaluateLocation(profile),
    });
  }

  // ===========================================================================
  // CRITERIA
  // ===========================================================================

  private evaluateExperience(profile: ApplicantProfile): CriterionResult {
    if (profile.experience.length === 0) {
      return { passed: false, reason: 'No work experience provided' };
    }

    const summary = this.experienceCalculator.compute(profile.experience);
    const { minYears } = this.policy.experience;
    const years = summary.totalYears.toFixed(2);

    if (summary.totalYears >= minYears) {
      return {
        passed: true,
        reason: `${years} years total experience (>= ${minYears} required)${skippedNote(summary)}`,
      };
    }

    if (summary.tier1Match !== null) {
      return {
        passed: true,
        reason: `Worked at ${summary.tier1Match} (tier-1 employer); ${years} years total experience${skippedNote(summary)}`,
      };
    }

    return {
      passed: false,
      reason: `Only ${years} years total experience (>= ${minYears} required) and no tier-1 employer${skippedNote(summary)}`,
    };
  }

  private evaluateCompensation(profile: ApplicantProfile): CriterionResult {
    if (!profile.salary) {
      return { passed: false, reason: 'No salary preferences provided' };
    }

    const { preferredRate, availabilityHoursPerWeek, currency } = profile.salary;
    const { passed, reason } = this.compensationChecker.check(preferredRate, availabilityHoursPerWeek, currency);
    return { passed, reason };
  }

  private evaluateLocation(profile: ApplicantProfile): CriterionResult {
    if (!profile.personal) {
      return { passed: false, reason: 'No personal details provided' };
    }

    const { location } = profile.personal;
    if (!location) {
      return { passed: false, reason: 'No location provided' };
    }

    const match = this.locationClassifier.classify(location);
    if (match.approved) {
      return { passed: true, reason: `${location} (approved region, matched "${match.matchedTerm}")` };
    }
    if (match.excludedBy) {
      return { passed: false, reason: `${location} (not in approved regions, excluded by "${match.excludedBy}")` };
    }
    return { passed: false, reason: `${location} (not in approved regions)` };
  }
}

function skippedNote(summary: ExperienceSummary): string {
  const count = summary.skipped.length;
  if (count === 0) return '';
  return `; ${count} employment period${count === 1 ? '' : 's'} skipped`;
}
