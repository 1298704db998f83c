/**
 * Shortlisted Lead - What the record store keeps for a qualified applicant
 */

import { formatExplanation, type QualificationVerdict } from './QualificationVerdict.js';

export interface ShortlistedLead {
  applicantId: string;
  /** The applicant document exactly as it was submitted, serialized */
  profileJson: string;
  scoreReason: string;
  createdAt: Date;
}

export function buildShortlistedLead(
  applicantId: string,
  rawProfile: unknown,
  verdict: QualificationVerdict,
  createdAt: Date = new Date()
): ShortlistedLead {
  if (!verdict.qualifies) {
    throw new Error(`Applicant ${applicantId} does not qualify for the shortlist`);
  }

  return {
    applicantId,
    profileJson: typeof rawProfile === 'string' ? rawProfile : JSON.stringify(rawProfile),
    scoreReason: formatExplanation(verdict),
    createdAt,
  };
}
