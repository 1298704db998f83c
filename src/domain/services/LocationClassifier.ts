/**
 * Location Classifier
 *
 * Decides whether a free-text location lies in an approved region.
 *
 * Matching order matters:
 * 1. Exclusion phrases first. A hit rejects the location outright, whatever
 *    else matches ("Sydney, Australia" contains "us"; "Indiana" contains
 *    "india").
 * 2. Approved phrases as substrings of the normalized text.
 * 3. Approved country codes as whole words only.
 */

import type { LocationPolicy } from '../../config/ScreeningPolicy.js';

export interface LocationMatch {
  approved: boolean;
  normalized: string;
  /** Approved phrase or code that matched */
  matchedTerm: string | null;
  /** Exclusion phrase that vetoed the location */
  excludedBy: string | null;
}

export class LocationClassifier {
  private readonly approvedPhrases: string[];
  private readonly approvedCodes: Set<string>;
  private readonly exclusionPhrases: string[];

  constructor(policy: LocationPolicy) {
    this.approvedPhrases = normalizeTerms(policy.approvedPhrases);
    this.approvedCodes = new Set(normalizeTerms(policy.approvedCountryCodes));
    this.exclusionPhrases = normalizeTerms(policy.exclusionPhrases);
  }

  isApproved(location: string): boolean {
    return this.classify(location).approved;
  }

  classify(location: string): LocationMatch {
    const normalized = normalizeLocation(location);
    const miss: LocationMatch = { approved: false, normalized, matchedTerm: null, excludedBy: null };

    if (!normalized) {
      return miss;
    }

    const excludedBy = this.exclusionPhrases.find((phrase) => normalized.includes(phrase));
    if (excludedBy) {
      return { ...miss, excludedBy };
    }

    const phrase = this.approvedPhrases.find((candidate) => normalized.includes(candidate));
    if (phrase) {
      return { ...miss, approved: true, matchedTerm: phrase };
    }

    const code = normalized.split(' ').find((word) => this.approvedCodes.has(word));
    if (code) {
      return { ...miss, approved: true, matchedTerm: code };
    }

    return miss;
  }
}

/**
 * Lower-case, fold accents, drop periods ("U.S.A." -> "usa"), turn any other
 * punctuation into a space and collapse whitespace.
 */
export function normalizeLocation(location: string): string {
  return location
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/\./g, '')
    .replace(/[^a-z0-9]+/g, ' ')
    .trim();
}

function normalizeTerms(terms: readonly string[]): string[] {
  return terms.map(normalizeLocation).filter((term) => term.length > 0);
}
