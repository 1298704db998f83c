/**
 * Profile fingerprint: SHA-256 over canonical JSON (object keys sorted at
 * every level), so key order in the submitted document never matters.
 */

import { createHash } from 'crypto';
import type { ApplicantProfile } from '../entities/ApplicantProfile.js';

export function computeProfileFingerprint(profile: ApplicantProfile): string {
  return createHash('sha256').update(canonicalJson(profile)).digest('hex');
}

export function canonicalJson(value: unknown): string {
  return JSON.stringify(canonicalize(value));
}

function canonicalize(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(canonicalize);
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (value && typeof value === 'object') {
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      sorted[key] = canonicalize(Reflect.get(value, key));
    }
    return sorted;
  }
  return value;
}
