/**
 * Enrichment Record - LLM-generated assessment of an applicant
 */

export interface EnrichmentRecord {
  /** Target is 75 words; the model is instructed, not truncated */
  summary: string;
  /** Integer in [1, 10] */
  score: number;
  /** Comma-separated data gaps, or "None" */
  issues: string;
  /** 1-3 bullet items */
  followUps: string;
  /** Fingerprint of the profile this record was generated from */
  sourceHash: string;
  model: string;
  generatedAt: Date;
}

/**
 * How an enrichment attempt failed.
 * - rate_limited / connection: transient, retried with backoff
 * - permanent: rejected by the service (auth, bad request, ...), never retried
 * - invalid_response: reply did not match the expected shape, never retried
 */
export type EnrichmentErrorKind = 'rate_limited' | 'connection' | 'permanent' | 'invalid_response';

export class EnrichmentError extends Error {
  constructor(
    message: string,
    public readonly kind: EnrichmentErrorKind,
    public readonly applicantId: string,
    public readonly attempts: number,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'EnrichmentError';
  }

  get retryable(): boolean {
    return this.kind === 'rate_limited' || this.kind === 'connection';
  }
}

export type EnrichmentOutcome =
  | { ok: true; record: EnrichmentRecord; cached: boolean }
  | { ok: false; error: EnrichmentError };
