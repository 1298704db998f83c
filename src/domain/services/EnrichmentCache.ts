/**
 * Enrichment Cache
 *
 * Last successful enrichment per applicant. The record carries the
 * fingerprint it was generated from, so a lookup is a hit only when the
 * profile is unchanged. The record store can supply a durable
 * implementation; the in-memory one lives for the process and never evicts.
 */

import type { EnrichmentRecord } from '../entities/EnrichmentRecord.js';

export interface EnrichmentCache {
  get(applicantId: string): Promise<EnrichmentRecord | undefined>;
  set(applicantId: string, record: EnrichmentRecord): Promise<void>;
}

export class InMemoryEnrichmentCache implements EnrichmentCache {
  private readonly entries = new Map<string, EnrichmentRecord>();

  async get(applicantId: string): Promise<EnrichmentRecord | undefined> {
    return this.entries.get(applicantId);
  }

  async set(applicantId: string, record: EnrichmentRecord): Promise<void> {
    this.entries.set(applicantId, record);
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }
}
