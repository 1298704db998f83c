/**
 * Enrichment Service
 *
 * Wraps the text-generation call that produces an applicant's summary,
 * score, data issues and follow-up questions.
 *
 * Flow per applicant:
 * 1. Fingerprint the profile; an unchanged profile reuses the cached record
 *    unless the caller forces a refresh.
 * 2. Call the model, retrying rate-limit and connection failures with
 *    exponential backoff (1s, 2s, 4s, ... from baseDelayMs).
 * 3. Validate the structured reply. A malformed reply is reported, not retried.
 * 4. Store the new record, replacing the previous one.
 *
 * enrich() never throws; failures come back as { ok: false, error }.
 */

import { z } from 'zod';
import type { Tool } from '@anthropic-ai/sdk/resources/messages';
import {
  EnrichmentError,
  type EnrichmentErrorKind,
  type EnrichmentOutcome,
  type EnrichmentRecord,
} from '../entities/EnrichmentRecord.js';
import type { ApplicantProfile } from '../entities/ApplicantProfile.js';
import {
  classifyClaudeError,
  getClaudeClient,
  type ClaudeClient,
  type ClaudeErrorClass,
  type ClaudeToolResponse,
} from '../../integrations/llm/ClaudeClient.js';
import {
  SUMMARY_WORD_TARGET,
  buildEnrichmentPrompt,
  buildEnrichmentSystemPrompt,
  buildEnrichmentTool,
} from '../../integrations/llm/prompts/enrichment.js';
import { InMemoryEnrichmentCache, type EnrichmentCache } from './EnrichmentCache.js';
import { computeProfileFingerprint } from './ProfileFingerprint.js';

// =============================================================================
// CONFIGURATION
// =============================================================================

export interface EnrichmentConfig {
  /** Total attempts, including the first */
  maxAttempts: number;
  baseDelayMs: number;
  maxTokens: number;
  temperature: number;
  model?: string;
  summaryWordTarget: number;
}

const DEFAULT_CONFIG: EnrichmentConfig = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  maxTokens: 600,
  temperature: 0.3,
  summaryWordTarget: SUMMARY_WORD_TARGET,
};

export type EnrichmentClient = Pick<ClaudeClient, 'callTool'>;

export interface EnrichmentServiceOptions {
  /** Resolved lazily so a missing API key surfaces as an enrichment failure */
  client?: EnrichmentClient | (() => EnrichmentClient);
  cache?: EnrichmentCache;
  config?: Partial<EnrichmentConfig>;
  classifyError?: (error: unknown) => ClaudeErrorClass;
  sleep?: (ms: number) => Promise<void>;
}

export interface EnrichOptions {
  force?: boolean;
}

const enrichmentReplySchema = z.object({
  summary: z.string().trim().min(1),
  score: z.number().int().min(1).max(10),
  issues: z.string().trim().min(1),
  follow_ups: z.string().trim().min(1),
});

// =============================================================================
// ENRICHMENT SERVICE
// =============================================================================

export class EnrichmentService {
  private readonly config: EnrichmentConfig;
  private readonly cache: EnrichmentCache;
  private readonly resolveClient: () => EnrichmentClient;
  private readonly classifyError: (error: unknown) => ClaudeErrorClass;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly inFlight = new Map<string, Promise<EnrichmentOutcome>>();
  private readonly systemPrompt: string;
  private readonly tool: Tool;

  constructor(options: EnrichmentServiceOptions = {}) {
    this.config = { ...DEFAULT_CONFIG, ...definedOnly(options.config) };
    this.cache = options.cache ?? new InMemoryEnrichmentCache();
    const client = options.client;
    this.resolveClient =
      typeof client === 'function' ? client : client ? () => client : () => getClaudeClient();
    this.classifyError = options.classifyError ?? classifyClaudeError;
    this.sleep = options.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
    this.systemPrompt = buildEnrichmentSystemPrompt(this.config.summaryWordTarget);
    this.tool = buildEnrichmentTool(this.config.summaryWordTarget);
  }

  async enrich(
    applicantId: string,
    profile: ApplicantProfile,
    options: EnrichOptions = {}
  ): Promise<EnrichmentOutcome> {
    const sourceHash = computeProfileFingerprint(profile);

    // Concurrent calls for the same applicant and content share one request.
    // A forced call reuses an in-flight result unless that result came from the cache.
    const key = `${applicantId}:${sourceHash}`;
    const pending = this.inFlight.get(key);
    if (pending) {
      const shared = await pending;
      if (!options.force || !shared.ok || !shared.cached) {
        return shared;
      }
      const rerun = this.inFlight.get(key);
      if (rerun) {
        return rerun;
      }
    }

    const run = this.run(applicantId, profile, sourceHash, options).finally(() => {
      this.inFlight.delete(key);
    });
    this.inFlight.set(key, run);
    return run;
  }

  // ===========================================================================
  // PRIVATE HELPERS
  // ===========================================================================

  private async run(
    applicantId: string,
    profile: ApplicantProfile,
    sourceHash: string,
    options: EnrichOptions
  ): Promise<EnrichmentOutcome> {
    try {
      if (!options.force) {
        const cached = await this.cache.get(applicantId);
        if (cached && cached.sourceHash === sourceHash) {
          console.log(`[EnrichmentService] ${applicantId}: profile unchanged, reusing cached evaluation`);
          return { ok: true, record: cached, cached: true };
        }
      }

      const { response, attempts } = await this.requestWithRetry(applicantId, profile);
      const record = this.toRecord(applicantId, response, sourceHash, attempts);
      await this.cache.set(applicantId, record);

      console.log(`[EnrichmentService] ${applicantId}: evaluated (score ${record.score}/10)`);
      return { ok: true, record, cached: false };
    } catch (error) {
      const enrichmentError =
        error instanceof EnrichmentError
          ? error
          : new EnrichmentError(errorMessage(error), 'permanent', applicantId, 0);
      console.error(
        `[EnrichmentService] ${applicantId}: enrichment failed (${enrichmentError.kind}, ${enrichmentError.attempts} attempt(s)):`,
        enrichmentError.message
      );
      return { ok: false, error: enrichmentError };
    }
  }

  /**
   * Explicit attempt loop. Each failure is classified once: transient
   * failures wait and go round again, anything else leaves the loop.
   */
  private async requestWithRetry(
    applicantId: string,
    profile: ApplicantProfile
  ): Promise<{ response: ClaudeToolResponse; attempts: number }> {
    const { maxAttempts, baseDelayMs } = this.config;
    let lastError: EnrichmentError | null = null;

    for (let attempt = 0; attempt < maxAttempts; attempt++) {
      try {
        const response = await this.resolveClient().callTool({
          systemPrompt: this.systemPrompt,
          prompt: buildEnrichmentPrompt(JSON.stringify(profile, null, 2)),
          tool: this.tool,
          model: this.config.model,
          maxTokens: this.config.maxTokens,
          temperature: this.config.temperature,
        });
        return { response, attempts: attempt + 1 };
      } catch (error) {
        const errorClass = this.classifyError(error);
        const kind: EnrichmentErrorKind = errorClass === 'fatal' ? 'permanent' : errorClass;
        lastError = new EnrichmentError(errorMessage(error), kind, applicantId, attempt + 1);

        if (!lastError.retryable || attempt + 1 >= maxAttempts) {
          throw lastError;
        }

        const delayMs = baseDelayMs * 2 ** attempt;
        console.warn(
          `[EnrichmentService] ${applicantId}: ${kind} on attempt ${attempt + 1}/${maxAttempts}, retrying in ${delayMs}ms`
        );
        await this.sleep(delayMs);
      }
    }

    throw lastError ?? new EnrichmentError('No attempts were made', 'permanent', applicantId, 0);
  }

  private toRecord(
    applicantId: string,
    response: ClaudeToolResponse,
    sourceHash: string,
    attempts: number
  ): EnrichmentRecord {
    const parsed = enrichmentReplySchema.safeParse(response.input);
    if (!parsed.success) {
      throw new EnrichmentError(
        `Invalid evaluation reply: ${parsed.error.issues
          .map((issue) => `${issue.path.join('.') || 'reply'} ${issue.message}`)
          .join('; ')}`,
        'invalid_response',
        applicantId,
        attempts,
        { reply: response.input, stopReason: response.stopReason }
      );
    }

    const reply = parsed.data;
    const words = countWords(reply.summary);
    if (words > this.config.summaryWordTarget) {
      console.warn(
        `[EnrichmentService] ${applicantId}: summary has ${words} words (target ${this.config.summaryWordTarget}), keeping as is`
      );
    }

    return {
      summary: reply.summary,
      score: reply.score,
      issues: reply.issues,
      followUps: reply.follow_ups,
      sourceHash,
      model: response.model,
      generatedAt: new Date(),
    };
  }
}

// =============================================================================
// UTILITIES
// =============================================================================

export function countWords(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function definedOnly(config: Partial<EnrichmentConfig> | undefined): Partial<EnrichmentConfig> {
  if (!config) return {};
  const result: Partial<EnrichmentConfig> = {};
  if (config.maxAttempts !== undefined) result.maxAttempts = config.maxAttempts;
  if (config.baseDelayMs !== undefined) result.baseDelayMs = config.baseDelayMs;
  if (config.maxTokens !== undefined) result.maxTokens = config.maxTokens;
  if (config.temperature !== undefined) result.temperature = config.temperature;
  if (config.model !== undefined) result.model = config.model;
  if (config.summaryWordTarget !== undefined) result.summaryWordTarget = config.summaryWordTarget;
  return result;
}
