/**
 * Applicant Pipeline
 *
 * Runs a batch of applicant documents through parsing, the qualification
 * decision and enrichment, one applicant at a time. A failure is recorded
 * against the applicant and the stage it happened in; the batch carries on.
 */

import { v4 as uuidv4 } from 'uuid';
import { loadEnv, enrichmentSettingsFromEnv, screeningPolicyFromEnv, type AppEnv } from '../../config/env.js';
import { parseApplicantProfile, type ParsedProfile } from '../entities/ApplicantProfile.js';
import type { EnrichmentOutcome, EnrichmentRecord } from '../entities/EnrichmentRecord.js';
import { formatExplanation, type QualificationVerdict } from '../entities/QualificationVerdict.js';
import { buildShortlistedLead, type ShortlistedLead } from '../entities/ShortlistedLead.js';
import { getClaudeClient } from '../../integrations/llm/ClaudeClient.js';
import { EnrichmentService } from './EnrichmentService.js';
import { QualificationEngine } from './QualificationEngine.js';
import type { Clock } from './ExperienceCalculator.js';

// =============================================================================
// TYPES
// =============================================================================

export interface ApplicantInput {
  applicantId: string;
  /** Raw applicant document: an object or a JSON string */
  profile: unknown;
}

export type PipelineStage = 'parse' | 'decision' | 'enrichment';

export interface PipelineFailure {
  stage: PipelineStage;
  message: string;
  /** Enrichment error kind, when the enrichment stage failed */
  kind?: string;
}

export interface ApplicantResult {
  applicantId: string;
  verdict: QualificationVerdict | null;
  explanation: string | null;
  warnings: string[];
  lead: ShortlistedLead | null;
  enrichment: EnrichmentRecord | null;
  enrichmentCached: boolean;
  failure: PipelineFailure | null;
}

export interface PipelineOptions {
  /** Skip the fingerprint cache and regenerate enrichment */
  force?: boolean;
  /** Call the enrichment stage at all (default true) */
  enrich?: boolean;
}

export interface ApplicantEvaluation {
  applicantId: string;
  verdict: QualificationVerdict;
  explanation: string;
  warnings: string[];
  lead: ShortlistedLead | null;
}

export interface BatchSummary {
  total: number;
  evaluated: number;
  shortlisted: number;
  enriched: number;
  cached: number;
  failed: number;
}

export interface BatchReport {
  runId: string;
  startedAt: Date;
  completedAt: Date;
  results: ApplicantResult[];
  summary: BatchSummary;
}

// =============================================================================
// APPLICANT PIPELINE
// =============================================================================

export class ApplicantPipeline {
  constructor(
    private readonly engine: QualificationEngine,
    private readonly enrichment: EnrichmentService,
    private readonly clock: Clock = () => new Date()
  ) {}

  async processBatch(applicants: readonly ApplicantInput[], options: PipelineOptions = {}): Promise<BatchReport> {
    const runId = uuidv4();
    const startedAt = this.clock();
    console.log(`[ApplicantPipeline] Run ${runId}: processing ${applicants.length} applicant(s)`);

    const results: ApplicantResult[] = [];
    for (const applicant of applicants) {
      results.push(await this.processApplicant(applicant, options));
    }

    const summary = summarize(results);
    console.log(
      `[ApplicantPipeline] Run ${runId}: ${summary.evaluated} evaluated, ${summary.shortlisted} shortlisted, ` +
        `${summary.enriched} enriched (${summary.cached} cached), ${summary.failed} failed`
    );

    return { runId, startedAt, completedAt: this.clock(), results, summary };
  }

  /**
   * Parse and decide a single applicant. Throws ProfileValidationError when
   * the document is not an applicant object.
   */
  evaluate(input: ApplicantInput): ApplicantEvaluation {
    const { profile, warnings } = parseApplicantProfile(input.profile);
    const verdict = this.engine.evaluate(profile);
    return {
      applicantId: input.applicantId,
      verdict,
      explanation: formatExplanation(verdict),
      warnings,
      lead: verdict.qualifies ? buildShortlistedLead(input.applicantId, input.profile, verdict, this.clock()) : null,
    };
  }

  /**
   * Parse and enrich a single applicant, independent of the decision.
   */
  async enrich(input: ApplicantInput, options: Pick<PipelineOptions, 'force'> = {}): Promise<EnrichmentOutcome> {
    const { profile } = parseApplicantProfile(input.profile);
    return this.enrichment.enrich(input.applicantId, profile, { force: options.force });
  }

  async processApplicant(input: ApplicantInput, options: PipelineOptions = {}): Promise<ApplicantResult> {
    const result: ApplicantResult = {
      applicantId: input.applicantId,
      verdict: null,
      explanation: null,
      warnings: [],
      lead: null,
      enrichment: null,
      enrichmentCached: false,
      failure: null,
    };

    let parsed: ParsedProfile;
    try {
      parsed = parseApplicantProfile(input.profile);
      result.warnings = parsed.warnings;
    } catch (error) {
      return this.fail(result, 'parse', error);
    }

    try {
      const verdict = this.engine.evaluate(parsed.profile);
      result.verdict = verdict;
      result.explanation = formatExplanation(verdict);
      if (verdict.qualifies) {
        result.lead = buildShortlistedLead(input.applicantId, input.profile, verdict, this.clock());
      }
    } catch (error) {
      return this.fail(result, 'decision', error);
    }

    if (options.enrich === false) {
      return result;
    }

    const outcome = await this.enrichment.enrich(input.applicantId, parsed.profile, { force: options.force });
    if (outcome.ok) {
      result.enrichment = outcome.record;
      result.enrichmentCached = outcome.cached;
    } else {
      result.failure = { stage: 'enrichment', message: outcome.error.message, kind: outcome.error.kind };
    }

    return result;
  }

  private fail(result: ApplicantResult, stage: PipelineStage, error: unknown): ApplicantResult {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`[ApplicantPipeline] ${result.applicantId}: ${stage} failed:`, message);
    result.failure = { stage, message };
    return result;
  }
}

function summarize(results: readonly ApplicantResult[]): BatchSummary {
  return {
    total: results.length,
    evaluated: results.filter((r) => r.verdict !== null).length,
    shortlisted: results.filter((r) => r.lead !== null).length,
    enriched: results.filter((r) => r.enrichment !== null).length,
    cached: results.filter((r) => r.enrichmentCached).length,
    failed: results.filter((r) => r.failure !== null).length,
  };
}

// =============================================================================
// FACTORY / SINGLETON
// =============================================================================

export function createApplicantPipeline(env: AppEnv): ApplicantPipeline {
  const settings = enrichmentSettingsFromEnv(env);
  const engine = new QualificationEngine(screeningPolicyFromEnv(env));
  const enrichment = new EnrichmentService({
    client: () => getClaudeClient({ apiKey: settings.apiKey }),
    config: {
      model: settings.model,
      maxAttempts: settings.maxAttempts,
      baseDelayMs: settings.baseDelayMs,
      maxTokens: settings.maxTokens,
    },
  });
  return new ApplicantPipeline(engine, enrichment);
}

let instance: ApplicantPipeline | null = null;

export function getApplicantPipeline(): ApplicantPipeline {
  if (!instance) {
    instance = createApplicantPipeline(loadEnv());
  }
  return instance;
}

export function resetApplicantPipeline(): void {
  instance = null;
}
