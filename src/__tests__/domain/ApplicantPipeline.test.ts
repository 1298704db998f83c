/**
 * Applicant Pipeline Tests
 *
 * Tests batch processing and per-applicant failure isolation.
 */

import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import Anthropic from '@anthropic-ai/sdk';
import { ApplicantPipeline, type ApplicantInput } from '../../domain/services/ApplicantPipeline.js';
import { EnrichmentService, type EnrichmentClient } from '../../domain/services/EnrichmentService.js';
import { QualificationEngine } from '../../domain/services/QualificationEngine.js';
import { DEFAULT_SCREENING_POLICY } from '../../config/ScreeningPolicy.js';
import type { ClaudeToolResponse } from '../../integrations/llm/ClaudeClient.js';

const NOW = new Date('2025-01-01T00:00:00Z');

const qualifiedProfile = {
  personal: { name: 'Ada', location: 'Toronto, Canada' },
  experience: [{ company: 'Acme Corp', title: 'Engineer', start: '2019-01-01', end: '2024-01-01' }],
  salary: { preferred_rate: 90, availability_hours_per_week: 25 },
};

const rejectedProfile = {
  personal: { name: 'Bo', location: 'Sydney, Australia' },
  experience: [{ company: 'Initech', title: 'Engineer', start: '2023-01-01', end: '2024-01-01' }],
  salary: { preferred_rate: 150, availability_hours_per_week: 10 },
};

const reply: ClaudeToolResponse = {
  input: { summary: 'Experienced engineer.', score: 7, issues: 'None', follow_ups: '- Notice period?' },
  model: 'test-model',
  usage: { inputTokens: 10, outputTokens: 10, totalTokens: 20 },
  stopReason: 'tool_use',
  latencyMs: 1,
};

describe('ApplicantPipeline', () => {
  let callTool: jest.Mock<EnrichmentClient['callTool']>;
  let pipeline: ApplicantPipeline;

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);

    callTool = jest.fn<EnrichmentClient['callTool']>();
    callTool.mockResolvedValue(reply);
    pipeline = new ApplicantPipeline(
      new QualificationEngine(DEFAULT_SCREENING_POLICY, () => NOW),
      new EnrichmentService({ client: { callTool }, sleep: async () => undefined }),
      () => NOW
    );
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('processApplicant', () => {
    it('should evaluate, shortlist and enrich a qualified applicant', async () => {
      const result = await pipeline.processApplicant({ applicantId: 'app-1', profile: qualifiedProfile });

      expect(result.failure).toBeNull();
      expect(result.verdict?.qualifies).toBe(true);
      expect(result.explanation).toBe(
        [
          'Experience: 5.00 years total experience (>= 4 required)',
          'Compensation: $90/hr (<= $100/hr) and 25 hrs/wk (>= 20 hrs/wk)',
          'Location: Toronto, Canada (approved region, matched "canada")',
        ].join('\n')
      );
      expect(result.lead).toEqual({
        applicantId: 'app-1',
        profileJson: JSON.stringify(qualifiedProfile),
        scoreReason: result.explanation,
        createdAt: NOW,
      });
      expect(result.enrichment?.score).toBe(7);
      expect(result.enrichmentCached).toBe(false);
    });

    it('should not shortlist a rejected applicant but still enrich it', async () => {
      const result = await pipeline.processApplicant({ applicantId: 'app-2', profile: rejectedProfile });

      expect(result.verdict?.qualifies).toBe(false);
      expect(result.lead).toBeNull();
      expect(result.enrichment).not.toBeNull();
    });

    it('should report a parse failure with its stage', async () => {
      const result = await pipeline.processApplicant({ applicantId: 'app-3', profile: '{broken' });

      expect(result.failure).toEqual({ stage: 'parse', message: 'Applicant profile is not valid JSON' });
      expect(result.verdict).toBeNull();
      expect(callTool).not.toHaveBeenCalled();
    });

    it('should keep the verdict when enrichment fails', async () => {
      callTool.mockRejectedValue(new Anthropic.AuthenticationError(401, undefined, 'invalid x-api-key', undefined));

      const result = await pipeline.processApplicant({ applicantId: 'app-1', profile: qualifiedProfile });

      expect(result.verdict?.qualifies).toBe(true);
      expect(result.lead).not.toBeNull();
      expect(result.failure?.stage).toBe('enrichment');
      expect(result.failure?.kind).toBe('permanent');
    });

    it('should skip enrichment when disabled', async () => {
      const result = await pipeline.processApplicant(
        { applicantId: 'app-1', profile: qualifiedProfile },
        { enrich: false }
      );

      expect(result.enrichment).toBeNull();
      expect(callTool).not.toHaveBeenCalled();
    });
  });

  describe('processBatch', () => {
    it('should isolate failures and count outcomes', async () => {
      const applicants: ApplicantInput[] = [
        { applicantId: 'app-1', profile: qualifiedProfile },
        { applicantId: 'app-2', profile: [1, 2, 3] },
        { applicantId: 'app-3', profile: rejectedProfile },
      ];

      const report = await pipeline.processBatch(applicants);

      expect(report.runId).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
      expect(report.startedAt).toEqual(NOW);
      expect(report.completedAt).toEqual(NOW);
      expect(report.results.map((r) => r.applicantId)).toEqual(['app-1', 'app-2', 'app-3']);
      expect(report.results[1]?.failure?.stage).toBe('parse');
      expect(report.summary).toEqual({
        total: 3,
        evaluated: 2,
        shortlisted: 1,
        enriched: 2,
        cached: 0,
        failed: 1,
      });
    });

    it('should reuse cached enrichment on a second run', async () => {
      const applicants: ApplicantInput[] = [{ applicantId: 'app-1', profile: qualifiedProfile }];

      await pipeline.processBatch(applicants);
      const second = await pipeline.processBatch(applicants);

      expect(callTool).toHaveBeenCalledTimes(1);
      expect(second.summary.cached).toBe(1);

      const forced = await pipeline.processBatch(applicants, { force: true });
      expect(callTool).toHaveBeenCalledTimes(2);
      expect(forced.summary.cached).toBe(0);
    });
  });

  describe('single-applicant operations', () => {
    it('should evaluate without enrichment', () => {
      const evaluation = pipeline.evaluate({ applicantId: 'app-2', profile: rejectedProfile });

      expect(evaluation.verdict.qualifies).toBe(false);
      expect(evaluation.lead).toBeNull();
      expect(evaluation.warnings).toEqual([]);
      expect(callTool).not.toHaveBeenCalled();
    });

    it('should enrich without a verdict', async () => {
      const outcome = await pipeline.enrich({ applicantId: 'app-2', profile: rejectedProfile });

      expect(outcome.ok).toBe(true);
      expect(callTool).toHaveBeenCalledTimes(1);
    });
  });
});
