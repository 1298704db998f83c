/**
 * Applicant Routes
 *
 * Decision, enrichment and batch endpoints over the applicant pipeline.
 * Profiles are accepted as submitted; their contents are validated by the
 * pipeline, only the envelope is validated here.
 */

import { Router } from 'express';
import { z } from 'zod';
import type { ApplicantPipeline } from '../../domain/services/index.js';
import { BadRequestError } from '../middleware/errorHandler.js';

// =============================================================================
// VALIDATION SCHEMAS
// =============================================================================

const profileSchema = z.union([z.record(z.unknown()), z.string().min(1)]);

const evaluateSchema = z.object({
  applicantId: z.string().min(1).default('anonymous'),
  profile: profileSchema,
});

const enrichSchema = z.object({
  applicantId: z.string().min(1),
  profile: profileSchema,
  force: z.boolean().default(false),
});

const batchSchema = z.object({
  applicants: z
    .array(
      z.object({
        applicantId: z.string().min(1),
        profile: z.unknown(),
      })
    )
    .min(1)
    .max(500),
  force: z.boolean().default(false),
  enrich: z.boolean().default(true),
});

// =============================================================================
// ROUTES
// =============================================================================

export function createApplicantRouter(pipeline: ApplicantPipeline): Router {
  const router = Router();

  /**
   * POST /applicants/evaluate - Qualification verdict for one applicant
   */
  router.post('/evaluate', (req, res, next) => {
    try {
      const { applicantId, profile } = evaluateSchema.parse(req.body);
      const evaluation = pipeline.evaluate({ applicantId, profile });

      res.json({
        applicantId: evaluation.applicantId,
        qualifies: evaluation.verdict.qualifies,
        criteria: evaluation.verdict.criteria,
        explanation: evaluation.explanation,
        warnings: evaluation.warnings,
        lead: evaluation.lead,
      });
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /applicants/enrich - Summary, score, issues and follow-ups
   */
  router.post('/enrich', async (req, res, next) => {
    try {
      const { applicantId, profile, force } = enrichSchema.parse(req.body);
      const outcome = await pipeline.enrich({ applicantId, profile }, { force });

      if (!outcome.ok) {
        throw outcome.error;
      }

      res.json({
        applicantId,
        cached: outcome.cached,
        enrichment: outcome.record,
      });
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /applicants/batch - Process a batch; per-applicant failures are reported, not raised
   */
  router.post('/batch', async (req, res, next) => {
    try {
      const { applicants, force, enrich } = batchSchema.parse(req.body);

      const seen = new Set<string>();
      const duplicates: string[] = [];
      for (const { applicantId } of applicants) {
        if (seen.has(applicantId)) duplicates.push(applicantId);
        seen.add(applicantId);
      }
      if (duplicates.length > 0) {
        throw new BadRequestError('Duplicate applicant ids in batch', { duplicates });
      }

      const report = await pipeline.processBatch(
        applicants.map(({ applicantId, profile }) => ({ applicantId, profile })),
        { force, enrich }
      );
      res.json(report);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
