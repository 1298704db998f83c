/**
 * Domain Services Module
 *
 * - Decision: experience, compensation and location checks composed into a verdict
 * - Enrichment: model-generated summary and score, cached per profile fingerprint
 * - Pipeline: batch processing with per-applicant failure isolation
 */

export {
  ExperienceCalculator,
  parseDate,
  type Clock,
  type ExperienceSummary,
  type SkippedPeriod,
} from './ExperienceCalculator.js';

export { LocationClassifier, normalizeLocation, type LocationMatch } from './LocationClassifier.js';

export { CompensationChecker, type CompensationResult } from './CompensationChecker.js';

export { QualificationEngine } from './QualificationEngine.js';

export { computeProfileFingerprint, canonicalJson } from './ProfileFingerprint.js';

export { InMemoryEnrichmentCache, type EnrichmentCache } from './EnrichmentCache.js';

export {
  EnrichmentService,
  countWords,
  type EnrichmentClient,
  type EnrichmentConfig,
  type EnrichmentServiceOptions,
  type EnrichOptions,
} from './EnrichmentService.js';

export {
  ApplicantPipeline,
  createApplicantPipeline,
  getApplicantPipeline,
  resetApplicantPipeline,
  type ApplicantEvaluation,
  type ApplicantInput,
  type ApplicantResult,
  type BatchReport,
  type BatchSummary,
  type PipelineFailure,
  type PipelineOptions,
  type PipelineStage,
} from './ApplicantPipeline.js';
