/**
 * Express Application - Applicant Screening API
 */

import { randomUUID } from 'crypto';
import express from 'express';
import cors from 'cors';
import helmet from 'helmet';

import { errorHandler, notFoundHandler } from './middleware/errorHandler.js';
import { createApplicantRouter, createHealthRouter } from './routes/index.js';
import { getApplicantPipeline, type ApplicantPipeline } from '../domain/services/index.js';

export interface AppOptions {
  pipeline?: ApplicantPipeline;
  corsOrigin?: string;
  isLlmConfigured?: () => boolean;
}

// =============================================================================
// CREATE APP
// =============================================================================

export function createApp(options: AppOptions = {}) {
  const app = express();
  const pipeline = options.pipeline ?? getApplicantPipeline();

  // ===========================================================================
  // GLOBAL MIDDLEWARE
  // ===========================================================================

  // Security headers
  app.use(helmet());

  // CORS
  app.use(
    cors({
      origin: options.corsOrigin ?? process.env.CORS_ORIGIN ?? '*',
      methods: ['GET', 'POST', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization', 'X-Request-Id'],
    })
  );

  // Body parsing
  app.use(express.json({ limit: '2mb' }));

  // Request ID
  app.use((req, res, next) => {
    const requestId = req.headers['x-request-id'] || randomUUID();
    req.headers['x-request-id'] = requestId;
    res.setHeader('X-Request-Id', requestId);
    next();
  });

  // ===========================================================================
  // ROUTES
  // ===========================================================================

  // Health checks
  app.use(
    '/health',
    createHealthRouter({
      isLlmConfigured: options.isLlmConfigured ?? (() => Boolean(process.env.ANTHROPIC_API_KEY)),
    })
  );

  // Applicant decisions, enrichment and batches
  app.use('/api/applicants', createApplicantRouter(pipeline));

  // ===========================================================================
  // ERROR HANDLING
  // ===========================================================================

  // 404 handler
  app.use(notFoundHandler);

  // Error handler
  app.use(errorHandler);

  return app;
}

export default createApp;
