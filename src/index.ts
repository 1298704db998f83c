/**
 * Applicant Screening Service - Main Entry Point
 *
 * Qualification decisions and model-generated enrichment for contractor
 * applicants, served over HTTP.
 */

import 'dotenv/config';
import { createApp } from './api/app.js';
import { loadEnv } from './config/env.js';
import { createApplicantPipeline } from './domain/services/index.js';

// =============================================================================
// STARTUP
// =============================================================================

async function start() {
  const env = loadEnv();

  console.log(`Environment: ${env.NODE_ENV}`);
  console.log('Starting applicant screening service...\n');

  if (!env.ANTHROPIC_API_KEY) {
    console.warn('ANTHROPIC_API_KEY is not set: decisions are available, enrichment requests will fail');
  }

  const app = createApp({
    pipeline: createApplicantPipeline(env),
    corsOrigin: env.CORS_ORIGIN,
    isLlmConfigured: () => Boolean(env.ANTHROPIC_API_KEY),
  });

  const server = app.listen(env.PORT, () => {
    console.log(`\nScreening API running on http://localhost:${env.PORT}`);
    console.log(`Health check: http://localhost:${env.PORT}/health`);
    console.log(`API base: http://localhost:${env.PORT}/api/applicants\n`);
  });

  // Graceful shutdown
  const shutdown = (signal: string) => {
    console.log(`\n${signal} received. Starting graceful shutdown...`);

    server.close((error) => {
      if (error) {
        console.error('Error during shutdown:', error);
        process.exit(1);
      }
      console.log('HTTP server closed');
      process.exit(0);
    });

    // Force exit after timeout
    setTimeout(() => {
      console.error('Forced shutdown after timeout');
      process.exit(1);
    }, 30000).unref();
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

// =============================================================================
// RUN
// =============================================================================

start().catch((error) => {
  console.error('Failed to start applicant screening service:', error);
  process.exit(1);
});
