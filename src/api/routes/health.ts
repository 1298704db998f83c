/**
 * Health Check Routes
 */

import { Router } from 'express';

export interface HealthRouteOptions {
  /** Whether the enrichment model can be reached with the configured credentials */
  isLlmConfigured: () => boolean;
}

export function createHealthRouter(options: HealthRouteOptions): Router {
  const router = Router();

  /**
   * Basic health check
   */
  router.get('/', (_req, res) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      service: 'applicant-screening-service',
    });
  });

  /**
   * Readiness: decisions need nothing external, enrichment needs an API key
   */
  router.get('/ready', (_req, res) => {
    const checks: Record<string, { status: string }> = {
      decisionEngine: { status: 'healthy' },
      enrichment: { status: options.isLlmConfigured() ? 'healthy' : 'unconfigured' },
    };

    const allHealthy = Object.values(checks).every((c) => c.status === 'healthy');

    res.status(allHealthy ? 200 : 503).json({
      status: allHealthy ? 'ready' : 'degraded',
      timestamp: new Date().toISOString(),
      checks,
    });
  });

  /**
   * Liveness probe (Kubernetes)
   */
  router.get('/live', (_req, res) => {
    res.json({ status: 'live' });
  });

  return router;
}
