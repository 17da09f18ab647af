/**
 * Health Routes
 *
 * Live health aggregation and the synthetic 24h metrics trend.
 */

import { Hono } from 'hono';
import type { Context } from 'hono';
import { handleApiError, jsonSuccessData } from '../lib/error-handler';
import type { UnifiedHealthReport } from '../services/health/types';
import type { MetricsSeries } from '../services/metrics/metrics-synthesizer';

export interface HealthRouterDeps {
  aggregate: () => Promise<UnifiedHealthReport>;
  sampleMetrics: () => Promise<MetricsSeries>;
}

export function createHealthRouter(deps: HealthRouterDeps): Hono {
  const router = new Hono();

  /**
   * GET /healthcheck - Unified local + Azure + endpoint report
   */
  router.get('/healthcheck', async (c: Context) => {
    try {
      return jsonSuccessData(c, await deps.aggregate());
    } catch (error) {
      return handleApiError(c, error, 'Healthcheck');
    }
  });

  /**
   * GET /metrics - 24h trend around the current CPU and memory reading
   */
  router.get('/metrics', async (c: Context) => {
    try {
      return jsonSuccessData(c, await deps.sampleMetrics());
    } catch (error) {
      return handleApiError(c, error, 'Metrics');
    }
  });

  return router;
}
