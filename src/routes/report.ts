/**
 * Report Routes
 *
 * POST /report - Markdown report from supplied or freshly collected
 * health and metrics.
 */

import { Hono } from 'hono';
import type { Context } from 'hono';
import { handleApiError, jsonSuccess } from '../lib/error-handler';
import type { AgentLoop } from '../services/ai-sdk/agent-loop';
import { ReportRequestSchema, readJsonBody } from './schemas';

export function createReportRouter(agent: Pick<AgentLoop, 'writeReport'>): Hono {
  const router = new Hono();

  router.post('/', async (c: Context) => {
    try {
      const { health, metrics, framing } = await readJsonBody(c, ReportRequestSchema);
      const result = await agent.writeReport(health, metrics, framing);
      return jsonSuccess(c, { ...result });
    } catch (error) {
      return handleApiError(c, error, 'Report');
    }
  });

  return router;
}
