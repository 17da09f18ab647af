/**
 * Hybrid Health Copilot - Hono application
 *
 * Built from injected services so route tests run in process against
 * stub sources; `server.ts` wires the real ones.
 */

import { Hono } from 'hono';
import type { Context } from 'hono';
import { cors } from 'hono/cors';
import { logger as honoLogger } from 'hono/logger';
import { version as APP_VERSION } from '../package.json';
import { type EngineConfig, getConfigStatus } from './lib/config-parser';
import { handleApiError, handleNotFoundError } from './lib/error-handler';
import { logger } from './lib/logger';
import { createChatRouter, createSupervisorRouter } from './routes/chat';
import { createHealthRouter } from './routes/health';
import { createModelsRouter } from './routes/models';
import { createReportRouter } from './routes/report';
import { createSessionsRouter } from './routes/sessions';
import type { AgentLoop } from './services/ai-sdk/agent-loop';
import { getAllCircuitStats } from './services/resilience/circuit-breaker';
import type { UnifiedHealthReport } from './services/health/types';
import type { MetricsSeries } from './services/metrics/metrics-synthesizer';
import type { SessionStore } from './services/session/session-store';

export interface AppDeps {
  config: () => EngineConfig;
  agent: Pick<AgentLoop, 'run' | 'writeReport'>;
  sessions: SessionStore;
  aggregate: () => Promise<UnifiedHealthReport>;
  sampleMetrics: () => Promise<MetricsSeries>;
  /** Request logging; off in tests */
  requestLogging?: boolean;
}

export function createApp(deps: AppDeps): Hono {
  const app = new Hono();

  // ==========================================================================
  // Middleware
  // ==========================================================================

  if (deps.requestLogging ?? true) {
    app.use('*', honoLogger((message, ...rest) => logger.info(message, ...rest)));
  }

  const allowedOrigins = deps.config().server.allowedOrigins;
  app.use(
    '*',
    cors({
      origin: allowedOrigins.includes('*') ? '*' : allowedOrigins,
    })
  );

  app.onError((err: Error, c: Context) => handleApiError(c, err, 'Unhandled'));

  app.notFound((c: Context) => handleNotFoundError(c, 'Route'));

  // ==========================================================================
  // Liveness
  // ==========================================================================

  /**
   * GET /healthz - Process liveness; no sources are checked
   */
  app.get('/healthz', (c: Context) =>
    c.json({
      ok: true,
      service: 'health-copilot',
      version: APP_VERSION,
      config: getConfigStatus(deps.config()),
      sessions: deps.sessions.size(),
      circuits: getAllCircuitStats(),
      timestamp: new Date().toISOString(),
    })
  );

  // ==========================================================================
  // API
  // ==========================================================================

  app.route('/api', createHealthRouter({ aggregate: deps.aggregate, sampleMetrics: deps.sampleMetrics }));
  app.route('/api/report', createReportRouter(deps.agent));
  app.route('/api/chat', createChatRouter(deps.agent));
  app.route('/api/supervisor', createSupervisorRouter(deps.agent));
  app.route('/api/sessions', createSessionsRouter(deps.sessions));
  app.route('/api/models', createModelsRouter(() => deps.config().narrative));

  return app;
}
