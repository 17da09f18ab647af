/**
 * Hybrid Health Copilot Server
 *
 * Loads `.env`, wires the real sources (node:os, Azure Resource Manager,
 * fetch, Gemini/Groq) into the Hono app and starts listening.
 */

// must evaluate before the logger reads LOG_LEVEL
import 'dotenv/config';

import { serve } from '@hono/node-server';
import { createApp } from './app';
import { getEngineConfig } from './lib/config-parser';
import { logger } from './lib/logger';
import { registerGracefulShutdownHandlers } from './server-shutdown';
import { AgentLoop } from './services/ai-sdk/agent-loop';
import { logProviderStatus } from './services/ai-sdk/model-provider';
import { AiSdkNarrativeService } from './services/ai-sdk/narrative-service';
import { createDefaultHealthAggregator } from './services/health/health-aggregator';
import { createOsMetricsSource } from './services/health/local-health';
import { sampleAndSynthesize } from './services/metrics/metrics-synthesizer';
import { ReportCompiler } from './services/report/report-compiler';
import { InMemorySessionStore } from './services/session/session-store';

// ============================================================================
// Composition
// ============================================================================

const config = getEngineConfig();

const aggregator = createDefaultHealthAggregator();
const metricsSource = createOsMetricsSource();

const aggregate = () => aggregator.aggregate(getEngineConfig());
const sampleMetrics = () => sampleAndSynthesize(metricsSource);

const sessions = new InMemorySessionStore({
  ttlMinutes: config.session.ttlMinutes,
  maxTurnPairs: config.session.maxTurnPairs,
});

const agent = new AgentLoop({
  sessions,
  narrative: new AiSdkNarrativeService(config.narrative),
  aggregate,
  sampleMetrics,
  reportCompiler: new ReportCompiler({ aggregate, sampleMetrics }),
});

const app = createApp({
  config: getEngineConfig,
  agent,
  sessions,
  aggregate,
  sampleMetrics,
});

// ============================================================================
// Server Start
// ============================================================================

logger.info(
  {
    port: config.server.port,
    azure: Boolean(config.azure.subscriptionId && config.azure.resourceGroup),
    endpoints: config.endpoints.list.length,
  },
  'Health Copilot server starting'
);
logProviderStatus(config.narrative);

for (const warning of config.endpoints.warnings) {
  logger.warn(`[Config] ${warning}`);
}

const server = serve(
  {
    fetch: app.fetch,
    port: config.server.port,
    hostname: '0.0.0.0',
  },
  (info: { address: string; port: number }) => {
    logger.info({ address: info.address, port: info.port }, 'Server listening');
  }
);

// ============================================================================
// Graceful Shutdown
// ============================================================================
registerGracefulShutdownHandlers(server);
