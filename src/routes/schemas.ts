/**
 * Request body schemas and JSON body parsing shared by the routers.
 */

import type { Context } from 'hono';
import { z } from 'zod';
import { ValidationError } from '../lib/errors';
import type { UnifiedHealthReport } from '../services/health/types';
import type { MetricsSeries } from '../services/metrics/metrics-synthesizer';

const CloudResourceSchema = z.object({
  name: z.string(),
  state: z.string(),
  healthy: z.boolean(),
});

const EndpointResultSchema = z.object({
  name: z.string(),
  url: z.string(),
  status: z.enum(['UP', 'DOWN']),
  http_status: z.number().nullable(),
  latency_ms: z.number(),
  error: z.string().nullable(),
});

export const UnifiedHealthReportSchema: z.ZodType<UnifiedHealthReport, z.ZodTypeDef, unknown> = z.object({
  timestamp: z.string(),
  summary: z.object({ total: z.number(), healthy: z.number(), warnings: z.number() }),
  warnings: z.array(z.string()),
  local: z.object({
    cpu_percent: z.number(),
    memory_percent: z.number(),
    disk_percent: z.number(),
    uptime_seconds: z.number(),
    warnings: z.array(z.string()),
  }),
  azure: z.object({
    configured: z.boolean(),
    status: z.enum(['ok', 'warnings', 'not_configured', 'auth_failed']),
    message: z.string(),
    vms: z.array(CloudResourceSchema),
    app_services: z.array(CloudResourceSchema),
    storage_accounts: z.array(CloudResourceSchema),
    warnings: z.array(z.string()),
  }),
  custom: z.object({
    configured: z.boolean(),
    results: z.array(EndpointResultSchema),
    warnings: z.array(z.string()),
  }),
});

const MetricPointSchema = z.object({ t: z.string(), v: z.number() });

export const MetricsSeriesSchema: z.ZodType<MetricsSeries, z.ZodTypeDef, unknown> = z.object({
  timestamp: z.string(),
  range: z.literal('24h'),
  synthetic_trend: z.literal(true),
  cpu: z.array(MetricPointSchema),
  memory: z.array(MetricPointSchema),
  disk: z.array(MetricPointSchema),
  netio: z.array(MetricPointSchema),
});

export const ReportRequestSchema = z.object({
  health: UnifiedHealthReportSchema.nullish(),
  metrics: MetricsSeriesSchema.nullish(),
  framing: z.enum(['report', 'daily_report']).default('report'),
});

function presentOrNull(value: string | null | undefined): string | null {
  return value && value.trim() ? value : null;
}

/** `sessionId` and `session_id` are both accepted; a blank id means none */
export const ChatRequestSchema = z
  .object({
    input: z.string().max(8_000).default(''),
    mode: z.string().nullish(),
    sessionId: z.string().nullish(),
    session_id: z.string().nullish(),
  })
  .transform(({ input, mode, sessionId, session_id }) => ({
    input,
    mode: mode ?? null,
    sessionId: presentOrNull(sessionId) ?? presentOrNull(session_id),
  }));

export const SupervisorRequestSchema = z.object({
  input: z.string().max(8_000).default(''),
});

/**
 * Parses the JSON body against `schema`. An empty body counts as `{}`;
 * unreadable JSON and schema violations become ValidationError.
 */
export async function readJsonBody<T>(c: Context, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
  const raw = await c.req.text();

  let body: unknown = {};
  if (raw.trim()) {
    try {
      body = JSON.parse(raw);
    } catch {
      throw new ValidationError('Invalid JSON body');
    }
  }

  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const path = issue?.path.join('.');
    throw new ValidationError(path ? `${path}: ${issue?.message}` : `Invalid request body: ${issue?.message}`);
  }
  return parsed.data;
}
