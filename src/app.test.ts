import { beforeEach, describe, expect, it, vi } from 'vitest';

vi.mock('./lib/logger', () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

import { createApp } from './app';
import type { EngineConfig } from './lib/config-parser';
import { NarrativeServiceError, ValidationError } from './lib/errors';
import type { AgentLoop } from './services/ai-sdk/agent-loop';
import { mergeReport } from './services/health/health-aggregator';
import { synthesize } from './services/metrics/metrics-synthesizer';
import { InMemorySessionStore } from './services/session/session-store';

const NOW = new Date('2026-03-01T12:00:00.000Z');

const config: EngineConfig = {
  thresholds: { cpu: 85, memory: 90, disk: 90 },
  azure: {
    subscriptionId: null,
    resourceGroup: null,
    apiVersions: { vm: '2024-03-01', web: '2024-04-01', storage: '2023-01-01' },
    timeoutMs: 30_000,
  },
  endpoints: { list: [], defaultTimeoutMs: 5_000, warnings: [] },
  session: { ttlMinutes: 60, maxTurnPairs: 10 },
  narrative: {
    gemini: { apiKey: 'test-gemini-key', model: 'gemini-2.5-flash' },
    groq: { apiKey: null, model: 'llama-3.3-70b-versatile' },
  },
  server: { port: 8080, allowedOrigins: ['*'] },
};

const report = mergeReport(
  { cpu_percent: 10, memory_percent: 20, disk_percent: 30, uptime_seconds: 60, warnings: [] },
  {
    configured: false,
    status: 'not_configured',
    message: 'Set AZURE_SUBSCRIPTION_ID and AZURE_RESOURCE_GROUP to enable Azure checks.',
    vms: [],
    app_services: [],
    storage_accounts: [],
    warnings: [],
  },
  { configured: false, results: [], warnings: [] },
  NOW
);

const metrics = synthesize(10, 20, NOW);

function setup() {
  const sessions = new InMemorySessionStore({ ttlMinutes: 60, maxTurnPairs: 10 });
  const agent = {
    run: vi.fn<AgentLoop['run']>(),
    writeReport: vi.fn<AgentLoop['writeReport']>(),
  };
  const app = createApp({
    config: () => config,
    agent,
    sessions,
    aggregate: async () => report,
    sampleMetrics: async () => metrics,
    requestLogging: false,
  });
  return { app, agent, sessions };
}

function postJson(body: string) {
  return { method: 'POST', headers: { 'Content-Type': 'application/json' }, body };
}

describe('HTTP API', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('GET /healthz reports liveness without checking sources', async () => {
    const { app } = setup();

    const res = await app.request('/healthz');
    const body = await res.json();

    expect(res.status).toBe(200);
    expect(body).toMatchObject({
      ok: true,
      config: { azureConfigured: false, endpointCount: 0, providers: { gemini: true, groq: false } },
      sessions: 0,
    });
  });

  it('GET /api/healthcheck wraps the unified report', async () => {
    const { app } = setup();

    const res = await app.request('/api/healthcheck');

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ ok: true, data: report });
  });

  it('GET /api/metrics wraps the synthetic series', async () => {
    const { app } = setup();

    const body = await (await app.request('/api/metrics')).json();

    expect(body).toEqual({ ok: true, data: metrics });
  });

  it('POST /api/chat accepts session_id and returns the agent response', async () => {
    const { app, agent } = setup();
    agent.run.mockResolvedValue({
      session_id: 'session-0001',
      text: 'All good.',
      action: 'health',
      tools_used: ['health'],
      reasoning: 'forced_by_mode:health',
      health: report,
      used_model: 'gemini-2.5-flash',
    });

    const res = await app.request(
      '/api/chat',
      postJson(JSON.stringify({ input: 'status', mode: 'health', session_id: 'session-0001' }))
    );
    const body = await res.json();

    expect(res.status).toBe(200);
    expect(agent.run).toHaveBeenCalledWith({ input: 'status', mode: 'health', sessionId: 'session-0001' });
    expect(body).toMatchObject({ ok: true, session_id: 'session-0001', text: 'All good.', tools_used: ['health'] });
  });

  it('POST /api/chat treats a blank session id as absent', async () => {
    const { app, agent } = setup();
    agent.run.mockResolvedValue({
      session_id: 'generated-session',
      text: 'Hello.',
      action: 'chat',
      tools_used: [],
      reasoning: 'forced_by_mode:chat',
      used_model: 'gemini-2.5-flash',
    });

    const res = await app.request('/api/chat', postJson(JSON.stringify({ input: 'hi', sessionId: '', session_id: '  ' })));

    expect(res.status).toBe(200);
    expect(agent.run).toHaveBeenCalledWith({ input: 'hi', mode: null, sessionId: null });
  });

  it('POST /api/chat rejects unreadable JSON', async () => {
    const { app, agent } = setup();

    const res = await app.request('/api/chat', postJson('{not json'));

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ ok: false, error: 'Invalid JSON body', code: 'VALIDATION_ERROR' });
    expect(agent.run).not.toHaveBeenCalled();
  });

  it('POST /api/chat maps validation errors to 400', async () => {
    const { app, agent } = setup();
    agent.run.mockRejectedValue(new ValidationError('Unsupported mode: reboot'));

    const res = await app.request('/api/chat', postJson(JSON.stringify({ input: 'x', mode: 'reboot' })));

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ ok: false, error: 'Unsupported mode: reboot', code: 'VALIDATION_ERROR' });
  });

  it('POST /api/chat maps narrative failures to 503', async () => {
    const { app, agent } = setup();
    agent.run.mockRejectedValue(new NarrativeServiceError('Narrative service unavailable: quota'));

    const res = await app.request('/api/chat', postJson(JSON.stringify({ input: 'hello' })));

    expect(res.status).toBe(503);
    expect(await res.json()).toEqual({
      ok: false,
      error: 'Narrative service unavailable: quota',
      code: 'MODEL_ERROR',
    });
  });

  it('POST /api/supervisor runs a plain chat turn without a session', async () => {
    const { app, agent } = setup();
    agent.run.mockResolvedValue({
      session_id: 'generated-session',
      text: 'Hi there.',
      action: 'chat',
      tools_used: [],
      reasoning: 'forced_by_mode:chat',
      used_model: 'gemini-2.5-flash',
    });

    const res = await app.request('/api/supervisor', postJson(JSON.stringify({ input: 'hello' })));

    expect(res.status).toBe(200);
    expect(agent.run).toHaveBeenCalledWith({ input: 'hello', mode: 'chat', sessionId: null });
    expect(await res.json()).toEqual({ ok: true, intent: 'chat', text: 'Hi there.', used_model: 'gemini-2.5-flash' });
  });

  it('POST /api/report auto-fills when nothing is supplied', async () => {
    const { app, agent } = setup();
    agent.writeReport.mockResolvedValue({ report_markdown: '# Report', used_model: 'gemini-2.5-flash' });

    const res = await app.request('/api/report', { method: 'POST' });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ ok: true, report_markdown: '# Report', used_model: 'gemini-2.5-flash' });
    expect(agent.writeReport).toHaveBeenCalledWith(undefined, undefined, 'report');
  });

  it('POST /api/report passes supplied inputs through', async () => {
    const { app, agent } = setup();
    agent.writeReport.mockResolvedValue({ report_markdown: '# Daily', used_model: 'gemini-2.5-flash' });

    await app.request(
      '/api/report',
      postJson(JSON.stringify({ health: report, metrics, framing: 'daily_report' }))
    );

    expect(agent.writeReport).toHaveBeenCalledWith(report, metrics, 'daily_report');
  });

  it('POST /api/report rejects a malformed health payload', async () => {
    const { app, agent } = setup();

    const res = await app.request('/api/report', postJson(JSON.stringify({ health: { summary: 'fine' } })));

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ ok: false, code: 'VALIDATION_ERROR' });
    expect(agent.writeReport).not.toHaveBeenCalled();
  });

  it('GET /api/sessions/:id returns stored turns', async () => {
    const { app, sessions } = setup();
    await sessions.append('session-0001', { role: 'user', text: 'hi', tools: [], at: NOW.toISOString() });

    const body = await (await app.request('/api/sessions/session-0001')).json();

    expect(body).toMatchObject({
      ok: true,
      data: { id: 'session-0001', turns: [{ role: 'user', text: 'hi', tools: [], at: NOW.toISOString() }] },
    });
  });

  it('GET /api/sessions/:id is 404 for an unknown session', async () => {
    const { app } = setup();

    const res = await app.request('/api/sessions/session-missing');

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ ok: false, error: 'Session not found', code: 'NOT_FOUND' });
  });

  it('GET /api/models lists providers in fallback order', async () => {
    const { app } = setup();

    const body = await (await app.request('/api/models')).json();

    expect(body).toEqual({
      ok: true,
      available: true,
      models: [
        { provider: 'gemini', modelId: 'gemini-2.5-flash', role: 'primary', configured: true, circuit: 'CLOSED' },
        { provider: 'groq', modelId: 'llama-3.3-70b-versatile', role: 'fallback', configured: false, circuit: 'CLOSED' },
      ],
    });
  });

  it('answers unknown routes with the error envelope', async () => {
    const { app } = setup();

    const res = await app.request('/api/nope');

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ ok: false, error: 'Route not found', code: 'NOT_FOUND' });
  });

  it('sends CORS headers for the configured origins', async () => {
    const { app } = setup();

    const res = await app.request('/healthz', { headers: { Origin: 'https://dashboard.test' } });

    expect(res.headers.get('access-control-allow-origin')).toBe('*');
  });
});
