import { describe, expect, it, vi } from 'vitest';

vi.mock('../../lib/logger', () => ({
  logger: { error: vi.fn(), warn: vi.fn(), info: vi.fn(), debug: vi.fn() },
}));

import type { UnifiedHealthReport } from '../health/types';
import { synthesize } from '../metrics/metrics-synthesizer';
import { buildHighlights, ReportCompiler, renderReportPrompt } from './report-compiler';

const NOW = new Date('2026-03-01T12:00:00.000Z');

function makeHealth(overrides: Partial<UnifiedHealthReport> = {}): UnifiedHealthReport {
  return {
    timestamp: NOW.toISOString(),
    summary: { total: 1, healthy: 1, warnings: 0 },
    warnings: [],
    local: { cpu_percent: 20, memory_percent: 30, disk_percent: 40, uptime_seconds: 100, warnings: [] },
    azure: {
      configured: false,
      status: 'not_configured',
      message: 'not configured',
      vms: [],
      app_services: [],
      storage_accounts: [],
      warnings: [],
    },
    custom: { configured: false, results: [], warnings: [] },
    ...overrides,
  };
}

describe('ReportCompiler.compile', () => {
  it('uses supplied inputs without running any tool', async () => {
    const aggregate = vi.fn();
    const sampleMetrics = vi.fn();
    const compiler = new ReportCompiler({ aggregate, sampleMetrics, now: () => NOW });
    const health = makeHealth();
    const metrics = synthesize(20, 30, NOW);

    const context = await compiler.compile(health, metrics);

    expect(aggregate).not.toHaveBeenCalled();
    expect(sampleMetrics).not.toHaveBeenCalled();
    expect(context.health).toBe(health);
    expect(context.metrics).toBe(metrics);
    expect(context.auto_filled).toEqual({ health: false, metrics: false });
    expect(context.generated_at).toBe('2026-03-01T12:00:00.000Z');
  });

  it('auto-fills whatever is missing', async () => {
    const health = makeHealth();
    const aggregate = vi.fn().mockResolvedValue(health);
    const sampleMetrics = vi.fn().mockResolvedValue(synthesize(10, 10, NOW));
    const compiler = new ReportCompiler({ aggregate, sampleMetrics, now: () => NOW });

    const context = await compiler.compile(undefined, null);

    expect(aggregate).toHaveBeenCalledTimes(1);
    expect(sampleMetrics).toHaveBeenCalledTimes(1);
    expect(context.health).toBe(health);
    expect(context.auto_filled).toEqual({ health: true, metrics: true });
  });
});

describe('buildHighlights', () => {
  it('summarizes checks, cloud state, down endpoints and current metrics', () => {
    const health = makeHealth({
      summary: { total: 3, healthy: 2, warnings: 1 },
      azure: { ...makeHealth().azure, configured: true, status: 'auth_failed' },
      custom: {
        configured: true,
        results: [
          { name: 'api', url: 'https://api.test/', status: 'UP', http_status: 200, latency_ms: 3, error: null },
          { name: 'web', url: 'https://web.test/', status: 'DOWN', http_status: null, latency_ms: 5, error: 'Timed out after 5 ms' },
        ],
        warnings: [],
      },
    });
    const metrics = synthesize(25, 50, NOW);

    const highlights = buildHighlights(health, metrics);

    expect(highlights.slice(0, 3)).toEqual([
      '2/3 checks healthy',
      'Azure authentication failed; cloud resources were not listed',
      'Endpoints down: web',
    ]);
    expect(highlights[3]).toMatch(/^CPU now 25%, 24h peak \d+(\.\d+)?%$/);
    expect(highlights[4]).toMatch(/^Memory now 50%, 24h peak \d+(\.\d+)?%$/);
  });
});

describe('renderReportPrompt', () => {
  it('frames a daily report around next actions', async () => {
    const compiler = new ReportCompiler({ aggregate: vi.fn(), sampleMetrics: vi.fn(), now: () => NOW });
    const context = await compiler.compile(makeHealth(), synthesize(20, 30, NOW));

    const daily = renderReportPrompt(context, 'daily_report');
    const plain = renderReportPrompt(context, 'report');

    expect(daily.prompt.startsWith("Generate today's hybrid infra health report.")).toBe(true);
    expect(daily.prompt).toContain("'## Next Actions' section");
    expect(plain.prompt.startsWith('Generate a hybrid infra health report.')).toBe(true);
    expect(plain.prompt).toContain('risk score (Low/Med/High)');
    expect(daily.system).toBe(plain.system);
  });

  it('embeds the health sections as JSON', async () => {
    const compiler = new ReportCompiler({ aggregate: vi.fn(), sampleMetrics: vi.fn(), now: () => NOW });
    const context = await compiler.compile(makeHealth(), synthesize(20, 30, NOW));

    const { prompt } = renderReportPrompt(context, 'report');

    expect(prompt).toContain('SUMMARY:\n{\n  "total": 1,\n  "healthy": 1,\n  "warnings": 0\n}');
  });
});
