/**
 * Report Compiler
 *
 * Assembles the structured context a narrative report is written from.
 * When the caller does not supply health or metrics, the compiler runs the
 * aggregator / synthesizer itself and flags the gap in `auto_filled`.
 */

import type { UnifiedHealthReport } from '../health/types';
import type { MetricPoint, MetricsSeries } from '../metrics/metrics-synthesizer';

export type ReportFraming = 'report' | 'daily_report';

export interface ReportContext {
  generated_at: string;
  health: UnifiedHealthReport;
  metrics: MetricsSeries;
  auto_filled: { health: boolean; metrics: boolean };
  highlights: string[];
}

export interface ReportCompilerDeps {
  aggregate: () => Promise<UnifiedHealthReport>;
  sampleMetrics: () => Promise<MetricsSeries>;
  now?: () => Date;
}

function peak(points: MetricPoint[]): number {
  return points.reduce((max, point) => Math.max(max, point.v), 0);
}

function latest(points: MetricPoint[]): number {
  return points[points.length - 1]?.v ?? 0;
}

export function buildHighlights(health: UnifiedHealthReport, metrics: MetricsSeries): string[] {
  const { summary } = health;
  const highlights = [`${summary.healthy}/${summary.total} checks healthy`];

  if (health.azure.status === 'not_configured') {
    highlights.push('Azure checks not configured');
  } else if (health.azure.status === 'auth_failed') {
    highlights.push('Azure authentication failed; cloud resources were not listed');
  }

  const down = health.custom.results.filter((result) => result.status === 'DOWN');
  if (down.length > 0) {
    highlights.push(`Endpoints down: ${down.map((result) => result.name).join(', ')}`);
  }

  highlights.push(`CPU now ${latest(metrics.cpu)}%, 24h peak ${peak(metrics.cpu)}%`);
  highlights.push(`Memory now ${latest(metrics.memory)}%, 24h peak ${peak(metrics.memory)}%`);

  return highlights;
}

export class ReportCompiler {
  private readonly deps: ReportCompilerDeps;

  constructor(deps: ReportCompilerDeps) {
    this.deps = deps;
  }

  /** Missing inputs are produced concurrently */
  async compile(health?: UnifiedHealthReport | null, metrics?: MetricsSeries | null): Promise<ReportContext> {
    const [resolvedHealth, resolvedMetrics] = await Promise.all([
      health ?? this.deps.aggregate(),
      metrics ?? this.deps.sampleMetrics(),
    ]);

    return {
      generated_at: (this.deps.now?.() ?? new Date()).toISOString(),
      health: resolvedHealth,
      metrics: resolvedMetrics,
      auto_filled: { health: !health, metrics: !metrics },
      highlights: buildHighlights(resolvedHealth, resolvedMetrics),
    };
  }
}

// ============================================================================
// Prompt
// ============================================================================

export interface ReportPrompt {
  system: string;
  prompt: string;
}

const REPORT_SYSTEM_PROMPT = [
  'You are an SRE assistant for a hybrid infrastructure (local host, Azure resources, HTTP endpoints).',
  'Summarize infra health and metrics in plain English.',
  'Highlight risks and suggest NON-DESTRUCTIVE next actions only.',
  'Format output as Markdown with headings and bullet points.',
].join('\n');

function section(title: string, value: unknown): string {
  return `${title}:\n${JSON.stringify(value, null, 2)}`;
}

export function renderReportPrompt(context: ReportContext, framing: ReportFraming): ReportPrompt {
  const heading =
    framing === 'daily_report'
      ? "Generate today's hybrid infra health report."
      : 'Generate a hybrid infra health report.';

  const closing =
    framing === 'daily_report'
      ? "End with a '## Next Actions' section of at most five prioritized, non-destructive steps for today."
      : "Include a short 'Next Actions' section.";

  const prompt = [
    heading,
    `Generated at: ${context.generated_at}`,
    section('HIGHLIGHTS', context.highlights),
    section('LOCAL HEALTH', context.health.local),
    section('AZURE HEALTH', context.health.azure),
    section('CUSTOM ENDPOINTS', context.health.custom),
    section('SUMMARY', context.health.summary),
    section('METRICS', context.metrics),
    'Be concise, actionable, and include a short risk score (Low/Med/High).',
    closing,
  ].join('\n\n');

  return { system: REPORT_SYSTEM_PROMPT, prompt };
}
