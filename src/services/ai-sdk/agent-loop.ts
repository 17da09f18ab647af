/**
 * Agent Loop
 *
 * One conversational turn: resolve intent → execute tools → compose →
 * persist. Tool failures only degrade their part of the payload; a
 * narrative failure fails the whole turn and leaves the session untouched.
 */

import { getErrorMessage } from '../../lib/errors';
import { createTurnLogger, type Logger } from '../../lib/logger';
import type { UnifiedHealthReport } from '../health/types';
import type { MetricsSeries } from '../metrics/metrics-synthesizer';
import { type ReportCompiler, type ReportFraming, renderReportPrompt } from '../report/report-compiler';
import type { Session, SessionPatch, SessionStore, ToolName, Turn } from '../session/session-store';
import {
  type AgentAction,
  type AgentMode,
  actionForTools,
  normalizeToolSelection,
  parseMode,
  toolsForMode,
} from './agent-routing';
import type { NarrativeService } from './narrative-service';

export const EMPTY_INPUT_REPLY = "Say something and I'll help.";

export interface AgentRequest {
  input: string;
  mode?: AgentMode | string | null;
  sessionId?: string | null;
}

export interface AgentResponse {
  session_id: string;
  text: string;
  action: AgentAction;
  tools_used: ToolName[];
  reasoning: string;
  health?: UnifiedHealthReport;
  metrics?: MetricsSeries;
  report_markdown?: string;
  used_model: string | null;
}

export interface ReportResult {
  report_markdown: string;
  used_model: string;
}

export interface AgentLoopDeps {
  sessions: SessionStore;
  narrative: NarrativeService;
  aggregate: () => Promise<UnifiedHealthReport>;
  sampleMetrics: () => Promise<MetricsSeries>;
  reportCompiler: ReportCompiler;
  now?: () => Date;
}

interface ToolOutputs {
  health?: UnifiedHealthReport;
  metrics?: MetricsSeries;
  report_markdown?: string;
}

export class AgentLoop {
  private readonly deps: AgentLoopDeps;

  constructor(deps: AgentLoopDeps) {
    this.deps = deps;
  }

  async run(request: AgentRequest): Promise<AgentResponse> {
    const mode = parseMode(request.mode);
    const session = await this.deps.sessions.getOrCreate(request.sessionId);
    const log = createTurnLogger(session.id, mode);
    const input = request.input.trim();

    if (!input) {
      return {
        session_id: session.id,
        text: EMPTY_INPUT_REPLY,
        action: 'chat',
        tools_used: [],
        reasoning: 'empty input',
        used_model: null,
      };
    }

    const startedAt = Date.now();

    // 1. resolve
    const { tools, reasoning } = await this.resolveTools(mode, input, session, log);
    const action = actionForTools(tools, mode);

    // 2. execute
    const framing: ReportFraming = mode === 'daily_report' ? 'daily_report' : 'report';
    const outputs = await this.executeTools(tools, framing, log);

    // 3. compose
    const history = await this.deps.sessions.history(session.id);
    const answer = await this.deps.narrative.compose({
      input,
      action,
      history,
      toolOutputs: { action, reasoning, ...this.withCachedOutputs(action, outputs, session) },
    });

    // 4. persist (only once an answer exists)
    const at = (this.deps.now?.() ?? new Date()).toISOString();
    const userTurn: Turn = { role: 'user', text: input, tools: [], at };
    const agentTurn: Turn = { role: 'agent', text: answer.text, tools, at };
    const patch: SessionPatch = {};
    if (outputs.health) patch.last_health = outputs.health;
    if (outputs.metrics) patch.last_metrics = outputs.metrics;
    if (outputs.report_markdown !== undefined) patch.last_report = outputs.report_markdown;

    await this.deps.sessions.withSession(session.id, (handle) => {
      handle.append(userTurn, agentTurn);
      handle.update(patch);
    });

    log.info({ action, tools, model: answer.modelId, durationMs: Date.now() - startedAt }, '[AgentLoop] turn complete');

    return {
      session_id: session.id,
      text: answer.text,
      action,
      tools_used: tools,
      reasoning,
      ...outputs,
      used_model: answer.modelId,
    };
  }

  /** Compile (auto-filling what is missing) and write a Markdown report */
  async writeReport(
    health: UnifiedHealthReport | null | undefined,
    metrics: MetricsSeries | null | undefined,
    framing: ReportFraming
  ): Promise<ReportResult> {
    const context = await this.deps.reportCompiler.compile(health, metrics);
    const result = await this.deps.narrative.generateReport(renderReportPrompt(context, framing));
    return { report_markdown: result.text, used_model: result.modelId };
  }

  // --------------------------------------------------------------------------

  private async resolveTools(
    mode: AgentMode,
    input: string,
    session: Session,
    log: Logger
  ): Promise<{ tools: ToolName[]; reasoning: string }> {
    if (mode !== 'auto') {
      return { tools: toolsForMode(mode), reasoning: `forced_by_mode:${mode}` };
    }

    try {
      const decision = await this.deps.narrative.selectTools({
        input,
        history: session.turns,
        cached: {
          health: session.last_health !== undefined,
          metrics: session.last_metrics !== undefined,
          report: session.last_report !== undefined,
        },
      });
      return {
        tools: normalizeToolSelection(decision.tools),
        reasoning: decision.reasoning?.trim() || 'n/a',
      };
    } catch (error) {
      log.warn(`[AgentLoop] tool selection failed, answering without tools: ${getErrorMessage(error)}`);
      return { tools: [], reasoning: 'tool selection unavailable' };
    }
  }

  /**
   * Health and metrics run concurrently; the report reuses them instead of
   * aggregating again.
   */
  private async executeTools(tools: ToolName[], framing: ReportFraming, log: Logger): Promise<ToolOutputs> {
    const [health, metrics] = await Promise.all([
      tools.includes('health') ? this.runTool('health', this.deps.aggregate, log) : undefined,
      tools.includes('metrics') ? this.runTool('metrics', this.deps.sampleMetrics, log) : undefined,
    ]);

    const outputs: ToolOutputs = {};
    if (health) outputs.health = health;
    if (metrics) outputs.metrics = metrics;

    if (tools.includes('report')) {
      const report = await this.writeReport(health, metrics, framing);
      outputs.report_markdown = report.report_markdown;
    }

    return outputs;
  }

  private async runTool<T>(name: ToolName, fn: () => Promise<T>, log: Logger): Promise<T | undefined> {
    try {
      return await fn();
    } catch (error) {
      log.error(`[AgentLoop] ${name} tool failed: ${getErrorMessage(error)}`, error);
      return undefined;
    }
  }

  /** Fresh outputs win; the session's last outputs fill in for follow-ups */
  private withCachedOutputs(action: AgentAction, outputs: ToolOutputs, session: Session): ToolOutputs {
    const merged: ToolOutputs = { ...outputs };
    const wantsHealth = action === 'health' || action === 'chat';
    const wantsMetrics = action === 'metrics' || action === 'chat';
    const wantsReport = action === 'report' || action === 'daily_report' || action === 'chat';

    if (wantsHealth && !merged.health && session.last_health) merged.health = session.last_health;
    if (wantsMetrics && !merged.metrics && session.last_metrics) merged.metrics = session.last_metrics;
    if (wantsReport && merged.report_markdown === undefined && session.last_report !== undefined) {
      merged.report_markdown = session.last_report;
    }
    return merged;
  }
}
