/**
 * Agent Routing
 *
 * Mode validation, fixed tool sets for explicit modes, and the tool
 * selection contract used for free text.
 */

import { z } from 'zod';
import { ValidationError } from '../../lib/errors';
import type { ToolName, Turn } from '../session/session-store';

// ============================================================================
// Modes
// ============================================================================

export const AGENT_MODES = ['auto', 'health', 'metrics', 'report', 'daily_report'] as const;

export type AgentMode = (typeof AGENT_MODES)[number];
export type ExplicitMode = Exclude<AgentMode, 'auto'>;

/** What the turn ended up doing; `chat` means no tool ran */
export type AgentAction = ExplicitMode | 'chat';

export function parseMode(raw: unknown): AgentMode {
  if (raw === undefined || raw === null || raw === '') return 'auto';
  if (typeof raw === 'string') {
    const normalized = raw.trim().toLowerCase();
    const mode = AGENT_MODES.find((candidate) => candidate === normalized);
    if (mode) return mode;
  }
  throw new ValidationError(`Unsupported mode: ${String(raw)}`);
}

const MODE_TOOLS: Record<ExplicitMode, ToolName[]> = {
  health: ['health'],
  metrics: ['metrics'],
  report: ['health', 'metrics', 'report'],
  daily_report: ['health', 'metrics', 'report'],
};

export function toolsForMode(mode: ExplicitMode): ToolName[] {
  return [...MODE_TOOLS[mode]];
}

/**
 * Report implies its inputs; duplicates collapse; order is canonical
 * (health, metrics, report).
 */
export function normalizeToolSelection(tools: readonly ToolName[]): ToolName[] {
  const selected = new Set(tools);
  if (selected.has('report')) {
    selected.add('health');
    selected.add('metrics');
  }
  return (['health', 'metrics', 'report'] as const).filter((tool) => selected.has(tool));
}

export function actionForTools(tools: readonly ToolName[], mode: AgentMode): AgentAction {
  if (mode !== 'auto') return mode;
  if (tools.includes('report')) return 'report';
  if (tools.includes('health')) return 'health';
  if (tools.includes('metrics')) return 'metrics';
  return 'chat';
}

// ============================================================================
// Tool selection
// ============================================================================

export const TOOL_DESCRIPTORS: ReadonlyArray<{ name: ToolName; description: string }> = [
  {
    name: 'health',
    description:
      'Run a live health check: local CPU/memory/disk/uptime, Azure resources and custom HTTP endpoints.',
  },
  { name: 'metrics', description: 'Produce the last-24h CPU and memory trend.' },
  { name: 'report', description: 'Write a Markdown health report from fresh health and metrics.' },
];

export const ToolDecisionSchema = z.object({
  tools: z.array(z.enum(['health', 'metrics', 'report'])).max(3).default([]),
  reasoning: z.string().max(500).optional(),
});

export type ToolDecision = { tools: ToolName[]; reasoning?: string };

export interface ToolSelectionContext {
  input: string;
  history: Turn[];
  cached: { health: boolean; metrics: boolean; report: boolean };
}

export const TOOL_SELECTION_SYSTEM_PROMPT = `You are an SRE ChatOps router. Decide which tools, if any, must run to answer the user.
Tools:
${TOOL_DESCRIPTORS.map((tool) => `- ${tool.name}: ${tool.description}`).join('\n')}

Rules:
- Status, uptime, warnings, endpoints, Azure or local system questions => ["health"]
- Charts, trends, last 24h or metrics questions => ["metrics"]
- Report or summary requests, including daily reports => ["report"]
- Follow-ups that the cached outputs already answer => []
- Small talk or general questions => []

Return a JSON object: { "tools": string[], "reasoning": short string }.`;

const HISTORY_WINDOW = 6;

export function buildToolSelectionPrompt(context: ToolSelectionContext): string {
  const recent = context.history
    .slice(-HISTORY_WINDOW)
    .map((turn) => `${turn.role}: ${turn.text}`)
    .join('\n');

  return [
    `User message: ${context.input}`,
    `Cached outputs: ${JSON.stringify(context.cached)}`,
    recent ? `Recent conversation:\n${recent}` : '',
  ]
    .filter(Boolean)
    .join('\n\n');
}

// ============================================================================
// Answer prompts
// ============================================================================

export const ANSWER_SYSTEM_PROMPT = `You are an SRE assistant for a hybrid infrastructure.
Use TOOL_OUTPUTS to answer the user's question. Be concise but helpful. Include:
- what you observed
- key values (cpu/mem/disk/uptime for health)
- warnings if any
- non-destructive next steps
Format with short headings and bullets.
Do not ask for clarification if TOOL_OUTPUTS already contains the needed info.
If the user asks for destructive actions, suggest safe read-only alternatives.`;

/** Tool payload JSON beyond this length is cut before prompting */
export const MAX_TOOL_OUTPUT_CHARS = 12_000;

export function buildAnswerPrompt(input: string, action: AgentAction, toolOutputs: Record<string, unknown>): string {
  const outputs = JSON.stringify(toolOutputs, null, 2);
  const clipped = outputs.length > MAX_TOOL_OUTPUT_CHARS ? `${outputs.slice(0, MAX_TOOL_OUTPUT_CHARS)}\n...` : outputs;

  return `USER_QUESTION:\n${input}\n\nACTION:\n${action}\n\nTOOL_OUTPUTS (JSON):\n${clipped}`;
}
