/**
 * Narrative Service
 *
 * The LLM capability behind the agent: tool selection, answer composition
 * and report writing. `AiSdkNarrativeService` runs each call down the
 * provider chain (Gemini → Groq), each provider behind its own circuit
 * breaker. When every provider fails the call throws NarrativeServiceError.
 */

import { generateText, type ModelMessage } from 'ai';
import type { EngineConfig } from '../../lib/config-parser';
import { getErrorMessage, NarrativeServiceError } from '../../lib/errors';
import { logger } from '../../lib/logger';
import { getCircuitBreaker } from '../resilience/circuit-breaker';
import type { ReportPrompt } from '../report/report-compiler';
import type { Turn } from '../session/session-store';
import {
  type AgentAction,
  ANSWER_SYSTEM_PROMPT,
  buildAnswerPrompt,
  buildToolSelectionPrompt,
  normalizeToolSelection,
  TOOL_SELECTION_SYSTEM_PROMPT,
  type ToolDecision,
  ToolDecisionSchema,
  type ToolSelectionContext,
} from './agent-routing';
import { getNarrativeModelChain, type ModelCandidate } from './model-provider';
import { generateObjectWithFallback, StructuredOutputParseError } from './structured-output';

// ============================================================================
// Contract
// ============================================================================

export interface ComposeRequest {
  input: string;
  action: AgentAction;
  history: Turn[];
  toolOutputs: Record<string, unknown>;
}

export interface NarrativeResult {
  text: string;
  modelId: string;
}

export interface NarrativeService {
  /** Which tools a free-text input needs; may reject, callers treat that as no tools */
  selectTools(context: ToolSelectionContext): Promise<ToolDecision>;
  compose(request: ComposeRequest): Promise<NarrativeResult>;
  generateReport(prompt: ReportPrompt): Promise<NarrativeResult>;
  /** Model id answers are expected to come from (first in the chain) */
  modelId(): string;
}

// ============================================================================
// AI SDK implementation
// ============================================================================

const CHAT_SYSTEM_PROMPT = `You are a helpful SRE assistant for a hybrid infrastructure.
Answer clearly and practically, with brief headings and bullet points when helpful.
If the user asks for destructive actions, suggest safe read-only alternatives.
Use TOOL_OUTPUTS from earlier checks when they are relevant.`;

export function toModelMessages(history: Turn[]): ModelMessage[] {
  return history.map((turn): ModelMessage =>
    turn.role === 'user' ? { role: 'user', content: turn.text } : { role: 'assistant', content: turn.text }
  );
}

export class AiSdkNarrativeService implements NarrativeService {
  private readonly narrative: EngineConfig['narrative'];

  constructor(narrative: EngineConfig['narrative']) {
    this.narrative = narrative;
  }

  modelId(): string {
    return getNarrativeModelChain(this.narrative)[0]?.modelId ?? this.narrative.gemini.model;
  }

  async selectTools(context: ToolSelectionContext): Promise<ToolDecision> {
    const { value } = await this.runWithFallback('ToolSelection', async ({ provider, model }) => {
      try {
        const decision = await generateObjectWithFallback({
          model,
          schema: ToolDecisionSchema,
          system: TOOL_SELECTION_SYSTEM_PROMPT,
          prompt: buildToolSelectionPrompt(context),
          temperature: 0,
          maxOutputTokens: 220,
          operation: 'ToolSelection',
        });
        return { tools: normalizeToolSelection(decision.tools), reasoning: decision.reasoning };
      } catch (error) {
        // Unparseable replies resolve to no tools; only transport errors reach the breaker
        if (!(error instanceof StructuredOutputParseError)) throw error;
        logger.warn(`[Narrative:ToolSelection] ${provider} reply unusable: ${error.message}`);
        return { tools: [], reasoning: 'unparseable tool selection' };
      }
    });
    return value;
  }

  async compose(request: ComposeRequest): Promise<NarrativeResult> {
    const isChat = request.action === 'chat';
    const messages: ModelMessage[] = [
      ...toModelMessages(request.history),
      { role: 'user', content: buildAnswerPrompt(request.input, request.action, request.toolOutputs) },
    ];

    const { value, modelId } = await this.runWithFallback('Compose', async ({ model }) => {
      const result = await generateText({
        model,
        system: isChat ? CHAT_SYSTEM_PROMPT : ANSWER_SYSTEM_PROMPT,
        messages,
        temperature: isChat ? 0.45 : 0.35,
        maxOutputTokens: 900,
      });
      return requireText(result.text);
    });

    return { text: value, modelId };
  }

  async generateReport(prompt: ReportPrompt): Promise<NarrativeResult> {
    const { value, modelId } = await this.runWithFallback('Report', async ({ model }) => {
      const result = await generateText({
        model,
        system: prompt.system,
        prompt: prompt.prompt,
        temperature: 0.4,
        maxOutputTokens: 1_200,
      });
      return requireText(result.text);
    });

    return { text: value, modelId };
  }

  private async runWithFallback<T>(
    operation: string,
    call: (candidate: ModelCandidate) => Promise<T>
  ): Promise<{ value: T; modelId: string }> {
    const chain = getNarrativeModelChain(this.narrative);
    if (chain.length === 0) {
      throw new NarrativeServiceError('No narrative provider available (set GEMINI_API_KEY or GROQ_API_KEY)');
    }

    let lastError: unknown;
    for (const candidate of chain) {
      try {
        const value = await getCircuitBreaker(candidate.provider).execute(() => call(candidate));
        return { value, modelId: candidate.modelId };
      } catch (error) {
        lastError = error;
        logger.warn(`[Narrative:${operation}] ${candidate.provider} failed: ${getErrorMessage(error)}`);
      }
    }

    const lastProvider = chain[chain.length - 1]?.provider ?? null;
    throw new NarrativeServiceError(`Narrative service unavailable: ${getErrorMessage(lastError)}`, {
      cause: lastError,
      provider: lastProvider,
    });
  }
}

function requireText(text: string): string {
  const trimmed = text.trim();
  if (!trimmed) {
    throw new Error('Model returned an empty response');
  }
  return trimmed;
}
