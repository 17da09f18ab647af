/**
 * AI SDK Model Provider
 *
 * Fallback chain for narrative generation:
 * - Primary: Gemini (`GEMINI_MODEL`, default gemini-2.5-flash)
 * - Fallback: Groq (`GROQ_MODEL`, default llama-3.3-70b-versatile)
 *
 * A provider joins the chain when its API key is set and its circuit
 * breaker currently allows calls.
 */

import type { EngineConfig } from '../../lib/config-parser';
import { logger } from '../../lib/logger';
import { getCircuitBreaker } from '../resilience/circuit-breaker';
import { getGeminiModel, getGroqModel } from './model-provider-core';
import type { ConfiguredModel, ModelCandidate, ProviderName, ProviderStatus } from './model-provider.types';

export type { ConfiguredModel, ModelCandidate, ProviderName, ProviderStatus } from './model-provider.types';
export { resetProviderCache } from './model-provider-core';

type NarrativeConfig = EngineConfig['narrative'];

const PROVIDER_ORDER: ProviderName[] = ['gemini', 'groq'];

export function checkProviderStatus(narrative: NarrativeConfig): ProviderStatus {
  return {
    gemini: narrative.gemini.apiKey !== null,
    groq: narrative.groq.apiKey !== null,
  };
}

function createModel(provider: ProviderName, narrative: NarrativeConfig): ModelCandidate | null {
  const { apiKey, model: modelId } = narrative[provider];
  if (!apiKey) return null;

  try {
    const model = provider === 'gemini' ? getGeminiModel(apiKey, modelId) : getGroqModel(apiKey, modelId);
    return { provider, modelId, model };
  } catch (error) {
    logger.warn(`[ModelProvider] ${provider} initialization failed:`, error);
    return null;
  }
}

/**
 * Candidates in fallback order, skipping providers without a key or with
 * an open circuit.
 */
export function getNarrativeModelChain(
  narrative: NarrativeConfig,
  excludeProviders: ProviderName[] = []
): ModelCandidate[] {
  const excluded = new Set(excludeProviders);
  const chain: ModelCandidate[] = [];

  for (const provider of PROVIDER_ORDER) {
    if (excluded.has(provider)) continue;
    if (!getCircuitBreaker(provider).isAllowed()) {
      logger.debug(`[ModelProvider] ${provider} skipped: circuit open`);
      continue;
    }
    const candidate = createModel(provider, narrative);
    if (candidate) chain.push(candidate);
  }

  return chain;
}

export function listConfiguredModels(narrative: NarrativeConfig): ConfiguredModel[] {
  const status = checkProviderStatus(narrative);
  return PROVIDER_ORDER.map((provider, index) => ({
    provider,
    modelId: narrative[provider].model,
    role: index === 0 ? 'primary' : 'fallback',
    configured: status[provider],
    circuit: getCircuitBreaker(provider).getStats().state,
  }));
}

export function logProviderStatus(narrative: NarrativeConfig): void {
  const status = checkProviderStatus(narrative);
  logger.info(
    {
      Gemini: status.gemini ? `ok (${narrative.gemini.model})` : 'off',
      Groq: status.groq ? `ok (${narrative.groq.model})` : 'off',
    },
    '[Provider Status]'
  );
}
