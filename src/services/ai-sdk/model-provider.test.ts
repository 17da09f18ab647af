import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

vi.mock('../../lib/logger', () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

vi.mock('@ai-sdk/google', () => ({
  createGoogleGenerativeAI: vi.fn(() => (modelId: string) => ({
    specificationVersion: 'v3',
    provider: 'google',
    modelId,
    doGenerate: vi.fn(),
    doStream: vi.fn(),
  })),
}));

vi.mock('@ai-sdk/groq', () => ({
  createGroq: vi.fn(() => (modelId: string) => ({
    specificationVersion: 'v3',
    provider: 'groq',
    modelId,
    doGenerate: vi.fn(),
    doStream: vi.fn(),
  })),
}));

import { createGoogleGenerativeAI } from '@ai-sdk/google';
import type { EngineConfig } from '../../lib/config-parser';
import { getCircuitBreaker, resetAllCircuitBreakers } from '../resilience/circuit-breaker';
import {
  checkProviderStatus,
  getNarrativeModelChain,
  listConfiguredModels,
  resetProviderCache,
} from './model-provider';

function narrative(geminiKey: string | null, groqKey: string | null): EngineConfig['narrative'] {
  return {
    gemini: { apiKey: geminiKey, model: 'gemini-2.5-flash' },
    groq: { apiKey: groqKey, model: 'llama-3.3-70b-versatile' },
  };
}

describe('model provider chain', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    resetProviderCache();
  });

  afterEach(() => {
    resetAllCircuitBreakers();
  });

  it('orders Gemini before Groq', () => {
    const chain = getNarrativeModelChain(narrative('test-gemini-key', 'test-groq-key'));

    expect(chain.map((c) => `${c.provider}:${c.modelId}`)).toEqual([
      'gemini:gemini-2.5-flash',
      'groq:llama-3.3-70b-versatile',
    ]);
  });

  it('skips providers without an API key', () => {
    const chain = getNarrativeModelChain(narrative(null, 'test-groq-key'));

    expect(chain.map((c) => c.provider)).toEqual(['groq']);
    expect(checkProviderStatus(narrative(null, 'test-groq-key'))).toEqual({ gemini: false, groq: true });
  });

  it('honours exclusions and open circuits', async () => {
    const breaker = getCircuitBreaker('gemini');
    for (let i = 0; i < 3; i++) {
      await breaker.execute(() => Promise.reject(new Error('down'))).catch(() => undefined);
    }

    expect(getNarrativeModelChain(narrative('test-gemini-key', 'test-groq-key')).map((c) => c.provider)).toEqual(['groq']);
    expect(getNarrativeModelChain(narrative('test-gemini-key', 'test-groq-key'), ['groq'])).toEqual([]);
  });

  it('reuses the provider instance for the same key', () => {
    getNarrativeModelChain(narrative('test-gemini-key', null));
    getNarrativeModelChain(narrative('test-gemini-key', null));
    getNarrativeModelChain(narrative('other-test-key', null));

    expect(createGoogleGenerativeAI).toHaveBeenCalledTimes(2);
  });

  it('lists both providers with role and circuit state', () => {
    expect(listConfiguredModels(narrative('test-gemini-key', null))).toEqual([
      { provider: 'gemini', modelId: 'gemini-2.5-flash', role: 'primary', configured: true, circuit: 'CLOSED' },
      { provider: 'groq', modelId: 'llama-3.3-70b-versatile', role: 'fallback', configured: false, circuit: 'CLOSED' },
    ]);
  });
});
