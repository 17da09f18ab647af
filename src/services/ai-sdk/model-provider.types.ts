import type { LanguageModel } from 'ai';

export type ProviderName = 'gemini' | 'groq';

export interface ProviderStatus {
  gemini: boolean;
  groq: boolean;
}

/** One usable entry of the fallback chain */
export interface ModelCandidate {
  provider: ProviderName;
  modelId: string;
  model: LanguageModel;
}

export interface ConfiguredModel {
  provider: ProviderName;
  modelId: string;
  role: 'primary' | 'fallback';
  configured: boolean;
  circuit: 'CLOSED' | 'OPEN' | 'HALF_OPEN';
}
