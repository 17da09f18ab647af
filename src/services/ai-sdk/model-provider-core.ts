import { createGoogleGenerativeAI } from '@ai-sdk/google';
import { createGroq } from '@ai-sdk/groq';
import type { LanguageModel } from 'ai';

// Lazy singletons, rebuilt only when the API key changes
let _gemini: { apiKey: string; provider: ReturnType<typeof createGoogleGenerativeAI> } | null = null;
let _groq: { apiKey: string; provider: ReturnType<typeof createGroq> } | null = null;

function getGeminiProvider(apiKey: string) {
  if (_gemini?.apiKey !== apiKey) {
    _gemini = { apiKey, provider: createGoogleGenerativeAI({ apiKey }) };
  }
  return _gemini.provider;
}

function getGroqProvider(apiKey: string) {
  if (_groq?.apiKey !== apiKey) {
    _groq = { apiKey, provider: createGroq({ apiKey }) };
  }
  return _groq.provider;
}

export function getGeminiModel(apiKey: string, modelId: string): LanguageModel {
  return getGeminiProvider(apiKey)(modelId);
}

export function getGroqModel(apiKey: string, modelId: string): LanguageModel {
  return getGroqProvider(apiKey)(modelId);
}

export function resetProviderCache(): void {
  _gemini = null;
  _groq = null;
}
