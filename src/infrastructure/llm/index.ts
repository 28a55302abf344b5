export type { LLMProvider, LLMResponse, LLMRequestOptions, LLMProviderConfig } from './types.js';
export { GroqProvider } from './groq.js';
export type { GroqClient } from './groq.js';
export { StubProvider } from './stub.js';

import Groq from 'groq-sdk';
import { GroqProvider } from './groq.js';
import { StubProvider } from './stub.js';
import type { AppConfig } from '../config.js';
import type { LLMProvider, LLMProviderConfig } from './types.js';

export function createLLMProvider(config: LLMProviderConfig): LLMProvider {
  switch (config.provider) {
    case 'groq':
      return new GroqProvider(new Groq({ apiKey: config.apiKey }), config.model);
    case 'stub':
      return new StubProvider(config.content);
  }
}

/** @throws {Error} If the groq provider is selected without an API key */
export function createLLMProviderFromConfig(
  config: Pick<AppConfig, 'llmProvider' | 'groqApiKey' | 'llmModel'>,
): LLMProvider {
  if (config.llmProvider === 'stub') {
    return createLLMProvider({ provider: 'stub' });
  }
  if (!config.groqApiKey) {
    throw new Error('GROQ_API_KEY environment variable is not set');
  }
  return createLLMProvider({ provider: 'groq', apiKey: config.groqApiKey, model: config.llmModel });
}
