import { LLMProvider, LLMProviderName, LLMProviderConfig } from './types';
import { OpenAIProvider } from './providers/openai-provider';
import { GeminiProvider } from './providers/gemini-provider';
import { env } from '../config/env';
import { logger } from '../observability/logger';

export function parseProviderName(value: string): LLMProviderName {
  if (value === 'openai' || value === 'gemini') return value;
  throw new Error(`Unknown LLM provider: ${value}`);
}

/**
 * Create a single LLM provider by name.
 */
export function createProvider(name: LLMProviderName, config: LLMProviderConfig): LLMProvider {
  switch (name) {
    case 'openai':
      return new OpenAIProvider(config);
    case 'gemini':
      return new GeminiProvider(config);
  }
}

/**
 * Build the generation provider selected by GENERATION_PROVIDER.
 * Returns undefined when its API key is missing; the composer then
 * serves the rule-based menu for open questions.
 */
export function buildGenerationProvider(): LLMProvider | undefined {
  const log = logger.child({ component: 'provider-factory' });
  const name = parseProviderName(env.generation.provider);

  const config: LLMProviderConfig = name === 'openai'
    ? { apiKey: env.openai.apiKey, model: env.openai.model, maxTokens: env.openai.maxTokens, temperature: env.openai.temperature }
    : { apiKey: env.gemini.apiKey, model: env.gemini.model, maxTokens: env.openai.maxTokens, temperature: env.openai.temperature };

  if (!config.apiKey) {
    log.warn({ provider: name }, 'Generation provider API key not set; open questions fall back to the menu');
    return undefined;
  }

  log.info({ provider: name, model: config.model }, 'Generation provider initialized');
  return createProvider(name, config);
}
