import type { Config } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { AnthropicProvider } from './anthropicProvider.js';
import { OpenAIProvider } from './openaiProvider.js';
import type { LLMProvider } from './types.js';

export type { LLMProvider, LLMResponse, GenerateOptions } from './types.js';
export { parseJsonObject } from './base.js';

/**
 * Provider aus der Konfiguration erzeugen.
 * Ohne API-Key: null (Executors melden dann fehlende Konfiguration)
 */
export function createProvider(llm: Config['llm']): LLMProvider | null {
  if (llm.provider === 'anthropic') {
    if (!llm.anthropicApiKey) {
      logger.warn('[LLM] ANTHROPIC_API_KEY nicht gesetzt - LLM-Executors deaktiviert');
      return null;
    }
    return new AnthropicProvider({ apiKey: llm.anthropicApiKey, model: llm.anthropicModel });
  }

  if (!llm.openaiApiKey) {
    logger.warn('[LLM] OPENAI_API_KEY nicht gesetzt - LLM-Executors deaktiviert');
    return null;
  }
  return new OpenAIProvider({
    apiKey: llm.openaiApiKey,
    model: llm.openaiModel,
    baseURL: llm.openaiBaseUrl,
  });
}
