import Anthropic from '@anthropic-ai/sdk';
import { logger } from '../utils/logger.js';
import { LLMProviderError, MissingCredentialError, errorMessage } from '../utils/errors.js';
import { BaseProvider } from './base.js';
import type { GenerateOptions, LLMResponse } from './types.js';

export interface AnthropicProviderOptions {
  apiKey: string;
  model: string;
  timeoutMs?: number;
}

const DEFAULT_MAX_TOKENS = 1200;

export class AnthropicProvider extends BaseProvider {
  readonly name = 'anthropic';
  readonly model: string;
  private client: Anthropic;

  constructor(options: AnthropicProviderOptions) {
    super();
    if (!options.apiKey) {
      throw new MissingCredentialError('ANTHROPIC_API_KEY', 'ANTHROPIC_API_KEY fehlt. In Secrets / env setzen.');
    }
    this.model = options.model || 'claude-3-5-haiku-20241022';
    this.client = new Anthropic({ apiKey: options.apiKey, timeout: options.timeoutMs ?? 90_000 });
  }

  async generate(prompt: string, options: GenerateOptions = {}): Promise<LLMResponse> {
    try {
      const response = await this.client.messages.create({
        model: this.model,
        max_tokens: options.maxTokens ?? DEFAULT_MAX_TOKENS,
        temperature: options.temperature ?? 0.2,
        ...(options.system ? { system: options.system } : {}),
        messages: [{ role: 'user', content: prompt }],
      });

      // Alle Text-Blöcke zusammensetzen
      let text = '';
      for (const block of response.content) {
        if (block.type === 'text') {
          text += block.text;
        }
      }

      const inputTokens = response.usage?.input_tokens ?? 0;
      const outputTokens = response.usage?.output_tokens ?? 0;

      logger.debug(`[LLM] anthropic ${this.model}: ${inputTokens}/${outputTokens} Tokens`);
      return {
        text,
        model: response.model || this.model,
        usage: {
          promptTokens: inputTokens,
          completionTokens: outputTokens,
          totalTokens: inputTokens + outputTokens,
        },
      };
    } catch (err) {
      throw new LLMProviderError(this.name, `Anthropic request failed: ${errorMessage(err)}`);
    }
  }
}
