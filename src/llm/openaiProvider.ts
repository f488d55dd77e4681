import OpenAI from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/index';
import { logger } from '../utils/logger.js';
import { LLMProviderError, MissingCredentialError, errorMessage } from '../utils/errors.js';
import { BaseProvider } from './base.js';
import type { GenerateOptions, LLMResponse } from './types.js';

export interface OpenAIProviderOptions {
  apiKey: string;
  model: string;
  baseURL?: string;
  timeoutMs?: number;
}

export class OpenAIProvider extends BaseProvider {
  readonly name = 'openai';
  readonly model: string;
  private client: OpenAI;

  constructor(options: OpenAIProviderOptions) {
    super();
    if (!options.apiKey) {
      throw new MissingCredentialError('OPENAI_API_KEY', 'OPENAI_API_KEY fehlt. In Secrets / env setzen.');
    }
    this.model = options.model || 'gpt-4.1-mini';
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseURL,
      timeout: options.timeoutMs ?? 90_000,
    });
  }

  async generate(prompt: string, options: GenerateOptions = {}): Promise<LLMResponse> {
    const messages: ChatCompletionMessageParam[] = [];
    if (options.system) {
      messages.push({ role: 'system', content: options.system });
    }
    messages.push({ role: 'user', content: prompt });

    try {
      const response = await this.client.chat.completions.create({
        model: this.model,
        messages,
        temperature: options.temperature ?? 0.2,
        ...(options.maxTokens ? { max_tokens: options.maxTokens } : {}),
      });

      const text = response.choices[0]?.message.content ?? '';
      const usage = response.usage
        ? {
            promptTokens: response.usage.prompt_tokens,
            completionTokens: response.usage.completion_tokens,
            totalTokens: response.usage.total_tokens,
          }
        : undefined;

      logger.debug(`[LLM] openai ${this.model}: ${usage?.totalTokens ?? '?'} Tokens`);
      return { text, model: response.model || this.model, usage };
    } catch (err) {
      throw new LLMProviderError(this.name, `OpenAI request failed: ${errorMessage(err)}`);
    }
  }
}
