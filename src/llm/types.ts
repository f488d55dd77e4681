import type { TokenUsage } from '../types/index.js';

export interface LLMResponse {
  text: string;
  model: string;
  usage?: TokenUsage;
}

export interface GenerateOptions {
  system?: string;
  maxTokens?: number;
  temperature?: number;
}

export interface LLMProvider {
  readonly name: string;
  readonly model: string;
  generate(prompt: string, options?: GenerateOptions): Promise<LLMResponse>;
  json(prompt: string, options?: GenerateOptions): Promise<Record<string, unknown>>;
}

export const JSON_ONLY_INSTRUCTION = 'Antworte NUR mit gültigem JSON. Kein Text ausserhalb des JSON.';
