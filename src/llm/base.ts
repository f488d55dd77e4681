import { LLMProviderError } from '../utils/errors.js';
import { isPlainObject } from '../jobs/schema.js';
import { JSON_ONLY_INSTRUCTION, type GenerateOptions, type LLMProvider, type LLMResponse } from './types.js';

/**
 * Gemeinsame JSON-Logik für alle Provider
 */
export abstract class BaseProvider implements LLMProvider {
  abstract readonly name: string;
  abstract readonly model: string;

  abstract generate(prompt: string, options?: GenerateOptions): Promise<LLMResponse>;

  async json(prompt: string, options: GenerateOptions = {}): Promise<Record<string, unknown>> {
    const system = `${options.system ?? ''}\n\n${JSON_ONLY_INSTRUCTION}`.trim();
    const out = (await this.generate(prompt, { ...options, system })).text.trim();
    return parseJsonObject(this.name, out);
  }
}

// Modelle packen JSON gern in ```json Blöcke
function stripCodeFence(text: string): string {
  const match = text.match(/^```(?:json)?\s*([\s\S]*?)\s*```$/);
  return match ? match[1] : text;
}

export function parseJsonObject(provider: string, text: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stripCodeFence(text.trim()));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new LLMProviderError(provider, `LLM returned no valid JSON (${reason}). Raw:\n${text}`, text);
  }
  if (!isPlainObject(parsed)) {
    throw new LLMProviderError(provider, `LLM returned JSON that is not an object. Raw:\n${text}`, text);
  }
  return parsed;
}
