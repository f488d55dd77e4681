import { describe, it, expect } from 'vitest';
import { createProvider, parseJsonObject } from '../llm/index.js';
import { OpenAIProvider } from '../llm/openaiProvider.js';
import { AnthropicProvider } from '../llm/anthropicProvider.js';
import { JSON_ONLY_INSTRUCTION } from '../llm/types.js';
import { LLMProviderError, MissingCredentialError } from '../utils/errors.js';
import type { Config } from '../types/index.js';
import { FakeLLM } from './fixtures.js';

const llmConfig: Config['llm'] = {
  provider: 'openai',
  openaiApiKey: '',
  openaiModel: 'gpt-4.1-mini',
  openaiBaseUrl: undefined,
  anthropicApiKey: '',
  anthropicModel: 'claude-3-5-haiku-20241022',
};

describe('LLM', () => {
  describe('parseJsonObject', () => {
    it('should parse plain and fenced JSON objects', () => {
      expect(parseJsonObject('p', '{"a":1}')).toEqual({ a: 1 });
      expect(parseJsonObject('p', '```json\n{"b":[1,2]}\n```')).toEqual({ b: [1, 2] });
    });

    it('should reject invalid JSON and non-objects', () => {
      expect(() => parseJsonObject('p', 'kein json')).toThrow(LLMProviderError);
      expect(() => parseJsonObject('p', '[1]')).toThrow('p: LLM returned JSON that is not an object. Raw:\n[1]');
    });
  });

  describe('json()', () => {
    it('should append the JSON instruction to the system prompt', async () => {
      const llm = new FakeLLM(['```\n{"ok":true}\n```']);

      await expect(llm.json('frage')).resolves.toEqual({ ok: true });
      expect(llm.calls[0].options.system).toBe(JSON_ONLY_INSTRUCTION);

      await llm.json('frage', { system: 'Sei knapp.' });
      expect(llm.calls[1].options.system).toBe(`Sei knapp.\n\n${JSON_ONLY_INSTRUCTION}`);
    });
  });

  describe('createProvider', () => {
    it('should return null without an API key', () => {
      expect(createProvider(llmConfig)).toBeNull();
      expect(createProvider({ ...llmConfig, provider: 'anthropic' })).toBeNull();
    });

    it('should create the configured provider', () => {
      const openai = createProvider({ ...llmConfig, openaiApiKey: 'test-key' });
      expect(openai).toBeInstanceOf(OpenAIProvider);
      expect(openai?.model).toBe('gpt-4.1-mini');

      const anthropic = createProvider({ ...llmConfig, provider: 'anthropic', anthropicApiKey: 'test-key' });
      expect(anthropic).toBeInstanceOf(AnthropicProvider);
      expect(anthropic?.name).toBe('anthropic');
    });

    it('should refuse to construct a provider without key', () => {
      expect(() => new OpenAIProvider({ apiKey: '', model: 'm' })).toThrow(MissingCredentialError);
    });
  });
});
