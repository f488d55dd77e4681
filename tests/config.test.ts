/**
 * Tests fuer Config Defaults
 * Prueft Defaults, Aliase und Grenzen der Umgebungsvariablen
 */

import { describe, it, expect, beforeEach, vi, afterEach } from 'vitest';
import { loadConfig } from '../src/utils/config.js';

describe('Config Defaults', () => {
  it('uses safe defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config.app).toEqual({ version: '1.4.0', port: 10000, allowedOrigins: ['*'] });
    expect(config.github).toEqual({
      token: '',
      defaultRepo: '',
      defaultBranch: 'main',
      apiBase: 'https://api.github.com',
    });
    expect(config.llm.provider).toBe('openai');
    expect(config.llm.openaiApiKey).toBe('');
    expect(config.paths).toEqual({
      outboxDir: 'agent_outbox',
      doneDir: 'agent_outbox_done',
      resultsDir: 'agent_results',
      opsLogDir: 'ops/logs',
      sqlitePath: './data/taskrelay.db',
    });
    expect(config.router).toEqual({
      maxJobsPerRun: 20,
      sleepBetweenJobsMs: 100,
      writeHeartbeat: true,
      intervalMs: 60000,
      enqueueNextJobs: false,
    });
    expect(config.generator.intervalMin).toBe(60);
    expect(config.schedulerEnabled).toBe(true);
  });

  it('ENQUEUE_NEXT_JOBS stays off unless explicitly enabled', () => {
    expect(loadConfig({ ENQUEUE_NEXT_JOBS: 'nein' }).router.enqueueNextJobs).toBe(false);
    expect(loadConfig({ ENQUEUE_NEXT_JOBS: 'YES' }).router.enqueueNextJobs).toBe(true);
    expect(loadConfig({ ENQUEUE_NEXT_JOBS: '1' }).router.enqueueNextJobs).toBe(true);
  });

  it('accepts GITHUB_PAT and OPENAI_KEY as aliases', () => {
    const config = loadConfig({ GITHUB_PAT: 'test-pat', OPENAI_KEY: 'test-key' });
    expect(config.github.token).toBe('test-pat');
    expect(config.llm.openaiApiKey).toBe('test-key');
  });

  it('prefers GITHUB_TOKEN over GITHUB_PAT', () => {
    expect(loadConfig({ GITHUB_TOKEN: 'test-token', GITHUB_PAT: 'test-pat' }).github.token).toBe('test-token');
  });

  it('treats blank values as unset', () => {
    const config = loadConfig({ DEFAULT_BRANCH: '  ', OPENAI_API_KEY: '', OPENAI_KEY: 'test-key' });
    expect(config.github.defaultBranch).toBe('main');
    expect(config.llm.openaiApiKey).toBe('test-key');
  });

  it('clamps router limits', () => {
    const config = loadConfig({
      MAX_JOBS_PER_RUN: '0',
      SLEEP_BETWEEN_JOBS_MS: '-5',
      ROUTER_INTERVAL_MS: '10',
      JOB_GENERATE_INTERVAL_MIN: 'abc',
    });
    expect(config.router.maxJobsPerRun).toBe(1);
    expect(config.router.sleepBetweenJobsMs).toBe(0);
    expect(config.router.intervalMs).toBe(1000);
    expect(config.generator.intervalMin).toBe(60);
  });

  it('splits allowed origins and strips the API base slash', () => {
    const config = loadConfig({
      ALLOWED_ORIGINS: 'https://a.example, https://b.example,',
      GITHUB_API_BASE: 'https://ghe.example/api/v3/',
    });
    expect(config.app.allowedOrigins).toEqual(['https://a.example', 'https://b.example']);
    expect(config.github.apiBase).toBe('https://ghe.example/api/v3');
  });

  it('rejects an unknown LLM provider', () => {
    expect(() => loadConfig({ LLM_PROVIDER: 'gemini' })).toThrow();
  });

  describe('module config', () => {
    const originalEnv = process.env;

    beforeEach(() => {
      // Reset env und Module-Cache
      vi.resetModules();
      process.env = { ...originalEnv };
    });

    afterEach(() => {
      process.env = originalEnv;
    });

    it('SCHEDULER_ENABLED=false disables the scheduler', async () => {
      process.env.SCHEDULER_ENABLED = 'false';
      const { config } = await import('../src/utils/config.js');
      expect(config.schedulerEnabled).toBe(false);
    });

    it('LLM_PROVIDER selects anthropic', async () => {
      process.env.LLM_PROVIDER = 'anthropic';
      process.env.ANTHROPIC_API_KEY = 'test-key';
      const { config } = await import('../src/utils/config.js');
      expect(config.llm.provider).toBe('anthropic');
      expect(config.llm.anthropicApiKey).toBe('test-key');
    });
  });
});
