import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';
import type { Config } from '../types/index.js';

// .env laden
dotenvConfig();
dotenvConfig({ path: '.env.local', override: true });

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.string().default('10000'),
  APP_VERSION: z.string().default('1.4.0'),
  ALLOWED_ORIGINS: z.string().default('*'),

  // GitHub
  GITHUB_TOKEN: z.string().optional(),
  GITHUB_PAT: z.string().optional(),
  DEFAULT_REPO: z.string().default(''),          // "owner/repo"
  DEFAULT_BRANCH: z.string().default('main'),
  GITHUB_API_BASE: z.string().default('https://api.github.com'),

  // LLM
  LLM_PROVIDER: z.enum(['openai', 'anthropic']).default('openai'),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_KEY: z.string().optional(),
  OPENAI_MODEL: z.string().default('gpt-4.1-mini'),
  OPENAI_BASE_URL: z.string().optional(),
  ANTHROPIC_API_KEY: z.string().optional(),
  ANTHROPIC_MODEL: z.string().default('claude-3-5-haiku-20241022'),

  // Pfade
  OUTBOX_DIR: z.string().default('agent_outbox'),
  DONE_DIR: z.string().default('agent_outbox_done'),
  RESULTS_DIR: z.string().default('agent_results'),
  OPS_LOG_DIR: z.string().default('ops/logs'),
  SQLITE_PATH: z.string().default('./data/taskrelay.db'),

  // Router
  MAX_JOBS_PER_RUN: z.string().default('20'),
  SLEEP_BETWEEN_JOBS_MS: z.string().default('100'),
  WRITE_RUN_HEARTBEAT: z.string().default('true'),
  ROUTER_INTERVAL_MS: z.string().default('60000'),
  ENQUEUE_NEXT_JOBS: z.string().default('false'),

  // Generator (60 min ist sicher, kleiner erst wenn stabil)
  JOB_GENERATE_INTERVAL_MIN: z.string().default('60'),
  SCHEDULER_ENABLED: z.string().default('true'),
});

export type Env = z.infer<typeof envSchema>;

// Leere Strings zählen als "nicht gesetzt"
function blankToUndefined(source: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(source)) {
    if (value !== undefined && value.trim() !== '') {
      out[key] = value.trim();
    }
  }
  return out;
}

function isTruthy(value: string): boolean {
  return ['1', 'true', 'yes'].includes(value.toLowerCase());
}

function parseIntOr(value: string, fallback: number): number {
  const n = parseInt(value, 10);
  return Number.isNaN(n) ? fallback : n;
}

export function buildConfig(env: Env): Config {
  return {
    app: {
      version: env.APP_VERSION,
      port: parseIntOr(env.PORT, 10000),
      allowedOrigins: env.ALLOWED_ORIGINS
        .split(',')
        .map((origin) => origin.trim())
        .filter((origin) => origin.length > 0),
    },
    github: {
      token: env.GITHUB_TOKEN ?? env.GITHUB_PAT ?? '',
      defaultRepo: env.DEFAULT_REPO,
      defaultBranch: env.DEFAULT_BRANCH,
      apiBase: env.GITHUB_API_BASE.replace(/\/+$/, ''),
    },
    llm: {
      provider: env.LLM_PROVIDER,
      openaiApiKey: env.OPENAI_API_KEY ?? env.OPENAI_KEY ?? '',
      openaiModel: env.OPENAI_MODEL,
      openaiBaseUrl: env.OPENAI_BASE_URL,
      anthropicApiKey: env.ANTHROPIC_API_KEY ?? '',
      anthropicModel: env.ANTHROPIC_MODEL,
    },
    paths: {
      outboxDir: env.OUTBOX_DIR,
      doneDir: env.DONE_DIR,
      resultsDir: env.RESULTS_DIR,
      opsLogDir: env.OPS_LOG_DIR,
      sqlitePath: env.SQLITE_PATH,
    },
    router: {
      // mindestens 1 Job pro Lauf
      maxJobsPerRun: Math.max(1, parseIntOr(env.MAX_JOBS_PER_RUN, 20)),
      sleepBetweenJobsMs: Math.max(0, parseIntOr(env.SLEEP_BETWEEN_JOBS_MS, 100)),
      writeHeartbeat: isTruthy(env.WRITE_RUN_HEARTBEAT),
      intervalMs: Math.max(1000, parseIntOr(env.ROUTER_INTERVAL_MS, 60000)),
      enqueueNextJobs: isTruthy(env.ENQUEUE_NEXT_JOBS),
    },
    generator: {
      intervalMin: Math.max(1, parseIntOr(env.JOB_GENERATE_INTERVAL_MIN, 60)),
    },
    schedulerEnabled: isTruthy(env.SCHEDULER_ENABLED),
  };
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): Config {
  return buildConfig(envSchema.parse(blankToUndefined(source)));
}

const env = envSchema.parse(blankToUndefined(process.env));

export const config: Config = buildConfig(env);

export const NODE_ENV = env.NODE_ENV;
export const LOG_LEVEL = process.env.LOG_LEVEL || 'info';

export default config;
