// ═══════════════════════════════════════════════════════════════
//                    TASKRELAY - TYPES
// ═══════════════════════════════════════════════════════════════

export type JobStatus = 'created' | 'started' | 'completed' | 'failed';

// Endzustände eines Jobs im Done-Verzeichnis (stehen im Dateinamen)
export type RouterStatus =
  | 'DONE'
  | 'FAILED_unknown_task'
  | 'FAILED_executor_error'
  | 'FAILED_router_crash';

export type LLMProviderName = 'openai' | 'anthropic';

/**
 * Job-Descriptor wie er im Outbox-Verzeichnis liegt.
 * Offenes Objekt: unbekannte Felder bleiben erhalten.
 */
export interface JobDescriptor {
  task?: string;
  job_type?: string;
  type?: string;
  job_id?: string;
  id?: string;
  rules?: string[];
  deliverables?: string[];
  focus?: string[];
  description?: string;
  title?: string;
  instructions?: string;
  input?: Record<string, unknown>;
  status?: string;
  created_at?: string;
  updated_at?: string;
  owner?: string;
  [key: string]: unknown;
}

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface NextJob {
  type: string;
  title: string;
  instructions: string;
  created_at: string;
  origin: string;
}

export interface ExecutorResult {
  ok: boolean;
  task: string;
  jobId: string;
  message: string;
  // deklarierter Pfad (z.B. "agent_results/ROI_PLAN.md") -> tatsächlich geschriebene Datei
  deliverables: Record<string, string>;
  needs?: Record<string, unknown>;
  error?: string;
  usage?: TokenUsage;
  nextJobs?: NextJob[];
}

export interface RouterOutcome {
  fileName: string;
  jobId: string;
  task: string;
  status: RouterStatus;
  donePath: string | null;
  resultFile: string | null;
  message: string;
  missingDeliverables: string[];
  durationMs: number;
  usage?: TokenUsage;
}

export interface TickSummary {
  startedAt: Date;
  finishedAt: Date;
  processed: number;
  done: number;
  failed: number;
  skipped: number;
  outcomes: RouterOutcome[];
}

export interface Config {
  app: {
    version: string;
    port: number;
    allowedOrigins: string[];
  };
  github: {
    token: string;
    defaultRepo: string;
    defaultBranch: string;
    apiBase: string;
  };
  llm: {
    provider: LLMProviderName;
    openaiApiKey: string;
    openaiModel: string;
    openaiBaseUrl: string | undefined;
    anthropicApiKey: string;
    anthropicModel: string;
  };
  paths: {
    outboxDir: string;
    doneDir: string;
    resultsDir: string;
    opsLogDir: string;
    sqlitePath: string;
  };
  router: {
    maxJobsPerRun: number;
    sleepBetweenJobsMs: number;
    writeHeartbeat: boolean;
    intervalMs: number;
    enqueueNextJobs: boolean;
  };
  generator: {
    intervalMin: number;
  };
  schedulerEnabled: boolean;
}
