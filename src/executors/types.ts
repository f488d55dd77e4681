import type { ExecutorResult, JobDescriptor } from '../types/index.js';
import type { LLMProvider } from '../llm/types.js';
import type { OutboxStore } from '../jobs/outbox.js';
import type { OpsLog } from '../jobs/opsLog.js';

export interface ExecutorContext {
  resultsDir: string;
  opsLog: OpsLog;
  llm: LLMProvider | null;
  outbox: OutboxStore;
  // Folge-Jobs aus LLM-Antworten in die Outbox legen
  enqueueNextJobs: boolean;
  // Quelldatei des Jobs (für Prompts und Metadaten)
  sourceFile: string;
  // vom Router einmal beim Laden bestimmt
  jobId: string;
  now(): Date;
}

export interface Executor {
  readonly task: string;
  readonly description: string;
  run(job: JobDescriptor, ctx: ExecutorContext): Promise<ExecutorResult>;
}
