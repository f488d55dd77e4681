/**
 * Gemeinsame Test-Hilfen: Temp-Verzeichnisse, Fake-LLM, Executor-Kontext
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import { BaseProvider } from '../llm/base.js';
import type { GenerateOptions, LLMResponse } from '../llm/types.js';
import type { Executor, ExecutorContext } from '../executors/types.js';
import type { ExecutorResult, JobDescriptor } from '../types/index.js';
import { resolveJobId } from '../jobs/schema.js';
import { OutboxStore } from '../jobs/outbox.js';
import { OpsLog } from '../jobs/opsLog.js';

export const FIXED_NOW = new Date('2026-10-19T08:05:03.123Z');

export function makeTempDir(prefix = 'taskrelay-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export type FakeReply = string | Error;

/**
 * Liefert vorgegebene Antworten der Reihe nach, zeichnet Aufrufe auf
 */
export class FakeLLM extends BaseProvider {
  readonly name = 'fake';
  readonly model = 'fake-model';
  readonly calls: Array<{ prompt: string; options: GenerateOptions }> = [];

  constructor(private replies: FakeReply[]) {
    super();
  }

  async generate(prompt: string, options: GenerateOptions = {}): Promise<LLMResponse> {
    this.calls.push({ prompt, options });
    const reply = this.replies.length > 1 ? this.replies.shift() : this.replies[0];
    if (reply === undefined) {
      throw new Error('FakeLLM: keine Antwort hinterlegt');
    }
    if (reply instanceof Error) {
      throw reply;
    }
    return {
      text: reply,
      model: this.model,
      usage: { promptTokens: 10, completionTokens: 5, totalTokens: 15 },
    };
  }
}

export interface TestWorkspace {
  root: string;
  outboxDir: string;
  doneDir: string;
  resultsDir: string;
  opsLogDir: string;
  outbox: OutboxStore;
  opsLog: OpsLog;
}

export function makeWorkspace(): TestWorkspace {
  const root = makeTempDir();
  const outboxDir = path.join(root, 'agent_outbox');
  const doneDir = path.join(root, 'agent_outbox_done');
  const resultsDir = path.join(root, 'agent_results');
  const opsLogDir = path.join(root, 'ops', 'logs');
  return {
    root,
    outboxDir,
    doneDir,
    resultsDir,
    opsLogDir,
    outbox: new OutboxStore({ outboxDir, doneDir }),
    opsLog: new OpsLog(opsLogDir),
  };
}

export function makeContext(ws: TestWorkspace, overrides: Partial<ExecutorContext> = {}): ExecutorContext {
  return {
    resultsDir: ws.resultsDir,
    opsLog: ws.opsLog,
    llm: null,
    outbox: ws.outbox,
    enqueueNextJobs: false,
    sourceFile: path.join(ws.outboxDir, 'job.json'),
    jobId: 'job',
    now: () => FIXED_NOW,
    ...overrides,
  };
}

/**
 * Führt einen Executor aus wie der Router: Job-ID einmal aus Job + Dateiname
 */
export function runExecutor(
  executor: Executor,
  job: JobDescriptor,
  ws: TestWorkspace,
  overrides: Partial<ExecutorContext> = {}
): Promise<ExecutorResult> {
  return executor.run(job, makeContext(ws, { jobId: resolveJobId(job, 'job.json'), ...overrides }));
}

export function writeJob(ws: TestWorkspace, fileName: string, data: unknown, mtime?: Date): string {
  fs.mkdirSync(ws.outboxDir, { recursive: true });
  const file = path.join(ws.outboxDir, fileName);
  fs.writeFileSync(file, typeof data === 'string' ? data : JSON.stringify(data, null, 2), 'utf-8');
  if (mtime) {
    fs.utimesSync(file, mtime, mtime);
  }
  return file;
}

export function readJson(file: string): unknown {
  return JSON.parse(fs.readFileSync(file, 'utf-8'));
}
