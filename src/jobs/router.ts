// ═══════════════════════════════════════════════════════════════
//                    TASK ROUTER
//   Outbox -> Executor -> Done-Verzeichnis
//   Jeder Job endet in genau einem Endzustand, nie ohne Spur
// ═══════════════════════════════════════════════════════════════

import path from 'path';
import type { ExecutorResult, JobDescriptor, RouterOutcome, RouterStatus, TickSummary, TokenUsage } from '../types/index.js';
import { config } from '../utils/config.js';
import { logger } from '../utils/logger.js';
import { ExecutorNotFoundError, describeError } from '../utils/errors.js';
import { writeTextFile } from '../utils/files.js';
import { compactStamp, humanUtc, sleep } from '../utils/time.js';
import { createProvider, type LLMProvider } from '../llm/index.js';
import { createDefaultRegistry, type ExecutorRegistry, type Executor, type ExecutorContext } from '../executors/index.js';
import { missingDeliverables } from '../executors/deliverables.js';
import { isDatabaseInitialized } from '../storage/db.js';
import { recordRun } from '../storage/repositories/jobRuns.js';
import { publishResult } from './publisher.js';
import { OutboxStore, idHintFor, outboxStore, type OutboxJob } from './outbox.js';
import { OpsLog } from './opsLog.js';
import { detectTaskType, pickStringList, resolveJobId } from './schema.js';

const HEARTBEAT_FILE = 'RUNNER_HEARTBEAT.md';
const SUPPORTED_TYPE_KEYS = ['job_type', 'task', 'type'];

export interface TaskRouterOptions {
  outbox?: OutboxStore;
  registry?: ExecutorRegistry;
  resultsDir?: string;
  opsLog?: OpsLog;
  // null = bewusst ohne LLM; undefined = aus der Config erzeugen
  llm?: LLMProvider | null;
  maxJobsPerRun?: number;
  sleepBetweenJobsMs?: number;
  writeHeartbeat?: boolean;
  enqueueNextJobs?: boolean;
  // <job_id>.result.json + DAILY_<datum>.md pro Ergebnis
  publishResults?: boolean;
  now?: () => Date;
}

export type DispatchStatus = 'DONE' | 'FAILED' | 'NEEDS_INPUT';

export interface DispatchResult {
  job_id: string;
  job_type: string | null;
  status: DispatchStatus;
  reason?: string;
  message?: string;
  details?: Record<string, unknown>;
  deliverables?: Record<string, string>;
}

function rawJson(job: unknown): string {
  return JSON.stringify(job, null, 2);
}

/**
 * Router-Ergebnis im Format des Publishers (status ok/fail, usage in snake_case)
 */
export function outcomeToResult(outcome: RouterOutcome): Record<string, unknown> {
  const result: Record<string, unknown> = {
    job_id: outcome.jobId,
    task: outcome.task,
    status: outcome.status === 'DONE' ? 'ok' : 'fail',
    router_status: outcome.status,
    file: outcome.fileName,
    message: outcome.message,
    done_path: outcome.donePath,
    result_file: outcome.resultFile,
    missing_deliverables: outcome.missingDeliverables,
    duration_ms: outcome.durationMs,
  };
  if (outcome.usage) {
    result.usage = {
      prompt_tokens: outcome.usage.promptTokens,
      completion_tokens: outcome.usage.completionTokens,
      total_tokens: outcome.usage.totalTokens,
    };
  }
  return result;
}

export class TaskRouter {
  readonly outbox: OutboxStore;
  readonly registry: ExecutorRegistry;
  readonly resultsDir: string;
  readonly opsLog: OpsLog;
  private llm: LLMProvider | null | undefined;
  private readonly maxJobsPerRun: number;
  private readonly sleepBetweenJobsMs: number;
  private readonly writeHeartbeat: boolean;
  private readonly enqueueNextJobs: boolean;
  private readonly publishResults: boolean;
  private readonly now: () => Date;
  // laufender Tick; weitere Aufrufer (Scheduler, MCP) teilen ihn
  private inFlight: Promise<TickSummary> | null = null;

  constructor(options: TaskRouterOptions = {}) {
    this.outbox = options.outbox ?? outboxStore;
    this.registry = options.registry ?? createDefaultRegistry();
    this.resultsDir = options.resultsDir ?? config.paths.resultsDir;
    this.opsLog = options.opsLog ?? new OpsLog(config.paths.opsLogDir);
    this.llm = options.llm;
    this.maxJobsPerRun = Math.max(1, options.maxJobsPerRun ?? config.router.maxJobsPerRun);
    this.sleepBetweenJobsMs = Math.max(0, options.sleepBetweenJobsMs ?? config.router.sleepBetweenJobsMs);
    this.writeHeartbeat = options.writeHeartbeat ?? config.router.writeHeartbeat;
    this.enqueueNextJobs = options.enqueueNextJobs ?? config.router.enqueueNextJobs;
    this.publishResults = options.publishResults ?? true;
    this.now = options.now ?? (() => new Date());
  }

  // LLM-Client erst bei Bedarf bauen
  private getLlm(): LLMProvider | null {
    if (this.llm === undefined) {
      this.llm = createProvider(config.llm);
    }
    return this.llm;
  }

  private context(sourceFile: string, jobId: string): ExecutorContext {
    return {
      resultsDir: this.resultsDir,
      opsLog: this.opsLog,
      llm: this.getLlm(),
      outbox: this.outbox,
      enqueueNextJobs: this.enqueueNextJobs,
      sourceFile,
      jobId,
      now: this.now,
    };
  }

  // ═══════════════════════════════════════════════════════════════
  // TICK
  // ═══════════════════════════════════════════════════════════════

  /**
   * Ein Durchlauf über die Outbox. Wirft nie.
   * Läuft bereits ein Tick, bekommt der Aufrufer dessen Ergebnis.
   */
  tick(): Promise<TickSummary> {
    if (this.inFlight) {
      logger.debug('Router-Tick läuft bereits, warte auf dessen Ergebnis');
      return this.inFlight;
    }
    const running = this.runTick().finally(() => {
      this.inFlight = null;
    });
    this.inFlight = running;
    return running;
  }

  isTicking(): boolean {
    return this.inFlight !== null;
  }

  private async runTick(): Promise<TickSummary> {
    const startedAt = this.now();
    const summary: TickSummary = {
      startedAt,
      finishedAt: startedAt,
      processed: 0,
      done: 0,
      failed: 0,
      skipped: 0,
      outcomes: [],
    };

    try {
      this.outbox.ensureDirs();
      if (this.writeHeartbeat) {
        writeTextFile(path.join(this.resultsDir, HEARTBEAT_FILE), `# Runner heartbeat\n\nLast run: ${humanUtc(startedAt)}\n`);
      }

      const files = this.outbox.list();
      const batch = files.slice(0, this.maxJobsPerRun);
      summary.skipped = files.length - batch.length;

      if (batch.length === 0) {
        logger.debug('Outbox leer');
      } else {
        logger.info(`Router: ${batch.length} Job(s) in der Outbox${summary.skipped ? `, ${summary.skipped} auf später verschoben` : ''}`);
      }

      for (let i = 0; i < batch.length; i++) {
        const outcome = await this.processOne(batch[i]);
        summary.outcomes.push(outcome);
        summary.processed++;
        if (outcome.status === 'DONE') {
          summary.done++;
        } else {
          summary.failed++;
        }

        if (i < batch.length - 1 && this.sleepBetweenJobsMs > 0) {
          await sleep(this.sleepBetweenJobsMs);
        }
      }
    } catch (err) {
      logger.error(`Router-Tick abgebrochen: ${describeError(err)}`);
    }

    summary.finishedAt = this.now();
    return summary;
  }

  // ═══════════════════════════════════════════════════════════════
  // EINZELNER JOB
  // ═══════════════════════════════════════════════════════════════

  /**
   * Verarbeitet eine Outbox-Datei bis zu ihrem Endzustand. Wirft nie.
   */
  async processOne(jobPath: string): Promise<RouterOutcome> {
    const startedMs = Date.now();
    let outcome: RouterOutcome;

    try {
      const job = this.outbox.load(jobPath);
      outcome = await this.route(job, startedMs);
    } catch (err) {
      outcome = this.handleCrash(jobPath, err, startedMs);
    }

    this.record(outcome);
    return outcome;
  }

  private async route(job: OutboxJob, startedMs: number): Promise<RouterOutcome> {
    const jobId = resolveJobId(job.data, job.fileName);
    this.outbox.markStatus(job, 'started', this.now());

    let executor: Executor;
    try {
      executor = this.registry.resolve(job.task);
    } catch (err) {
      if (err instanceof ExecutorNotFoundError) {
        return this.handleUnknownTask(job, jobId, err, startedMs);
      }
      throw err;
    }

    logger.info(`Job ${job.fileName} -> ${executor.task}`);

    let result: ExecutorResult;
    try {
      result = await executor.run(job.data, this.context(job.path, jobId));
    } catch (err) {
      const error = describeError(err);
      result = { ok: false, task: executor.task, jobId, message: error, error, deliverables: {} };
    }

    if (!result.ok) {
      return this.handleExecutorFailure(job, result, startedMs);
    }

    const missing = missingDeliverables(pickStringList(job.data, 'deliverables'), result.deliverables);
    if (missing.length) {
      logger.warn(`Job ${result.jobId}: deklarierte Deliverables fehlen: ${missing.join(', ')}`);
    }

    const produced = Object.values(result.deliverables);
    job.data.status = 'completed';
    job.data.updated_at = this.now().toISOString();
    job.data.output_files = produced;

    const note = missing.length ? `${result.message} | missing deliverables: ${missing.join(', ')}` : result.message;
    const donePath = this.outbox.markDone(job, 'DONE', note, this.now());
    logger.info(`Job ${result.jobId} erledigt: ${result.message}`);

    return this.outcome(job.fileName, result.jobId, job.task, 'DONE', {
      donePath,
      resultFile: produced[0] ?? null,
      message: result.message,
      missingDeliverables: missing,
      startedMs,
      usage: result.usage,
    });
  }

  private handleUnknownTask(job: OutboxJob, jobId: string, err: ExecutorNotFoundError, startedMs: number): RouterOutcome {
    const now = this.now();
    const resultFile = path.join(this.resultsDir, `UNKNOWN_TASK_${job.idHint}_${compactStamp(now)}.md`);
    writeTextFile(
      resultFile,
      '# Unknown task (fallback)\n\n' +
        `- time: ${humanUtc(now)}\n` +
        `- job file: ${job.fileName}\n` +
        `- task: ${job.task}\n` +
        `- reason: ${err.message}\n\n` +
        '## Raw job JSON\n' +
        '```json\n' +
        `${rawJson(job.data)}\n` +
        '```\n'
    );

    const donePath = this.outbox.markDone(job, 'FAILED_unknown_task', err.message, now);
    logger.warn(`Job ${job.fileName}: ${err.message}`);

    return this.outcome(job.fileName, jobId, job.task, 'FAILED_unknown_task', {
      donePath,
      resultFile,
      message: err.message,
      missingDeliverables: [],
      startedMs,
    });
  }

  private handleExecutorFailure(job: OutboxJob, result: ExecutorResult, startedMs: number): RouterOutcome {
    const now = this.now();
    const reason = result.error ?? result.message;
    const resultFile = path.join(this.resultsDir, `TASK_FAILED_${result.task}_${job.idHint}_${compactStamp(now)}.md`);

    let text =
      '# TASK FAILED\n\n' +
      `- time: ${humanUtc(now)}\n` +
      `- job file: ${job.fileName}\n` +
      `- task: ${result.task}\n` +
      `- job: ${result.jobId}\n\n` +
      '## Message\n' +
      `${reason}\n\n`;
    if (result.needs) {
      text += '## Needs\n```json\n' + `${rawJson(result.needs)}\n` + '```\n\n';
    }
    text += '## Raw job JSON\n```json\n' + `${rawJson(job.data)}\n` + '```\n';
    writeTextFile(resultFile, text);

    job.data.status = 'failed';
    job.data.updated_at = now.toISOString();
    const donePath = this.outbox.markDone(job, 'FAILED_executor_error', reason, now);
    logger.error(`Job ${result.jobId} (${result.task}) fehlgeschlagen: ${reason}`);

    return this.outcome(job.fileName, result.jobId, result.task, 'FAILED_executor_error', {
      donePath,
      resultFile,
      message: reason,
      missingDeliverables: [],
      startedMs,
      usage: result.usage,
    });
  }

  /**
   * Alles was vor oder neben dem Executor schiefgeht (z.B. kaputtes JSON)
   */
  private handleCrash(jobPath: string, err: unknown, startedMs: number): RouterOutcome {
    const now = this.now();
    const fileName = path.basename(jobPath);
    const message = describeError(err);
    logger.error(`Router-Crash bei ${fileName}: ${message}`);

    let resultFile: string | null = path.join(this.resultsDir, `ROUTER_CRASH_${idHintFor(fileName)}_${compactStamp(now)}.md`);
    let donePath: string | null = null;

    try {
      const stack = err instanceof Error && err.stack ? err.stack : message;
      writeTextFile(
        resultFile,
        '# Router crash\n\n' +
          `- time: ${humanUtc(now)}\n` +
          `- job file: ${fileName}\n\n` +
          '## Error\n```\n' +
          `${stack}\n` +
          '```\n\n' +
          '## Raw file\n```\n' +
          `${this.outbox.readRaw(jobPath)}\n` +
          '```\n'
      );
    } catch (writeErr) {
      logger.error(`Crash-Bericht für ${fileName} nicht schreibbar: ${describeError(writeErr)}`);
      resultFile = null;
    }

    try {
      donePath = this.outbox.moveRaw(jobPath, 'FAILED_router_crash', now);
    } catch (moveErr) {
      logger.error(`Job ${fileName} konnte nicht verschoben werden: ${describeError(moveErr)}`);
    }

    return this.outcome(fileName, idHintFor(fileName), 'UNKNOWN', 'FAILED_router_crash', {
      donePath,
      resultFile,
      message,
      missingDeliverables: [],
      startedMs,
    });
  }

  private outcome(
    fileName: string,
    jobId: string,
    task: string,
    status: RouterStatus,
    rest: {
      donePath: string | null;
      resultFile: string | null;
      message: string;
      missingDeliverables: string[];
      startedMs: number;
      usage?: TokenUsage;
    }
  ): RouterOutcome {
    return {
      fileName,
      jobId,
      task,
      status,
      donePath: rest.donePath,
      resultFile: rest.resultFile,
      message: rest.message,
      missingDeliverables: rest.missingDeliverables,
      durationMs: Date.now() - rest.startedMs,
      ...(rest.usage ? { usage: rest.usage } : {}),
    };
  }

  private record(outcome: RouterOutcome): void {
    try {
      const target = outcome.resultFile ? ` -> ${outcome.resultFile}` : '';
      this.opsLog.append(`${outcome.status} ${outcome.task} job=${outcome.jobId} file=${outcome.fileName}${target}`, this.now());
    } catch (err) {
      logger.warn(`Ops-Log nicht schreibbar: ${describeError(err)}`);
    }

    if (this.publishResults) {
      try {
        publishResult(outcomeToResult(outcome), { resultsDir: this.resultsDir, now: this.now() });
      } catch (err) {
        logger.warn(`Ergebnis für ${outcome.jobId} nicht veröffentlicht: ${describeError(err)}`);
      }
    }

    if (!isDatabaseInitialized()) return;
    try {
      recordRun(outcome, this.now());
    } catch (err) {
      logger.warn(`Run-Ledger Eintrag fehlgeschlagen: ${describeError(err)}`);
    }
  }

  // ═══════════════════════════════════════════════════════════════
  // IN-MEMORY DISPATCH
  // ═══════════════════════════════════════════════════════════════

  /**
   * Job ohne Outbox-Datei ausführen. `needs` ergänzt fehlende Eingaben.
   * Unbekannte Typen ergeben NEEDS_INPUT statt FAILED, damit der Aufrufer
   * nachliefern und erneut senden kann.
   */
  async dispatch(job: JobDescriptor, needs: Record<string, unknown> = {}): Promise<DispatchResult> {
    const merged: JobDescriptor = { ...job, ...needs };
    const jobType = detectTaskType(merged);
    const jobId = typeof merged.job_id === 'string' && merged.job_id ? merged.job_id : 'unknown';
    const dispatchSource = '(dispatch)';

    if (!jobType || !this.registry.has(jobType)) {
      return {
        job_id: jobId,
        job_type: jobType || null,
        status: 'NEEDS_INPUT',
        reason: 'Unknown job type',
        details: {
          type: jobType || null,
          expected_keys_any_of: SUPPORTED_TYPE_KEYS,
          supported: this.registry.supported(),
        },
      };
    }

    const executor = this.registry.resolve(jobType);
    let result: ExecutorResult;
    try {
      result = await executor.run(merged, this.context(dispatchSource, resolveJobId(merged, dispatchSource)));
    } catch (err) {
      return { job_id: jobId, job_type: jobType, status: 'FAILED', reason: describeError(err) };
    }

    if (result.ok) {
      return {
        job_id: result.jobId,
        job_type: jobType,
        status: 'DONE',
        message: result.message,
        deliverables: result.deliverables,
      };
    }

    return {
      job_id: result.jobId,
      job_type: jobType,
      status: result.needs ? 'NEEDS_INPUT' : 'FAILED',
      reason: result.error ?? result.message,
      ...(result.needs ? { details: result.needs } : {}),
      deliverables: result.deliverables,
    };
  }
}

export const taskRouter = new TaskRouter();
