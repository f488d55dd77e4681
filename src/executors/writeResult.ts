import path from 'path';
import type { ExecutorResult, JobDescriptor } from '../types/index.js';
import { InvalidParamsError } from '../utils/errors.js';
import { writeTextFile } from '../utils/files.js';
import { deliverableKey, toPosix } from './deliverables.js';
import type { Executor, ExecutorContext } from './types.js';

export const WRITE_RESULT_TASK = 'WRITE_RESULT';
export const WRITE_RESULT_ACTION = 'write_result';
const DEFAULT_OUT_PATH = 'hello.txt';

/**
 * Zielpfad immer unterhalb des Results-Verzeichnisses.
 * "agent_results/x.md", "/x.md" und "x.md" landen alle in <resultsDir>/x.md
 */
export function resolveOutPath(resultsDir: string, outPath: string): string {
  let rel = toPosix(outPath.trim()).replace(/^\/+/, '');
  const prefix = `${toPosix(path.basename(resultsDir))}/`;
  if (rel.startsWith(prefix)) {
    rel = rel.substring(prefix.length);
  }
  if (!rel) {
    rel = DEFAULT_OUT_PATH;
  }
  if (rel.split('/').includes('..')) {
    throw new InvalidParamsError(`out_path darf kein ".." enthalten: ${outPath}`);
  }
  return path.join(resultsDir, ...rel.split('/'));
}

export interface WriteResultOutcome {
  action: string;
  written: string | null;
}

/**
 * Führt eine "write_result"-Aktion aus. Andere Aktionen werden ignoriert.
 */
export function applyWriteResult(data: Record<string, unknown>, resultsDir: string): WriteResultOutcome {
  const action = String(data.action ?? '').trim();
  if (action !== WRITE_RESULT_ACTION) {
    return { action, written: null };
  }

  const outPath = typeof data.out_path === 'string' ? data.out_path : '';
  const content = data.out_content === undefined || data.out_content === null ? '' : String(data.out_content);
  const target = resolveOutPath(resultsDir, outPath);
  writeTextFile(target, content);
  return { action, written: target };
}

export class WriteResultExecutor implements Executor {
  readonly task = WRITE_RESULT_TASK;
  readonly description = 'Schreibt out_content nach agent_results/<out_path>';

  async run(job: JobDescriptor, ctx: ExecutorContext): Promise<ExecutorResult> {
    const jobId = ctx.jobId;
    // Descriptor mit task=WRITE_RESULT impliziert die Aktion
    const outcome = applyWriteResult({ action: WRITE_RESULT_ACTION, ...job }, ctx.resultsDir);

    if (!outcome.written) {
      const error = `Unsupported action: ${outcome.action || '(leer)'}`;
      return { ok: false, task: this.task, jobId, message: error, error, deliverables: {} };
    }

    ctx.opsLog.append(`WRITE_RESULT ${jobId} -> ${outcome.written}`, ctx.now());
    return {
      ok: true,
      task: this.task,
      jobId,
      message: `Wrote: ${outcome.written}`,
      deliverables: { [deliverableKey(outcome.written)]: outcome.written },
    };
  }
}
