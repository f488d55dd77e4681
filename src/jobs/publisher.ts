/**
 * Ergebnis-Veröffentlichung nach Abschluss eines Jobs (Erfolg oder Fehler)
 *
 * Schreibt:
 *  - agent_results/<job_id>.result.json   (atomar über .tmp)
 *  - agent_results/DAILY_<YYYY-MM-DD>.md  (append-only, eine Zeile pro Ergebnis)
 */

import path from 'path';
import { config } from '../utils/config.js';
import { logger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import { appendTextFile, resolveInside, safeFileBase, writeJsonAtomic } from '../utils/files.js';
import { compactStamp, dayStamp, hourMinute } from '../utils/time.js';
import { isPlainObject } from './schema.js';

const MAX_REASON_LENGTH = 160;
const RESULT_SUFFIX = '.result.json';

export interface PublishOptions {
  resultsDir?: string;
  filenameHint?: string;
  now?: Date;
}

export interface PublishedPaths {
  resultJson: string;
  dailyLog: string;
}

function nonEmpty(value: unknown): string | null {
  return typeof value === 'string' && value.trim() ? value.trim() : null;
}

function toNumber(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'string' && value.trim()) {
    const n = Number(value.trim());
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

// ═══════════════════════════════════════════════════════════════
// EXTRAKTION
// ═══════════════════════════════════════════════════════════════

export function extractStatus(result: Record<string, unknown>): string {
  for (const key of ['status', 'state', 'result_status']) {
    const v = nonEmpty(result[key]);
    if (v) return v.toLowerCase();
  }
  if (result.error || result.exception || result.traceback) {
    return 'fail';
  }
  return 'ok';
}

/**
 * Usage-Objekt aus den gängigen Formen: usage, meta.usage, provider.usage, openai.usage
 */
export function extractUsage(result: Record<string, unknown>): Record<string, unknown> {
  const keyPaths = [['usage'], ['meta', 'usage'], ['provider', 'usage'], ['openai', 'usage']];

  for (const keyPath of keyPaths) {
    let cur: unknown = result;
    for (const key of keyPath) {
      cur = isPlainObject(cur) ? cur[key] : undefined;
    }
    if (isPlainObject(cur)) return cur;
  }
  return {};
}

export function extractTokens(usage: Record<string, unknown>): number | null {
  const total = usage.total_tokens;
  if (typeof total === 'number' && Number.isInteger(total)) return total;

  const prompt = usage.prompt_tokens;
  const completion = usage.completion_tokens;
  if (typeof prompt === 'number' && Number.isInteger(prompt) && typeof completion === 'number' && Number.isInteger(completion)) {
    return prompt + completion;
  }
  return null;
}

export function extractCost(result: Record<string, unknown>): number | null {
  const candidates = [
    result.cost_usd,
    isPlainObject(result.meta) ? result.meta.cost_usd : undefined,
    isPlainObject(result.billing) ? result.billing.cost_usd : undefined,
  ];
  for (const candidate of candidates) {
    const n = toNumber(candidate);
    if (n !== null) return n;
  }
  return null;
}

export function extractReason(result: Record<string, unknown>): string | null {
  for (const key of ['reason', 'message', 'error', 'exception']) {
    const v = nonEmpty(result[key]);
    if (v) return v.replace(/\n/g, ' ').substring(0, MAX_REASON_LENGTH);
  }
  return null;
}

export function extractJobId(result: Record<string, unknown>, now: Date = new Date()): string {
  for (const key of ['job_id', 'id', 'job', 'name', 'file']) {
    const v = nonEmpty(result[key]);
    if (v) return v;
  }
  return `job-${compactStamp(now).replace('T', '-').replace('Z', '')}`;
}

export function resultFileName(jobId: string, filenameHint?: string): string {
  const name = safeFileBase(filenameHint || `${jobId}${RESULT_SUFFIX}`);
  return name.endsWith(RESULT_SUFFIX) ? name : `${name.replace(/\.json/g, '')}${RESULT_SUFFIX}`;
}

export function formatDailyLine(
  now: Date,
  jobId: string,
  status: string,
  tokens: number | null,
  cost: number | null,
  reason: string | null
): string {
  const parts = [`[${hourMinute(now)}] job=${jobId}`, `status=${status}`];
  if (tokens !== null) parts.push(`tokens=${tokens}`);
  if (cost !== null) parts.push(`cost=$${cost.toFixed(6)}`);
  if (status !== 'ok' && reason) parts.push(`reason=${reason}`);
  return parts.join('  ') + '\n';
}

// ═══════════════════════════════════════════════════════════════
// PUBLISH
// ═══════════════════════════════════════════════════════════════

export function publishResult(result: Record<string, unknown>, options: PublishOptions = {}): PublishedPaths {
  const resultsDir = options.resultsDir ?? config.paths.resultsDir;
  const now = options.now ?? new Date();
  const jobId = extractJobId(result, now);

  const resultJson = resolveInside(resultsDir, resultFileName(jobId, options.filenameHint));
  writeJsonAtomic(resultJson, result);

  const status = extractStatus(result);
  const line = formatDailyLine(
    now,
    jobId,
    status,
    extractTokens(extractUsage(result)),
    extractCost(result),
    extractReason(result)
  );

  const dailyLog = path.join(resultsDir, `DAILY_${dayStamp(now)}.md`);
  try {
    appendTextFile(dailyLog, line);
  } catch (err) {
    // Tageslog darf den Ablauf nie unterbrechen
    logger.warn(`Tageslog nicht schreibbar (${dailyLog}): ${errorMessage(err)}`);
  }

  logger.info(`Ergebnis veröffentlicht: ${path.basename(resultJson)} (status=${status})`);
  return { resultJson, dailyLog };
}
