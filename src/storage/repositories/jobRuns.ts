/**
 * Repository für die job_runs Tabelle
 * Jeder Router-Durchlauf eines Outbox-Jobs landet hier (Status, Dauer, Ergebnisdatei).
 */

import { v4 as uuidv4 } from 'uuid';
import { getDatabase } from '../db.js';
import type { RouterOutcome } from '../../types/index.js';

// ═══════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════

export interface JobRunRecord {
  id: string;
  jobId: string;
  task: string;
  status: string;
  fileName: string;
  donePath: string | null;
  resultFile: string | null;
  message: string | null;
  missingDeliverables: string[];
  durationMs: number;
  createdAt: Date;
}

export interface RunStats {
  total: number;
  done: number;
  failed: number;
  byStatus: Record<string, number>;
  byTask: Record<string, number>;
  lastRunAt: Date | null;
}

interface JobRunRow {
  id: string;
  job_id: string;
  task: string;
  status: string;
  file_name: string;
  done_path: string | null;
  result_file: string | null;
  message: string | null;
  missing_deliverables: string | null;
  duration_ms: number;
  created_at: string;
}

function parseList(raw: string | null): string[] {
  if (!raw) return [];
  const parsed: unknown = JSON.parse(raw);
  return Array.isArray(parsed) ? parsed.filter((v): v is string => typeof v === 'string') : [];
}

function rowToRun(row: JobRunRow): JobRunRecord {
  return {
    id: row.id,
    jobId: row.job_id,
    task: row.task,
    status: row.status,
    fileName: row.file_name,
    donePath: row.done_path,
    resultFile: row.result_file,
    message: row.message,
    missingDeliverables: parseList(row.missing_deliverables),
    durationMs: row.duration_ms,
    createdAt: new Date(row.created_at),
  };
}

// ═══════════════════════════════════════════════════════════════
// FUNCTIONS
// ═══════════════════════════════════════════════════════════════

/**
 * Speichert das Ergebnis eines Router-Durchlaufs
 * @returns generierte Run-ID
 */
export function recordRun(outcome: RouterOutcome, now: Date = new Date()): string {
  const db = getDatabase();
  const id = uuidv4();

  db.prepare(`
    INSERT INTO job_runs (
      id, job_id, task, status, file_name, done_path, result_file,
      message, missing_deliverables, duration_ms, created_at
    ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
  `).run(
    id,
    outcome.jobId,
    outcome.task,
    outcome.status,
    outcome.fileName,
    outcome.donePath,
    outcome.resultFile,
    outcome.message,
    outcome.missingDeliverables.length ? JSON.stringify(outcome.missingDeliverables) : null,
    Math.round(outcome.durationMs),
    now.toISOString()
  );

  return id;
}

/**
 * Letzte Runs, neueste zuerst
 */
export function getRecentRuns(limit = 20): JobRunRecord[] {
  const db = getDatabase();
  const rows = db
    .prepare<[number], JobRunRow>('SELECT * FROM job_runs ORDER BY created_at DESC, rowid DESC LIMIT ?')
    .all(Math.max(1, Math.floor(limit)));
  return rows.map(rowToRun);
}

export function getRunsForJob(jobId: string): JobRunRecord[] {
  const db = getDatabase();
  const rows = db
    .prepare<[string], JobRunRow>('SELECT * FROM job_runs WHERE job_id = ? ORDER BY created_at ASC, rowid ASC')
    .all(jobId);
  return rows.map(rowToRun);
}

export function getRunStats(): RunStats {
  const db = getDatabase();

  const statusRows = db
    .prepare<[], { status: string; count: number }>('SELECT status, COUNT(*) AS count FROM job_runs GROUP BY status')
    .all();
  const taskRows = db
    .prepare<[], { task: string; count: number }>('SELECT task, COUNT(*) AS count FROM job_runs GROUP BY task')
    .all();
  const last = db.prepare<[], { last: string | null }>('SELECT MAX(created_at) AS last FROM job_runs').get();

  const byStatus: Record<string, number> = {};
  let total = 0;
  let failed = 0;
  for (const row of statusRows) {
    byStatus[row.status] = row.count;
    total += row.count;
    if (row.status.startsWith('FAILED')) failed += row.count;
  }

  const byTask: Record<string, number> = {};
  for (const row of taskRows) {
    byTask[row.task] = row.count;
  }

  return {
    total,
    done: byStatus.DONE ?? 0,
    failed,
    byStatus,
    byTask,
    lastRunAt: last?.last ? new Date(last.last) : null,
  };
}
