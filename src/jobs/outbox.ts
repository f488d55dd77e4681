import fs from 'fs';
import path from 'path';
import type { JobDescriptor, JobStatus, RouterStatus } from '../types/index.js';
import { config } from '../utils/config.js';
import { logger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import { compactStamp, humanUtc, isoSeconds } from '../utils/time.js';
import { detectTaskType, parseJobDescriptor } from './schema.js';
import { safeMove, writeJsonFile } from '../utils/files.js';

// ═══════════════════════════════════════════════════════════════
//                    OUTBOX STORE
//   agent_outbox/*.json  ->  agent_outbox_done/<id>.<STATUS>.<ts>.json
// ═══════════════════════════════════════════════════════════════

const MAX_NOTE_LENGTH = 3000;

export interface OutboxJob {
  path: string;
  fileName: string;
  // für Dateinamen, stabil
  idHint: string;
  data: JobDescriptor;
  task: string;
}

export interface OutboxStoreOptions {
  outboxDir: string;
  doneDir: string;
}

export function idHintFor(fileName: string): string {
  return path.parse(fileName).name.replace(/\./g, '_');
}

export class OutboxStore {
  readonly outboxDir: string;
  readonly doneDir: string;

  constructor(options: OutboxStoreOptions = { outboxDir: config.paths.outboxDir, doneDir: config.paths.doneDir }) {
    this.outboxDir = options.outboxDir;
    this.doneDir = options.doneDir;
  }

  ensureDirs(): void {
    fs.mkdirSync(this.outboxDir, { recursive: true });
    fs.mkdirSync(this.doneDir, { recursive: true });
  }

  /**
   * FIFO: älteste Datei (mtime) zuerst, bei Gleichstand nach Name
   */
  list(): string[] {
    if (!fs.existsSync(this.outboxDir)) {
      return [];
    }

    const entries = fs
      .readdirSync(this.outboxDir, { withFileTypes: true })
      .filter((e) => e.isFile() && e.name.toLowerCase().endsWith('.json'))
      .map((e) => {
        const full = path.join(this.outboxDir, e.name);
        return { full, name: e.name, mtime: fs.statSync(full).mtimeMs };
      });

    entries.sort((a, b) => a.mtime - b.mtime || a.name.localeCompare(b.name));
    return entries.map((e) => e.full);
  }

  load(jobPath: string): OutboxJob {
    const fileName = path.basename(jobPath);
    const raw: unknown = JSON.parse(fs.readFileSync(jobPath, 'utf-8'));
    const data = parseJobDescriptor(raw);
    const task = detectTaskType(data) || 'UNKNOWN';

    return {
      path: jobPath,
      fileName,
      idHint: idHintFor(fileName),
      data,
      task,
    };
  }

  /**
   * Liest die Rohdaten ohne Schema-Prüfung (für Crash-Berichte)
   */
  readRaw(jobPath: string): string {
    try {
      return fs.readFileSync(jobPath, 'utf-8');
    } catch (err) {
      return `<unlesbar: ${errorMessage(err)}>`;
    }
  }

  markStatus(job: OutboxJob, status: JobStatus, now: Date = new Date()): void {
    job.data.status = status;
    job.data.updated_at = now.toISOString();
    writeJsonFile(job.path, job.data);
  }

  /**
   * Job mit Router-Metadaten anreichern und ins Done-Verzeichnis verschieben
   */
  markDone(job: OutboxJob, status: RouterStatus, note = '', now: Date = new Date()): string {
    const safeStatus = status.replace(/ /g, '_');
    const dst = path.join(this.doneDir, `${job.idHint}.${safeStatus}.${compactStamp(now)}.json`);

    try {
      job.data._router = {
        time_utc: humanUtc(now),
        task: job.task,
        status,
        note: note.substring(0, MAX_NOTE_LENGTH),
      };
      writeJsonFile(job.path, job.data);
    } catch (err) {
      logger.warn(`Router-Metadaten konnten nicht geschrieben werden (${job.fileName}): ${errorMessage(err)}`);
    }

    safeMove(job.path, dst);
    return dst;
  }

  /**
   * Unlesbare Datei (kein gültiges JSON) ohne Anreicherung verschieben
   */
  moveRaw(jobPath: string, status: RouterStatus, now: Date = new Date()): string {
    const dst = path.join(this.doneDir, `${idHintFor(path.basename(jobPath))}.${status}.${compactStamp(now)}.json`);
    safeMove(jobPath, dst);
    return dst;
  }

  /**
   * Neuen Job in die Outbox legen. Existierende Dateien werden nie überschrieben.
   * @returns Pfad der Datei oder null wenn sie bereits existiert
   */
  enqueue(descriptor: JobDescriptor, fileName?: string, now: Date = new Date()): string | null {
    const data = parseJobDescriptor(descriptor);
    const name = fileName ?? `${data.job_id ?? data.id ?? `job_${compactStamp(now)}`}.json`;
    const target = path.join(this.outboxDir, path.basename(name.endsWith('.json') ? name : `${name}.json`));

    if (fs.existsSync(target)) {
      logger.warn(`Outbox-Datei existiert bereits, überspringe: ${target}`);
      return null;
    }

    const record: JobDescriptor = {
      status: 'created',
      created_at: isoSeconds(now),
      updated_at: isoSeconds(now),
      ...data,
    };

    fs.mkdirSync(this.outboxDir, { recursive: true });
    fs.writeFileSync(target, JSON.stringify(record, null, 2), { encoding: 'utf-8', flag: 'wx' });
    logger.info(`Job in Outbox gelegt: ${path.basename(target)}`);
    return target;
  }

  countPending(): number {
    return this.list().length;
  }

  listDone(): string[] {
    if (!fs.existsSync(this.doneDir)) return [];
    return fs.readdirSync(this.doneDir).filter((name) => name.endsWith('.json')).sort();
  }
}

export const outboxStore = new OutboxStore();
