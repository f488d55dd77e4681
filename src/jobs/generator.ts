import fs from 'fs';
import path from 'path';
import type { JobDescriptor } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { findAssetPath } from '../utils/files.js';
import { isoSeconds } from '../utils/time.js';
import { outboxStore, type OutboxStore } from './outbox.js';
import { isPlainObject, parseJobDescriptor } from './schema.js';

// ═══════════════════════════════════════════════════════════════
//                    JOB GENERATOR
//   Legt pro Lauf genau einen Job aus templates/default-job.json an
// ═══════════════════════════════════════════════════════════════

export interface JobGeneratorOptions {
  outbox?: OutboxStore;
  templatePath?: string;
}

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/**
 * job_YYYYMMDD_HHMMSS (UTC). Zeitstempel vorne, damit die Sortierung FIFO bleibt.
 */
export function newJobId(now: Date = new Date()): string {
  return (
    `job_${now.getUTCFullYear()}${pad(now.getUTCMonth() + 1)}${pad(now.getUTCDate())}` +
    `_${pad(now.getUTCHours())}${pad(now.getUTCMinutes())}${pad(now.getUTCSeconds())}`
  );
}

export class JobGenerator {
  private readonly outbox: OutboxStore;
  private readonly templatePath: string | undefined;

  constructor(options: JobGeneratorOptions = {}) {
    this.outbox = options.outbox ?? outboxStore;
    this.templatePath = options.templatePath;
  }

  loadTemplate(): JobDescriptor {
    const file = this.templatePath ?? findAssetPath(path.join('templates', 'default-job.json'), import.meta.url);
    const raw: unknown = JSON.parse(fs.readFileSync(file, 'utf-8'));
    if (!isPlainObject(raw)) {
      throw new Error(`Job-Template muss ein JSON-Objekt sein: ${file}`);
    }
    return parseJobDescriptor(raw);
  }

  /**
   * @returns Pfad des neuen Jobs oder null wenn die Datei schon existiert
   */
  generate(now: Date = new Date()): string | null {
    const jobId = newJobId(now);
    const stamp = isoSeconds(now);

    const job: JobDescriptor = {
      ...this.loadTemplate(),
      job_id: jobId,
      status: 'created',
      created_at: stamp,
      updated_at: stamp,
    };

    const written = this.outbox.enqueue(job, `${jobId}.json`, now);
    if (written) {
      logger.info(`Job generiert: ${jobId}`);
    }
    return written;
  }
}

export const jobGenerator = new JobGenerator();
