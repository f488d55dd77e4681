import path from 'path';
import { appendTextFile } from '../utils/files.js';
import { dayStamp, isoSeconds, timeOfDay } from '../utils/time.js';

/**
 * Append-only Markdown-Logs unter ops/logs/
 * - <YYYY-MM-DD>.md   "- [HH:MM:SSZ] <zeile>"
 * - AUTORUN_LOG.md    "<ISO> [LEVEL] <TASK> job_id=<id> <msg>"
 */
export class OpsLog {
  constructor(readonly dir: string) {}

  dailyPath(now: Date = new Date()): string {
    return path.join(this.dir, `${dayStamp(now)}.md`);
  }

  get autorunPath(): string {
    return path.join(this.dir, 'AUTORUN_LOG.md');
  }

  append(line: string, now: Date = new Date()): string {
    const file = this.dailyPath(now);
    appendTextFile(file, `- [${timeOfDay(now)}Z] ${line}\n`);
    return file;
  }

  autorun(level: 'INFO' | 'WARN' | 'ERROR', task: string, jobId: string, msg: string, now: Date = new Date()): string {
    appendTextFile(this.autorunPath, `${isoSeconds(now)} [${level}] ${task} job_id=${jobId} ${msg}\n`);
    return this.autorunPath;
  }
}
