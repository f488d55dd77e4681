#!/usr/bin/env tsx
/**
 * Zeigt die letzten Router-Läufe aus dem Run-Ledger
 *
 * Verwendung:
 *   npm run runs:show
 *   npm run runs:show -- --limit 50
 */

import chalk from 'chalk';
import { initDatabase } from '../src/storage/db.js';
import { getRecentRuns, getRunStats } from '../src/storage/repositories/jobRuns.js';

function parseLimit(args: string[]): number {
  const idx = args.indexOf('--limit');
  const n = idx >= 0 ? parseInt(args[idx + 1] ?? '', 10) : NaN;
  return Number.isFinite(n) && n > 0 ? n : 20;
}

initDatabase();

const stats = getRunStats();
console.log('═══════════════════════════════════════════════════════════════');
console.log(chalk.bold('RUN-LEDGER'));
console.log('═══════════════════════════════════════════════════════════════');
console.log(`Total: ${stats.total} | ${chalk.green(`erledigt: ${stats.done}`)} | ${chalk.red(`fehlgeschlagen: ${stats.failed}`)}`);
console.log(`Letzter Lauf: ${stats.lastRunAt ? stats.lastRunAt.toISOString() : '-'}`);

const tasks = Object.entries(stats.byTask).sort((a, b) => b[1] - a[1]);
if (tasks.length) {
  console.log(`Tasks: ${tasks.map(([task, count]) => `${task}=${count}`).join(', ')}`);
}
console.log();

for (const run of getRecentRuns(parseLimit(process.argv.slice(2)))) {
  const color = run.status === 'DONE' ? chalk.green : chalk.red;
  console.log(`${run.createdAt.toISOString()}  ${color(run.status.padEnd(22))} ${run.task.padEnd(16)} ${run.jobId}`);
  if (run.resultFile) {
    console.log(chalk.gray(`    -> ${run.resultFile}`));
  }
  if (run.missingDeliverables.length) {
    console.log(chalk.yellow(`    fehlende Deliverables: ${run.missingDeliverables.join(', ')}`));
  }
}

console.log('═══════════════════════════════════════════════════════════════');
