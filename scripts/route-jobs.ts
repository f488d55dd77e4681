#!/usr/bin/env tsx
/**
 * Ein Router-Durchlauf über agent_outbox/ (für Cron / CI)
 *
 * Verwendung:
 *   npm run jobs:route
 *
 * Beendet sich immer mit Exit-Code 0: Fehler landen als Ergebnisdatei
 * in agent_results/, nicht als roter Lauf.
 */

import chalk from 'chalk';
import { taskRouter } from '../src/jobs/router.js';
import { initDatabase, closeDatabase } from '../src/storage/db.js';
import { acquireProcessLock, releaseProcessLock } from '../src/utils/processLock.js';
import { describeError } from '../src/utils/errors.js';
import logger from '../src/utils/logger.js';

async function main(): Promise<void> {
  try {
    acquireProcessLock();
  } catch (err) {
    console.log(chalk.yellow(describeError(err)));
    return;
  }

  try {
    try {
      initDatabase();
    } catch (err) {
      logger.warn(`Run-Ledger nicht verfügbar: ${describeError(err)}`);
    }

    const summary = await taskRouter.tick();

    if (summary.processed === 0) {
      console.log(chalk.gray('Outbox leer'));
    }
    for (const outcome of summary.outcomes) {
      const color = outcome.status === 'DONE' ? chalk.green : chalk.red;
      console.log(`${color(outcome.status.padEnd(22))} ${outcome.task.padEnd(16)} ${outcome.fileName}`);
    }
    console.log(
      `\n${summary.processed} verarbeitet | ${chalk.green(`${summary.done} erledigt`)} | ` +
        `${chalk.red(`${summary.failed} fehlgeschlagen`)} | ${summary.skipped} verschoben`
    );
  } finally {
    closeDatabase();
    releaseProcessLock();
  }
}

main()
  .catch((err) => {
    logger.error(`Router-Lauf fehlgeschlagen: ${describeError(err)}`);
  })
  .finally(() => {
    process.exitCode = 0;
  });
