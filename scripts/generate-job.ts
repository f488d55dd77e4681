#!/usr/bin/env tsx
/**
 * Legt einen neuen Job aus templates/default-job.json in die Outbox
 *
 * Verwendung:
 *   npm run jobs:generate
 */

import chalk from 'chalk';
import { jobGenerator } from '../src/jobs/generator.js';
import { describeError } from '../src/utils/errors.js';

try {
  const written = jobGenerator.generate();
  if (written) {
    console.log(chalk.green(`Job angelegt: ${written}`));
  } else {
    console.log(chalk.yellow('Job existiert bereits, nichts geschrieben'));
  }
} catch (err) {
  console.error(chalk.red(`Generator fehlgeschlagen: ${describeError(err)}`));
  process.exitCode = 1;
}
