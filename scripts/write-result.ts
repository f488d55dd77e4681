#!/usr/bin/env tsx
/**
 * Führt eine "write_result"-Aktion aus einer Outbox-Datei aus
 *
 * Verwendung:
 *   npm run jobs:write-result -- agent_outbox/hello.json
 *
 * Datei: { "action": "write_result", "out_path": "hello.txt", "out_content": "..." }
 * Ausgabe landet immer unter agent_results/. Exit-Code ist immer 0.
 */

import fs from 'fs';
import { applyWriteResult } from '../src/executors/writeResult.js';
import { isPlainObject } from '../src/jobs/schema.js';
import { config } from '../src/utils/config.js';
import { describeError } from '../src/utils/errors.js';

function run(args: string[]): void {
  if (args.length !== 1) {
    console.log('Usage: write-result <path-to-outbox-json>');
    return;
  }

  const jobPath = args[0];
  if (!fs.existsSync(jobPath)) {
    console.log(`Outbox file not found: ${jobPath}`);
    return;
  }

  const raw = fs.readFileSync(jobPath, 'utf-8').trim();
  if (!raw) {
    console.log(`Outbox file is empty: ${jobPath}`);
    return;
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    console.log(`JSON parse failed for ${jobPath}: ${describeError(err)}`);
    return;
  }
  if (!isPlainObject(data)) {
    console.log(`Outbox file is not a JSON object: ${jobPath}`);
    return;
  }

  const outcome = applyWriteResult(data, config.paths.resultsDir);
  console.log(`Action: ${outcome.action}`);
  if (!outcome.written) {
    console.log('Not write_result -> exit.');
    return;
  }
  console.log(`Wrote: ${outcome.written}`);
}

try {
  run(process.argv.slice(2));
} catch (err) {
  console.log(`write_result failed: ${describeError(err)}`);
}
