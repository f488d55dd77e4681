#!/usr/bin/env node

import type { Server } from 'http';
import { config, NODE_ENV } from './utils/config.js';
import logger from './utils/logger.js';
import { describeError } from './utils/errors.js';
import { acquireProcessLock, releaseProcessLock } from './utils/processLock.js';
import { startWebServer } from './web/server.js';
import { initDatabase, closeDatabase } from './storage/db.js';
import { scheduler } from './runtime/scheduler.js';
import { outboxStore } from './jobs/outbox.js';
import { taskRouter } from './jobs/router.js';

// ═══════════════════════════════════════════════════════════════
//                    TASKRELAY
//                  Main Entry Point
// ═══════════════════════════════════════════════════════════════

const BANNER = `
╔═══════════════════════════════════════════════════════════════╗
║                                                               ║
║     TASKRELAY                                                 ║
║                                                               ║
║     Outbox -> Executor -> agent_results                       ║
║     MCP Gateway (JSON-RPC) + GitHub Contents API              ║
║                                                               ║
╚═══════════════════════════════════════════════════════════════╝
`;

let httpServer: Server | null = null;

async function main(): Promise<void> {
  console.log('\x1b[32m' + BANNER + '\x1b[0m');

  logger.info('═══════════════════════════════════════════════════════');
  logger.info('  taskrelay wird gestartet...');
  logger.info('═══════════════════════════════════════════════════════');

  // 0. Run-Ledger (optional, Router läuft auch ohne)
  try {
    initDatabase();
    logger.info('  SQLite Run-Ledger: Initialisiert');
  } catch (err) {
    logger.error(`  SQLite Run-Ledger: ${describeError(err)}`);
  }

  outboxStore.ensureDirs();

  logger.info(`  Environment: ${NODE_ENV}`);
  logger.info(`  Version: ${config.app.version}`);
  logger.info(`  Outbox: ${config.paths.outboxDir} -> ${config.paths.doneDir}`);
  logger.info(`  Results: ${config.paths.resultsDir}`);
  logger.info(`  Executors: ${taskRouter.registry.supported().join(', ')}`);
  logger.info(`  LLM-Provider: ${config.llm.provider}`);
  logger.info(`  GitHub-Token: ${config.github.token ? 'gesetzt' : 'fehlt'}`);
  logger.info(`  Scheduler: ${config.schedulerEnabled ? 'Aktiv' : 'Inaktiv'}`);
  logger.info('═══════════════════════════════════════════════════════');

  setupGracefulShutdown();

  // 1. Gateway SOFORT starten (kritisch für Health-Checks)
  httpServer = startWebServer({ schedulerStatus: () => scheduler.getStatus() });

  // 2. Generator + Router im selben Prozess
  if (config.schedulerEnabled) {
    acquireProcessLock();
    scheduler.on('tick', (summary: { processed: number; done: number; failed: number }) => {
      if (summary.processed > 0) {
        logger.info(`[Router] ${summary.processed} verarbeitet, ${summary.done} erledigt, ${summary.failed} fehlgeschlagen`);
      }
    });
    scheduler.start();
  }

  logger.info('═══════════════════════════════════════════════════════');
  logger.info('  Alle Systeme ONLINE');
  logger.info('═══════════════════════════════════════════════════════');
}

function setupGracefulShutdown(): void {
  const shutdown = (signal: string): void => {
    logger.info(`${signal} empfangen, fahre herunter...`);

    scheduler.stop();
    releaseProcessLock();
    httpServer?.close();
    closeDatabase();

    logger.info('Auf Wiedersehen!');
    process.exit(0);
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  process.on('uncaughtException', (err) => {
    logger.error(`Uncaught Exception: ${err.message}`);
    logger.error(err.stack || '');
    releaseProcessLock();
    process.exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    logger.error(`Unhandled Rejection: ${describeError(reason)}`);
    releaseProcessLock();
    process.exit(1);
  });
}

main().catch((err) => {
  logger.error(`Startup-Fehler: ${describeError(err)}`);
  releaseProcessLock();
  process.exit(1);
});
