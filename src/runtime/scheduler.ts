// ═══════════════════════════════════════════════════════════════
//                    SCHEDULER
//   Generator- und Router-Intervall im Server-Prozess
// ═══════════════════════════════════════════════════════════════

import { EventEmitter } from 'events';
import type { TickSummary } from '../types/index.js';
import { config } from '../utils/config.js';
import logger from '../utils/logger.js';
import { describeError } from '../utils/errors.js';
import { taskRouter, type TaskRouter } from '../jobs/router.js';
import { jobGenerator, type JobGenerator } from '../jobs/generator.js';

export interface SchedulerOptions {
  router?: TaskRouter;
  generator?: JobGenerator;
  routerIntervalMs?: number;
  generateIntervalMs?: number;
  // Erster Durchlauf direkt nach start()
  runOnStart?: boolean;
}

export interface SchedulerStatus {
  running: boolean;
  routerBusy: boolean;
  routerRuns: number;
  generatorRuns: number;
  lastTickAt: Date | null;
  lastGenerateAt: Date | null;
  routerIntervalMs: number;
  generateIntervalMs: number;
}

export class Scheduler extends EventEmitter {
  private readonly router: TaskRouter;
  private readonly generator: JobGenerator;
  private readonly routerIntervalMs: number;
  private readonly generateIntervalMs: number;
  private readonly runOnStart: boolean;

  private running = false;
  private routerBusy = false;
  private routerHandle: NodeJS.Timeout | null = null;
  private generatorHandle: NodeJS.Timeout | null = null;
  private routerRuns = 0;
  private generatorRuns = 0;
  private lastTickAt: Date | null = null;
  private lastGenerateAt: Date | null = null;

  constructor(options: SchedulerOptions = {}) {
    super();
    this.router = options.router ?? taskRouter;
    this.generator = options.generator ?? jobGenerator;
    this.routerIntervalMs = options.routerIntervalMs ?? config.router.intervalMs;
    this.generateIntervalMs = options.generateIntervalMs ?? config.generator.intervalMin * 60_000;
    this.runOnStart = options.runOnStart ?? true;
  }

  start(): void {
    if (this.running) {
      logger.warn('[Scheduler] Läuft bereits');
      return;
    }

    this.running = true;
    logger.info(
      `[Scheduler] Gestartet: Router alle ${this.routerIntervalMs / 1000}s, Generator alle ${this.generateIntervalMs / 60_000} min`
    );

    if (this.runOnStart) {
      this.runGenerator();
      this.triggerRouter();
    }

    this.routerHandle = setInterval(() => this.triggerRouter(), this.routerIntervalMs);
    this.generatorHandle = setInterval(() => this.runGenerator(), this.generateIntervalMs);

    this.emit('started');
  }

  stop(): void {
    if (!this.running) return;

    if (this.routerHandle) clearInterval(this.routerHandle);
    if (this.generatorHandle) clearInterval(this.generatorHandle);
    this.routerHandle = null;
    this.generatorHandle = null;
    this.running = false;

    logger.info('[Scheduler] Gestoppt');
    this.emit('stopped');
  }

  private triggerRouter(): void {
    this.runRouter().catch((err) => {
      logger.error(`[Scheduler] Router-Fehler: ${describeError(err)}`);
    });
  }

  /**
   * Ein Router-Durchlauf. Läuft noch einer, wird übersprungen.
   * @returns Zusammenfassung oder null wenn übersprungen
   */
  async runRouter(): Promise<TickSummary | null> {
    // auch ein über MCP gestarteter Tick zählt als laufend
    if (this.routerBusy || this.router.isTicking()) {
      logger.debug('[Scheduler] Router läuft noch, Tick übersprungen');
      this.emit('tickSkipped');
      return null;
    }

    this.routerBusy = true;
    try {
      const summary = await this.router.tick();
      this.routerRuns++;
      this.lastTickAt = summary.finishedAt;
      this.emit('tick', summary);
      return summary;
    } finally {
      this.routerBusy = false;
    }
  }

  runGenerator(): string | null {
    try {
      const written = this.generator.generate();
      this.generatorRuns++;
      this.lastGenerateAt = new Date();
      if (written) {
        this.emit('generated', written);
      }
      return written;
    } catch (err) {
      logger.error(`[Scheduler] Generator-Fehler: ${describeError(err)}`);
      this.emit('generateFailed', err);
      return null;
    }
  }

  getStatus(): SchedulerStatus {
    return {
      running: this.running,
      routerBusy: this.routerBusy,
      routerRuns: this.routerRuns,
      generatorRuns: this.generatorRuns,
      lastTickAt: this.lastTickAt,
      lastGenerateAt: this.lastGenerateAt,
      routerIntervalMs: this.routerIntervalMs,
      generateIntervalMs: this.generateIntervalMs,
    };
  }
}

export const scheduler = new Scheduler();
