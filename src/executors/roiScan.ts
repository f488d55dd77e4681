/**
 * ROI_SCAN Executor
 *
 * Zwei Modi:
 * - template (Standard): deterministischer ROI-Plan aus templates/roi-plan.md
 *   mit den Input-Feldern des Jobs, ohne externe Aufrufe
 * - llm: kurzer, handlungsorientierter Plan vom LLM-Provider; braucht ein Ziel
 *
 * Deliverables: agent_results/ROI_PLAN.md + ops/logs/AUTORUN_LOG.md
 */

import fs from 'fs';
import path from 'path';
import type { ExecutorResult, JobDescriptor } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { describeError } from '../utils/errors.js';
import { findAssetPath, renderTemplate, writeTextFile } from '../utils/files.js';
import { compactStamp, isoSeconds } from '../utils/time.js';
import { isPlainObject, pickStringList } from '../jobs/schema.js';
import type { Executor, ExecutorContext } from './types.js';

export const ROI_SCAN_TASK = 'ROI_SCAN';
export const ROI_PLAN_KEY = 'agent_results/ROI_PLAN.md';
export const AUTORUN_LOG_KEY = 'ops/logs/AUTORUN_LOG.md';

const INPUT_DEFAULTS: Record<string, string> = {
  goal: 'ROI-Plan erstellen, der schnell Umsatz bringt',
  timeframe: '48 Stunden (Plan) / 30 Tage (erster Umsatz)',
  market: 'Global',
  budget: '0',
  legal_scope: 'EU',
  risk_tolerance: 'Niedrig',
  target_customer: 'Kleine SaaS / Solopreneure',
};

const EXAMPLE_JOB = {
  task: ROI_SCAN_TASK,
  mode: 'llm',
  goal: 'ROI-Plan für einen API-Weiterverkauf, der schnell Umsatz bringt',
  timeframe: '48 Stunden',
  constraints: 'max. 2 Stunden manuelle Arbeit pro Tag',
};

export type RoiScanMode = 'template' | 'llm';

export interface RoiScanOptions {
  templatePath?: string;
}

function inputOf(job: JobDescriptor): Record<string, unknown> {
  return isPlainObject(job.input) ? job.input : {};
}

function scalar(value: unknown): string | null {
  if (typeof value === 'string' && value.trim()) return value.trim();
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return null;
}

export function detectMode(job: JobDescriptor): RoiScanMode {
  const mode = scalar(job.mode) ?? scalar(inputOf(job).mode);
  return mode?.toLowerCase() === 'llm' ? 'llm' : 'template';
}

function bulletSection(title: string, items: string[]): string {
  if (items.length === 0) return '';
  return `\n---\n\n## ${title}\n\n${items.map((item) => `- ${item}`).join('\n')}\n`;
}

export function buildRoiPlanMarkdown(job: JobDescriptor, jobId: string, template: string, now: Date): string {
  const input = inputOf(job);
  const values: Record<string, string> = {
    job_id: jobId,
    created: scalar(job.created_at) ?? scalar(job.time) ?? isoSeconds(now),
  };
  for (const [key, fallback] of Object.entries(INPUT_DEFAULTS)) {
    values[key] = scalar(input[key]) ?? fallback;
  }

  let md = renderTemplate(template, values).trimEnd() + '\n';
  md += bulletSection('Regeln', pickStringList(job, 'rules'));
  md += bulletSection('Fokus', pickStringList(job, 'focus'));
  return md;
}

export function pickGoal(job: JobDescriptor): string {
  return scalar(job.goal) ?? scalar(job.objective) ?? scalar(inputOf(job).goal) ?? '';
}

export function buildLlmPrompt(job: JobDescriptor, goal: string): string {
  const input = inputOf(job);
  const timeframe = scalar(job.timeframe) ?? scalar(input.timeframe) ?? 'jetzt';
  const context = scalar(job.context) ?? scalar(input.context) ?? '';
  const constraints = scalar(job.constraints) ?? scalar(input.constraints) ?? '';
  const rules = pickStringList(job, 'rules');
  const focus = pickStringList(job, 'focus');

  const lines = [
    'Erstelle einen ROI-Plan, HANDLUNGSORIENTIERT und kurz.',
    `Ziel: ${goal}`,
    `Zeitrahmen: ${timeframe}`,
    '',
    'Kontext:',
    context,
    '',
    'Rahmenbedingungen:',
    constraints,
  ];
  if (rules.length) lines.push('', 'Regeln:', ...rules.map((r) => `- ${r}`));
  if (focus.length) lines.push('', 'Fokus:', ...focus.map((f) => `- ${f}`));
  lines.push(
    '',
    'Anforderungen:',
    '- Maximal 1 Seite (Markdown).',
    '- Beginne mit: "## ROI PLAN"',
    '- Enthält:',
    '  1) "Was wir bauen (1 Satz)"',
    '  2) "Erster Umsatzweg (konkret)"',
    '  3) "48-Stunden-Plan" (Stichpunkte, Timebox)',
    '  4) "Metriken" (was täglich gemessen wird)',
    '  5) "Risiko & Kill-Kriterien" (wann wir stoppen oder umsteuern)',
    '  6) "Nächste Automatisierung" (konkret)',
    '- Keine Theorie, keine langen Erklärungen.'
  );
  return lines.join('\n').trim();
}

export class RoiScanExecutor implements Executor {
  readonly task = ROI_SCAN_TASK;
  readonly description = 'ROI-Plan (Template oder LLM) nach agent_results/ROI_PLAN.md';
  private templatePath: string | undefined;

  constructor(options: RoiScanOptions = {}) {
    this.templatePath = options.templatePath;
  }

  private loadTemplate(): string {
    const file = this.templatePath ?? findAssetPath(path.join('templates', 'roi-plan.md'), import.meta.url);
    return fs.readFileSync(file, 'utf-8');
  }

  async run(job: JobDescriptor, ctx: ExecutorContext): Promise<ExecutorResult> {
    const jobId = ctx.jobId;
    const mode = detectMode(job);

    try {
      ctx.opsLog.autorun('INFO', this.task, jobId, `start mode=${mode}`, ctx.now());

      if (mode === 'llm') {
        return await this.runLlm(job, jobId, ctx);
      }

      const markdown = buildRoiPlanMarkdown(job, jobId, this.loadTemplate(), ctx.now());
      return this.writePlan(markdown, jobId, ctx, 'template');
    } catch (err) {
      return this.fail(job, jobId, ctx, describeError(err));
    }
  }

  private async runLlm(job: JobDescriptor, jobId: string, ctx: ExecutorContext): Promise<ExecutorResult> {
    const goal = pickGoal(job);
    if (!goal) {
      ctx.opsLog.autorun('WARN', this.task, jobId, 'needs input: goal', ctx.now());
      return {
        ok: false,
        task: this.task,
        jobId,
        message: 'Missing required field: goal',
        error: 'Missing required field: goal',
        deliverables: {},
        needs: {
          missing: ['goal'],
          hint: 'goal im ROI_SCAN-Job setzen (was soll geliefert werden).',
          example_job: EXAMPLE_JOB,
        },
      };
    }

    if (!ctx.llm) {
      const error = 'Kein LLM-Provider konfiguriert (OPENAI_API_KEY / ANTHROPIC_API_KEY)';
      ctx.opsLog.autorun('ERROR', this.task, jobId, error, ctx.now());
      return {
        ok: false,
        task: this.task,
        jobId,
        message: error,
        error,
        deliverables: {},
        needs: { missing: ['llm_provider_working'], hint: 'API-Key in Secrets / env setzen.', error },
      };
    }

    let text: string;
    let usage: ExecutorResult['usage'];
    try {
      const response = await ctx.llm.generate(buildLlmPrompt(job, goal), { maxTokens: 1200 });
      text = response.text.trim();
      usage = response.usage;
    } catch (err) {
      const error = describeError(err);
      ctx.opsLog.autorun('ERROR', this.task, jobId, `llm failed: ${error}`, ctx.now());
      return {
        ok: false,
        task: this.task,
        jobId,
        message: `LLM-Aufruf fehlgeschlagen: ${error}`,
        error,
        deliverables: {},
        needs: { missing: ['llm_provider_working'], hint: 'Provider-Key und Modell prüfen.', error },
      };
    }

    if (!text) {
      const error = 'LLM returned empty text';
      ctx.opsLog.autorun('ERROR', this.task, jobId, error, ctx.now());
      return { ok: false, task: this.task, jobId, message: error, error, deliverables: {} };
    }

    let markdown = text.includes('## ROI PLAN') ? text : `## ROI PLAN\n\n${text}`;
    markdown += `\n\n---\nGenerated: ${compactStamp(ctx.now())} (UTC)\nJob: ${this.task}\n`;

    const result = this.writePlan(markdown, jobId, ctx, 'llm');
    return { ...result, usage };
  }

  private writePlan(markdown: string, jobId: string, ctx: ExecutorContext, mode: RoiScanMode): ExecutorResult {
    const planPath = path.join(ctx.resultsDir, 'ROI_PLAN.md');
    writeTextFile(planPath, markdown);
    const logPath = ctx.opsLog.autorun('INFO', this.task, jobId, `wrote ${planPath}`, ctx.now());

    logger.info(`[ROI_SCAN] ${jobId}: Plan geschrieben (${mode}) -> ${planPath}`);
    return {
      ok: true,
      task: this.task,
      jobId,
      message: `${this.task} executed (${mode}).`,
      deliverables: {
        [ROI_PLAN_KEY]: planPath,
        [AUTORUN_LOG_KEY]: logPath,
      },
    };
  }

  private fail(job: JobDescriptor, jobId: string, ctx: ExecutorContext, error: string): ExecutorResult {
    const failedPath = path.join(ctx.resultsDir, 'ROI_FAILED.md');
    const text =
      '# TASK FAILED\n\n' +
      `- time: ${isoSeconds(ctx.now())}\n` +
      `- task: ${this.task}\n` +
      `- job: ${jobId}\n\n` +
      '## Message\n' +
      `${error}\n\n` +
      '## Raw job JSON\n' +
      '```json\n' +
      `${JSON.stringify(job, null, 2)}\n` +
      '```\n';
    writeTextFile(failedPath, text);

    try {
      ctx.opsLog.autorun('ERROR', this.task, jobId, `failed: ${error}`, ctx.now());
    } catch (logErr) {
      logger.warn(`[ROI_SCAN] AUTORUN_LOG nicht beschreibbar: ${describeError(logErr)}`);
    }

    return {
      ok: false,
      task: this.task,
      jobId,
      message: `${this.task} failed: ${error}`,
      error,
      deliverables: { 'agent_results/ROI_FAILED.md': failedPath },
    };
  }
}
