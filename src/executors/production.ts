import type { ExecutorResult, JobDescriptor } from '../types/index.js';
import { describeError } from '../utils/errors.js';
import { resolveInside, safeFileBase, writeTextFile } from '../utils/files.js';
import { pickString } from '../jobs/schema.js';
import { deliverableKey } from './deliverables.js';
import type { Executor, ExecutorContext } from './types.js';

export const PRODUCTION_TASK = 'PRODUCTION';

const SYSTEM_CORE = [
  'Du lieferst konkreten Output mit messbarem ROI.',
  'Keine Fantasie. Ohne Beleg (Repo/SHA/Dateiinhalt) nie behaupten, dass etwas veröffentlicht oder committed wurde.',
  'Antworte mit: 1) was du produziert hast, 2) wo die Datei liegt, 3) nächster Schritt.',
  'Kein Marketing für das System selbst. Verkauft werden Produkte und Dienstleistungen, nicht die Engine.',
].join('\n');

export function buildProductionPrompt(description: string): string {
  return [
    `Aufgabe: ${description}`,
    '',
    'Lieferanforderungen:',
    '- Konkreter, kurzer "next_batch"-Vorschlag mit maximal 10 Massnahmen.',
    '- Jede Massnahme: Priorität (P0/P1/P2), erwarteter ROI, Risiko und eine ganz konkrete Handlung.',
    '- Ausgabe als reines Markdown, ohne Fülltext.',
  ].join('\n');
}

/**
 * Beschreibungsgetriebener Standard-Job (vom Generator erzeugt):
 * schreibt <job_id>_output.md nach agent_results/
 */
export class ProductionExecutor implements Executor {
  readonly task = PRODUCTION_TASK;
  readonly description = 'Next-Batch-Plan aus der Job-Beschreibung (LLM) nach <job_id>_output.md';

  async run(job: JobDescriptor, ctx: ExecutorContext): Promise<ExecutorResult> {
    const jobId = ctx.jobId;
    const description = pickString(job, ['description', 'instructions', 'prompt'], '');

    if (!description) {
      return {
        ok: false,
        task: this.task,
        jobId,
        message: 'Missing required field: description',
        error: 'Missing required field: description',
        deliverables: {},
        needs: { missing: ['description'], hint: 'description im Job setzen.' },
      };
    }

    if (!ctx.llm) {
      const error = 'Kein LLM-Provider konfiguriert (OPENAI_API_KEY / ANTHROPIC_API_KEY)';
      return { ok: false, task: this.task, jobId, message: error, error, deliverables: {} };
    }

    try {
      const response = await ctx.llm.generate(buildProductionPrompt(description), { system: SYSTEM_CORE });
      const outPath = resolveInside(ctx.resultsDir, `${safeFileBase(jobId)}_output.md`);
      writeTextFile(outPath, response.text);
      ctx.opsLog.append(`JOB completed: ${jobId} -> ${outPath}`, ctx.now());

      return {
        ok: true,
        task: this.task,
        jobId,
        message: `${this.task} executed.`,
        deliverables: { [deliverableKey(outPath)]: outPath },
        usage: response.usage,
      };
    } catch (err) {
      const error = describeError(err);
      return { ok: false, task: this.task, jobId, message: `${this.task} failed: ${error}`, error, deliverables: {} };
    }
  }
}
