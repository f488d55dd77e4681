/**
 * GENERAL_INSIGHT Executor
 *
 * Allgemeine Analyse-Jobs: strukturierter Prompt -> LLM -> Markdown + Meta-JSON.
 * Die Antwort enthält "Nächste Jobs" als JSON-Array; diese werden normalisiert
 * in die Meta-Datei übernommen und optional in die Outbox gelegt.
 */

import type { ExecutorResult, JobDescriptor, NextJob } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { describeError } from '../utils/errors.js';
import { resolveInside, safeFileBase, writeJsonFile, writeTextFile } from '../utils/files.js';
import { compactStamp, isoSeconds } from '../utils/time.js';
import { isPlainObject, pickString } from '../jobs/schema.js';
import { deliverableKey } from './deliverables.js';
import type { Executor, ExecutorContext } from './types.js';

export const GENERAL_INSIGHT_TASK = 'GENERAL_INSIGHT';

const DEFAULT_TYPE = 'general_insight';
const DEFAULT_TITLE = 'Analyse-Job';
const DEFAULT_INSTRUCTIONS = 'Analysieren und umsetzbare Erkenntnisse + nächste vorgeschlagene Jobs liefern.';
// Grenze für die Suche nach dem JSON-Array in langen Antworten
const MAX_PARSE_ATTEMPTS = 200;

export function pickJobType(job: JobDescriptor): string {
  return pickString(job, ['type', 'job_type', 'task', 'kind', 'category'], DEFAULT_TYPE);
}

export function pickJobTitle(job: JobDescriptor): string {
  return pickString(job, ['title', 'name', 'headline'], DEFAULT_TITLE);
}

export function pickJobInstructions(job: JobDescriptor): string {
  return pickString(job, ['instructions', 'instruction', 'prompt', 'description'], DEFAULT_INSTRUCTIONS);
}

export function buildInsightPrompt(job: JobDescriptor, sourceFile: string): string {
  return `AUFGABENTYP: ${pickJobType(job)}
TITEL: ${pickJobTitle(job)}

ANWEISUNGEN:
${pickJobInstructions(job)}

JOB JSON:
${JSON.stringify(job, null, 2)}

AUSGABEFORMAT (STRIKT):
1) Einzeiliges Fazit (max. 20 Wörter)
2) 5–10 Erkenntnisse als Stichpunkte (umsetzbar, konkret)
3) "Nächste Jobs" als JSON-Array mit 3–8 Einträgen (jeder mit: type, title, instructions)
4) "Risiken/Unbekanntes" als Stichpunkte (nur echte Unsicherheiten)
5) Ende mit "DONE"

WICHTIG:
- Nicht behaupten, externe Aktionen ausgeführt zu haben, ausser der Job enthält Belege.
- Fehlen Informationen, nächste Jobs zum Beschaffen/Prüfen vorschlagen.
- Praktisch bleiben. Kein Fülltext.
QUELLDATEI: ${sourceFile}
`;
}

function tryParseJson(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

/**
 * Erstes Teilstück zwischen '[' und ']' das sich als JSON-Array parsen lässt
 */
export function extractNextJobs(text: string): unknown[] | null {
  let attempts = 0;
  let start = text.indexOf('[');

  while (start !== -1 && attempts < MAX_PARSE_ATTEMPTS) {
    let end = text.indexOf(']', start);
    while (end !== -1 && attempts < MAX_PARSE_ATTEMPTS) {
      attempts++;
      const parsed = tryParseJson(text.substring(start, end + 1).trim());
      if (parsed.ok && Array.isArray(parsed.value)) {
        return parsed.value;
      }
      // kein gültiges JSON bis hier, nächstes ']' probieren
      end = text.indexOf(']', end + 1);
    }
    start = text.indexOf('[', start + 1);
  }

  return null;
}

function stringField(item: Record<string, unknown>, keys: string[], fallback: string): string | null {
  for (const key of keys) {
    const v = item[key];
    if (v === undefined || v === null || v === '') continue;
    if (typeof v !== 'string') return null;
    return v.trim() || fallback;
  }
  return fallback;
}

export function normalizeNextJob(item: unknown, now: Date = new Date()): NextJob | null {
  if (!isPlainObject(item)) return null;

  const type = stringField(item, ['type', 'job_type'], DEFAULT_TYPE);
  const title = stringField(item, ['title'], 'Nächster Job');
  const instructions = stringField(item, ['instructions', 'instruction', 'prompt'], 'Aufgabe ausführen.');
  if (type === null || title === null || instructions === null) return null;

  return {
    type,
    title,
    instructions,
    created_at: now.toISOString(),
    origin: 'insight_executor',
  };
}

export class InsightExecutor implements Executor {
  readonly task = GENERAL_INSIGHT_TASK;
  readonly description = 'Allgemeine LLM-Analyse mit Folge-Jobs nach <ts>_<type>_<id>.md';

  async run(job: JobDescriptor, ctx: ExecutorContext): Promise<ExecutorResult> {
    const now = ctx.now();
    const jobId = ctx.jobId;
    const jobType = pickJobType(job);
    const title = pickJobTitle(job);

    const base = safeFileBase(`${compactStamp(now)}_${jobType}_${jobId}`);
    const mdPath = resolveInside(ctx.resultsDir, `${base}.md`);
    const metaPath = resolveInside(ctx.resultsDir, `${base}.meta.json`);

    let ok = false;
    let answer: string;
    let model = 'none';
    let usage: ExecutorResult['usage'];

    if (!ctx.llm) {
      answer = 'LLM-Provider nicht konfiguriert. OPENAI_API_KEY oder ANTHROPIC_API_KEY als Secret setzen.\n\nDONE';
    } else {
      model = ctx.llm.model;
      try {
        const response = await ctx.llm.generate(buildInsightPrompt(job, ctx.sourceFile), {
          system: 'Sei direkt und praktisch, liefere strukturierte Ergebnisse.',
        });
        ok = true;
        answer = response.text;
        usage = response.usage;
      } catch (err) {
        answer = `LLM-Aufruf fehlgeschlagen: ${describeError(err)}`;
      }
    }

    const ranAt = isoSeconds(now);
    const meta: Record<string, unknown> = {
      job_id: jobId,
      job_type: jobType,
      title,
      instructions: pickJobInstructions(job),
      source_job_file: ctx.sourceFile,
      ran_at_utc: ranAt,
      model,
      llm_ok: ok,
    };
    if (usage) {
      meta.usage = {
        prompt_tokens: usage.promptTokens,
        completion_tokens: usage.completionTokens,
        total_tokens: usage.totalTokens,
      };
    }

    const nextJobs = ok ? (extractNextJobs(answer) ?? []) : [];
    const normalized = nextJobs
      .map((item) => normalizeNextJob(item, now))
      .filter((item): item is NextJob => item !== null);
    if (normalized.length) {
      meta.next_jobs = normalized;
    }

    const header =
      '# Ergebnis\n\n' +
      `- **Job:** ${title}\n` +
      `- **Typ:** ${jobType}\n` +
      `- **ID:** ${jobId}\n` +
      `- **Zeit (UTC):** ${ranAt}\n` +
      `- **Modell:** ${model}\n` +
      `- **LLM OK:** ${ok}\n\n---\n\n`;
    writeTextFile(mdPath, header + answer);
    writeJsonFile(metaPath, meta);

    if (ok && ctx.enqueueNextJobs) {
      this.enqueueNextJobs(normalized, jobId, ctx, now);
    }

    return {
      ok,
      task: this.task,
      jobId,
      message: ok ? `${this.task} executed (${normalized.length} next jobs).` : `${this.task} failed: ${answer.split('\n')[0]}`,
      ...(ok ? {} : { error: answer.split('\n')[0] }),
      deliverables: {
        [deliverableKey(mdPath)]: mdPath,
        [deliverableKey(metaPath)]: metaPath,
      },
      usage,
      nextJobs: normalized,
    };
  }

  private enqueueNextJobs(jobs: NextJob[], parentId: string, ctx: ExecutorContext, now: Date): void {
    jobs.forEach((next, i) => {
      const jobId = `${parentId}_next_${i + 1}`;
      try {
        ctx.outbox.enqueue(
          {
            job_id: jobId,
            // Folge-Jobs laufen wieder über diesen Executor, type bleibt Beschreibung
            task: GENERAL_INSIGHT_TASK,
            type: next.type,
            title: next.title,
            instructions: next.instructions,
            origin: next.origin,
            parent_job_id: parentId,
          },
          `${compactStamp(now)}_${safeFileBase(jobId)}.json`,
          now
        );
      } catch (err) {
        logger.warn(`Folge-Job ${jobId} konnte nicht angelegt werden: ${describeError(err)}`);
      }
    });
  }
}
