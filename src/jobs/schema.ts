/**
 * Job-Descriptor Schema
 *
 * Zwei Formate:
 * - offener Descriptor ({ task, rules, deliverables, focus, ... }) aus der Outbox
 * - striktes Envelope ({ id, type, payload, output?, meta? }) für API-Clients
 */

import { createHash } from 'crypto';
import { z } from 'zod';
import type { JobDescriptor } from '../types/index.js';
import { JobSchemaError } from '../utils/errors.js';

const stringList = z.array(z.string());

const descriptorSchema = z
  .object({
    task: z.string().optional(),
    job_type: z.string().optional(),
    type: z.string().optional(),
    job_id: z.string().optional(),
    id: z.string().optional(),
    rules: stringList.optional(),
    deliverables: stringList.optional(),
    focus: stringList.optional(),
    description: z.string().optional(),
    title: z.string().optional(),
    instructions: z.string().optional(),
    input: z.record(z.unknown()).optional(),
    status: z.string().optional(),
    created_at: z.string().optional(),
    updated_at: z.string().optional(),
    owner: z.string().optional(),
  })
  .passthrough();

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseJobDescriptor(raw: unknown): JobDescriptor {
  if (!isPlainObject(raw)) {
    throw new JobSchemaError('Job must be a JSON object');
  }
  const result = descriptorSchema.safeParse(raw);
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new JobSchemaError(`Invalid job descriptor: ${issues.join('; ')}`, issues);
  }
  return result.data;
}

// ═══════════════════════════════════════════════════════════════
// STRIKTES ENVELOPE
// ═══════════════════════════════════════════════════════════════

const REQUIRED_TOP_KEYS = ['id', 'type', 'payload'];
const OPTIONAL_TOP_KEYS = ['output', 'meta'];

export interface JobEnvelope {
  id: string;
  type: string;
  payload: Record<string, unknown>;
  output?: Record<string, unknown>;
  meta?: Record<string, unknown>;
}

function check(condition: boolean, message: string): asserts condition {
  if (!condition) {
    throw new JobSchemaError(message);
  }
}

function formatKeyList(keys: string[]): string {
  return `[${[...keys].sort().map((k) => `'${k}'`).join(', ')}]`;
}

export function parseJobEnvelope(raw: unknown): JobEnvelope {
  check(isPlainObject(raw), 'Job must be a JSON object');

  const keys = Object.keys(raw);
  const missing = REQUIRED_TOP_KEYS.filter((k) => !keys.includes(k));
  check(missing.length === 0, `Missing required keys: ${formatKeyList(missing)}`);

  const allowed = [...REQUIRED_TOP_KEYS, ...OPTIONAL_TOP_KEYS];
  const unknown = keys.filter((k) => !allowed.includes(k));
  check(unknown.length === 0, `Unknown keys not allowed: ${formatKeyList(unknown)}`);

  const { id, type, payload, output, meta } = raw;

  check(typeof id === 'string' && id.trim() !== '', 'id must be a non-empty string');
  check(typeof type === 'string' && type.trim() !== '', 'type must be a non-empty string');
  check(isPlainObject(payload), 'payload must be an object');

  const envelope: JobEnvelope = { id: id.trim(), type: type.trim(), payload };

  if (output !== undefined && output !== null) {
    check(isPlainObject(output), 'output must be an object if present');
    if ('path' in output) {
      const outPath = output.path;
      check(typeof outPath === 'string' && outPath.trim() !== '', 'output.path must be a non-empty string');
    }
    envelope.output = output;
  }

  if (meta !== undefined && meta !== null) {
    check(isPlainObject(meta), 'meta must be an object if present');
    envelope.meta = meta;
  }

  return envelope;
}

/**
 * Envelope in einen Outbox-Descriptor umwandeln (payload-Felder auf oberster Ebene)
 */
export function envelopeToDescriptor(envelope: JobEnvelope): JobDescriptor {
  return parseJobDescriptor({
    ...envelope.payload,
    id: envelope.id,
    task: envelope.type,
    ...(envelope.output ? { output: envelope.output } : {}),
    ...(envelope.meta ? { meta: envelope.meta } : {}),
  });
}

// ═══════════════════════════════════════════════════════════════
// TASK-ERKENNUNG
// ═══════════════════════════════════════════════════════════════

function norm(value: unknown): string {
  if (value === null || value === undefined) return '';
  return String(value).trim();
}

/**
 * Task-Typ ermitteln:
 * 1) explizite Felder job_type / task / type
 * 2) Hinweise aus job_id / id / source / file / path / filename
 */
export function detectTaskType(job: Record<string, unknown>): string {
  for (const key of ['job_type', 'task', 'type']) {
    const v = norm(job[key]);
    if (v) return v.toUpperCase();
  }

  const hints = ['job_id', 'id', 'source', 'file', 'path', 'filename']
    .map((key) => norm(job[key]))
    .join(' ')
    .toLowerCase();

  if (hints.includes('roi_scan') || hints.includes('roi-scan') || hints.includes('roiscan')) {
    return 'ROI_SCAN';
  }

  return '';
}

export function sha1Short(text: string): string {
  return createHash('sha1').update(text, 'utf8').digest('hex').substring(0, 10);
}

export function resolveJobId(job: Record<string, unknown>, fileName: string): string {
  for (const key of ['job_id', 'id']) {
    const v = job[key];
    if (typeof v === 'string' && v.trim()) return v.trim();
  }
  return sha1Short(fileName + JSON.stringify(job));
}

export function pickString(job: Record<string, unknown>, keys: string[], fallback: string): string {
  for (const key of keys) {
    const v = job[key];
    if (typeof v === 'string' && v.trim()) return v.trim();
  }
  return fallback;
}

export function pickStringList(job: Record<string, unknown>, key: string): string[] {
  const v = job[key];
  if (!Array.isArray(v)) return [];
  return v.filter((item): item is string => typeof item === 'string' && item.trim() !== '');
}
