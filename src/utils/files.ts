import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { logger } from './logger.js';
import { errorMessage } from './errors.js';

export function writeJsonFile(filePath: string, data: unknown): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, JSON.stringify(data, null, 2), 'utf-8');
}

export function writeTextFile(filePath: string, text: string): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, text, 'utf-8');
}

export function appendTextFile(filePath: string, text: string): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.appendFileSync(filePath, text, 'utf-8');
}

/**
 * Verschieben mit Fallback auf Kopieren + Löschen (z.B. über Dateisystemgrenzen)
 */
export function safeMove(src: string, dst: string): void {
  fs.mkdirSync(path.dirname(dst), { recursive: true });
  try {
    fs.renameSync(src, dst);
  } catch (err) {
    logger.debug(`rename fehlgeschlagen (${errorMessage(err)}), kopiere ${src} -> ${dst}`);
    fs.copyFileSync(src, dst);
    fs.rmSync(src, { force: true });
  }
}

/**
 * Atomar schreiben: erst .tmp, dann rename
 */
export function writeJsonAtomic(filePath: string, data: unknown): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  const tmpPath = `${filePath}.tmp`;
  fs.writeFileSync(tmpPath, JSON.stringify(data, null, 2), 'utf-8');
  fs.renameSync(tmpPath, filePath);
}

/**
 * Sucht eine mitgelieferte Datei (Templates, Schema) in dev und prod.
 * Kandidaten: relativ zu process.cwd(), dann relativ zum Modul.
 */
export function findAssetPath(relative: string, moduleUrl: string): string {
  const moduleDir = path.dirname(fileURLToPath(moduleUrl));
  const candidates = [
    path.resolve(process.cwd(), relative),
    path.resolve(moduleDir, '..', '..', relative),
    path.resolve(moduleDir, '..', '..', '..', relative),
  ];

  for (const candidate of candidates) {
    if (fs.existsSync(candidate)) {
      return candidate;
    }
  }

  throw new Error(`Datei nicht gefunden: ${relative}. Geprüfte Pfade: ${candidates.join(', ')}`);
}

/**
 * Dateiname aus einer freien Kennung (job_id, Typ): keine Trenner, kein ".."
 */
export function safeFileBase(text: string): string {
  return text.replace(/[/\\\s]/g, '_').replace(/\.{2,}/g, '_') || '_';
}

/**
 * Pfad unterhalb von dir; alles was hinausführt wirft
 */
export function resolveInside(dir: string, fileName: string): string {
  const root = path.resolve(dir);
  const target = path.resolve(root, fileName);
  if (target === root || !target.startsWith(root + path.sep)) {
    throw new Error(`Pfad außerhalb von ${dir}: ${fileName}`);
  }
  return path.join(dir, path.relative(root, target));
}

/**
 * {{key}} Platzhalter ersetzen. Unbekannte Platzhalter bleiben stehen.
 */
export function renderTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{\{\s*([a-zA-Z0-9_]+)\s*\}\}/g, (match, key: string) =>
    Object.prototype.hasOwnProperty.call(values, key) ? values[key] : match
  );
}
