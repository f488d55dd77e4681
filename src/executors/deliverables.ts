import path from 'path';

export function toPosix(p: string): string {
  return p.split(path.sep).join('/').replace(/^\.\//, '');
}

/**
 * Schlüssel für die Deliverables-Map: Pfad relativ zum Arbeitsverzeichnis
 */
export function deliverableKey(file: string): string {
  return toPosix(path.relative(process.cwd(), path.resolve(file)));
}

/**
 * Deklarierte Deliverables, die im Ergebnis fehlen.
 * Erfüllt ist ein Eintrag, wenn er als Schlüssel vorkommt oder ein
 * geschriebener Pfad auf ihn endet.
 */
export function missingDeliverables(declared: string[], produced: Record<string, string>): string[] {
  const keys = Object.keys(produced).map(toPosix);
  const values = Object.values(produced).map(toPosix);

  return declared.filter((entry) => {
    const wanted = toPosix(entry.trim()).replace(/^\/+/, '');
    if (!wanted) return false;
    if (keys.includes(wanted)) return false;
    return !values.some((v) => v === wanted || v.endsWith(`/${wanted}`));
  });
}
