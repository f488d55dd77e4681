// Zeitformate (alle UTC)

function pad(n: number, width = 2): string {
  return String(n).padStart(width, '0');
}

/** 2026-10-19T08:05:03Z */
export function isoSeconds(d: Date = new Date()): string {
  return d.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

/** 20261019T080503Z */
export function compactStamp(d: Date = new Date()): string {
  return (
    `${d.getUTCFullYear()}${pad(d.getUTCMonth() + 1)}${pad(d.getUTCDate())}` +
    `T${pad(d.getUTCHours())}${pad(d.getUTCMinutes())}${pad(d.getUTCSeconds())}Z`
  );
}

/** 2026-10-19 08:05:03 UTC */
export function humanUtc(d: Date = new Date()): string {
  return `${dayStamp(d)} ${timeOfDay(d)} UTC`;
}

/** 2026-10-19 */
export function dayStamp(d: Date = new Date()): string {
  return `${d.getUTCFullYear()}-${pad(d.getUTCMonth() + 1)}-${pad(d.getUTCDate())}`;
}

/** 08:05:03 */
export function timeOfDay(d: Date = new Date()): string {
  return `${pad(d.getUTCHours())}:${pad(d.getUTCMinutes())}:${pad(d.getUTCSeconds())}`;
}

/** 08:05 */
export function hourMinute(d: Date = new Date()): string {
  return `${pad(d.getUTCHours())}:${pad(d.getUTCMinutes())}`;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
