// ═══════════════════════════════════════════════════════════════
//                    PROCESS LOCK
//   Verhindert, dass zwei Router gleichzeitig dieselbe Outbox abarbeiten
// ═══════════════════════════════════════════════════════════════
import { existsSync, writeFileSync, unlinkSync, readFileSync, mkdirSync } from 'fs';
import { dirname, join } from 'path';
import logger from './logger.js';
import { errorMessage } from './errors.js';

export const DEFAULT_LOCK_FILE = join(process.cwd(), 'data', '.router.lock');

export class ProcessLockError extends Error {
  constructor(readonly lockFile: string, readonly pid: number) {
    super(`Eine andere Instanz läuft bereits (PID: ${pid}). Falls das nicht stimmt, lösche: ${lockFile}`);
    this.name = 'ProcessLockError';
  }
}

function isProcessAlive(pid: number): boolean {
  try {
    // Signal 0 prüft nur, ob der Prozess existiert
    process.kill(pid, 0);
    return true;
  } catch {
    return false;
  }
}

/**
 * Lock erwerben. Stale Locks (Prozess tot) werden überschrieben.
 * @throws ProcessLockError wenn ein lebender Prozess den Lock hält
 */
export function acquireProcessLock(lockFile: string = DEFAULT_LOCK_FILE): void {
  mkdirSync(dirname(lockFile), { recursive: true });

  if (existsSync(lockFile)) {
    const pid = parseInt(readFileSync(lockFile, 'utf-8'), 10);
    if (Number.isInteger(pid) && pid !== process.pid && isProcessAlive(pid)) {
      throw new ProcessLockError(lockFile, pid);
    }
    logger.info(`[LOCK] Stale lock file (PID ${pid} tot), überschreibe...`);
  }

  writeFileSync(lockFile, String(process.pid));
  logger.info(`[LOCK] Process Lock erworben (PID: ${process.pid})`);
}

export function releaseProcessLock(lockFile: string = DEFAULT_LOCK_FILE): void {
  try {
    if (existsSync(lockFile) && parseInt(readFileSync(lockFile, 'utf-8'), 10) === process.pid) {
      unlinkSync(lockFile);
      logger.info('[LOCK] Process Lock freigegeben');
    }
  } catch (err) {
    logger.error(`[LOCK] Freigabe Fehler: ${errorMessage(err)}`);
  }
}
