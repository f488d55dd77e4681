import fs from 'fs';
import path from 'path';
import Database from 'better-sqlite3';
import { config, NODE_ENV } from '../utils/config.js';
import { logger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import { findAssetPath } from '../utils/files.js';

// Singleton-Instanz
let db: Database.Database | null = null;

const MEMORY_PATH = ':memory:';

/**
 * Initialisiert die Datenbank und führt Migrations aus
 */
export function initDatabase(dbPath: string = config.paths.sqlitePath): Database.Database {
  if (db) {
    return db;
  }

  if (dbPath !== MEMORY_PATH) {
    const dbDir = path.dirname(dbPath);
    if (!fs.existsSync(dbDir)) {
      logger.info(`Erstelle Verzeichnis: ${dbDir}`);
      fs.mkdirSync(dbDir, { recursive: true });
    }
  }

  logger.info(`Initialisiere SQLite Datenbank: ${dbPath}`);

  db = new Database(dbPath, {
    verbose: NODE_ENV === 'development' ? (msg: unknown) => logger.debug(`SQL: ${String(msg)}`) : undefined,
  });

  if (dbPath !== MEMORY_PATH) {
    db.pragma('journal_mode = WAL');
  }
  db.pragma('synchronous = NORMAL');

  runMigrations(db);

  logger.info('SQLite Datenbank erfolgreich initialisiert');
  return db;
}

/**
 * Schema-Migration aus schema.sql (idempotent, CREATE ... IF NOT EXISTS)
 */
function runMigrations(database: Database.Database): void {
  const schemaPath = findAssetPath(path.join('src', 'storage', 'schema.sql'), import.meta.url);
  const schema = fs.readFileSync(schemaPath, 'utf-8');

  const statements = schema
    .split('\n')
    .filter((line) => !line.trim().startsWith('--'))
    .join('\n')
    .split(';')
    .map((stmt) => stmt.trim())
    .filter((stmt) => stmt.length > 0);

  let successCount = 0;
  let skipCount = 0;

  for (const statement of statements) {
    try {
      database.exec(statement);
      successCount++;
    } catch (error) {
      const msg = errorMessage(error);
      if (msg.includes('already exists') || msg.includes('duplicate column')) {
        skipCount++;
        logger.debug(`Migration übersprungen: ${msg.substring(0, 50)}`);
      } else {
        throw error;
      }
    }
  }

  logger.info(`Schema-Migration: ${successCount} OK, ${skipCount} übersprungen`);
}

/**
 * Gibt die Datenbank-Instanz zurück
 * @throws Error wenn Datenbank nicht initialisiert
 */
export function getDatabase(): Database.Database {
  if (!db) {
    throw new Error('Datenbank nicht initialisiert. Rufe zuerst initDatabase() auf.');
  }
  return db;
}

export function closeDatabase(): void {
  if (db) {
    logger.info('Schließe SQLite Datenbank');
    db.close();
    db = null;
  }
}

export function isDatabaseInitialized(): boolean {
  return db !== null;
}

process.on('exit', () => {
  closeDatabase();
});
