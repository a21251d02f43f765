/**
 * Ledger database
 *
 * Opens the SQLite ledger and brings its schema up to date. Migrations are
 * forward-only; a ledger written by a newer engine is refused rather than
 * replayed against a schema this build does not know.
 */

import Database from 'better-sqlite3';
import type { Database as DatabaseType } from 'better-sqlite3';
import { migrations } from './migrations/index';
import { createLogger } from '../logger/index';

const log = createLogger({ name: 'changegate:db' });

export type { DatabaseType as Database };

export interface DatabaseConfig {
  /** Path to SQLite database file, or ':memory:' */
  path: string;
}

const LATEST_SCHEMA_VERSION = migrations.reduce((max, m) => Math.max(max, m.version), 0);

/**
 * Open the ledger at `config.path`, applying any pending migrations.
 */
export function initDatabase(config: DatabaseConfig): DatabaseType {
  const db = new Database(config.path);

  // WAL lets replays read a consistent snapshot while another process appends
  db.pragma('journal_mode = WAL');

  try {
    migrate(db, config.path);
  } catch (err) {
    db.close();
    throw err;
  }

  return db;
}

function appliedVersion(db: DatabaseType): number {
  const row = db
    .prepare<[], { version: number | null }>('SELECT MAX(version) AS version FROM schema_versions')
    .get();
  return row?.version ?? 0;
}

function migrate(db: DatabaseType, path: string): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_versions (
      version INTEGER PRIMARY KEY,
      name TEXT NOT NULL,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    )
  `);

  const current = appliedVersion(db);
  if (current > LATEST_SCHEMA_VERSION) {
    log.error({ path, version: current, supported: LATEST_SCHEMA_VERSION }, 'Ledger schema is newer than this engine');
    throw new Error(
      `Ledger ${path} has schema version ${current}; this engine supports up to ${LATEST_SCHEMA_VERSION}`
    );
  }

  for (const migration of migrations) {
    if (migration.version <= current) continue;

    db.transaction(() => {
      migration.up(db);
      db.prepare('INSERT INTO schema_versions (version, name) VALUES (?, ?)').run(migration.version, migration.name);
    })();

    log.info({ path, version: migration.version, name: migration.name }, 'Ledger migration applied');
  }
}

export function closeDatabase(db: DatabaseType): void {
  db.close();
}
