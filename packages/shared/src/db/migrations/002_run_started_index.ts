/**
 * Migration 002: Run listing index
 *
 * Partial index over run.started entries so listing runs does not scan
 * every entry in the ledger.
 */

import type { Database } from 'better-sqlite3';
import type { Migration } from './index';

export const migration002: Migration = {
  version: 2,
  name: 'run_started_index',
  up: (db: Database) => {
    db.exec(`
      CREATE INDEX idx_ledger_entries_run_started
      ON ledger_entries(created_at, run_id)
      WHERE kind = 'run.started'
    `);
  },
};
