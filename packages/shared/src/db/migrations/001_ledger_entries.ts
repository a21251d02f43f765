/**
 * Migration 001: Ledger entries
 *
 * The decision ledger is the only persisted state. Entries are keyed by
 * (run_id, sequence) and the triggers reject any UPDATE or DELETE, so the
 * table is append-only regardless of which code path touches it.
 */

import type { Database } from 'better-sqlite3';
import type { Migration } from './index';

export const migration001: Migration = {
  version: 1,
  name: 'ledger_entries',
  up: (db: Database) => {
    db.exec(`
      CREATE TABLE ledger_entries (
        run_id TEXT NOT NULL,
        sequence INTEGER NOT NULL,
        kind TEXT NOT NULL,
        actor TEXT NOT NULL,
        payload_json TEXT NOT NULL,
        created_at TEXT NOT NULL,

        PRIMARY KEY (run_id, sequence),

        CHECK (sequence >= 1),
        CHECK (kind IN (
          'run.started',
          'finding.registered',
          'finding.decided',
          'drift.registered',
          'drift.resolved',
          'plan.proposed',
          'plan.approved',
          'plan.changes_requested',
          'component.delivered',
          'verification.recorded',
          'checklist.recorded',
          'phase.transitioned'
        ))
      ) WITHOUT ROWID
    `);

    db.exec(`
      CREATE TRIGGER ledger_entries_no_update
      BEFORE UPDATE ON ledger_entries
      BEGIN
        SELECT RAISE(ABORT, 'ledger entries are append-only');
      END
    `);

    db.exec(`
      CREATE TRIGGER ledger_entries_no_delete
      BEFORE DELETE ON ledger_entries
      BEGIN
        SELECT RAISE(ABORT, 'ledger entries are append-only');
      END
    `);
  },
};
