/**
 * Decision Ledger
 *
 * Append-only store of immutable entries keyed by (runId, sequence). The
 * ledger is the only persisted state: runs, findings, drift records and plans
 * are all reconstructed from it by the replay module.
 */

import type { Database } from 'better-sqlite3';
import { createLogger } from '../logger/index';
import { InvalidInputError, ReplayCorruptionError } from '../errors/index';
import type { LedgerEntryKind } from '../types/index';
import { formatIssues, ledgerEntryBodySchema, type LedgerEntryBody } from './schemas';

const log = createLogger({ name: 'changegate:ledger' });

export type { LedgerEntryBody } from './schemas';

/** Actor recorded when the engine itself causes an entry. */
export const SYSTEM_ACTOR = 'system';

export type LedgerEntry = LedgerEntryBody & {
  runId: string;
  sequence: number;
  actor: string;
  createdAt: string;
};

interface LedgerRow {
  run_id: string;
  sequence: number;
  kind: LedgerEntryKind;
  actor: string;
  payload_json: string;
  created_at: string;
}

// =============================================================================
// ID Generation
// =============================================================================

function generateId(prefix: string): string {
  const timestamp = Date.now().toString(36);
  const random = Math.random().toString(36).substring(2, 8);
  return `${prefix}_${timestamp}${random}`;
}

export function generateRunId(): string {
  return generateId('run');
}

export function generateFindingId(): string {
  return generateId('fnd');
}

export function generateDriftId(): string {
  return generateId('dft');
}

export function generatePlanId(): string {
  return generateId('pln');
}

// =============================================================================
// Writes
// =============================================================================

/**
 * Append an entry at the next sequence number of the run.
 *
 * Callers that validate against a replayed view must hold an immediate
 * transaction around the read and this append.
 */
export function appendEntry(
  db: Database,
  runId: string,
  body: LedgerEntryBody,
  actor: string = SYSTEM_ACTOR
): LedgerEntry {
  const parsed = ledgerEntryBodySchema.safeParse(body);
  if (!parsed.success) {
    throw new InvalidInputError(`Invalid ${body.kind} entry`, formatIssues(parsed.error), { runId });
  }

  const append = db.transaction((): LedgerEntry => {
    const next = db
      .prepare<[string], { next_seq: number }>(
        'SELECT COALESCE(MAX(sequence), 0) + 1 as next_seq FROM ledger_entries WHERE run_id = ?'
      )
      .get(runId);
    const sequence = next?.next_seq ?? 1;
    const createdAt = new Date().toISOString();

    db.prepare(`
      INSERT INTO ledger_entries (run_id, sequence, kind, actor, payload_json, created_at)
      VALUES (?, ?, ?, ?, ?, ?)
    `).run(runId, sequence, parsed.data.kind, actor, JSON.stringify(parsed.data.payload), createdAt);

    return { ...parsed.data, runId, sequence, actor, createdAt };
  });

  const entry = append.immediate();

  log.debug({ runId, sequence: entry.sequence, kind: entry.kind, actor }, 'Ledger entry appended');

  return entry;
}

// =============================================================================
// Reads
// =============================================================================

export interface ListEntriesOptions {
  /** Only entries with a sequence strictly greater than this */
  afterSequence?: number;
  /** Only entries with a sequence less than or equal to this */
  uptoSequence?: number;
}

/**
 * List a run's entries in sequence order.
 *
 * A single statement, so the result is a consistent snapshot even while
 * another connection appends.
 */
export function listEntries(
  db: Database,
  runId: string,
  options: ListEntriesOptions = {}
): LedgerEntry[] {
  const rows = db
    .prepare<[string, number, number], LedgerRow>(`
      SELECT run_id, sequence, kind, actor, payload_json, created_at
      FROM ledger_entries
      WHERE run_id = ? AND sequence > ? AND sequence <= ?
      ORDER BY sequence ASC
    `)
    .all(runId, options.afterSequence ?? 0, options.uptoSequence ?? Number.MAX_SAFE_INTEGER);

  return rows.map(rowToEntry);
}

/**
 * Highest sequence recorded for a run, or 0 when the run has no entries.
 */
export function getLastSequence(db: Database, runId: string): number {
  const row = db
    .prepare<[string], { last_seq: number }>(
      'SELECT COALESCE(MAX(sequence), 0) as last_seq FROM ledger_entries WHERE run_id = ?'
    )
    .get(runId);
  return row?.last_seq ?? 0;
}

/**
 * Ids of every run in the ledger, oldest first.
 */
export function listRunIds(db: Database): string[] {
  return db
    .prepare<[], { run_id: string }>(`
      SELECT run_id FROM ledger_entries
      WHERE kind = 'run.started'
      ORDER BY created_at ASC, run_id ASC
    `)
    .all()
    .map((row) => row.run_id);
}

function rowToEntry(row: LedgerRow): LedgerEntry {
  let payload: unknown;
  try {
    payload = JSON.parse(row.payload_json);
  } catch (err) {
    throw new ReplayCorruptionError(
      `payload is not valid JSON (${err instanceof Error ? err.message : String(err)})`,
      { runId: row.run_id, sequence: row.sequence }
    );
  }

  const parsed = ledgerEntryBodySchema.safeParse({ kind: row.kind, payload });
  if (!parsed.success) {
    throw new ReplayCorruptionError(
      `${row.kind} payload does not match its schema: ${formatIssues(parsed.error).join('; ')}`,
      { runId: row.run_id, sequence: row.sequence }
    );
  }

  return {
    ...parsed.data,
    runId: row.run_id,
    sequence: row.sequence,
    actor: row.actor,
    createdAt: row.created_at,
  };
}
