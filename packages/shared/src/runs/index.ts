/**
 * Runs Module
 *
 * Starting runs and reading their state. Does NOT handle phase transitions
 * (that's the orchestrator).
 */

import type { Database } from 'better-sqlite3';
import { createLogger } from '../logger/index';
import { GuardViolationError, InvalidInputError, ReplayCorruptionError, RunNotFoundError } from '../errors/index';
import { appendEntry, generateRunId, listEntries, listRunIds, SYSTEM_ACTOR, type LedgerEntry } from '../ledger/index';
import { applyEntry, type RunView } from '../replay/index';
import { loadRunView } from '../replay/store';
import { TERMINAL_PHASES, type RunStatus, type WorkflowPhase } from '../types/index';

const log = createLogger({ name: 'changegate:runs' });

// =============================================================================
// Types
// =============================================================================

export interface StartRunOptions {
  /** Earlier terminal run this one corrects or continues */
  referencesRunId?: string;
  actor?: string;
}

export interface RunSummary {
  runId: string;
  subjectRef: string;
  phase: WorkflowPhase;
  status: RunStatus;
  createdAt: string;
  updatedAt: string;
  lastSequence: number;
}

/** A run whose ledger no longer replays */
export interface CorruptRun {
  runId: string;
  sequence?: number;
  message: string;
}

export interface RunListing {
  runs: RunSummary[];
  /** Listed whatever the filters, since their phase and status are unknown */
  corrupted: CorruptRun[];
}

export interface ListRunsOptions {
  status?: RunStatus;
  phase?: WorkflowPhase;
}

// =============================================================================
// Commands
// =============================================================================

/**
 * Start a run in doc_discovery.
 *
 * A completed run is never reopened: corrections start a new run that
 * references it.
 */
export function startRun(db: Database, subjectRef: string, options: StartRunOptions = {}): RunView {
  if (subjectRef.trim().length === 0) {
    throw new InvalidInputError('subjectRef must not be blank');
  }

  const runId = generateRunId();

  const start = db.transaction((): RunView => {
    if (options.referencesRunId !== undefined) {
      const referenced = loadRunView(db, options.referencesRunId);
      if (!TERMINAL_PHASES.has(referenced.phase)) {
        throw new GuardViolationError(
          `Run ${referenced.runId} is still in ${referenced.phase}; only terminal runs can be referenced`,
          {
            runId: referenced.runId,
            phase: referenced.phase,
            attempted: 'start',
            blockedBy: [referenced.runId],
          }
        );
      }
    }

    const entry = appendEntry(
      db,
      runId,
      {
        kind: 'run.started',
        payload: { subjectRef, referencesRunId: options.referencesRunId },
      },
      options.actor ?? SYSTEM_ACTOR
    );
    return applyEntry(null, entry);
  });

  const run = start.immediate();

  log.info({ runId, subjectRef, referencesRunId: options.referencesRunId }, 'Run started');

  return run;
}

// =============================================================================
// Reads
// =============================================================================

/**
 * Current state of a run, replayed from the ledger.
 */
export function getState(db: Database, runId: string): RunView {
  return loadRunView(db, runId);
}

/**
 * Full ledger history of a run.
 */
export function getRunHistory(db: Database, runId: string): LedgerEntry[] {
  const entries = listEntries(db, runId);
  if (entries.length === 0) {
    throw new RunNotFoundError(runId);
  }
  return entries;
}

/**
 * Summaries of every run, filtered by status and phase. A run that fails to
 * replay is reported in `corrupted` and does not hide the others.
 */
export function listRuns(db: Database, options: ListRunsOptions = {}): RunListing {
  const listing: RunListing = { runs: [], corrupted: [] };

  for (const runId of listRunIds(db)) {
    let view: RunView;
    try {
      view = loadRunView(db, runId);
    } catch (err) {
      if (!(err instanceof ReplayCorruptionError)) throw err;
      log.error({ runId, sequence: err.sequence, err }, 'Run ledger failed to replay');
      listing.corrupted.push({ runId, sequence: err.sequence, message: err.message });
      continue;
    }

    if (options.status !== undefined && view.status !== options.status) continue;
    if (options.phase !== undefined && view.phase !== options.phase) continue;
    listing.runs.push(toSummary(view));
  }

  return listing;
}

/**
 * Runs waiting on a human decision.
 */
export function listSuspendedRuns(db: Database): RunSummary[] {
  return listRuns(db, { status: 'suspended' }).runs;
}

function toSummary(view: RunView): RunSummary {
  return {
    runId: view.runId,
    subjectRef: view.subjectRef,
    phase: view.phase,
    status: view.status,
    createdAt: view.createdAt,
    updatedAt: view.updatedAt,
    lastSequence: view.lastSequence,
  };
}
