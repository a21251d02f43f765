/**
 * View cache and command wrapper
 *
 * Views are cached per database handle and caught up by folding only the
 * entries appended since the cached sequence. Commands run their read,
 * validation and append inside one immediate transaction so that concurrent
 * writers to the same run are serialized.
 */

import type { Database } from 'better-sqlite3';
import { RunNotFoundError } from '../errors/index';
import { appendEntry, listEntries, SYSTEM_ACTOR, type LedgerEntry, type LedgerEntryBody } from '../ledger/index';
import { TERMINAL_PHASES } from '../types/index';
import { applyEntry, foldEntries, type RunView } from './index';

const viewCache = new WeakMap<Database, Map<string, RunView>>();

function cacheFor(db: Database): Map<string, RunView> {
  let views = viewCache.get(db);
  if (views === undefined) {
    views = new Map();
    viewCache.set(db, views);
  }
  return views;
}

/**
 * Current view of a run, folded from the cached view plus any newer entries.
 *
 * Commands call this before their first append, so the cache only ever holds
 * committed state. Terminal runs accept no further entries and are dropped
 * from the cache instead of kept.
 */
export function loadRunView(db: Database, runId: string): RunView {
  const views = cacheFor(db);
  const cached = views.get(runId) ?? null;
  const entries = listEntries(db, runId, { afterSequence: cached?.lastSequence ?? 0 });

  const view = foldEntries(cached, entries);
  if (view === null) {
    throw new RunNotFoundError(runId);
  }

  if (TERMINAL_PHASES.has(view.phase)) {
    views.delete(runId);
  } else if (view !== cached) {
    views.set(runId, view);
  }
  return view;
}

export function clearViewCache(db: Database): void {
  viewCache.delete(db);
}

/**
 * Run a command against the current view of a run inside an immediate
 * transaction. Whatever `command` throws rolls back its appends.
 */
export function withRunView<T>(db: Database, runId: string, command: (view: RunView) => T): T {
  return db.transaction(() => command(loadRunView(db, runId))).immediate();
}

/**
 * Append an entry and fold it onto the view the command validated against.
 * The fold re-checks the entry, so a command can never record something
 * replay would reject.
 */
export function appendToRun(
  db: Database,
  view: RunView,
  body: LedgerEntryBody,
  actor: string = SYSTEM_ACTOR
): { entry: LedgerEntry; view: RunView } {
  const entry = appendEntry(db, view.runId, body, actor);
  return { entry, view: applyEntry(view, entry) };
}
