/**
 * Orchestrator Module
 *
 * The workflow state machine. Every phase change is recorded as exactly one
 * `phase.transitioned` ledger entry, and `transition` / `abort` are the only
 * code paths that append one. Guards are evaluated against the replayed view
 * inside the same immediate transaction as the append.
 */

import type { Database } from 'better-sqlite3';
import { z } from 'zod';
import { createLogger } from '../logger/index';
import { GuardViolationError, InvalidInputError } from '../errors/index';
import { SYSTEM_ACTOR, type LedgerEntry } from '../ledger/index';
import { checkResultSchema, formatIssues } from '../ledger/schemas';
import type { RunView } from '../replay/index';
import { appendToRun, withRunView } from '../replay/store';
import { TERMINAL_PHASES, type CheckResult, type WorkflowPhase } from '../types/index';
import { assertEntryAllowed, checklistFailed, evaluateGuard } from './guards';

export { VALID_TRANSITIONS, ENTRY_PHASES, isValidTransition, isReentry } from './transitions';
export { evaluateGuard, checklistFailed, assertEntryAllowed, type GuardResult } from './guards';

const log = createLogger({ name: 'changegate:orchestrator' });

// =============================================================================
// Types
// =============================================================================

export interface CommandOptions {
  actor?: string;
}

export interface TransitionOptions extends CommandOptions {
  /** Required when the target is `aborted` */
  reason?: string;
}

export interface TransitionResult {
  run: RunView;
  entry: LedgerEntry;
  from: WorkflowPhase;
  /**
   * True when a request to complete was turned into a return to
   * implementation because the final checklist failed.
   */
  reentry: boolean;
}

// =============================================================================
// Transitions
// =============================================================================

/**
 * Move a run to `to`, or raise GuardViolation and leave it where it is.
 *
 * Requesting `completed` with a failing final checklist records a return to
 * implementation instead and reports it through `reentry`.
 */
export function transition(
  db: Database,
  runId: string,
  to: WorkflowPhase,
  options: TransitionOptions = {}
): TransitionResult {
  if (to === 'aborted') {
    return abort(db, runId, options.reason ?? '', options);
  }

  const result = withRunView(db, runId, (view): TransitionResult => {
    const from = view.phase;
    const target: WorkflowPhase =
      from === 'final_checklist' && to === 'completed' && checklistFailed(view) ? 'implementation' : to;

    const guard = evaluateGuard(view, target);
    if (!guard.allowed) {
      log.warn(
        { runId, from, to: target, blockedBy: guard.blockedBy, reason: guard.reason },
        'Transition rejected by guard'
      );
      throw new GuardViolationError(
        `Cannot move run ${runId} from ${from} to ${target}: ${guard.reason ?? 'guard failed'}`,
        {
          runId,
          phase: from,
          sequence: view.lastSequence,
          attempted: target,
          blockedBy: guard.blockedBy,
        }
      );
    }

    const reentry = target === 'implementation' && from === 'final_checklist';
    const { entry, view: run } = appendToRun(
      db,
      view,
      {
        kind: 'phase.transitioned',
        payload: reentry
          ? { from, to: target, reason: options.reason ?? 'final checklist failed', reentry: true }
          : { from, to: target, reason: options.reason },
      },
      options.actor ?? SYSTEM_ACTOR
    );

    return { run, entry, from, reentry };
  });

  log.info(
    {
      runId,
      from: result.from,
      to: result.run.phase,
      reentry: result.reentry,
      sequence: result.entry.sequence,
    },
    'Phase transitioned'
  );

  return result;
}

/**
 * Abort a run from any non-terminal phase. No guard applies.
 */
export function abort(
  db: Database,
  runId: string,
  reason: string,
  options: CommandOptions = {}
): TransitionResult {
  if (reason.trim().length === 0) {
    throw new InvalidInputError('An abort reason is required', [], { runId });
  }

  const result = withRunView(db, runId, (view): TransitionResult => {
    if (TERMINAL_PHASES.has(view.phase)) {
      throw new GuardViolationError(`Run ${runId} is already ${view.phase}`, {
        runId,
        phase: view.phase,
        sequence: view.lastSequence,
        attempted: 'aborted',
      });
    }

    const { entry, view: run } = appendToRun(
      db,
      view,
      { kind: 'phase.transitioned', payload: { from: view.phase, to: 'aborted', reason } },
      options.actor ?? SYSTEM_ACTOR
    );
    return { run, entry, from: view.phase, reentry: false };
  });

  log.info({ runId, from: result.from, reason }, 'Run aborted');

  return result;
}

// =============================================================================
// Implementation, Verification and Checklist Records
// =============================================================================

/**
 * Record delivery of a component of the approved plan. Delivering the same
 * component twice is a no-op.
 */
export function markDelivered(
  db: Database,
  runId: string,
  component: string,
  options: CommandOptions = {}
): RunView {
  return withRunView(db, runId, (view): RunView => {
    assertEntryAllowed(view, 'component.delivered', 'deliver');

    const plan = view.plan;
    if (plan === null || !plan.components.some((c) => c.name === component)) {
      throw new InvalidInputError(`Component ${component} is not part of the approved plan`, [], {
        runId,
        phase: view.phase,
      });
    }
    if (view.deliveredComponents.includes(component)) {
      log.debug({ runId, component }, 'Component already delivered');
      return view;
    }

    const { view: run } = appendToRun(
      db,
      view,
      { kind: 'component.delivered', payload: { component } },
      options.actor ?? SYSTEM_ACTOR
    );
    log.info({ runId, component }, 'Component delivered');
    return run;
  });
}

const checkListSchema = z.array(checkResultSchema).min(1, 'at least one result is required');

function parseChecks(runId: string, label: string, results: CheckResult[]): CheckResult[] {
  const parsed = checkListSchema.safeParse(results);
  if (!parsed.success) {
    throw new InvalidInputError(`Invalid ${label}`, formatIssues(parsed.error), { runId });
  }
  return parsed.data;
}

/**
 * Record the verification report. A later report replaces an earlier one.
 */
export function recordVerification(
  db: Database,
  runId: string,
  checks: CheckResult[],
  options: CommandOptions = {}
): RunView {
  const parsed = parseChecks(runId, 'verification report', checks);

  return withRunView(db, runId, (view): RunView => {
    assertEntryAllowed(view, 'verification.recorded', 'record verification');
    const { view: run } = appendToRun(
      db,
      view,
      { kind: 'verification.recorded', payload: { checks: parsed } },
      options.actor ?? SYSTEM_ACTOR
    );
    log.info(
      { runId, checks: parsed.length, failed: parsed.filter((c) => !c.passed).length },
      'Verification recorded'
    );
    return run;
  });
}

/**
 * Record the final checklist. A later checklist replaces an earlier one.
 */
export function recordChecklist(
  db: Database,
  runId: string,
  items: CheckResult[],
  options: CommandOptions = {}
): RunView {
  const parsed = parseChecks(runId, 'final checklist', items);

  return withRunView(db, runId, (view): RunView => {
    assertEntryAllowed(view, 'checklist.recorded', 'record checklist');
    const { view: run } = appendToRun(
      db,
      view,
      { kind: 'checklist.recorded', payload: { items: parsed } },
      options.actor ?? SYSTEM_ACTOR
    );
    log.info(
      { runId, items: parsed.length, failed: parsed.filter((c) => !c.passed).length },
      'Final checklist recorded'
    );
    return run;
  });
}
