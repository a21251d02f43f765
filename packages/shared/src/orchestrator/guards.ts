/**
 * Phase guards
 *
 * Pure checks against a replayed view. Commands call these inside their
 * transaction, after loading the view and before appending.
 */

import { GuardViolationError } from '../errors/index';
import {
  pendingDriftRecords,
  pendingFindings,
  undeliveredComponents,
  type RunView,
} from '../replay/index';
import { TERMINAL_PHASES, type CheckResult, type LedgerEntryKind, type WorkflowPhase } from '../types/index';
import { ENTRY_PHASES, isValidTransition } from './transitions';

export interface GuardResult {
  allowed: boolean;
  /** Ids or names of whatever blocks the move */
  blockedBy: string[];
  reason?: string;
}

const ALLOWED: GuardResult = { allowed: true, blockedBy: [] };

function blocked(reason: string, blockedBy: string[]): GuardResult {
  return { allowed: false, blockedBy, reason };
}

function failing(results: CheckResult[]): string[] {
  return results.filter((r) => !r.passed).map((r) => r.name);
}

/**
 * True when a final checklist was recorded and at least one item failed.
 */
export function checklistFailed(view: RunView): boolean {
  return view.checklistItems !== null && failing(view.checklistItems).length > 0;
}

/**
 * Evaluate whether `view` may move to `to` right now.
 */
export function evaluateGuard(view: RunView, to: WorkflowPhase): GuardResult {
  const from = view.phase;

  if (!isValidTransition(from, to)) {
    return blocked(
      TERMINAL_PHASES.has(from)
        ? `Run is ${from}; no further transitions are possible`
        : `Invalid transition: ${from} -> ${to}`,
      []
    );
  }

  if (to === 'aborted') {
    return ALLOWED;
  }

  switch (from) {
    case 'doc_discovery': {
      const pending = pendingDriftRecords(view).map((d) => d.driftId);
      return pending.length > 0 ? blocked(`${pending.length} drift record(s) still pending`, pending) : ALLOWED;
    }

    case 'issue_discovery': {
      const pending = [
        ...pendingFindings(view).map((f) => f.findingId),
        ...pendingDriftRecords(view).map((d) => d.driftId),
      ];
      return pending.length > 0 ? blocked(`${pending.length} decision(s) still pending`, pending) : ALLOWED;
    }

    case 'planning': {
      if (view.plan === null) return blocked('No plan has been proposed', ['plan']);
      if (!view.plan.approved) {
        return blocked(`Plan v${view.plan.version} is awaiting approval`, [view.plan.planId]);
      }
      return ALLOWED;
    }

    case 'implementation': {
      const remaining = undeliveredComponents(view);
      return remaining.length > 0
        ? blocked(`${remaining.length} component(s) not yet delivered`, remaining)
        : ALLOWED;
    }

    case 'verification': {
      if (view.verificationChecks === null) return blocked('No verification report recorded', ['verification']);
      const failed = failing(view.verificationChecks);
      return failed.length > 0 ? blocked(`${failed.length} verification check(s) failed`, failed) : ALLOWED;
    }

    case 'final_checklist': {
      if (view.checklistItems === null) return blocked('No final checklist recorded', ['checklist']);
      const failed = failing(view.checklistItems);
      if (to === 'implementation') {
        return failed.length > 0 ? ALLOWED : blocked('Final checklist has no failing item', ['checklist']);
      }
      return failed.length > 0 ? blocked(`${failed.length} checklist item(s) failed`, failed) : ALLOWED;
    }

    case 'completed':
    case 'aborted':
      return blocked(`Run is ${from}; no further transitions are possible`, []);
  }
}

/**
 * Reject a command when the run is terminal or the phase does not accept it.
 */
export function assertEntryAllowed(
  view: RunView,
  kind: Exclude<LedgerEntryKind, 'run.started' | 'phase.transitioned'>,
  attempted: string
): void {
  if (TERMINAL_PHASES.has(view.phase)) {
    throw new GuardViolationError(`Run ${view.runId} is ${view.phase}; ${attempted} is not accepted`, {
      runId: view.runId,
      phase: view.phase,
      sequence: view.lastSequence,
      attempted,
    });
  }

  const phases = ENTRY_PHASES[kind];
  if (!phases.has(view.phase)) {
    throw new GuardViolationError(
      `${attempted} is only accepted in ${[...phases].join(' or ')}; run ${view.runId} is in ${view.phase}`,
      { runId: view.runId, phase: view.phase, sequence: view.lastSequence, attempted }
    );
  }
}
