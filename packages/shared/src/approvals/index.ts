/**
 * Approval Gate
 *
 * Validates and records human decisions on findings, drift records and plan
 * versions. A successful decision appends exactly one ledger entry.
 */

import type { Database } from 'better-sqlite3';
import { createLogger } from '../logger/index';
import {
  InvalidDecisionError,
  InvalidInputError,
  StalePlanError,
  UnknownTargetError,
} from '../errors/index';
import { SYSTEM_ACTOR, type LedgerEntry } from '../ledger/index';
import { assertEntryAllowed } from '../orchestrator/guards';
import {
  pendingDriftRecords,
  pendingFindings,
  type DriftRecord,
  type Finding,
  type Plan,
  type RunView,
} from '../replay/index';
import { appendToRun, loadRunView, withRunView } from '../replay/store';
import {
  DRIFT_RESOLUTIONS,
  FINDING_DECISIONS,
  PLAN_DECISIONS,
  SEVERITIES,
  type DecisionTargetKind,
  type FindingDecision,
  type Severity,
} from '../types/index';

const log = createLogger({ name: 'changegate:approvals' });

// =============================================================================
// Types
// =============================================================================

export interface DecisionOptions {
  /** Required for ignored_with_reason */
  reason?: string;
  notes?: string;
  actor?: string;
}

export interface DecisionResult {
  /** Null when the decision changed nothing (re-approving an approved plan) */
  entry: LedgerEntry | null;
  run: RunView;
}

export interface PendingDecisions {
  runId: string;
  findings: Finding[];
  driftRecords: DriftRecord[];
  /** Current plan when it still awaits approval */
  plan: Plan | null;
}

/** Decision per severity; severities left out stay pending. */
export type SeverityDecisions = Partial<Record<Severity, string>>;

export interface BulkDecisionResult {
  entries: LedgerEntry[];
  run: RunView;
}

type DecidedFinding = Exclude<FindingDecision, 'pending'>;

function uniform(decision: DecidedFinding): Record<Severity, DecidedFinding> {
  return { critical: decision, high: decision, medium: decision, low: decision };
}

/** The ways an approver usually settles a whole discovery report. */
export const SEVERITY_DECISION_PRESETS = {
  /** Fix critical issues now, flag the others in the PR */
  'fix-critical': { ...uniform('document_in_pr'), critical: 'fix_now' },
  'issues-for-all': uniform('create_issue'),
  'flag-all': uniform('document_in_pr'),
  'ignore-all': uniform('ignore'),
} satisfies Record<string, Record<Severity, DecidedFinding>>;

export type SeverityDecisionPreset = keyof typeof SEVERITY_DECISION_PRESETS;

function isOneOf<T extends string>(values: ReadonlyArray<T>, value: string): value is T {
  return values.some((v) => v === value);
}

function isBlank(value: string | undefined): boolean {
  return value === undefined || value.trim().length === 0;
}

function rejectDecision(
  view: RunView,
  targetId: string,
  targetKind: DecisionTargetKind,
  decision: string,
  allowed: ReadonlyArray<string>,
  message: string
): never {
  log.warn({ runId: view.runId, targetId, targetKind, decision }, message);
  throw new InvalidDecisionError(message, {
    runId: view.runId,
    phase: view.phase,
    sequence: view.lastSequence,
    targetId,
    targetKind,
    decision,
    allowed,
  });
}

// =============================================================================
// Deciders
// =============================================================================

function decideFinding(
  db: Database,
  view: RunView,
  finding: Finding,
  decision: string,
  options: DecisionOptions
): DecisionResult {
  assertEntryAllowed(view, 'finding.decided', 'decide finding');

  if (finding.superseded) {
    rejectDecision(
      view,
      finding.findingId,
      'finding',
      decision,
      [],
      `Finding ${finding.findingId} was superseded by ${finding.supersededBy ?? 'a newer finding'}`
    );
  }
  if (!isOneOf(FINDING_DECISIONS, decision)) {
    return rejectDecision(
      view,
      finding.findingId,
      'finding',
      decision,
      FINDING_DECISIONS,
      `'${decision}' is not a valid finding decision`
    );
  }
  if (decision === 'ignored_with_reason' && isBlank(options.reason)) {
    rejectDecision(
      view,
      finding.findingId,
      'finding',
      decision,
      FINDING_DECISIONS,
      'ignored_with_reason requires a reason'
    );
  }

  const { entry, view: run } = appendToRun(
    db,
    view,
    {
      kind: 'finding.decided',
      payload: { findingId: finding.findingId, decision, reason: options.reason },
    },
    options.actor ?? SYSTEM_ACTOR
  );
  return { entry, run };
}

function resolveDrift(
  db: Database,
  view: RunView,
  record: DriftRecord,
  resolution: string,
  options: DecisionOptions
): DecisionResult {
  assertEntryAllowed(view, 'drift.resolved', 'resolve drift');

  if (record.superseded) {
    rejectDecision(
      view,
      record.driftId,
      'drift',
      resolution,
      [],
      `Drift record ${record.driftId} was superseded by ${record.supersededBy ?? 'a newer record'}`
    );
  }
  if (!isOneOf(DRIFT_RESOLUTIONS, resolution)) {
    return rejectDecision(
      view,
      record.driftId,
      'drift',
      resolution,
      DRIFT_RESOLUTIONS,
      `'${resolution}' is not a valid drift resolution`
    );
  }

  const { entry, view: run } = appendToRun(
    db,
    view,
    {
      kind: 'drift.resolved',
      payload: { driftId: record.driftId, resolution, notes: options.notes ?? options.reason },
    },
    options.actor ?? SYSTEM_ACTOR
  );
  return { entry, run };
}

function decidePlan(
  db: Database,
  view: RunView,
  plan: Plan,
  decision: string,
  options: DecisionOptions
): DecisionResult {
  assertEntryAllowed(view, 'plan.approved', 'decide plan');

  if (!isOneOf(PLAN_DECISIONS, decision)) {
    return rejectDecision(
      view,
      plan.planId,
      'plan',
      decision,
      PLAN_DECISIONS,
      `'${decision}' is not a valid plan decision`
    );
  }

  const current = view.plan;
  if (current === null || current.planId !== plan.planId) {
    log.warn({ runId: view.runId, planId: plan.planId, version: plan.version }, 'Decision on stale plan');
    throw new StalePlanError(view.runId, plan.version, current?.version ?? null);
  }

  if (current.approved) {
    if (decision === 'approved') {
      log.debug({ runId: view.runId, planId: current.planId }, 'Plan already approved');
      return { entry: null, run: view };
    }
    rejectDecision(
      view,
      current.planId,
      'plan',
      decision,
      ['approved'],
      `Plan v${current.version} is already approved and cannot be sent back`
    );
  }

  const { entry, view: run } = appendToRun(
    db,
    view,
    {
      kind: decision === 'approved' ? 'plan.approved' : 'plan.changes_requested',
      payload: { planId: current.planId, version: current.version, notes: options.notes },
    },
    options.actor ?? SYSTEM_ACTOR
  );
  return { entry, run };
}

// =============================================================================
// Public API
// =============================================================================

/**
 * Record a decision on a finding, drift record or plan, resolved by id.
 */
export function submitDecision(
  db: Database,
  runId: string,
  targetId: string,
  decision: string,
  options: DecisionOptions = {}
): DecisionResult {
  const result = withRunView(db, runId, (view): DecisionResult => {
    const finding = view.findings.find((f) => f.findingId === targetId);
    if (finding !== undefined) return decideFinding(db, view, finding, decision, options);

    const record = view.driftRecords.find((d) => d.driftId === targetId);
    if (record !== undefined) return resolveDrift(db, view, record, decision, options);

    const plan = view.planHistory.find((p) => p.planId === targetId);
    if (plan !== undefined) return decidePlan(db, view, plan, decision, options);

    throw new UnknownTargetError(runId, targetId);
  });

  if (result.entry !== null) {
    log.info(
      { runId, targetId, decision, sequence: result.entry.sequence, status: result.run.status },
      'Decision recorded'
    );
  }

  return result;
}

/**
 * Decide every pending finding of the given severities at once. Each
 * finding still gets its own ledger entry; all of them commit together or
 * not at all.
 */
export function decideBySeverity(
  db: Database,
  runId: string,
  decisions: SeverityDecisions,
  options: DecisionOptions = {}
): BulkDecisionResult {
  if (SEVERITIES.every((severity) => decisions[severity] === undefined)) {
    throw new InvalidInputError('At least one severity decision is required', [], { runId });
  }

  const result = withRunView(db, runId, (start): BulkDecisionResult => {
    assertEntryAllowed(start, 'finding.decided', 'decide findings by severity');

    const chosen: Partial<Record<Severity, DecidedFinding>> = {};
    for (const severity of SEVERITIES) {
      const decision = decisions[severity];
      if (decision === undefined) continue;
      if (!isOneOf(FINDING_DECISIONS, decision)) {
        return rejectDecision(
          start,
          severity,
          'finding',
          decision,
          FINDING_DECISIONS,
          `'${decision}' is not a valid finding decision`
        );
      }
      if (decision === 'ignored_with_reason' && isBlank(options.reason)) {
        rejectDecision(start, severity, 'finding', decision, FINDING_DECISIONS, 'ignored_with_reason requires a reason');
      }
      chosen[severity] = decision;
    }

    const entries: LedgerEntry[] = [];
    let view = start;
    for (const finding of pendingFindings(start)) {
      const decision = chosen[finding.severity];
      if (decision === undefined) continue;

      let entry: LedgerEntry;
      ({ entry, view } = appendToRun(
        db,
        view,
        {
          kind: 'finding.decided',
          payload: { findingId: finding.findingId, decision, reason: options.reason },
        },
        options.actor ?? SYSTEM_ACTOR
      ));
      entries.push(entry);
    }

    return { entries, run: view };
  });

  log.info(
    { runId, decided: result.entries.length, status: result.run.status },
    'Findings decided by severity'
  );

  return result;
}

/**
 * Approve a plan by version number.
 */
export function approvePlan(
  db: Database,
  runId: string,
  version: number,
  options: Omit<DecisionOptions, 'reason'> = {}
): DecisionResult {
  const result = withRunView(db, runId, (view): DecisionResult => {
    assertEntryAllowed(view, 'plan.approved', 'approve plan');

    const plan = view.planHistory.find((p) => p.version === version);
    if (plan === undefined || view.plan === null || plan.planId !== view.plan.planId) {
      throw new StalePlanError(runId, version, view.plan?.version ?? null);
    }
    return decidePlan(db, view, plan, 'approved', options);
  });

  if (result.entry !== null) {
    log.info({ runId, version, sequence: result.entry.sequence }, 'Plan approved');
  }

  return result;
}

/**
 * Items currently blocking the run on a human decision.
 */
export function listPendingDecisions(db: Database, runId: string): PendingDecisions {
  const view = loadRunView(db, runId);
  return {
    runId,
    findings: pendingFindings(view),
    driftRecords: pendingDriftRecords(view),
    plan: view.plan !== null && !view.plan.approved ? view.plan : null,
  };
}
