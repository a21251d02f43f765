/**
 * Replay
 *
 * Folds a run's ledger entries into a materialized RunView. The fold is pure:
 * the same entries always produce the same view, and every entry is checked
 * against the state built so far. Anything the engine itself would never have
 * written raises ReplayCorruption.
 */

import type { Database } from 'better-sqlite3';
import { ReplayCorruptionError, RunNotFoundError } from '../errors/index';
import { listEntries, type LedgerEntry } from '../ledger/index';
import { ENTRY_PHASES, isReentry, isValidTransition } from '../orchestrator/transitions';
import {
  DISCOVERY_PHASES,
  TERMINAL_PHASES,
  type CheckResult,
  type ComponentSpec,
  type Confidence,
  type DriftCategory,
  type DriftResolution,
  type FindingDecision,
  type RunStatus,
  type Severity,
  type WorkflowPhase,
} from '../types/index';

// =============================================================================
// View Types
// =============================================================================

export interface Finding {
  findingId: string;
  locationRef: string;
  category: string;
  severity: Severity;
  confidence: Confidence;
  description: string;
  recommendedFix: string;
  ruleId?: string;
  evidence?: string;
  decision: FindingDecision;
  decisionReason?: string;
  decidedBy?: string;
  decidedAt?: string;
  superseded: boolean;
  supersededBy?: string;
  registeredAt: string;
  registeredSequence: number;
}

export interface DriftRecord {
  driftId: string;
  claimRef: string;
  symbol: string;
  expected: string;
  observed: string;
  category: DriftCategory;
  confidence: Confidence;
  suggestion?: string;
  resolution: DriftResolution;
  resolutionNotes?: string;
  resolvedBy?: string;
  resolvedAt?: string;
  superseded: boolean;
  supersededBy?: string;
  registeredAt: string;
  registeredSequence: number;
}

export interface ChangeRequest {
  notes?: string;
  requestedBy: string;
  requestedAt: string;
}

export interface Plan {
  planId: string;
  version: number;
  summary?: string;
  components: ComponentSpec[];
  approved: boolean;
  approvalNotes?: string;
  approvedBy?: string;
  approvedAt?: string;
  changeRequests: ChangeRequest[];
  superseded: boolean;
  proposedBy: string;
  proposedAt: string;
}

export interface RunView {
  runId: string;
  subjectRef: string;
  referencesRunId?: string;
  phase: WorkflowPhase;
  status: RunStatus;
  createdBy: string;
  createdAt: string;
  updatedAt: string;
  lastSequence: number;
  findings: Finding[];
  driftRecords: DriftRecord[];
  /** Current plan version, or null before the first proposal */
  plan: Plan | null;
  /** Every proposed version, oldest first; the last one is `plan` */
  planHistory: Plan[];
  deliveredComponents: string[];
  /** Latest verification report, cleared on re-entry */
  verificationChecks: CheckResult[] | null;
  /** Latest final checklist, cleared on re-entry */
  checklistItems: CheckResult[] | null;
  /** Number of times the run has entered implementation */
  implementationRounds: number;
  abortReason?: string;
  abortedFromPhase?: WorkflowPhase;
}

// =============================================================================
// Derived State
// =============================================================================

export function pendingFindings(view: RunView): Finding[] {
  return view.findings.filter((f) => !f.superseded && f.decision === 'pending');
}

export function pendingDriftRecords(view: RunView): DriftRecord[] {
  return view.driftRecords.filter((d) => !d.superseded && d.resolution === 'pending');
}

export function activeFindings(view: RunView): Finding[] {
  return view.findings.filter((f) => !f.superseded);
}

export function activeDriftRecords(view: RunView): DriftRecord[] {
  return view.driftRecords.filter((d) => !d.superseded);
}

/**
 * Components of the approved plan not yet delivered. Empty when no plan is
 * approved.
 */
export function undeliveredComponents(view: RunView): string[] {
  if (view.plan === null || !view.plan.approved) return [];
  return view.plan.components
    .map((c) => c.name)
    .filter((name) => !view.deliveredComponents.includes(name));
}

export function deriveRunStatus(view: RunView): RunStatus {
  if (view.phase === 'completed') return 'completed';
  if (view.phase === 'aborted') return 'aborted';

  if (DISCOVERY_PHASES.has(view.phase)) {
    const waiting = pendingFindings(view).length > 0 || pendingDriftRecords(view).length > 0;
    return waiting ? 'suspended' : 'active';
  }

  if (view.phase === 'planning' && view.plan !== null && !view.plan.approved) {
    return 'suspended';
  }

  return 'active';
}

// =============================================================================
// Fold
// =============================================================================

function corrupt(view: RunView | null, entry: LedgerEntry, message: string): never {
  throw new ReplayCorruptionError(message, {
    runId: entry.runId,
    phase: view?.phase,
    sequence: entry.sequence,
  });
}

function isBlank(value: string | undefined): boolean {
  return value === undefined || value.trim().length === 0;
}

function startView(entry: LedgerEntry): RunView {
  if (entry.kind !== 'run.started' || entry.sequence !== 1) {
    return corrupt(null, entry, `first entry must be run.started at sequence 1, found ${entry.kind}`);
  }

  return {
    runId: entry.runId,
    subjectRef: entry.payload.subjectRef,
    referencesRunId: entry.payload.referencesRunId,
    phase: 'doc_discovery',
    status: 'active',
    createdBy: entry.actor,
    createdAt: entry.createdAt,
    updatedAt: entry.createdAt,
    lastSequence: 1,
    findings: [],
    driftRecords: [],
    plan: null,
    planHistory: [],
    deliveredComponents: [],
    verificationChecks: null,
    checklistItems: null,
    implementationRounds: 0,
  };
}

function applyBody(view: RunView, entry: LedgerEntry): RunView {
  if (entry.kind !== 'run.started' && entry.kind !== 'phase.transitioned') {
    if (!ENTRY_PHASES[entry.kind].has(view.phase)) {
      return corrupt(view, entry, `${entry.kind} is not allowed in phase ${view.phase}`);
    }
  }

  switch (entry.kind) {
    case 'run.started':
      return corrupt(view, entry, 'run.started recorded twice');

    case 'finding.registered': {
      const { supersedesFindingId, ...fields } = entry.payload;
      if (view.findings.some((f) => f.findingId === fields.findingId)) {
        return corrupt(view, entry, `finding ${fields.findingId} registered twice`);
      }

      let findings = view.findings;
      if (supersedesFindingId !== undefined) {
        const prior = view.findings.find((f) => f.findingId === supersedesFindingId);
        if (prior === undefined || prior.superseded || prior.decision !== 'pending') {
          return corrupt(view, entry, `finding ${supersedesFindingId} cannot be superseded`);
        }
        findings = findings.map((f) =>
          f.findingId === supersedesFindingId
            ? { ...f, superseded: true, supersededBy: fields.findingId }
            : f
        );
      }

      const finding: Finding = {
        ...fields,
        decision: 'pending',
        superseded: false,
        registeredAt: entry.createdAt,
        registeredSequence: entry.sequence,
      };
      return { ...view, findings: [...findings, finding] };
    }

    case 'finding.decided': {
      const { findingId, decision, reason } = entry.payload;
      const target = view.findings.find((f) => f.findingId === findingId);
      if (target === undefined || target.superseded) {
        return corrupt(view, entry, `decision references unknown or superseded finding ${findingId}`);
      }
      if (decision === 'ignored_with_reason' && isBlank(reason)) {
        return corrupt(view, entry, `ignored_with_reason for ${findingId} has no reason`);
      }
      return {
        ...view,
        findings: view.findings.map((f) =>
          f.findingId === findingId
            ? { ...f, decision, decisionReason: reason, decidedBy: entry.actor, decidedAt: entry.createdAt }
            : f
        ),
      };
    }

    case 'drift.registered': {
      const { supersedesDriftId, ...fields } = entry.payload;
      if (view.driftRecords.some((d) => d.driftId === fields.driftId)) {
        return corrupt(view, entry, `drift record ${fields.driftId} registered twice`);
      }

      let driftRecords = view.driftRecords;
      if (supersedesDriftId !== undefined) {
        const prior = view.driftRecords.find((d) => d.driftId === supersedesDriftId);
        if (prior === undefined || prior.superseded || prior.resolution !== 'pending') {
          return corrupt(view, entry, `drift record ${supersedesDriftId} cannot be superseded`);
        }
        driftRecords = driftRecords.map((d) =>
          d.driftId === supersedesDriftId ? { ...d, superseded: true, supersededBy: fields.driftId } : d
        );
      }

      const record: DriftRecord = {
        ...fields,
        resolution: 'pending',
        superseded: false,
        registeredAt: entry.createdAt,
        registeredSequence: entry.sequence,
      };
      return { ...view, driftRecords: [...driftRecords, record] };
    }

    case 'drift.resolved': {
      const { driftId, resolution, notes } = entry.payload;
      const target = view.driftRecords.find((d) => d.driftId === driftId);
      if (target === undefined || target.superseded) {
        return corrupt(view, entry, `resolution references unknown or superseded drift record ${driftId}`);
      }
      return {
        ...view,
        driftRecords: view.driftRecords.map((d) =>
          d.driftId === driftId
            ? { ...d, resolution, resolutionNotes: notes, resolvedBy: entry.actor, resolvedAt: entry.createdAt }
            : d
        ),
      };
    }

    case 'plan.proposed': {
      const { planId, version, summary, components } = entry.payload;
      if (version !== view.planHistory.length + 1) {
        return corrupt(view, entry, `plan version ${version} does not follow ${view.planHistory.length}`);
      }
      if (view.planHistory.some((p) => p.planId === planId)) {
        return corrupt(view, entry, `plan ${planId} proposed twice`);
      }

      const plan: Plan = {
        planId,
        version,
        summary,
        components,
        approved: false,
        changeRequests: [],
        superseded: false,
        proposedBy: entry.actor,
        proposedAt: entry.createdAt,
      };
      const history = view.planHistory.map((p) => (p.superseded ? p : { ...p, superseded: true }));
      return { ...view, plan, planHistory: [...history, plan] };
    }

    case 'plan.approved':
    case 'plan.changes_requested': {
      const { planId, version, notes } = entry.payload;
      const current = view.plan;
      if (current === null || current.planId !== planId || current.version !== version) {
        return corrupt(view, entry, `${entry.kind} references plan ${planId} v${version}, which is not current`);
      }
      if (current.approved) {
        return corrupt(view, entry, `${entry.kind} recorded for already approved plan v${version}`);
      }

      const updated: Plan =
        entry.kind === 'plan.approved'
          ? { ...current, approved: true, approvalNotes: notes, approvedBy: entry.actor, approvedAt: entry.createdAt }
          : {
              ...current,
              changeRequests: [
                ...current.changeRequests,
                { notes, requestedBy: entry.actor, requestedAt: entry.createdAt },
              ],
            };
      return {
        ...view,
        plan: updated,
        planHistory: view.planHistory.map((p) => (p.planId === planId ? updated : p)),
      };
    }

    case 'component.delivered': {
      const { component } = entry.payload;
      const plan = view.plan;
      if (plan === null || !plan.approved || !plan.components.some((c) => c.name === component)) {
        return corrupt(view, entry, `component ${component} is not part of the approved plan`);
      }
      if (view.deliveredComponents.includes(component)) {
        return corrupt(view, entry, `component ${component} delivered twice`);
      }
      return { ...view, deliveredComponents: [...view.deliveredComponents, component] };
    }

    case 'verification.recorded':
      return { ...view, verificationChecks: entry.payload.checks };

    case 'checklist.recorded':
      return { ...view, checklistItems: entry.payload.items };

    case 'phase.transitioned': {
      const { from, to, reason, reentry } = entry.payload;
      if (from !== view.phase) {
        return corrupt(view, entry, `transition from ${from} but run is in ${view.phase}`);
      }
      if (!isValidTransition(from, to)) {
        return corrupt(view, entry, `transition ${from} -> ${to} is not a valid move`);
      }
      if ((reentry === true) !== isReentry(from, to)) {
        return corrupt(view, entry, `reentry flag does not match transition ${from} -> ${to}`);
      }

      if (to === 'aborted') {
        if (isBlank(reason)) {
          return corrupt(view, entry, 'abort recorded without a reason');
        }
        return { ...view, phase: to, abortReason: reason, abortedFromPhase: from };
      }

      if (to === 'implementation') {
        return {
          ...view,
          phase: to,
          implementationRounds: view.implementationRounds + 1,
          verificationChecks: null,
          checklistItems: null,
        };
      }

      return { ...view, phase: to };
    }
  }
}

/**
 * Apply one entry to a view. Passing `null` starts a new view, which only a
 * `run.started` entry at sequence 1 may do.
 */
export function applyEntry(view: RunView | null, entry: LedgerEntry): RunView {
  if (view === null) {
    return startView(entry);
  }

  if (entry.runId !== view.runId) {
    return corrupt(view, entry, `entry belongs to run ${entry.runId}`);
  }
  if (entry.sequence !== view.lastSequence + 1) {
    return corrupt(view, entry, `expected sequence ${view.lastSequence + 1}, found ${entry.sequence}`);
  }
  if (TERMINAL_PHASES.has(view.phase)) {
    return corrupt(view, entry, `${entry.kind} recorded after the run reached ${view.phase}`);
  }

  const next = applyBody(view, entry);
  const folded: RunView = { ...next, lastSequence: entry.sequence, updatedAt: entry.createdAt };
  return { ...folded, status: deriveRunStatus(folded) };
}

/**
 * Fold entries onto a starting view (null for a full replay).
 */
export function foldEntries(start: RunView | null, entries: ReadonlyArray<LedgerEntry>): RunView | null {
  return entries.reduce<RunView | null>((view, entry) => applyEntry(view, entry), start);
}

/**
 * Rebuild a run's view from the ledger, bypassing any cache.
 */
export function replayRun(db: Database, runId: string): RunView {
  const view = foldEntries(null, listEntries(db, runId));
  if (view === null) {
    throw new RunNotFoundError(runId);
  }
  return view;
}
