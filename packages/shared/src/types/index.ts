/**
 * Core type definitions for Changegate
 *
 * Shared vocabulary for the workflow engine: phases, statuses, severities
 * and the decision sets accepted by the approval gate.
 */

// =============================================================================
// Run Lifecycle Types
// =============================================================================

export type WorkflowPhase =
  | 'doc_discovery'
  | 'issue_discovery'
  | 'planning'
  | 'implementation'
  | 'verification'
  | 'final_checklist'
  | 'completed'
  | 'aborted';

/** Canonical forward order. `aborted` is reachable from any non-terminal phase. */
export const PHASE_ORDER: ReadonlyArray<WorkflowPhase> = [
  'doc_discovery',
  'issue_discovery',
  'planning',
  'implementation',
  'verification',
  'final_checklist',
  'completed',
];

export const TERMINAL_PHASES: ReadonlySet<WorkflowPhase> = new Set(['completed', 'aborted']);

export const DISCOVERY_PHASES: ReadonlySet<WorkflowPhase> = new Set(['doc_discovery', 'issue_discovery']);

export type RunStatus = 'active' | 'suspended' | 'completed' | 'aborted';

export function isWorkflowPhase(value: string): value is WorkflowPhase {
  const phases: ReadonlyArray<string> = PHASE_ORDER;
  return value === 'aborted' || phases.includes(value);
}

// =============================================================================
// Finding Types
// =============================================================================

export type Severity = 'critical' | 'high' | 'medium' | 'low';

/** Higher rank wins when several rules match the same span. */
export const SEVERITY_RANK: Record<Severity, number> = {
  critical: 4,
  high: 3,
  medium: 2,
  low: 1,
};

export const SEVERITIES: ReadonlyArray<Severity> = ['critical', 'high', 'medium', 'low'];

export type Confidence = 'high' | 'low';

export type FindingDecision =
  | 'pending'
  | 'fix_now'
  | 'document_in_pr'
  | 'create_issue'
  | 'document_in_commit'
  | 'ignore'
  | 'ignored_with_reason';

/** Category assigned when an artifact or claim could not be analysed. */
export const ANALYSIS_INCOMPLETE = 'analysis_incomplete';

/** A finding as produced by the classifier, before registration. */
export interface FindingCandidate {
  locationRef: string;
  category: string;
  severity: Severity;
  confidence?: Confidence;
  description: string;
  recommendedFix: string;
  ruleId?: string;
  /** Trimmed matched line */
  evidence?: string;
}

// =============================================================================
// Drift Types
// =============================================================================

export type DriftCategory = 'mismatch' | 'absent' | typeof ANALYSIS_INCOMPLETE;

export type DriftResolution = 'pending' | 'docs_are_right' | 'code_is_right' | 'both_stale';

/** Value recorded as `observed` when the inventory lacks the symbol. */
export const ABSENT_OBSERVATION = '<absent>';

/** Value recorded as `observed` when a claim could not be checked. */
export const UNVERIFIED_OBSERVATION = '<unverified>';

/** A drift record as produced by the reconciler, before registration. */
export interface DriftCandidate {
  claimRef: string;
  symbol: string;
  expected: string;
  observed: string;
  category: DriftCategory;
  confidence?: Confidence;
  /** What the approver could do about it, phrased as an action */
  suggestion?: string;
}

// =============================================================================
// Plan Types
// =============================================================================

export type PlanDecision = 'approved' | 'changes_requested';

export interface ComponentSpec {
  name: string;
  purpose: string;
  dependsOn: string[];
}

// =============================================================================
// Decision Sets (Approval Gate)
// =============================================================================

export type DecisionTargetKind = 'finding' | 'drift' | 'plan';

export const FINDING_DECISIONS: ReadonlyArray<Exclude<FindingDecision, 'pending'>> = [
  'fix_now',
  'document_in_pr',
  'create_issue',
  'document_in_commit',
  'ignore',
  'ignored_with_reason',
];

export const DRIFT_RESOLUTIONS: ReadonlyArray<Exclude<DriftResolution, 'pending'>> = [
  'docs_are_right',
  'code_is_right',
  'both_stale',
];

export const PLAN_DECISIONS: ReadonlyArray<PlanDecision> = ['approved', 'changes_requested'];

// =============================================================================
// Check Results (verification + final checklist)
// =============================================================================

export interface CheckResult {
  name: string;
  passed: boolean;
  detail?: string;
}

// =============================================================================
// Ledger Entry Kinds
// =============================================================================

export type LedgerEntryKind =
  | 'run.started'
  | 'finding.registered'
  | 'finding.decided'
  | 'drift.registered'
  | 'drift.resolved'
  | 'plan.proposed'
  | 'plan.approved'
  | 'plan.changes_requested'
  | 'component.delivered'
  | 'verification.recorded'
  | 'checklist.recorded'
  | 'phase.transitioned';
