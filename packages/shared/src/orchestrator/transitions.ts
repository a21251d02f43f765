import { DISCOVERY_PHASES, type LedgerEntryKind, type WorkflowPhase } from '../types/index';

/**
 * Structurally valid phase moves. Guards decide whether a valid move may
 * happen now; a move absent from this table never may.
 */
export const VALID_TRANSITIONS: Record<WorkflowPhase, ReadonlyArray<WorkflowPhase>> = {
  doc_discovery: ['issue_discovery', 'aborted'],
  issue_discovery: ['planning', 'aborted'],
  planning: ['implementation', 'aborted'],
  implementation: ['verification', 'aborted'],
  verification: ['final_checklist', 'aborted'],
  final_checklist: ['completed', 'implementation', 'aborted'],
  completed: [],
  aborted: [],
};

export function isValidTransition(from: WorkflowPhase, to: WorkflowPhase): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

/** The only backwards move: a failed final checklist returns to implementation. */
export function isReentry(from: WorkflowPhase, to: WorkflowPhase): boolean {
  return from === 'final_checklist' && to === 'implementation';
}

/**
 * Phases in which each non-transition entry kind may be recorded. Commands
 * reject requests outside these phases and replay rejects entries that were
 * recorded outside them.
 */
export const ENTRY_PHASES: Record<
  Exclude<LedgerEntryKind, 'run.started' | 'phase.transitioned'>,
  ReadonlySet<WorkflowPhase>
> = {
  'finding.registered': DISCOVERY_PHASES,
  'finding.decided': DISCOVERY_PHASES,
  'drift.registered': DISCOVERY_PHASES,
  'drift.resolved': DISCOVERY_PHASES,
  'plan.proposed': new Set(['planning']),
  'plan.approved': new Set(['planning']),
  'plan.changes_requested': new Set(['planning']),
  'component.delivered': new Set(['implementation']),
  'verification.recorded': new Set(['verification']),
  'checklist.recorded': new Set(['final_checklist']),
};
