/**
 * Test fixtures: drive a run through its phases with every guard satisfied.
 */

import type { Database } from 'better-sqlite3';
import { approvePlan } from '../approvals/index';
import { markDelivered, recordChecklist, recordVerification, transition } from '../orchestrator/index';
import { proposePlan } from '../plans/index';
import type { RunView } from '../replay/index';
import { getState, startRun } from '../runs/index';
import { PHASE_ORDER, type ComponentSpec, type FindingCandidate, type WorkflowPhase } from '../types/index';

export const TEST_COMPONENTS: ComponentSpec[] = [
  { name: 'schema', purpose: 'Add the orders table', dependsOn: [] },
  { name: 'endpoint', purpose: 'Expose POST /orders', dependsOn: ['schema'] },
];

export function testFinding(overrides: Partial<FindingCandidate> = {}): FindingCandidate {
  return {
    locationRef: 'app/views.py:12',
    category: 'todo',
    severity: 'low',
    description: 'Unresolved TODO/FIXME marker',
    recommendedFix: 'Resolve the marker or track it as an issue',
    ...overrides,
  };
}

function step(db: Database, view: RunView): RunView {
  switch (view.phase) {
    case 'doc_discovery':
    case 'issue_discovery':
      return transition(db, view.runId, view.phase === 'doc_discovery' ? 'issue_discovery' : 'planning').run;
    case 'planning': {
      const { version } = proposePlan(db, view.runId, { summary: 'Orders API', components: TEST_COMPONENTS });
      approvePlan(db, view.runId, version, { actor: 'reviewer' });
      return transition(db, view.runId, 'implementation').run;
    }
    case 'implementation':
      for (const component of TEST_COMPONENTS) {
        markDelivered(db, view.runId, component.name);
      }
      return transition(db, view.runId, 'verification').run;
    case 'verification':
      recordVerification(db, view.runId, [{ name: 'unit tests', passed: true }]);
      return transition(db, view.runId, 'final_checklist').run;
    case 'final_checklist':
      recordChecklist(db, view.runId, [{ name: 'docs updated', passed: true }]);
      return transition(db, view.runId, 'completed').run;
    case 'completed':
    case 'aborted':
      return view;
  }
}

/**
 * Advance a run with no pending decisions until it reaches `target`.
 */
export function driveToPhase(db: Database, runId: string, target: WorkflowPhase): RunView {
  let view = getState(db, runId);
  const targetIndex = PHASE_ORDER.indexOf(target);
  while (PHASE_ORDER.indexOf(view.phase) < targetIndex) {
    view = step(db, view);
  }
  return view;
}

/**
 * Start a run and advance it to `target`.
 */
export function startRunIn(db: Database, target: WorkflowPhase, subjectRef = 'CR-1'): RunView {
  const run = startRun(db, subjectRef);
  return driveToPhase(db, run.runId, target);
}
