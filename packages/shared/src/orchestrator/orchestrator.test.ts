/**
 * Orchestrator Module Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { Database } from 'better-sqlite3';
import { initDatabase, closeDatabase } from '../db/index';
import { GuardViolationError, InvalidInputError } from '../errors/index';
import { getRunHistory, getState, startRun } from '../runs/index';
import { registerFindings } from '../findings/index';
import { registerDrift } from '../drift/index';
import { submitDecision } from '../approvals/index';
import { proposePlan } from '../plans/index';
import { startRunIn, testFinding, TEST_COMPONENTS } from '../testing/fixtures';
import { PHASE_ORDER, TERMINAL_PHASES, type WorkflowPhase } from '../types/index';
import {
  abort,
  evaluateGuard,
  isValidTransition,
  markDelivered,
  recordChecklist,
  recordVerification,
  transition,
  VALID_TRANSITIONS,
} from './index';

let db: Database;

beforeEach(() => {
  db = initDatabase({ path: ':memory:' });
});

afterEach(() => {
  closeDatabase(db);
});

function expectGuardViolation(fn: () => unknown): GuardViolationError {
  try {
    fn();
  } catch (err) {
    if (err instanceof GuardViolationError) return err;
    throw err;
  }
  throw new Error('expected a GuardViolationError');
}

describe('isValidTransition', () => {
  it('accepts all valid transitions', () => {
    const phases: WorkflowPhase[] = [...PHASE_ORDER, 'aborted'];
    for (const from of phases) {
      for (const to of VALID_TRANSITIONS[from]) {
        expect(isValidTransition(from, to)).toBe(true);
      }
    }
    expect(isValidTransition('final_checklist', 'implementation')).toBe(true);
  });

  it('rejects skips and moves out of terminal phases', () => {
    expect(isValidTransition('doc_discovery', 'planning')).toBe(false);
    expect(isValidTransition('issue_discovery', 'implementation')).toBe(false);
    expect(isValidTransition('verification', 'implementation')).toBe(false);
    expect(isValidTransition('completed', 'doc_discovery')).toBe(false);
    expect(isValidTransition('aborted', 'planning')).toBe(false);
  });

  it('allows abort from every non-terminal phase', () => {
    for (const phase of PHASE_ORDER) {
      expect(isValidTransition(phase, 'aborted')).toBe(!TERMINAL_PHASES.has(phase));
    }
  });
});

describe('transition', () => {
  it('moves through every phase to completed', () => {
    const run = startRunIn(db, 'completed');

    expect(run.phase).toBe('completed');
    expect(run.status).toBe('completed');
    expect(run.implementationRounds).toBe(1);

    const phases = getRunHistory(db, run.runId)
      .flatMap((e) => (e.kind === 'phase.transitioned' ? [e.payload.to] : []));
    expect(phases).toEqual(PHASE_ORDER.slice(1));
  });

  it('rejects a skip while a finding is pending and leaves the phase unchanged', () => {
    const run = startRunIn(db, 'issue_discovery');
    registerFindings(db, run.runId, [testFinding()]);
    const before = getState(db, run.runId);

    const err = expectGuardViolation(() => transition(db, run.runId, 'implementation'));

    expect(err.attempted).toBe('implementation');
    expect(err.phase).toBe('issue_discovery');
    expect(getState(db, run.runId).phase).toBe('issue_discovery');
    expect(getState(db, run.runId).lastSequence).toBe(before.lastSequence);
  });

  it('blocks leaving issue discovery until every finding is decided', () => {
    const run = startRunIn(db, 'issue_discovery');
    const [findingId] = registerFindings(db, run.runId, [testFinding()]);

    const err = expectGuardViolation(() => transition(db, run.runId, 'planning'));
    expect(err.blockedBy).toEqual([findingId]);
    expect(err.message).toBe(
      `Cannot move run ${run.runId} from issue_discovery to planning: 1 decision(s) still pending`
    );

    submitDecision(db, run.runId, findingId ?? '', 'document_in_pr');
    const result = transition(db, run.runId, 'planning');

    expect(result.run.phase).toBe('planning');
    expect(result.from).toBe('issue_discovery');
    expect(result.reentry).toBe(false);
    expect(result.entry.sequence).toBe(result.run.lastSequence);
  });

  it('blocks leaving doc discovery while drift is pending', () => {
    const run = startRun(db, 'CR-1');
    const [driftId] = registerDrift(db, run.runId, [
      {
        claimRef: 'docs/api.md#orders',
        symbol: 'create_order',
        expected: 'exists',
        observed: '<absent>',
        category: 'absent',
      },
    ]);

    const err = expectGuardViolation(() => transition(db, run.runId, 'issue_discovery'));
    expect(err.blockedBy).toEqual([driftId]);

    submitDecision(db, run.runId, driftId ?? '', 'docs_are_right', { notes: 'implement the endpoint' });
    expect(transition(db, run.runId, 'issue_discovery').run.phase).toBe('issue_discovery');
  });

  it('requires an approved plan before implementation', () => {
    const run = startRunIn(db, 'planning');

    expect(expectGuardViolation(() => transition(db, run.runId, 'implementation')).blockedBy).toEqual(['plan']);

    const { planId } = proposePlan(db, run.runId, { components: TEST_COMPONENTS });
    expect(expectGuardViolation(() => transition(db, run.runId, 'implementation')).blockedBy).toEqual([planId]);
  });

  it('requires every component before verification', () => {
    const run = startRunIn(db, 'implementation');
    markDelivered(db, run.runId, 'schema');

    const err = expectGuardViolation(() => transition(db, run.runId, 'verification'));
    expect(err.blockedBy).toEqual(['endpoint']);
  });

  it('requires passing verification before the final checklist', () => {
    const run = startRunIn(db, 'verification');

    expect(expectGuardViolation(() => transition(db, run.runId, 'final_checklist')).blockedBy).toEqual([
      'verification',
    ]);

    recordVerification(db, run.runId, [
      { name: 'unit tests', passed: true },
      { name: 'lint', passed: false, detail: '3 errors' },
    ]);
    expect(expectGuardViolation(() => transition(db, run.runId, 'final_checklist')).blockedBy).toEqual(['lint']);

    recordVerification(db, run.runId, [{ name: 'lint', passed: true }]);
    expect(transition(db, run.runId, 'final_checklist').run.phase).toBe('final_checklist');
  });

  it('returns to implementation when completing with a failing checklist', () => {
    const run = startRunIn(db, 'final_checklist');
    recordChecklist(db, run.runId, [
      { name: 'docs updated', passed: true },
      { name: 'migration reviewed', passed: false },
    ]);

    const result = transition(db, run.runId, 'completed');

    expect(result.reentry).toBe(true);
    expect(result.run.phase).toBe('implementation');
    expect(result.run.implementationRounds).toBe(2);
    expect(result.run.verificationChecks).toBeNull();
    expect(result.run.checklistItems).toBeNull();
    expect(result.entry.payload).toEqual({
      from: 'final_checklist',
      to: 'implementation',
      reason: 'final checklist failed',
      reentry: true,
    });

    // Components stay delivered, so the run can go straight back to verification
    expect(transition(db, run.runId, 'verification').run.phase).toBe('verification');
  });

  it('only allows an explicit return to implementation after a checklist failure', () => {
    const run = startRunIn(db, 'final_checklist');
    recordChecklist(db, run.runId, [{ name: 'docs updated', passed: true }]);

    expect(expectGuardViolation(() => transition(db, run.runId, 'implementation')).blockedBy).toEqual([
      'checklist',
    ]);

    recordChecklist(db, run.runId, [{ name: 'docs updated', passed: false }]);
    const result = transition(db, run.runId, 'implementation', { reason: 'reviewer asked for changes' });
    expect(result.reentry).toBe(true);
    expect(result.run.phase).toBe('implementation');
  });

  it('requires a checklist before completing', () => {
    const run = startRunIn(db, 'final_checklist');
    expect(expectGuardViolation(() => transition(db, run.runId, 'completed')).blockedBy).toEqual(['checklist']);
  });

  it('rejects every transition out of a terminal phase', () => {
    const run = startRunIn(db, 'completed');
    for (const phase of PHASE_ORDER) {
      expect(() => transition(db, run.runId, phase)).toThrow(GuardViolationError);
    }
  });

  it('appends exactly one entry per transition', () => {
    const run = startRun(db, 'CR-1');
    transition(db, run.runId, 'issue_discovery');
    expect(getRunHistory(db, run.runId).map((e) => e.kind)).toEqual(['run.started', 'phase.transitioned']);
  });
});

describe('abort', () => {
  const nonTerminal: WorkflowPhase[] = [
    'doc_discovery',
    'issue_discovery',
    'planning',
    'implementation',
    'verification',
    'final_checklist',
  ];

  for (const phase of nonTerminal) {
    it(`aborts from ${phase}`, () => {
      const run = startRunIn(db, phase);
      const result = abort(db, run.runId, 'requirements changed', { actor: 'alice' });

      expect(result.run.phase).toBe('aborted');
      expect(result.run.status).toBe('aborted');
      expect(result.run.abortedFromPhase).toBe(phase);
      expect(result.run.abortReason).toBe('requirements changed');
      expect(result.entry.actor).toBe('alice');
    });
  }

  it('aborts a suspended run', () => {
    const run = startRunIn(db, 'issue_discovery');
    registerFindings(db, run.runId, [testFinding()]);
    expect(getState(db, run.runId).status).toBe('suspended');

    expect(abort(db, run.runId, 'duplicate request').run.status).toBe('aborted');
  });

  it('requires a reason', () => {
    const run = startRun(db, 'CR-1');
    expect(() => abort(db, run.runId, '  ')).toThrow(InvalidInputError);
    expect(() => transition(db, run.runId, 'aborted')).toThrow('An abort reason is required');
    expect(transition(db, run.runId, 'aborted', { reason: 'stop' }).run.phase).toBe('aborted');
  });

  it('rejects aborting a terminal run', () => {
    const run = startRun(db, 'CR-1');
    abort(db, run.runId, 'first');
    expect(() => abort(db, run.runId, 'second')).toThrow(`Run ${run.runId} is already aborted`);
  });
});

describe('phase-restricted records', () => {
  it('rejects records outside their phase', () => {
    const run = startRun(db, 'CR-1');

    expect(() => markDelivered(db, run.runId, 'schema')).toThrow(GuardViolationError);
    expect(() => recordVerification(db, run.runId, [{ name: 't', passed: true }])).toThrow(GuardViolationError);
    expect(() => recordChecklist(db, run.runId, [{ name: 'c', passed: true }])).toThrow(
      `record checklist is only accepted in final_checklist; run ${run.runId} is in doc_discovery`
    );
  });

  it('rejects unknown components and treats redelivery as a no-op', () => {
    const run = startRunIn(db, 'implementation');

    expect(() => markDelivered(db, run.runId, 'billing')).toThrow(
      'Component billing is not part of the approved plan'
    );

    const first = markDelivered(db, run.runId, 'schema');
    const second = markDelivered(db, run.runId, 'schema');
    expect(second.lastSequence).toBe(first.lastSequence);
    expect(second.deliveredComponents).toEqual(['schema']);
  });

  it('rejects empty reports', () => {
    const run = startRunIn(db, 'verification');
    expect(() => recordVerification(db, run.runId, [])).toThrow(
      'Invalid verification report: at least one result is required'
    );
  });
});

describe('evaluateGuard', () => {
  it('reports a terminal run', () => {
    const run = startRunIn(db, 'completed');
    expect(evaluateGuard(run, 'aborted')).toEqual({
      allowed: false,
      blockedBy: [],
      reason: 'Run is completed; no further transitions are possible',
    });
  });
});
