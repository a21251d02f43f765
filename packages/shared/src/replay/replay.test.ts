import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { Database } from 'better-sqlite3';
import { initDatabase, closeDatabase } from '../db/index';
import { ReplayCorruptionError, RunNotFoundError } from '../errors/index';
import { appendEntry, listEntries, type LedgerEntry, type LedgerEntryBody } from '../ledger/index';
import { registerFindings } from '../findings/index';
import { submitDecision } from '../approvals/index';
import { abort, transition } from '../orchestrator/index';
import { getState, startRun } from '../runs/index';
import { startRunIn, testFinding } from '../testing/fixtures';
import { applyEntry, deriveRunStatus, foldEntries, replayRun } from './index';
import { clearViewCache, loadRunView } from './store';

function insertRaw(db: Database, runId: string, sequence: number, kind: string, payload: unknown): void {
  db.prepare(
    `INSERT INTO ledger_entries (run_id, sequence, kind, actor, payload_json, created_at)
     VALUES (?, ?, ?, 'mallory', ?, '2026-01-01T00:00:00.000Z')`
  ).run(runId, sequence, kind, JSON.stringify(payload));
}

function entry(body: LedgerEntryBody, sequence = 1): LedgerEntry {
  return { ...body, runId: 'run_test', sequence, actor: 'system', createdAt: '2026-01-01T00:00:00.000Z' };
}

describe('replay', () => {
  let db: Database;

  beforeEach(() => {
    db = initDatabase({ path: ':memory:' });
  });

  afterEach(() => {
    closeDatabase(db);
  });

  it('should rebuild the same view the commands produced', () => {
    const run = startRunIn(db, 'issue_discovery');
    const [findingId] = registerFindings(db, run.runId, [testFinding()]);
    submitDecision(db, run.runId, findingId ?? '', 'create_issue', { actor: 'alice' });
    transition(db, run.runId, 'planning');

    const cached = getState(db, run.runId);
    const rebuilt = replayRun(db, run.runId);

    expect(JSON.stringify(rebuilt)).toBe(JSON.stringify(cached));
    expect(JSON.stringify(replayRun(db, run.runId))).toBe(JSON.stringify(rebuilt));
    expect(rebuilt.phase).toBe('planning');
    expect(rebuilt.findings[0]?.decision).toBe('create_issue');
    expect(rebuilt.findings[0]?.decidedBy).toBe('alice');
  });

  it('should rebuild intermediate states from a sequence prefix', () => {
    const run = startRun(db, 'CR-1');
    transition(db, run.runId, 'issue_discovery');
    transition(db, run.runId, 'planning');

    const atTwo = foldEntries(null, listEntries(db, run.runId, { uptoSequence: 2 }));
    expect(atTwo?.phase).toBe('issue_discovery');
    expect(atTwo?.lastSequence).toBe(2);
  });

  it('should catch up a cached view with entries appended elsewhere', () => {
    const run = startRun(db, 'CR-1');
    expect(loadRunView(db, run.runId).lastSequence).toBe(1);

    appendEntry(db, run.runId, { kind: 'phase.transitioned', payload: { from: 'doc_discovery', to: 'issue_discovery' } });

    const view = loadRunView(db, run.runId);
    expect(view.phase).toBe('issue_discovery');
    expect(view.lastSequence).toBe(2);
  });

  it('should keep open runs cached and drop terminal ones', () => {
    const run = startRun(db, 'CR-1');
    const open = loadRunView(db, run.runId);
    expect(loadRunView(db, run.runId)).toBe(open);

    abort(db, run.runId, 'superseded by CR-2');
    const aborted = loadRunView(db, run.runId);
    const reread = loadRunView(db, run.runId);
    expect(reread.phase).toBe('aborted');
    expect(reread).not.toBe(aborted);
    expect(reread).toEqual(aborted);
  });

  it('should raise RunNotFound for an unknown run', () => {
    expect(() => replayRun(db, 'run_missing')).toThrow(RunNotFoundError);
    expect(() => getState(db, 'run_missing')).toThrow('Run run_missing not found');
  });

  describe('corruption', () => {
    it('should reject a sequence gap', () => {
      const run = startRun(db, 'CR-1');
      insertRaw(db, run.runId, 3, 'phase.transitioned', { from: 'doc_discovery', to: 'issue_discovery' });
      clearViewCache(db);

      try {
        getState(db, run.runId);
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(ReplayCorruptionError);
        if (err instanceof ReplayCorruptionError) {
          expect(err.sequence).toBe(3);
          expect(err.phase).toBe('doc_discovery');
          expect(err.message).toBe(
            `Ledger replay failed for run ${run.runId} at sequence 3: expected sequence 2, found 3`
          );
        }
      }
    });

    it('should reject a ledger that does not start with run.started', () => {
      insertRaw(db, 'run_forged', 1, 'component.delivered', { component: 'x' });
      expect(() => replayRun(db, 'run_forged')).toThrow(
        'Ledger replay failed for run run_forged at sequence 1: first entry must be run.started at sequence 1, found component.delivered'
      );
    });

    it('should reject a transition that does not start from the current phase', () => {
      const run = startRun(db, 'CR-1');
      insertRaw(db, run.runId, 2, 'phase.transitioned', { from: 'planning', to: 'implementation' });

      expect(() => replayRun(db, run.runId)).toThrow(/transition from planning but run is in doc_discovery/);
    });

    it('should reject a phase skip', () => {
      const run = startRun(db, 'CR-1');
      insertRaw(db, run.runId, 2, 'phase.transitioned', { from: 'doc_discovery', to: 'planning' });

      expect(() => replayRun(db, run.runId)).toThrow(/transition doc_discovery -> planning is not a valid move/);
    });

    it('should reject a decision on an unknown finding', () => {
      const run = startRun(db, 'CR-1');
      insertRaw(db, run.runId, 2, 'finding.decided', { findingId: 'fnd_ghost', decision: 'ignore' });

      expect(() => replayRun(db, run.runId)).toThrow(/unknown or superseded finding fnd_ghost/);
    });

    it('should reject entries after a terminal phase', () => {
      const run = startRun(db, 'CR-1');
      abort(db, run.runId, 'superseded by CR-2');
      insertRaw(db, run.runId, 3, 'phase.transitioned', { from: 'aborted', to: 'doc_discovery' });

      expect(() => replayRun(db, run.runId)).toThrow(/phase.transitioned recorded after the run reached aborted/);
    });

    it('should reject entries recorded in the wrong phase', () => {
      const run = startRun(db, 'CR-1');
      insertRaw(db, run.runId, 2, 'verification.recorded', { checks: [{ name: 'tests', passed: true }] });

      expect(() => replayRun(db, run.runId)).toThrow(/verification.recorded is not allowed in phase doc_discovery/);
    });
  });

  describe('applyEntry', () => {
    it('should not mutate the view it folds onto', () => {
      const start = applyEntry(null, entry({ kind: 'run.started', payload: { subjectRef: 'CR-1' } }));
      const snapshot = JSON.stringify(start);

      applyEntry(
        start,
        entry(
          {
            kind: 'finding.registered',
            payload: { findingId: 'fnd_1', ...testFinding(), confidence: 'high' },
          },
          2
        )
      );

      expect(JSON.stringify(start)).toBe(snapshot);
    });

    it('should derive status from pending items', () => {
      const start = applyEntry(null, entry({ kind: 'run.started', payload: { subjectRef: 'CR-1' } }));
      expect(deriveRunStatus(start)).toBe('active');

      const withFinding = applyEntry(
        start,
        entry(
          {
            kind: 'finding.registered',
            payload: { findingId: 'fnd_1', ...testFinding(), confidence: 'high' },
          },
          2
        )
      );
      expect(withFinding.status).toBe('suspended');

      const decided = applyEntry(
        withFinding,
        entry({ kind: 'finding.decided', payload: { findingId: 'fnd_1', decision: 'fix_now' } }, 3)
      );
      expect(decided.status).toBe('active');
    });
  });
});
