import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { Database } from 'better-sqlite3';
import { initDatabase, closeDatabase } from '../db/index';
import { InvalidInputError, ReplayCorruptionError } from '../errors/index';
import {
  appendEntry,
  listEntries,
  getLastSequence,
  listRunIds,
  generateRunId,
  generateFindingId,
  generateDriftId,
  generatePlanId,
  SYSTEM_ACTOR,
} from './index';

describe('ledger', () => {
  let db: Database;

  beforeEach(() => {
    db = initDatabase({ path: ':memory:' });
  });

  afterEach(() => {
    closeDatabase(db);
  });

  describe('id generation', () => {
    it('should prefix ids by kind', () => {
      expect(generateRunId()).toMatch(/^run_[a-z0-9]+$/);
      expect(generateFindingId()).toMatch(/^fnd_[a-z0-9]+$/);
      expect(generateDriftId()).toMatch(/^dft_[a-z0-9]+$/);
      expect(generatePlanId()).toMatch(/^pln_[a-z0-9]+$/);
    });
  });

  describe('appendEntry', () => {
    it('should allocate contiguous sequences per run', () => {
      const a1 = appendEntry(db, 'run_a', { kind: 'run.started', payload: { subjectRef: 'A' } });
      const b1 = appendEntry(db, 'run_b', { kind: 'run.started', payload: { subjectRef: 'B' } });
      const a2 = appendEntry(
        db,
        'run_a',
        { kind: 'component.delivered', payload: { component: 'parser' } },
        'alice'
      );

      expect(a1.sequence).toBe(1);
      expect(b1.sequence).toBe(1);
      expect(a2.sequence).toBe(2);
      expect(a1.actor).toBe(SYSTEM_ACTOR);
      expect(a2.actor).toBe('alice');
      expect(getLastSequence(db, 'run_a')).toBe(2);
      expect(getLastSequence(db, 'run_missing')).toBe(0);
    });

    it('should reject payloads that do not match their schema', () => {
      expect(() =>
        appendEntry(db, 'run_a', { kind: 'verification.recorded', payload: { checks: [] } })
      ).toThrow(InvalidInputError);
      expect(getLastSequence(db, 'run_a')).toBe(0);
    });

    it('should roll back with an enclosing transaction', () => {
      const attempt = db.transaction(() => {
        appendEntry(db, 'run_a', { kind: 'run.started', payload: { subjectRef: 'A' } });
        throw new Error('abandon');
      });

      expect(() => attempt.immediate()).toThrow('abandon');
      expect(listEntries(db, 'run_a')).toEqual([]);
    });
  });

  describe('listEntries', () => {
    beforeEach(() => {
      appendEntry(db, 'run_a', { kind: 'run.started', payload: { subjectRef: 'A' } });
      appendEntry(db, 'run_a', { kind: 'component.delivered', payload: { component: 'one' } });
      appendEntry(db, 'run_a', { kind: 'component.delivered', payload: { component: 'two' } });
    });

    it('should return entries in sequence order with decoded payloads', () => {
      const entries = listEntries(db, 'run_a');
      expect(entries.map((e) => e.sequence)).toEqual([1, 2, 3]);
      expect(entries[0]?.kind).toBe('run.started');
      expect(entries[2]?.payload).toEqual({ component: 'two' });
    });

    it('should honour sequence bounds', () => {
      expect(listEntries(db, 'run_a', { afterSequence: 1 }).map((e) => e.sequence)).toEqual([2, 3]);
      expect(listEntries(db, 'run_a', { uptoSequence: 2 }).map((e) => e.sequence)).toEqual([1, 2]);
      expect(listEntries(db, 'run_a', { afterSequence: 3 })).toEqual([]);
    });

    it('should raise ReplayCorruption for an undecodable payload', () => {
      db.prepare(
        `INSERT INTO ledger_entries (run_id, sequence, kind, actor, payload_json, created_at)
         VALUES ('run_a', 4, 'component.delivered', 'system', '{"component":', '2026-01-01T00:00:00.000Z')`
      ).run();

      expect(() => listEntries(db, 'run_a')).toThrow(ReplayCorruptionError);
      expect(listEntries(db, 'run_a', { uptoSequence: 3 })).toHaveLength(3);
    });

    it('should raise ReplayCorruption for a payload that violates its schema', () => {
      db.prepare(
        `INSERT INTO ledger_entries (run_id, sequence, kind, actor, payload_json, created_at)
         VALUES ('run_a', 4, 'plan.approved', 'system', '{"planId":"pln_x"}', '2026-01-01T00:00:00.000Z')`
      ).run();

      try {
        listEntries(db, 'run_a');
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(ReplayCorruptionError);
        if (err instanceof ReplayCorruptionError) {
          expect(err.runId).toBe('run_a');
          expect(err.sequence).toBe(4);
          expect(err.recoverable).toBe(false);
        }
      }
    });
  });

  describe('listRunIds', () => {
    it('should list runs by their run.started entry', () => {
      appendEntry(db, 'run_a', { kind: 'run.started', payload: { subjectRef: 'A' } });
      appendEntry(db, 'run_a', { kind: 'component.delivered', payload: { component: 'one' } });
      appendEntry(db, 'run_b', { kind: 'run.started', payload: { subjectRef: 'B' } });

      expect([...listRunIds(db)].sort()).toEqual(['run_a', 'run_b']);
    });
  });
});
