/**
 * Drift Module
 *
 * Registers reconciler candidates on a run, idempotent on the
 * (claimRef, symbol, expected) fingerprint in the same way as findings.
 */

import type { Database } from 'better-sqlite3';
import { z } from 'zod';
import { createLogger } from '../logger/index';
import { InvalidInputError } from '../errors/index';
import { generateDriftId, SYSTEM_ACTOR } from '../ledger/index';
import { confidenceSchema, formatIssues } from '../ledger/schemas';
import { assertEntryAllowed } from '../orchestrator/guards';
import { activeDriftRecords, type DriftRecord } from '../replay/index';
import { appendToRun, withRunView } from '../replay/store';
import type { DriftCandidate } from '../types/index';

const log = createLogger({ name: 'changegate:drift' });

export const driftCandidateSchema = z.object({
  claimRef: z.string().trim().min(1),
  symbol: z.string(),
  expected: z.string(),
  observed: z.string(),
  category: z.enum(['mismatch', 'absent', 'analysis_incomplete']),
  confidence: confidenceSchema.default('high'),
  suggestion: z.string().optional(),
});

type ParsedDriftCandidate = z.infer<typeof driftCandidateSchema>;

/**
 * One claim is one record: a document may state several properties of the
 * same symbol, and each is reconciled on its own.
 */
export function driftFingerprint(item: { claimRef: string; symbol: string; expected: string }): string {
  return `${item.claimRef}\u0000${item.symbol}\u0000${item.expected}`;
}

function sameContent(existing: DriftRecord, candidate: ParsedDriftCandidate): boolean {
  return (
    existing.expected === candidate.expected &&
    existing.observed === candidate.observed &&
    existing.category === candidate.category &&
    existing.confidence === candidate.confidence &&
    existing.suggestion === candidate.suggestion
  );
}

/**
 * Register drift candidates. Returns the ids of newly recorded drift records.
 */
export function registerDrift(
  db: Database,
  runId: string,
  candidates: DriftCandidate[],
  options: { actor?: string } = {}
): string[] {
  const parsed = z.array(driftCandidateSchema).safeParse(candidates);
  if (!parsed.success) {
    throw new InvalidInputError('Invalid drift candidates', formatIssues(parsed.error), { runId });
  }

  const accepted = withRunView(db, runId, (start): string[] => {
    assertEntryAllowed(start, 'drift.registered', 'register drift');

    const seen = new Set<string>();
    const ids: string[] = [];
    let view = start;

    for (const candidate of parsed.data) {
      const key = driftFingerprint(candidate);
      if (seen.has(key)) continue;
      seen.add(key);

      const existing = activeDriftRecords(view).find((d) => driftFingerprint(d) === key);
      if (existing !== undefined && (existing.resolution !== 'pending' || sameContent(existing, candidate))) {
        continue;
      }

      const driftId = generateDriftId();
      ({ view } = appendToRun(
        db,
        view,
        {
          kind: 'drift.registered',
          payload: { driftId, ...candidate, supersedesDriftId: existing?.driftId },
        },
        options.actor ?? SYSTEM_ACTOR
      ));
      ids.push(driftId);
    }

    return ids;
  });

  log.info({ runId, candidates: candidates.length, accepted: accepted.length }, 'Drift records registered');

  return accepted;
}
