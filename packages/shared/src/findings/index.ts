/**
 * Findings Module
 *
 * Registers classifier candidates on a run. Registration is idempotent on the
 * (locationRef, category) fingerprint: re-registering a decided finding is a
 * no-op, and a pending finding is only replaced when its content changed.
 */

import type { Database } from 'better-sqlite3';
import { z } from 'zod';
import { createLogger } from '../logger/index';
import { InvalidInputError } from '../errors/index';
import { generateFindingId, SYSTEM_ACTOR } from '../ledger/index';
import { confidenceSchema, formatIssues, severitySchema } from '../ledger/schemas';
import { assertEntryAllowed } from '../orchestrator/guards';
import { activeFindings, type Finding } from '../replay/index';
import { appendToRun, withRunView } from '../replay/store';
import type { FindingCandidate } from '../types/index';

const log = createLogger({ name: 'changegate:findings' });

export const findingCandidateSchema = z.object({
  locationRef: z.string().trim().min(1),
  category: z.string().trim().min(1),
  severity: severitySchema,
  confidence: confidenceSchema.default('high'),
  description: z.string(),
  recommendedFix: z.string(),
  ruleId: z.string().optional(),
  evidence: z.string().optional(),
});

type ParsedFindingCandidate = z.infer<typeof findingCandidateSchema>;

export function findingFingerprint(item: { locationRef: string; category: string }): string {
  return `${item.locationRef}\u0000${item.category}`;
}

function sameContent(existing: Finding, candidate: ParsedFindingCandidate): boolean {
  return (
    existing.severity === candidate.severity &&
    existing.confidence === candidate.confidence &&
    existing.description === candidate.description &&
    existing.recommendedFix === candidate.recommendedFix &&
    existing.ruleId === candidate.ruleId &&
    existing.evidence === candidate.evidence
  );
}

function parseCandidates(runId: string, candidates: FindingCandidate[]): ParsedFindingCandidate[] {
  const parsed = z.array(findingCandidateSchema).safeParse(candidates);
  if (!parsed.success) {
    throw new InvalidInputError('Invalid finding candidates', formatIssues(parsed.error), { runId });
  }
  return parsed.data;
}

/**
 * Register finding candidates. Returns the ids of newly recorded findings,
 * in candidate order; duplicates that were skipped contribute nothing.
 */
export function registerFindings(
  db: Database,
  runId: string,
  candidates: FindingCandidate[],
  options: { actor?: string } = {}
): string[] {
  const parsed = parseCandidates(runId, candidates);

  const accepted = withRunView(db, runId, (start): string[] => {
    assertEntryAllowed(start, 'finding.registered', 'register findings');

    const seen = new Set<string>();
    const ids: string[] = [];
    let view = start;

    for (const candidate of parsed) {
      const key = findingFingerprint(candidate);
      if (seen.has(key)) continue;
      seen.add(key);

      const existing = activeFindings(view).find((f) => findingFingerprint(f) === key);
      if (existing !== undefined && (existing.decision !== 'pending' || sameContent(existing, candidate))) {
        continue;
      }

      const findingId = generateFindingId();
      ({ view } = appendToRun(
        db,
        view,
        {
          kind: 'finding.registered',
          payload: { findingId, ...candidate, supersedesFindingId: existing?.findingId },
        },
        options.actor ?? SYSTEM_ACTOR
      ));
      ids.push(findingId);
    }

    return ids;
  });

  log.info({ runId, candidates: candidates.length, accepted: accepted.length }, 'Findings registered');

  return accepted;
}
