/**
 * Documentation Reconciler
 *
 * Compares documentation claims against a code inventory and reports every
 * claim the inventory does not bear out. It never decides which side is
 * right: every candidate it produces is registered as pending.
 */

import {
  ABSENT_OBSERVATION,
  ANALYSIS_INCOMPLETE,
  UNVERIFIED_OBSERVATION,
  type DriftCandidate,
} from '../types/index';

export interface DocumentationClaim {
  /** Where the claim is made, e.g. `docs/api.md#create-order` */
  claimRef: string;
  symbol: string;
  /** `exists`, or the property the documentation states, e.g. a signature */
  expected: string;
}

/** Symbol name to observed property. */
export type CodeInventory = ReadonlyMap<string, string>;

export const EXISTS_EXPECTATION = 'exists';

export function inventoryFromRecord(record: Record<string, string>): CodeInventory {
  return new Map(Object.entries(record));
}

function normalize(value: string): string {
  return value.trim().replace(/\s+/g, ' ');
}

/**
 * Reconcile one claim; null when the inventory agrees with it.
 */
export function reconcileClaim(
  claim: DocumentationClaim,
  inventory: CodeInventory,
  fallbackRef = 'claim'
): DriftCandidate | null {
  const claimRef = claim.claimRef.trim().length > 0 ? claim.claimRef : fallbackRef;

  if (claim.claimRef.trim().length === 0 || claim.symbol.trim().length === 0 || claim.expected.trim().length === 0) {
    return {
      claimRef,
      symbol: claim.symbol,
      expected: claim.expected,
      observed: UNVERIFIED_OBSERVATION,
      category: ANALYSIS_INCOMPLETE,
      confidence: 'low',
      suggestion: 'check the claim by hand',
    };
  }

  const observed = inventory.get(claim.symbol);
  if (observed === undefined) {
    return {
      claimRef,
      symbol: claim.symbol,
      expected: claim.expected,
      observed: ABSENT_OBSERVATION,
      category: 'absent',
      confidence: 'high',
      suggestion: `add ${claim.symbol} to the code, or drop it from the documentation`,
    };
  }

  const expected = normalize(claim.expected);
  if (expected.toLowerCase() === EXISTS_EXPECTATION || expected === normalize(observed)) {
    return null;
  }

  return {
    claimRef,
    symbol: claim.symbol,
    expected: claim.expected,
    observed,
    category: 'mismatch',
    confidence: 'high',
    suggestion: `change the code to match the documentation, or document ${normalize(observed)}`,
  };
}

/**
 * Reconcile claims in order. Malformed claims without a claimRef are
 * reported under `<sourceRef>#claims[<index>]`, or `claims[<index>]` when no
 * source is named.
 */
export function reconcileClaims(
  claims: ReadonlyArray<DocumentationClaim>,
  inventory: CodeInventory,
  sourceRef?: string
): DriftCandidate[] {
  const candidates: DriftCandidate[] = [];
  claims.forEach((claim, index) => {
    const fallbackRef = sourceRef === undefined ? `claims[${index}]` : `${sourceRef}#claims[${index}]`;
    const candidate = reconcileClaim(claim, inventory, fallbackRef);
    if (candidate !== null) candidates.push(candidate);
  });
  return candidates;
}
