/**
 * Scan Module
 *
 * Runs the classifier and the reconciler over many sources through a bounded
 * pool, then registers the collected candidates on the run in input order.
 * Loading happens outside any transaction; registration is a single command.
 */

import { readFile } from 'node:fs/promises';
import type { Database } from 'better-sqlite3';
import { createLogger } from '../logger/index';
import { analysisIncomplete, classifyArtifact, loadDefaultRuleSet, type RuleSet } from '../classifier/index';
import { registerDrift } from '../drift/index';
import { registerFindings } from '../findings/index';
import { assertEntryAllowed } from '../orchestrator/guards';
import {
  reconcileClaims,
  type CodeInventory,
  type DocumentationClaim,
} from '../reconciler/index';
import { loadRunView } from '../replay/store';
import {
  ANALYSIS_INCOMPLETE,
  UNVERIFIED_OBSERVATION,
  type DriftCandidate,
  type FindingCandidate,
} from '../types/index';
import { mapWithConcurrency } from './pool';

export { mapWithConcurrency } from './pool';

const log = createLogger({ name: 'changegate:scan' });

export const DEFAULT_SCAN_CONCURRENCY = 4;

// =============================================================================
// Sources
// =============================================================================

export interface ArtifactSource {
  locationRef: string;
  load(): Promise<string>;
}

export interface ClaimSource {
  /** Reference reported when the source itself cannot be loaded */
  sourceRef: string;
  load(): Promise<DocumentationClaim[]>;
}

export function fileArtifactSource(path: string, locationRef: string = path): ArtifactSource {
  return { locationRef, load: () => readFile(path, 'utf8') };
}

export function textArtifactSource(locationRef: string, text: string): ArtifactSource {
  return { locationRef, load: () => Promise.resolve(text) };
}

export function staticClaimSource(sourceRef: string, claims: DocumentationClaim[]): ClaimSource {
  return { sourceRef, load: () => Promise.resolve(claims) };
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// =============================================================================
// Pure Scans
// =============================================================================

export interface ScanOptions {
  concurrency?: number;
  maxArtifactBytes?: number;
}

/**
 * Classify every artifact. A source whose loader fails yields one
 * analysis_incomplete candidate instead of failing the scan.
 */
export async function scanArtifacts(
  sources: ReadonlyArray<ArtifactSource>,
  ruleSet: RuleSet,
  options: ScanOptions = {}
): Promise<FindingCandidate[]> {
  const perSource = await mapWithConcurrency(
    sources,
    options.concurrency ?? DEFAULT_SCAN_CONCURRENCY,
    async (source): Promise<FindingCandidate[]> => {
      let text: string;
      try {
        text = await source.load();
      } catch (err) {
        log.warn({ locationRef: source.locationRef, err }, 'Artifact could not be loaded');
        return [analysisIncomplete(source.locationRef, `load failed: ${describeError(err)}`)];
      }
      return classifyArtifact(
        { locationRef: source.locationRef, text },
        ruleSet,
        { maxArtifactBytes: options.maxArtifactBytes }
      );
    }
  );

  return perSource.flat();
}

/**
 * Reconcile the claims of every source against the inventory.
 */
export async function reconcileDocumentation(
  sources: ReadonlyArray<ClaimSource>,
  inventory: CodeInventory,
  options: Pick<ScanOptions, 'concurrency'> = {}
): Promise<DriftCandidate[]> {
  const perSource = await mapWithConcurrency(
    sources,
    options.concurrency ?? DEFAULT_SCAN_CONCURRENCY,
    async (source): Promise<DriftCandidate[]> => {
      let claims: DocumentationClaim[];
      try {
        claims = await source.load();
      } catch (err) {
        log.warn({ sourceRef: source.sourceRef, err }, 'Documentation could not be loaded');
        return [
          {
            claimRef: source.sourceRef,
            symbol: '',
            expected: `claims could not be loaded: ${describeError(err)}`,
            observed: UNVERIFIED_OBSERVATION,
            category: ANALYSIS_INCOMPLETE,
            confidence: 'low',
            suggestion: 'fix the documentation source and reconcile again',
          },
        ];
      }
      return reconcileClaims(claims, inventory, source.sourceRef);
    }
  );

  return perSource.flat();
}

// =============================================================================
// Scan and Register
// =============================================================================

export interface ScanResult<C> {
  candidates: C[];
  /** Ids of newly registered items */
  accepted: string[];
}

export interface RunScanOptions extends ScanOptions {
  actor?: string;
}

/**
 * Classify sources and register the findings on a run in a discovery phase.
 */
export async function runIssueScan(
  db: Database,
  runId: string,
  sources: ReadonlyArray<ArtifactSource>,
  ruleSet: RuleSet = loadDefaultRuleSet(),
  options: RunScanOptions = {}
): Promise<ScanResult<FindingCandidate>> {
  assertEntryAllowed(loadRunView(db, runId), 'finding.registered', 'register findings');

  const candidates = await scanArtifacts(sources, ruleSet, options);
  const accepted = registerFindings(db, runId, candidates, { actor: options.actor });

  log.info(
    { runId, sources: sources.length, candidates: candidates.length, accepted: accepted.length },
    'Issue scan complete'
  );

  return { candidates, accepted };
}

/**
 * Reconcile documentation sources and register the drift on a run in a
 * discovery phase.
 */
export async function runDocScan(
  db: Database,
  runId: string,
  sources: ReadonlyArray<ClaimSource>,
  inventory: CodeInventory,
  options: Omit<RunScanOptions, 'maxArtifactBytes'> = {}
): Promise<ScanResult<DriftCandidate>> {
  assertEntryAllowed(loadRunView(db, runId), 'drift.registered', 'register drift');

  const candidates = await reconcileDocumentation(sources, inventory, options);
  const accepted = registerDrift(db, runId, candidates, { actor: options.actor });

  log.info(
    { runId, sources: sources.length, candidates: candidates.length, accepted: accepted.length },
    'Documentation scan complete'
  );

  return { candidates, accepted };
}
