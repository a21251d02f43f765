/**
 * Finding Classifier
 *
 * Pure function from an artifact and a compiled rule set to finding
 * candidates. The classifier never touches the ledger; registration happens
 * in the findings module.
 */

import {
  ANALYSIS_INCOMPLETE,
  SEVERITY_RANK,
  type FindingCandidate,
} from '../types/index';
import type { CompiledRule, RuleSet } from './rules';

export {
  compileRuleSet,
  loadRuleSet,
  loadDefaultRuleSet,
  DEFAULT_RULES_PATH,
  type Rule,
  type RuleSet,
  type CompiledRule,
} from './rules';

export interface ArtifactInput {
  /** Opaque pointer to the artifact, usually a file path */
  locationRef: string;
  text: string;
}

export interface ClassifyOptions {
  /** Artifacts larger than this (UTF-8 bytes) are not analysed */
  maxArtifactBytes?: number;
}

export const MAX_EVIDENCE_LENGTH = 120;

/**
 * The single candidate reported for an artifact that could not be analysed.
 */
export function analysisIncomplete(locationRef: string, reason: string): FindingCandidate {
  return {
    locationRef,
    category: ANALYSIS_INCOMPLETE,
    severity: 'low',
    confidence: 'low',
    description: `Artifact could not be analysed: ${reason}`,
    recommendedFix: 'Review the artifact manually',
  };
}

function splitLines(text: string): string[] {
  const lines = text.split(/\r?\n/);
  if (lines.length > 1 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

function ruleMatches(rule: CompiledRule, line: string): boolean {
  return rule.regex.test(line) && (rule.unless === null || !rule.unless.test(line));
}

/**
 * Classify one artifact. At most one candidate is produced per line: the
 * highest-severity matching rule, with ties going to the earlier rule.
 */
export function classifyArtifact(
  artifact: ArtifactInput,
  ruleSet: RuleSet,
  options: ClassifyOptions = {}
): FindingCandidate[] {
  const { locationRef, text } = artifact;

  if (text.includes('\0')) {
    return [analysisIncomplete(locationRef, 'content contains NUL bytes')];
  }
  if (options.maxArtifactBytes !== undefined && Buffer.byteLength(text, 'utf8') > options.maxArtifactBytes) {
    return [analysisIncomplete(locationRef, `content exceeds ${options.maxArtifactBytes} bytes`)];
  }

  const applicable = ruleSet.rules.filter(
    (rule) => !rule.excludePaths.some((fragment) => locationRef.includes(fragment))
  );
  const lines = splitLines(text);
  const multiLine = lines.length > 1;
  const candidates: FindingCandidate[] = [];

  lines.forEach((line, index) => {
    let best: CompiledRule | null = null;
    for (const rule of applicable) {
      if (!ruleMatches(rule, line)) continue;
      if (best === null || SEVERITY_RANK[rule.severity] > SEVERITY_RANK[best.severity]) {
        best = rule;
      }
    }
    if (best === null) return;

    candidates.push({
      locationRef: multiLine ? `${locationRef}:${index + 1}` : locationRef,
      category: best.category,
      severity: best.severity,
      confidence: 'high',
      description: best.description,
      recommendedFix: best.recommendedFix,
      ruleId: best.id,
      evidence: line.trim().slice(0, MAX_EVIDENCE_LENGTH),
    });
  });

  return candidates;
}
