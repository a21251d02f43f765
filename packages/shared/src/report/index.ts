/**
 * Reports
 *
 * Plain-text summaries shown to the approver when a run suspends on
 * discovery results.
 */

import type { DriftRecord, Finding } from '../replay/index';
import { SEVERITIES, type Severity } from '../types/index';

export interface ReportOptions {
  /** Items listed per group before the rest are only counted */
  maxListed?: number;
}

/** Severities whose findings are listed individually; the rest are counted. */
const LISTED_SEVERITIES: ReadonlySet<Severity> = new Set(['critical', 'high']);

export function groupBySeverity(findings: ReadonlyArray<Finding>): Record<Severity, Finding[]> {
  const groups: Record<Severity, Finding[]> = { critical: [], high: [], medium: [], low: [] };
  for (const finding of findings) {
    groups[finding.severity].push(finding);
  }
  return groups;
}

/**
 * Summarize findings by severity. Critical and high findings are listed
 * (up to `maxListed` each); medium and low are counted.
 */
export function formatFindingsReport(findings: ReadonlyArray<Finding>, options: ReportOptions = {}): string {
  if (findings.length === 0) {
    return 'No unrelated issues found.';
  }

  const maxListed = options.maxListed ?? 2;
  const groups = groupBySeverity(findings);
  const lines = ['Unrelated issues found while reviewing the code:'];

  for (const severity of SEVERITIES) {
    const group = groups[severity];
    if (group.length === 0) continue;

    const label = `${severity.toUpperCase()} (${group.length} ${group.length === 1 ? 'issue' : 'issues'})`;
    if (!LISTED_SEVERITIES.has(severity)) {
      lines.push('', label);
      continue;
    }

    lines.push('', `${label}:`);
    for (const finding of group.slice(0, maxListed)) {
      lines.push(`  - ${finding.locationRef} - ${finding.description} [${finding.findingId}]`);
    }
    if (group.length > maxListed) {
      lines.push(`  ...and ${group.length - maxListed} more`);
    }
  }

  return lines.join('\n');
}

/**
 * Summarize documentation drift, one block per record.
 */
export function formatDriftReport(records: ReadonlyArray<DriftRecord>, options: ReportOptions = {}): string {
  if (records.length === 0) {
    return 'Documentation matches the code inventory.';
  }

  const maxListed = options.maxListed ?? 5;
  const lines = ['Discrepancies between documentation and code:'];

  records.slice(0, maxListed).forEach((record, index) => {
    lines.push(
      '',
      `${index + 1}. ${record.claimRef} (${record.symbol}) [${record.driftId}]`,
      `   Documentation says: ${record.expected}`,
      `   Code shows: ${record.observed}`
    );
    if (record.suggestion !== undefined) {
      lines.push(`   Should I: ${record.suggestion}?`);
    }
  });

  if (records.length > maxListed) {
    lines.push('', `...and ${records.length - maxListed} more discrepancies.`);
  }

  return lines.join('\n');
}
