/**
 * Text rendering shared by the commands.
 */

import {
  formatDriftReport,
  formatFindingsReport,
  pendingDriftRecords,
  pendingFindings,
  type LedgerEntry,
  type RunView,
} from '@changegate/shared';
import type { CLIOptions } from './index';

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

/**
 * Print `value` as JSON, or the text lines otherwise.
 */
export function emit(options: CLIOptions, value: unknown, lines: () => string[]): void {
  if (options.format === 'json') {
    printJson(value);
    return;
  }
  for (const line of lines()) {
    console.log(line);
  }
}

function planLine(view: RunView): string {
  const plan = view.plan;
  if (plan === null) return 'none';
  const state = plan.approved ? 'approved' : 'awaiting approval';
  return `v${plan.version} ${state} (${plan.planId})`;
}

export function formatRunView(view: RunView): string[] {
  const lines = [
    `Run ${view.runId} (${view.subjectRef})`,
    `  Phase:      ${view.phase}`,
    `  Status:     ${view.status}`,
    `  Ledger:     ${view.lastSequence} entries`,
    `  Plan:       ${planLine(view)}`,
    `  Pending:    ${pendingFindings(view).length} finding(s), ${pendingDriftRecords(view).length} drift record(s)`,
  ];

  if (view.plan !== null && view.plan.approved) {
    lines.push(`  Delivered:  ${view.deliveredComponents.length}/${view.plan.components.length} component(s)`);
  }
  if (view.implementationRounds > 1) {
    lines.push(`  Rounds:     ${view.implementationRounds}`);
  }
  if (view.referencesRunId !== undefined) {
    lines.push(`  References: ${view.referencesRunId}`);
  }
  if (view.abortReason !== undefined) {
    lines.push(`  Aborted:    ${view.abortReason} (from ${view.abortedFromPhase ?? 'unknown'})`);
  }

  return lines;
}

/**
 * Reports for whatever currently awaits a decision.
 */
export function formatPendingReports(view: RunView): string[] {
  const lines: string[] = [];
  const drift = pendingDriftRecords(view);
  const findings = pendingFindings(view);
  if (drift.length > 0) lines.push('', formatDriftReport(drift));
  if (findings.length > 0) lines.push('', formatFindingsReport(findings));
  return lines;
}

export function formatEntry(entry: LedgerEntry): string {
  return `${String(entry.sequence).padStart(4)}  ${entry.createdAt}  ${entry.actor.padEnd(10)}  ${entry.kind}${describePayload(entry)}`;
}

function describePayload(entry: LedgerEntry): string {
  switch (entry.kind) {
    case 'run.started':
      return ` ${entry.payload.subjectRef}`;
    case 'finding.registered':
      return ` ${entry.payload.findingId} ${entry.payload.severity} ${entry.payload.locationRef}`;
    case 'finding.decided':
      return ` ${entry.payload.findingId} ${entry.payload.decision}`;
    case 'drift.registered':
      return ` ${entry.payload.driftId} ${entry.payload.claimRef} (${entry.payload.symbol})`;
    case 'drift.resolved':
      return ` ${entry.payload.driftId} ${entry.payload.resolution}`;
    case 'plan.proposed':
    case 'plan.approved':
    case 'plan.changes_requested':
      return ` v${entry.payload.version} ${entry.payload.planId}`;
    case 'component.delivered':
      return ` ${entry.payload.component}`;
    case 'verification.recorded':
      return ` ${entry.payload.checks.filter((c) => c.passed).length}/${entry.payload.checks.length} passed`;
    case 'checklist.recorded':
      return ` ${entry.payload.items.filter((c) => c.passed).length}/${entry.payload.items.length} passed`;
    case 'phase.transitioned':
      return ` ${entry.payload.from} -> ${entry.payload.to}${entry.payload.reason !== undefined ? ` (${entry.payload.reason})` : ''}`;
  }
}
