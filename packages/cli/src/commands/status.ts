/**
 * Read-only commands: status, history, pending, runs.
 */

import {
  getRunHistory,
  getState,
  isWorkflowPhase,
  listPendingDecisions,
  listRuns,
  type RunStatus,
} from '@changegate/shared';
import type { CommandContext } from '../index';
import { CLIError, EXIT_CODE } from '../index';
import { getFlag, getPositionals } from '../flags';
import { emit, formatEntry, formatPendingReports, formatRunView } from '../output';

const RUN_STATUSES: ReadonlyArray<RunStatus> = ['active', 'suspended', 'completed', 'aborted'];

function requireRunId(args: string[], command: string): string {
  const [runId] = getPositionals(args);
  if (runId === undefined) {
    throw new CLIError(`Usage: changegate ${command} <runId>`);
  }
  return runId;
}

export async function statusCommand(ctx: CommandContext, args: string[]): Promise<number> {
  const view = getState(ctx.db, requireRunId(args, 'status'));

  emit(ctx, view, () => [...formatRunView(view), ...formatPendingReports(view)]);
  return EXIT_CODE.SUCCESS;
}

export async function historyCommand(ctx: CommandContext, args: string[]): Promise<number> {
  const entries = getRunHistory(ctx.db, requireRunId(args, 'history'));

  emit(ctx, entries, () => entries.map(formatEntry));
  return EXIT_CODE.SUCCESS;
}

export async function pendingCommand(ctx: CommandContext, args: string[]): Promise<number> {
  const pending = listPendingDecisions(ctx.db, requireRunId(args, 'pending'));

  emit(ctx, pending, () => {
    const lines = [
      ...pending.driftRecords.map((d) => `drift    ${d.driftId}  ${d.claimRef} (${d.symbol})`),
      ...pending.findings.map((f) => `finding  ${f.findingId}  ${f.severity}  ${f.locationRef}: ${f.description}`),
    ];
    if (pending.plan !== null) {
      lines.push(`plan     ${pending.plan.planId}  v${pending.plan.version}`);
    }
    return lines.length > 0 ? lines : ['Nothing awaits a decision.'];
  });
  return EXIT_CODE.SUCCESS;
}

export async function runsCommand(ctx: CommandContext, args: string[]): Promise<number> {
  const status = getFlag(args, '--status');
  const phase = getFlag(args, '--phase');

  const statusFilter = RUN_STATUSES.find((s) => s === status);
  if (status !== undefined && statusFilter === undefined) {
    throw new CLIError(`Unknown status: ${status}. Use ${RUN_STATUSES.join(', ')}.`);
  }
  if (phase !== undefined && !isWorkflowPhase(phase)) {
    throw new CLIError(`Unknown phase: ${phase}`);
  }

  const listing = listRuns(ctx.db, { status: statusFilter, phase });
  const { runs, corrupted } = listing;

  emit(ctx, listing, () =>
    runs.length === 0 && corrupted.length === 0
      ? ['No runs found.']
      : [
          ...runs.map((r) => `${r.runId}  ${r.phase.padEnd(15)}  ${r.status.padEnd(9)}  ${r.subjectRef}`),
          ...corrupted.map((r) => `${r.runId}  ${'corrupt'.padEnd(15)}  ${r.message}`),
        ]
  );
  return corrupted.length > 0 ? EXIT_CODE.RUNTIME_ERROR : EXIT_CODE.SUCCESS;
}
