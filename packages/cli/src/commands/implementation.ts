/**
 * changegate deliver / verify / checklist
 */

import {
  markDelivered,
  recordChecklist,
  recordVerification,
  type CheckResult,
  type RunView,
} from '@changegate/shared';
import type { CommandContext } from '../index';
import { CLIError, EXIT_CODE } from '../index';
import { getPositionals } from '../flags';
import { emit } from '../output';

export async function deliverCommand(ctx: CommandContext, args: string[]): Promise<number> {
  const [runId, component] = getPositionals(args);
  if (runId === undefined || component === undefined) {
    throw new CLIError('Usage: changegate deliver <runId> <component>');
  }

  const run = markDelivered(ctx.db, runId, component, { actor: ctx.actor });
  const total = run.plan?.components.length ?? 0;

  emit(ctx, run, () => [`Delivered ${component} (${run.deliveredComponents.length}/${total} component(s))`]);
  return EXIT_CODE.SUCCESS;
}

/**
 * Parse `name:pass` / `name:fail`. The name may itself contain colons.
 */
export function parseCheck(arg: string): CheckResult {
  const idx = arg.lastIndexOf(':');
  const name = idx === -1 ? '' : arg.slice(0, idx).trim();
  const outcome = idx === -1 ? '' : arg.slice(idx + 1).toLowerCase();
  if (name === '' || (outcome !== 'pass' && outcome !== 'fail')) {
    throw new CLIError(`Invalid check "${arg}". Use <name>:pass or <name>:fail`);
  }
  return { name, passed: outcome === 'pass' };
}

function summarize(label: string, checks: CheckResult[]): string[] {
  const failed = checks.filter((c) => !c.passed);
  return [
    `Recorded ${label}: ${checks.length - failed.length}/${checks.length} passed`,
    ...failed.map((c) => `  [fail] ${c.name}`),
  ];
}

function checksCommand(
  label: string,
  record: (ctx: CommandContext, runId: string, checks: CheckResult[]) => RunView
): (ctx: CommandContext, args: string[]) => Promise<number> {
  return async (ctx, args) => {
    const [runId, ...rawChecks] = getPositionals(args);
    if (runId === undefined || rawChecks.length === 0) {
      throw new CLIError(`Usage: changegate ${label} <runId> <name:pass|fail>...`);
    }

    const checks = rawChecks.map(parseCheck);
    const run = record(ctx, runId, checks);

    emit(ctx, run, () => summarize(label, checks));
    return EXIT_CODE.SUCCESS;
  };
}

export const verifyCommand = checksCommand('verify', (ctx, runId, checks) =>
  recordVerification(ctx.db, runId, checks, { actor: ctx.actor })
);

export const checklistCommand = checksCommand('checklist', (ctx, runId, checks) =>
  recordChecklist(ctx.db, runId, checks, { actor: ctx.actor })
);
