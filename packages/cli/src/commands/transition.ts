/**
 * changegate transition / abort
 */

import { abort, isWorkflowPhase, transition } from '@changegate/shared';
import type { CommandContext } from '../index';
import { CLIError, EXIT_CODE } from '../index';
import { getFlag, getPositionals } from '../flags';
import { emit } from '../output';

export async function transitionCommand(ctx: CommandContext, args: string[]): Promise<number> {
  const [runId, target] = getPositionals(args);
  if (runId === undefined || target === undefined) {
    throw new CLIError('Usage: changegate transition <runId> <phase> [--reason <text>]');
  }
  if (!isWorkflowPhase(target)) {
    throw new CLIError(`Unknown phase: ${target}`);
  }

  const result = transition(ctx.db, runId, target, { reason: getFlag(args, '--reason'), actor: ctx.actor });
  const { run } = result;

  emit(ctx, result, () =>
    result.reentry
      ? [
          `Final checklist failed; run ${runId} returned to implementation (round ${run.implementationRounds})`,
        ]
      : [`Run ${runId} moved from ${result.from} to ${run.phase}`]
  );
  return EXIT_CODE.SUCCESS;
}

export async function abortCommand(ctx: CommandContext, args: string[]): Promise<number> {
  const [runId] = getPositionals(args);
  const reason = getFlag(args, '--reason');
  if (runId === undefined || reason === undefined) {
    throw new CLIError('Usage: changegate abort <runId> --reason <text>');
  }

  const result = abort(ctx.db, runId, reason, { actor: ctx.actor });

  emit(ctx, result, () => [`Run ${runId} aborted from ${result.from}: ${reason}`]);
  return EXIT_CODE.SUCCESS;
}
