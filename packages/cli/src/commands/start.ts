/**
 * changegate start <subject>
 */

import { startRun } from '@changegate/shared';
import type { CommandContext } from '../index';
import { CLIError, EXIT_CODE } from '../index';
import { getFlag, getPositionals } from '../flags';
import { emit } from '../output';

export async function startCommand(ctx: CommandContext, args: string[]): Promise<number> {
  const subject = getPositionals(args).join(' ');
  if (subject.trim() === '') {
    throw new CLIError(
      'Usage: changegate start <subject> [--references <runId>]\nExample: changegate start "CR-128 add order export"'
    );
  }

  const run = startRun(ctx.db, subject, {
    referencesRunId: getFlag(args, '--references'),
    actor: ctx.actor,
  });

  emit(ctx, run, () => [`Started ${run.runId} (${run.subjectRef}) in ${run.phase}`]);
  return EXIT_CODE.SUCCESS;
}
