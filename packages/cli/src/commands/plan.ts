/**
 * changegate propose-plan / approve-plan
 */

import { approvePlan, proposePlan, validatePlan } from '@changegate/shared';
import type { CommandContext } from '../index';
import { CLIError, EXIT_CODE } from '../index';
import { getFlag, getPositionals, parsePositiveInt, readFlagJson } from '../flags';
import { emit } from '../output';

export async function proposePlanCommand(ctx: CommandContext, args: string[]): Promise<number> {
  const [runId] = getPositionals(args);
  const planPath = getFlag(args, '--plan');
  if (runId === undefined || planPath === undefined) {
    throw new CLIError(
      'Usage: changegate propose-plan <runId> --plan <file.json>\n' +
        'The file holds { "summary"?: string, "components": [{ "name", "purpose", "dependsOn"? }] }'
    );
  }

  const plan = validatePlan(readFlagJson(planPath, '--plan'));
  const result = proposePlan(ctx.db, runId, plan, { actor: ctx.actor });

  emit(ctx, result, () => [
    `Proposed plan v${result.version} (${result.planId}) with ${plan.components.length} component(s)`,
    ...plan.components.map(
      (c) => `  - ${c.name}: ${c.purpose}${c.dependsOn.length > 0 ? ` (after ${c.dependsOn.join(', ')})` : ''}`
    ),
  ]);
  return EXIT_CODE.SUCCESS;
}

export async function approvePlanCommand(ctx: CommandContext, args: string[]): Promise<number> {
  const [runId, rawVersion] = getPositionals(args);
  if (runId === undefined || rawVersion === undefined) {
    throw new CLIError('Usage: changegate approve-plan <runId> <version> [--notes <text>]');
  }

  const version = parsePositiveInt(rawVersion, 'version');
  const result = approvePlan(ctx.db, runId, version, { notes: getFlag(args, '--notes'), actor: ctx.actor });

  emit(ctx, result, () => [
    result.entry === null ? `Plan v${version} was already approved` : `Approved plan v${version}`,
  ]);
  return EXIT_CODE.SUCCESS;
}
