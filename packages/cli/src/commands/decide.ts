/**
 * changegate decide <runId> <targetId> <decision>
 * changegate decide-severity <runId> [--preset <name>] [--critical <decision>] ...
 */

import {
  decideBySeverity,
  SEVERITIES,
  SEVERITY_DECISION_PRESETS,
  submitDecision,
  type SeverityDecisionPreset,
  type SeverityDecisions,
} from '@changegate/shared';
import type { CommandContext } from '../index';
import { CLIError, EXIT_CODE } from '../index';
import { getFlag, getPositionals } from '../flags';
import { emit } from '../output';

export async function decideCommand(ctx: CommandContext, args: string[]): Promise<number> {
  const [runId, targetId, decision] = getPositionals(args);
  if (runId === undefined || targetId === undefined || decision === undefined) {
    throw new CLIError(
      'Usage: changegate decide <runId> <targetId> <decision> [--reason <text>] [--notes <text>]\n' +
        'Findings: fix_now, document_in_pr, create_issue, document_in_commit, ignore, ignored_with_reason\n' +
        'Drift:    docs_are_right, code_is_right, both_stale\n' +
        'Plans:    approved, changes_requested'
    );
  }

  const result = submitDecision(ctx.db, runId, targetId, decision, {
    reason: getFlag(args, '--reason'),
    notes: getFlag(args, '--notes'),
    actor: ctx.actor,
  });

  emit(ctx, result, () =>
    result.entry === null
      ? [`${targetId} is already ${decision}; nothing recorded`]
      : [`Recorded ${decision} for ${targetId} at sequence ${result.entry.sequence}; run is ${result.run.status}`]
  );
  return EXIT_CODE.SUCCESS;
}

const PRESET_NAMES = Object.keys(SEVERITY_DECISION_PRESETS);

function isPreset(name: string): name is SeverityDecisionPreset {
  return PRESET_NAMES.includes(name);
}

export async function decideSeverityCommand(ctx: CommandContext, args: string[]): Promise<number> {
  const [runId] = getPositionals(args);
  if (runId === undefined) {
    throw new CLIError(
      'Usage: changegate decide-severity <runId> [--preset <name>] [--critical|--high|--medium|--low <decision>] [--reason <text>]\n' +
        `Presets: ${PRESET_NAMES.join(', ')}`
    );
  }

  const presetName = getFlag(args, '--preset');
  let decisions: SeverityDecisions = {};
  if (presetName !== undefined) {
    if (!isPreset(presetName)) {
      throw new CLIError(`Unknown preset: ${presetName}. Use one of ${PRESET_NAMES.join(', ')}.`);
    }
    decisions = { ...SEVERITY_DECISION_PRESETS[presetName] };
  }
  for (const severity of SEVERITIES) {
    const decision = getFlag(args, `--${severity}`);
    if (decision !== undefined) decisions[severity] = decision;
  }

  const result = decideBySeverity(ctx.db, runId, decisions, {
    reason: getFlag(args, '--reason'),
    actor: ctx.actor,
  });

  emit(ctx, result, () => [
    `Recorded ${result.entries.length} finding decision(s); run is ${result.run.status}`,
  ]);
  return EXIT_CODE.SUCCESS;
}
