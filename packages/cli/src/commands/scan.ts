/**
 * changegate scan <runId> <file...>
 *
 * Classifies files with the rule catalog and registers the findings on the
 * run. Files that cannot be read are reported as analysis_incomplete.
 */

import {
  fileArtifactSource,
  loadDefaultRuleSet,
  loadRuleSet,
  loadRunView,
  pendingFindings,
  runIssueScan,
  formatFindingsReport,
} from '@changegate/shared';
import type { CommandContext } from '../index';
import { CLIError, EXIT_CODE } from '../index';
import { getFlag, getPositionals, parsePositiveInt } from '../flags';
import { emit } from '../output';

export async function scanCommand(ctx: CommandContext, args: string[]): Promise<number> {
  const [runId, ...files] = getPositionals(args);
  if (runId === undefined || files.length === 0) {
    throw new CLIError('Usage: changegate scan <runId> <file...> [--rules <file.json>] [--concurrency <n>]');
  }

  const rulesPath = getFlag(args, '--rules') ?? ctx.config.rulesPath;
  const ruleSet = rulesPath === '' ? loadDefaultRuleSet() : loadRuleSet(rulesPath);
  const concurrencyFlag = getFlag(args, '--concurrency');
  const concurrency =
    concurrencyFlag === undefined ? ctx.config.scanConcurrency : parsePositiveInt(concurrencyFlag, '--concurrency');

  const result = await runIssueScan(
    ctx.db,
    runId,
    files.map((file) => fileArtifactSource(file)),
    ruleSet,
    { concurrency, maxArtifactBytes: ctx.config.maxArtifactBytes, actor: ctx.actor }
  );
  const view = loadRunView(ctx.db, runId);

  emit(ctx, { ...result, status: view.status }, () => [
    `Scanned ${files.length} file(s): ${result.candidates.length} candidate(s), ${result.accepted.length} new finding(s)`,
    '',
    formatFindingsReport(pendingFindings(view)),
  ]);
  return EXIT_CODE.SUCCESS;
}
