/**
 * changegate reconcile <runId> --claims <file.json> --inventory <file.json>
 *
 * The claims file holds an array of { claimRef, symbol, expected }; the
 * inventory file maps each code symbol to its observed property.
 */

import { z } from 'zod';
import {
  formatDriftReport,
  inventoryFromRecord,
  loadRunView,
  pendingDriftRecords,
  runDocScan,
  staticClaimSource,
} from '@changegate/shared';
import type { CommandContext } from '../index';
import { CLIError, EXIT_CODE } from '../index';
import { getFlag, getPositionals, readFlagJson } from '../flags';
import { emit } from '../output';

const claimsFileSchema = z.array(
  z.object({
    claimRef: z.string().min(1),
    symbol: z.string().min(1),
    expected: z.string(),
  })
);

const inventoryFileSchema = z.record(z.string());

function parseFile<T>(schema: z.ZodType<T>, value: unknown, flagName: string): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new CLIError(`Invalid ${flagName} file: ${issues.join('; ')}`);
  }
  return parsed.data;
}

export async function reconcileCommand(ctx: CommandContext, args: string[]): Promise<number> {
  const [runId] = getPositionals(args);
  const claimsPath = getFlag(args, '--claims');
  const inventoryPath = getFlag(args, '--inventory');
  if (runId === undefined || claimsPath === undefined || inventoryPath === undefined) {
    throw new CLIError('Usage: changegate reconcile <runId> --claims <file.json> --inventory <file.json>');
  }

  const claims = parseFile(claimsFileSchema, readFlagJson(claimsPath, '--claims'), '--claims');
  const inventory = inventoryFromRecord(
    parseFile(inventoryFileSchema, readFlagJson(inventoryPath, '--inventory'), '--inventory')
  );

  const result = await runDocScan(ctx.db, runId, [staticClaimSource(claimsPath, claims)], inventory, {
    concurrency: ctx.config.scanConcurrency,
    actor: ctx.actor,
  });
  const view = loadRunView(ctx.db, runId);

  emit(ctx, { ...result, status: view.status }, () => [
    `Reconciled ${claims.length} claim(s): ${result.candidates.length} discrepancy(ies), ${result.accepted.length} new drift record(s)`,
    '',
    formatDriftReport(pendingDriftRecords(view)),
  ]);
  return EXIT_CODE.SUCCESS;
}
