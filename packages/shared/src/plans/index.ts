/**
 * Plans Module
 *
 * Proposing implementation plans. Each proposal is a new immutable version
 * that supersedes the previous one; approval lives in the approvals module.
 */

import type { Database } from 'better-sqlite3';
import { z } from 'zod';
import { createLogger } from '../logger/index';
import { InvalidInputError } from '../errors/index';
import { generatePlanId, SYSTEM_ACTOR } from '../ledger/index';
import { formatIssues } from '../ledger/schemas';
import { assertEntryAllowed } from '../orchestrator/guards';
import type { RunView } from '../replay/index';
import { appendToRun, withRunView } from '../replay/store';
import type { ComponentSpec } from '../types/index';

const log = createLogger({ name: 'changegate:plans' });

export interface PlanInput {
  summary?: string;
  components: ComponentSpec[];
}

export interface ProposePlanResult {
  planId: string;
  version: number;
  run: RunView;
}

const planInputSchema = z.object({
  summary: z.string().optional(),
  components: z
    .array(
      z.object({
        name: z.string().trim().min(1),
        purpose: z.string().trim().min(1),
        dependsOn: z.array(z.string()).default([]),
      })
    )
    .min(1, 'a plan needs at least one component'),
});

/**
 * Validate a plan: non-empty, unique component names, and dependencies that
 * only point at components declared earlier in the list.
 */
export function validatePlan(input: unknown): PlanInput {
  const parsed = planInputSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidInputError('Invalid plan', formatIssues(parsed.error));
  }

  const issues: string[] = [];
  const declared = new Set<string>();

  parsed.data.components.forEach((component, index) => {
    if (declared.has(component.name)) {
      issues.push(`components.${index}.name: duplicate component ${component.name}`);
    }
    for (const dependency of component.dependsOn) {
      if (!declared.has(dependency)) {
        issues.push(
          `components.${index}.dependsOn: ${component.name} depends on ${dependency}, which is not declared before it`
        );
      }
    }
    declared.add(component.name);
  });

  if (issues.length > 0) {
    throw new InvalidInputError('Invalid plan', issues);
  }

  return parsed.data;
}

/**
 * Propose a new plan version for a run in planning.
 */
export function proposePlan(
  db: Database,
  runId: string,
  input: PlanInput,
  options: { actor?: string } = {}
): ProposePlanResult {
  const plan = validatePlan(input);

  const result = withRunView(db, runId, (view): ProposePlanResult => {
    assertEntryAllowed(view, 'plan.proposed', 'propose plan');

    const planId = generatePlanId();
    const version = view.planHistory.length + 1;
    const { view: run } = appendToRun(
      db,
      view,
      {
        kind: 'plan.proposed',
        payload: { planId, version, summary: plan.summary, components: plan.components },
      },
      options.actor ?? SYSTEM_ACTOR
    );
    return { planId, version, run };
  });

  log.info(
    { runId, planId: result.planId, version: result.version, components: plan.components.length },
    'Plan proposed'
  );

  return result;
}
