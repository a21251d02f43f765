/**
 * Ledger payload schemas
 *
 * Every entry body is a `{ kind, payload }` pair validated on append and
 * again on read, so a replay never folds a payload it cannot trust.
 */

import { z } from 'zod';

const phaseSchema = z.enum([
  'doc_discovery',
  'issue_discovery',
  'planning',
  'implementation',
  'verification',
  'final_checklist',
  'completed',
  'aborted',
]);

export const severitySchema = z.enum(['critical', 'high', 'medium', 'low']);

export const confidenceSchema = z.enum(['high', 'low']);

export const checkResultSchema = z.object({
  name: z.string().min(1),
  passed: z.boolean(),
  detail: z.string().optional(),
});

export const componentSpecSchema = z.object({
  name: z.string().min(1),
  purpose: z.string().min(1),
  dependsOn: z.array(z.string()),
});

// =============================================================================
// Payloads
// =============================================================================

const runStartedPayload = z.object({
  subjectRef: z.string().min(1),
  referencesRunId: z.string().optional(),
});

const findingRegisteredPayload = z.object({
  findingId: z.string().min(1),
  locationRef: z.string().min(1),
  category: z.string().min(1),
  severity: severitySchema,
  confidence: confidenceSchema,
  description: z.string(),
  recommendedFix: z.string(),
  ruleId: z.string().optional(),
  evidence: z.string().optional(),
  supersedesFindingId: z.string().optional(),
});

const findingDecidedPayload = z.object({
  findingId: z.string().min(1),
  decision: z.enum([
    'fix_now',
    'document_in_pr',
    'create_issue',
    'document_in_commit',
    'ignore',
    'ignored_with_reason',
  ]),
  reason: z.string().optional(),
});

const driftRegisteredPayload = z.object({
  driftId: z.string().min(1),
  claimRef: z.string().min(1),
  symbol: z.string(),
  expected: z.string(),
  observed: z.string(),
  category: z.enum(['mismatch', 'absent', 'analysis_incomplete']),
  confidence: confidenceSchema,
  suggestion: z.string().optional(),
  supersedesDriftId: z.string().optional(),
});

const driftResolvedPayload = z.object({
  driftId: z.string().min(1),
  resolution: z.enum(['docs_are_right', 'code_is_right', 'both_stale']),
  notes: z.string().optional(),
});

const planProposedPayload = z.object({
  planId: z.string().min(1),
  version: z.number().int().min(1),
  summary: z.string().optional(),
  components: z.array(componentSpecSchema).min(1),
});

const planDecisionPayload = z.object({
  planId: z.string().min(1),
  version: z.number().int().min(1),
  notes: z.string().optional(),
});

const phaseTransitionedPayload = z.object({
  from: phaseSchema,
  to: phaseSchema,
  reason: z.string().optional(),
  reentry: z.boolean().optional(),
});

// =============================================================================
// Entry Bodies
// =============================================================================

export const ledgerEntryBodySchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('run.started'), payload: runStartedPayload }),
  z.object({ kind: z.literal('finding.registered'), payload: findingRegisteredPayload }),
  z.object({ kind: z.literal('finding.decided'), payload: findingDecidedPayload }),
  z.object({ kind: z.literal('drift.registered'), payload: driftRegisteredPayload }),
  z.object({ kind: z.literal('drift.resolved'), payload: driftResolvedPayload }),
  z.object({ kind: z.literal('plan.proposed'), payload: planProposedPayload }),
  z.object({ kind: z.literal('plan.approved'), payload: planDecisionPayload }),
  z.object({ kind: z.literal('plan.changes_requested'), payload: planDecisionPayload }),
  z.object({
    kind: z.literal('component.delivered'),
    payload: z.object({ component: z.string().min(1) }),
  }),
  z.object({
    kind: z.literal('verification.recorded'),
    payload: z.object({ checks: z.array(checkResultSchema).min(1) }),
  }),
  z.object({
    kind: z.literal('checklist.recorded'),
    payload: z.object({ items: z.array(checkResultSchema).min(1) }),
  }),
  z.object({ kind: z.literal('phase.transitioned'), payload: phaseTransitionedPayload }),
]);

export type LedgerEntryBody = z.infer<typeof ledgerEntryBodySchema>;

export type FindingRegisteredPayload = z.infer<typeof findingRegisteredPayload>;
export type DriftRegisteredPayload = z.infer<typeof driftRegisteredPayload>;
export type PhaseTransitionedPayload = z.infer<typeof phaseTransitionedPayload>;

/**
 * Flatten zod issues into `path: message` strings for error reporting.
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
  );
}
