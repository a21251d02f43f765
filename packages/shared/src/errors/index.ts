/**
 * Workflow Errors
 *
 * Every failure surfaced by the engine carries enough context (runId, phase,
 * ledger sequence) for a caller to resume from the ledger.
 */

import type { DecisionTargetKind, WorkflowPhase } from '../types/index';

export type WorkflowErrorCode =
  | 'guard_violation'
  | 'invalid_decision'
  | 'stale_plan'
  | 'replay_corruption'
  | 'run_not_found'
  | 'unknown_target'
  | 'invalid_input';

export interface WorkflowErrorContext {
  runId?: string;
  phase?: WorkflowPhase;
  sequence?: number;
  targetId?: string;
}

export class WorkflowError extends Error {
  public readonly code: WorkflowErrorCode;
  public readonly runId?: string;
  public readonly phase?: WorkflowPhase;
  public readonly sequence?: number;
  public readonly targetId?: string;

  constructor(message: string, code: WorkflowErrorCode, context: WorkflowErrorContext = {}) {
    super(message);
    this.name = 'WorkflowError';
    this.code = code;
    this.runId = context.runId;
    this.phase = context.phase;
    this.sequence = context.sequence;
    this.targetId = context.targetId;
  }

  /** Only ledger corruption requires operator intervention. */
  get recoverable(): boolean {
    return this.code !== 'replay_corruption';
  }
}

export class GuardViolationError extends WorkflowError {
  public readonly attempted: string;
  public readonly blockedBy: string[];

  constructor(
    message: string,
    context: WorkflowErrorContext & { attempted: string; blockedBy?: string[] },
  ) {
    super(message, 'guard_violation', context);
    this.name = 'GuardViolationError';
    this.attempted = context.attempted;
    this.blockedBy = context.blockedBy ?? [];
  }
}

export class InvalidDecisionError extends WorkflowError {
  public readonly targetKind: DecisionTargetKind;
  public readonly decision: string;
  public readonly allowed: ReadonlyArray<string>;

  constructor(
    message: string,
    context: WorkflowErrorContext & {
      targetKind: DecisionTargetKind;
      decision: string;
      allowed: ReadonlyArray<string>;
    },
  ) {
    super(message, 'invalid_decision', context);
    this.name = 'InvalidDecisionError';
    this.targetKind = context.targetKind;
    this.decision = context.decision;
    this.allowed = context.allowed;
  }
}

export class StalePlanError extends WorkflowError {
  public readonly requestedVersion: number;
  public readonly currentVersion: number | null;

  constructor(runId: string, requestedVersion: number, currentVersion: number | null) {
    super(
      currentVersion === null
        ? `Plan version ${requestedVersion} is stale: run ${runId} has no current plan`
        : `Plan version ${requestedVersion} is stale: current version is ${currentVersion}`,
      'stale_plan',
      { runId },
    );
    this.name = 'StalePlanError';
    this.requestedVersion = requestedVersion;
    this.currentVersion = currentVersion;
  }
}

export class ReplayCorruptionError extends WorkflowError {
  constructor(message: string, context: WorkflowErrorContext) {
    super(
      `Ledger replay failed for run ${context.runId ?? 'unknown'} at sequence ${String(context.sequence ?? 'unknown')}: ${message}`,
      'replay_corruption',
      context,
    );
    this.name = 'ReplayCorruptionError';
  }
}

export class RunNotFoundError extends WorkflowError {
  constructor(runId: string) {
    super(`Run ${runId} not found`, 'run_not_found', { runId });
    this.name = 'RunNotFoundError';
  }
}

export class UnknownTargetError extends WorkflowError {
  constructor(runId: string, targetId: string) {
    super(`No finding, drift record or plan ${targetId} in run ${runId}`, 'unknown_target', {
      runId,
      targetId,
    });
    this.name = 'UnknownTargetError';
  }
}

export class InvalidInputError extends WorkflowError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = [], context: WorkflowErrorContext = {}) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message, 'invalid_input', context);
    this.name = 'InvalidInputError';
    this.issues = issues;
  }
}

export function isWorkflowError(err: unknown): err is WorkflowError {
  return err instanceof WorkflowError;
}
