import type { ErrorCode } from '@shared/types';
import type { ClaimState } from './state-model';

/**
 * Base class for every error the claim workflow raises. The `code` is stable
 * and is what the API layer reports to clients.
 */
export abstract class ClaimWorkflowError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidTransition extends ClaimWorkflowError {
  readonly code = 'INVALID_TRANSITION';

  constructor(
    readonly claimId: string,
    readonly from: ClaimState,
    readonly to: ClaimState,
    readonly allowed: readonly ClaimState[],
  ) {
    super(
      `Claim ${claimId} cannot move from ${from} to ${to}. Valid transitions: [${allowed.join(', ')}]`,
    );
  }
}

export class TerminalStateError extends ClaimWorkflowError {
  readonly code = 'TERMINAL_STATE';

  constructor(readonly claimId: string, readonly state: ClaimState) {
    super(`Claim ${claimId} is in terminal state ${state}`);
  }
}

export class InsertionConflict extends ClaimWorkflowError {
  readonly code = 'INSERTION_CONFLICT';

  constructor(
    readonly claimId: string,
    readonly pending: ClaimState,
    readonly requested: ClaimState,
  ) {
    super(
      `Claim ${claimId} already has ${pending} pending; cannot insert ${requested}`,
    );
  }
}

export class InvalidInsertion extends ClaimWorkflowError {
  readonly code = 'INVALID_INSERTION';

  constructor(readonly claimId: string, readonly state: ClaimState, reason: string) {
    super(`Cannot insert ${state} into claim ${claimId}: ${reason}`);
  }
}

export class OrchestrationInProgress extends ClaimWorkflowError {
  readonly code = 'ORCHESTRATION_IN_PROGRESS';

  constructor(readonly claimId: string) {
    super(`An evaluation is already running for claim ${claimId}`);
  }
}

export class OrchestrationCancelled extends ClaimWorkflowError {
  readonly code = 'ORCHESTRATION_CANCELLED';

  constructor(readonly claimId: string) {
    super(`Evaluation of claim ${claimId} was cancelled`);
  }
}

export class EvaluationPending extends ClaimWorkflowError {
  readonly code = 'EVALUATION_PENDING';

  constructor(readonly claimId: string) {
    super(
      `Claim ${claimId} has no routing decision yet; advance it to finish the evaluation`,
    );
  }
}

export class NotUnderInvestigation extends ClaimWorkflowError {
  readonly code = 'NOT_UNDER_INVESTIGATION';

  constructor(readonly claimId: string, readonly state: ClaimState) {
    super(`Claim ${claimId} is in ${state}, not FRAUD_INVESTIGATION`);
  }
}

export class EvidenceLocked extends ClaimWorkflowError {
  readonly code = 'EVIDENCE_LOCKED';

  constructor(readonly claimId: string, readonly state: ClaimState) {
    super(`Evidence for claim ${claimId} is fixed once it leaves SUBMITTED (now ${state})`);
  }
}

/** Raised inside agent adapters; the orchestrator turns it into a degraded verdict. */
export class AgentUnavailable extends ClaimWorkflowError {
  readonly code = 'AGENT_UNAVAILABLE';

  constructor(readonly agent: string, reason: string) {
    super(`Agent ${agent} unavailable: ${reason}`);
  }
}

export class ClaimNotFound extends ClaimWorkflowError {
  readonly code = 'CLAIM_NOT_FOUND';

  constructor(readonly claimId: string) {
    super(`Claim ${claimId} not found`);
  }
}

export class ClaimValidationError extends ClaimWorkflowError {
  readonly code = 'VALIDATION_FAILED';

  constructor(readonly issues: string[]) {
    super(`Invalid claim: ${issues.join('; ')}`);
  }
}

export function isClaimWorkflowError(err: unknown): err is ClaimWorkflowError {
  return err instanceof ClaimWorkflowError;
}
