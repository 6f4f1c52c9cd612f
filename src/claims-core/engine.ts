import type { ClaimSummaryRecord } from '@shared/types';
import { appendAudit, cloneClaim, createClaim, parseEvidence, type Claim } from './claim';
import { ClaimLock } from './claim-lock';
import {
  ClaimNotFound,
  EvaluationPending,
  EvidenceLocked,
  InvalidTransition,
  NotUnderInvestigation,
  TerminalStateError,
} from './errors';
import { consoleLogger, type Logger } from './logger';
import type { RoutingDecision } from './orchestrator';
import type { ProcessMonitor } from './process-monitor';
import type { ClaimRepository } from './repository';
import type { ClaimStateMachine, PendingInsertion, TransitionRecord } from './state-machine';
import { isTerminal, type ClaimState } from './state-model';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ClaimEngineDeps {
  repository: ClaimRepository;
  stateMachine: ClaimStateMachine;
  monitor: ProcessMonitor;
  logger?: Logger;
}

export interface TransitionOutcome {
  claim: Claim;
  /** The requested transition first, then any the monitor applied. */
  transitions: TransitionRecord[];
  decision?: RoutingDecision;
  nextStates: ClaimState[];
}

// ---------------------------------------------------------------------------
// Engine
// ---------------------------------------------------------------------------

/**
 * Public face of the workflow for callers such as the HTTP layer. Each call
 * that changes a claim runs inside that claim's exclusive section: load,
 * transition, state-entry hook and save happen without interleaving.
 */
export class ClaimEngine {
  private readonly lock = new ClaimLock();
  private readonly repository: ClaimRepository;
  private readonly stateMachine: ClaimStateMachine;
  private readonly monitor: ProcessMonitor;
  private readonly logger: Logger;

  constructor(deps: ClaimEngineDeps) {
    this.repository = deps.repository;
    this.stateMachine = deps.stateMachine;
    this.monitor = deps.monitor;
    this.logger = deps.logger ?? consoleLogger('ENGINE');
  }

  async create(fields: unknown): Promise<Claim> {
    const claim = createClaim(fields);
    await this.repository.save(claim);
    this.logger.info(`Created claim ${claim.id} for ${claim.claimantName}`);
    return cloneClaim(claim);
  }

  async get(id: string): Promise<Claim> {
    const claim = await this.repository.findById(id);
    if (!claim) throw new ClaimNotFound(id);
    return claim;
  }

  async history(id: string): Promise<ClaimState[]> {
    const claim = await this.get(id);
    return [...claim.stateHistory];
  }

  async list(): Promise<Claim[]> {
    return this.repository.list();
  }

  nextStates(claim: Claim): ClaimState[] {
    return this.stateMachine.nextStates(claim);
  }

  pendingInsertion(claim: Claim): PendingInsertion | undefined {
    return this.stateMachine.pendingInsertion(claim);
  }

  /**
   * Move the claim to `target` and run the state-entry hook. Only states the
   * machine currently accepts can be requested; insertions are the
   * monitor's business. A claim whose review has no decision yet cannot be
   * moved this way.
   */
  async transition(id: string, target: ClaimState, signal?: AbortSignal): Promise<TransitionOutcome> {
    return this.lock.runExclusive(id, async () => {
      const claim = await this.get(id);
      if (this.monitor.awaitingDecision(claim)) {
        throw new EvaluationPending(claim.id);
      }
      return this.apply(claim, target, signal);
    });
  }

  /**
   * Move the claim to whatever comes next on its path, a staged insertion
   * taking precedence over the static table. When the review of the current
   * state never reached a decision, finish that instead.
   */
  async advance(id: string, signal?: AbortSignal): Promise<TransitionOutcome> {
    return this.lock.runExclusive(id, async () => {
      const claim = await this.get(id);
      if (this.monitor.awaitingDecision(claim)) {
        return this.resumeReview(claim, signal);
      }
      if (isTerminal(claim.currentState)) {
        throw new TerminalStateError(claim.id, claim.currentState);
      }

      const [next] = this.stateMachine.nextStates(claim);
      if (next === undefined) {
        throw new InvalidTransition(claim.id, claim.currentState, claim.currentState, []);
      }
      return this.apply(claim, next, signal);
    });
  }

  /**
   * Operator clearance of an investigation: the claim resumes its path, the
   * advisory flag drops and the override is recorded.
   */
  async clear(id: string, operator: string, reason: string): Promise<TransitionOutcome> {
    return this.lock.runExclusive(id, async () => {
      const claim = await this.get(id);
      if (claim.currentState !== 'FRAUD_INVESTIGATION') {
        throw new NotUnderInvestigation(claim.id, claim.currentState);
      }

      const [resume] = this.stateMachine.nextStates(claim);
      if (resume === undefined) {
        throw new InvalidTransition(claim.id, claim.currentState, claim.currentState, []);
      }

      claim.requiresInvestigation = false;
      claim.humanOverride = true;
      appendAudit(claim, { actor: operator, decision: 'CLEARED', rationale: reason });
      this.logger.info(`Claim ${claim.id} cleared by ${operator}`);
      return this.apply(claim, resume, undefined);
    });
  }

  /** Add a damage photo or call transcript while the claim is still SUBMITTED. */
  async attachEvidence(id: string, input: unknown): Promise<Claim> {
    const evidence = parseEvidence(input);
    return this.lock.runExclusive(id, async () => {
      const claim = await this.get(id);
      if (claim.currentState !== 'SUBMITTED') {
        throw new EvidenceLocked(claim.id, claim.currentState);
      }

      claim.evidence = Object.freeze({ ...claim.evidence, ...evidence });
      claim.updatedAt = new Date();
      await this.repository.save(claim);
      this.logger.info(`Claim ${claim.id} evidence now [${Object.keys(claim.evidence).join(', ')}]`);
      return cloneClaim(claim);
    });
  }

  async summary(): Promise<ClaimSummaryRecord> {
    const claims = await this.repository.list();
    const stateCounts: Record<ClaimState, number> = {
      SUBMITTED: 0,
      UNDER_REVIEW: 0,
      ASSESSMENT: 0,
      FRAUD_INVESTIGATION: 0,
      FINAL_DECISION: 0,
    };
    for (const claim of claims) stateCounts[claim.currentState] += 1;

    return {
      totalClaims: claims.length,
      stateCounts,
      flaggedForInvestigation: claims.filter((c) => c.requiresInvestigation).length,
    };
  }

  private async apply(
    claim: Claim,
    target: ClaimState,
    signal: AbortSignal | undefined,
  ): Promise<TransitionOutcome> {
    const record = this.stateMachine.transition(claim, target);
    this.logger.info(`Claim ${claim.id} transitioned ${record.fromState} -> ${record.toState}`);
    // Applied transitions are never rolled back, so persist before the hook runs.
    await this.repository.save(claim);

    const outcome = await this.monitor.onStateEntered(claim, target, signal);
    if (outcome.transitions.length > 0 || outcome.decision) {
      await this.repository.save(claim);
    }

    return {
      claim: cloneClaim(claim),
      transitions: [record, ...outcome.transitions],
      decision: outcome.decision,
      nextStates: this.stateMachine.nextStates(claim),
    };
  }

  private async resumeReview(claim: Claim, signal: AbortSignal | undefined): Promise<TransitionOutcome> {
    this.logger.info(`Claim ${claim.id} resuming evaluation in ${claim.currentState}`);
    const outcome = await this.monitor.onStateEntered(claim, claim.currentState, signal);
    await this.repository.save(claim);

    return {
      claim: cloneClaim(claim),
      transitions: outcome.transitions,
      decision: outcome.decision,
      nextStates: this.stateMachine.nextStates(claim),
    };
  }
}
