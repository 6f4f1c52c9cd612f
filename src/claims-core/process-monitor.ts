import { appendAudit, type Claim } from './claim';
import type { ClaimOrchestrator, RoutingDecision } from './orchestrator';
import type { ClaimStateMachine, TransitionRecord } from './state-machine';
import type { ClaimState } from './state-model';
import { consoleLogger, type Logger } from './logger';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface MonitorOutcome {
  /** Set when an orchestration ran as part of this state entry. */
  decision?: RoutingDecision;
  /** Transitions the handlers applied themselves, in order. */
  transitions: TransitionRecord[];
}

export type StateEntryHandler = (
  claim: Claim,
  signal: AbortSignal | undefined,
) => Promise<MonitorOutcome>;

const EMPTY_OUTCOME = (): MonitorOutcome => ({ transitions: [] });

/** Audit actor under which the routing decision is recorded. */
export const ROUTING_ACTOR = 'orchestrator';

// ---------------------------------------------------------------------------
// Process Monitor
// ---------------------------------------------------------------------------

/**
 * Reacts to a claim entering a state. Whoever applies a transition calls
 * `onStateEntered` right after it succeeds.
 *
 * The default UNDER_REVIEW handler is the only place in the engine that
 * stages an insertion on the state machine.
 */
export class ProcessMonitor {
  private readonly handlers = new Map<ClaimState, StateEntryHandler[]>();
  private readonly logger: Logger;

  constructor(
    private readonly stateMachine: ClaimStateMachine,
    private readonly orchestrator: ClaimOrchestrator,
    logger?: Logger,
  ) {
    this.logger = logger ?? consoleLogger('MONITOR');
    this.register('UNDER_REVIEW', (claim, signal) => this.onUnderReview(claim, signal));
  }

  register(state: ClaimState, handler: StateEntryHandler): void {
    const list = this.handlers.get(state) ?? [];
    list.push(handler);
    this.handlers.set(state, list);
  }

  /**
   * True while the claim sits in UNDER_REVIEW without a recorded routing
   * decision, e.g. after the evaluation was cancelled or failed.
   */
  awaitingDecision(claim: Claim): boolean {
    return (
      claim.currentState === 'UNDER_REVIEW' &&
      !claim.auditLog.some((e) => e.actor === ROUTING_ACTOR)
    );
  }

  /**
   * Run every handler registered for `state`, in registration order. A
   * handler that moves the claim on stops later handlers for the old state.
   */
  async onStateEntered(
    claim: Claim,
    state: ClaimState,
    signal?: AbortSignal,
  ): Promise<MonitorOutcome> {
    const outcome = EMPTY_OUTCOME();

    for (const handler of this.handlers.get(state) ?? []) {
      if (claim.currentState !== state) break;
      const result = await handler(claim, signal);
      if (result.decision) outcome.decision = result.decision;
      outcome.transitions.push(...result.transitions);
    }

    return outcome;
  }

  private async onUnderReview(
    claim: Claim,
    signal: AbortSignal | undefined,
  ): Promise<MonitorOutcome> {
    this.logger.info(`Claim ${claim.id} entered UNDER_REVIEW - triggering agent evaluation`);
    const decision = await this.orchestrator.evaluate(claim, signal);
    const flaggedAtCreation = claim.requiresInvestigation;
    const transitions: TransitionRecord[] = [];

    if (decision.needsInvestigation) {
      this.logger.info(`Claim ${claim.id} flagged - inserting FRAUD_INVESTIGATION before ASSESSMENT`);
      this.stateMachine.insertState(claim, 'FRAUD_INVESTIGATION', 'ASSESSMENT');
      transitions.push(this.stateMachine.transition(claim, 'FRAUD_INVESTIGATION'));
      claim.requiresInvestigation = true;
    } else {
      this.logger.info(`Claim ${claim.id} passed evaluation - no investigation needed`);
    }

    for (const v of decision.verdicts) {
      appendAudit(claim, {
        actor: v.agent,
        decision: v.status === 'failed' ? 'UNAVAILABLE' : v.suspicious ? 'SUSPICIOUS' : 'CLEAR',
        rationale: v.rationale,
        score: v.score,
      });
    }
    appendAudit(
      claim,
      decision.needsInvestigation
        ? {
            actor: ROUTING_ACTOR,
            decision: 'INVESTIGATE',
            rationale: investigationReason(flaggedAtCreation, decision),
          }
        : {
            actor: ROUTING_ACTOR,
            decision: 'PROCEED',
            rationale: 'No source flagged the claim for investigation',
          },
    );

    return { decision, transitions };
  }
}

function investigationReason(flaggedAtCreation: boolean, decision: RoutingDecision): string {
  const sources: string[] = [];
  if (flaggedAtCreation) sources.push('claim flagged at creation');
  const flaggedBy = decision.verdicts
    .filter((v) => v.status === 'ok' && v.suspicious)
    .map((v) => v.agent);
  if (flaggedBy.length > 0) sources.push(`suspicious: ${flaggedBy.join(', ')}`);
  return `Investigation required (${sources.join('; ')})`;
}
