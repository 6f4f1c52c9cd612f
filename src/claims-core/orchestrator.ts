import { z } from 'zod';
import { VERDICT_SCORE_RANGE } from '@shared/constants';
import type { Claim } from './claim';
import { AgentUnavailable, OrchestrationCancelled, OrchestrationInProgress } from './errors';
import { consoleLogger, type Logger } from './logger';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export const agentVerdictSchema = z.object({
  suspicious: z.boolean(),
  score: z.number().min(VERDICT_SCORE_RANGE.min).max(VERDICT_SCORE_RANGE.max),
  rationale: z.string(),
});

export type AgentVerdict = z.infer<typeof agentVerdictSchema>;

/**
 * Anything that can look at a claim and return a verdict. Implementations
 * should stop work when `signal` aborts.
 */
export interface ClaimAgent {
  readonly name: string;
  evaluate(claim: Claim, signal: AbortSignal): Promise<AgentVerdict>;
}

export interface CollectedVerdict extends AgentVerdict {
  agent: string;
  status: 'ok' | 'failed';
}

export interface RoutingDecision {
  claimId: string;
  needsInvestigation: boolean;
  /** One entry per agent, in registration order. */
  verdicts: CollectedVerdict[];
  failedAgents: string[];
}

export interface OrchestratorOptions {
  agentTimeoutMs?: number;
  logger?: Logger;
}

export const DEFAULT_AGENT_TIMEOUT_MS = 30_000;

// ---------------------------------------------------------------------------
// Decision rule
// ---------------------------------------------------------------------------

/**
 * Investigation triggers when the claim was flagged at creation or when any
 * agent that answered called it suspicious. A clean verdict never clears
 * the creation flag.
 */
export function decideInvestigation(
  requiresInvestigation: boolean,
  verdicts: readonly CollectedVerdict[],
): boolean {
  return requiresInvestigation || verdicts.some((v) => v.status === 'ok' && v.suspicious);
}

function failedVerdict(agent: string, cause: AgentUnavailable): CollectedVerdict {
  return {
    agent,
    status: 'failed',
    suspicious: false,
    score: 0,
    rationale: cause.message,
  };
}

// ---------------------------------------------------------------------------
// Orchestrator
// ---------------------------------------------------------------------------

export class ClaimOrchestrator {
  private readonly inFlight = new Set<string>();
  private readonly agentTimeoutMs: number;
  private readonly logger: Logger;

  constructor(
    private readonly agents: readonly ClaimAgent[],
    options: OrchestratorOptions = {},
  ) {
    this.agentTimeoutMs = options.agentTimeoutMs ?? DEFAULT_AGENT_TIMEOUT_MS;
    this.logger = options.logger ?? consoleLogger('ORCHESTRATOR');
  }

  get agentNames(): string[] {
    return this.agents.map((a) => a.name);
  }

  isEvaluating(claimId: string): boolean {
    return this.inFlight.has(claimId);
  }

  /**
   * Run every agent against the claim concurrently and fold the verdicts into
   * one routing decision. Only one evaluation per claim may be in flight.
   */
  async evaluate(claim: Claim, signal?: AbortSignal): Promise<RoutingDecision> {
    if (this.inFlight.has(claim.id)) {
      throw new OrchestrationInProgress(claim.id);
    }
    this.inFlight.add(claim.id);

    try {
      if (signal?.aborted) throw new OrchestrationCancelled(claim.id);

      this.logger.info(`Evaluating claim ${claim.id} with [${this.agentNames.join(', ')}]`);
      const verdicts = await Promise.all(
        this.agents.map((agent) => this.runAgent(agent, claim, signal)),
      );

      if (signal?.aborted) throw new OrchestrationCancelled(claim.id);

      const needsInvestigation = decideInvestigation(claim.requiresInvestigation, verdicts);
      const failedAgents = verdicts.filter((v) => v.status === 'failed').map((v) => v.agent);

      for (const v of verdicts) {
        this.logger.info(
          `  - ${v.agent}: status=${v.status} suspicious=${v.suspicious} score=${v.score} reason='${v.rationale}'`,
        );
      }
      this.logger.info(
        `Claim ${claim.id}: investigation required=${needsInvestigation}` +
          (failedAgents.length > 0 ? ` (failed: ${failedAgents.join(', ')})` : ''),
      );

      return { claimId: claim.id, needsInvestigation, verdicts, failedAgents };
    } finally {
      this.inFlight.delete(claim.id);
    }
  }

  private async runAgent(
    agent: ClaimAgent,
    claim: Claim,
    parent: AbortSignal | undefined,
  ): Promise<CollectedVerdict> {
    const controller = new AbortController();
    const aborted = new Promise<never>((_, reject) => {
      controller.signal.addEventListener('abort', () => reject(controller.signal.reason), {
        once: true,
      });
    });

    const timer = setTimeout(() => {
      controller.abort(
        new AgentUnavailable(agent.name, `timed out after ${this.agentTimeoutMs} ms`),
      );
    }, this.agentTimeoutMs);
    const onParentAbort = () =>
      controller.abort(new AgentUnavailable(agent.name, 'evaluation cancelled'));
    if (parent?.aborted) onParentAbort();
    else parent?.addEventListener('abort', onParentAbort, { once: true });

    try {
      const raw: unknown = await Promise.race([
        agent.evaluate(claim, controller.signal),
        aborted,
      ]);
      const parsed = agentVerdictSchema.safeParse(raw);
      if (!parsed.success) {
        throw new AgentUnavailable(
          agent.name,
          `malformed verdict (${parsed.error.issues.map((i) => i.path.join('.') || i.message).join(', ')})`,
        );
      }
      return { agent: agent.name, status: 'ok', ...parsed.data };
    } catch (err) {
      const cause =
        err instanceof AgentUnavailable
          ? err
          : new AgentUnavailable(agent.name, err instanceof Error ? err.message : String(err));
      this.logger.warn(cause.message);
      return failedVerdict(agent.name, cause);
    } finally {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    }
  }
}
