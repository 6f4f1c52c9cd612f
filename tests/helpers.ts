import { createClaim, type Claim, type ClaimFields } from '@core/claim';
import type { AgentVerdict, ClaimAgent } from '@core/orchestrator';

export function makeClaim(overrides: Partial<ClaimFields> = {}): Claim {
  return createClaim({
    claimantName: 'Jane Doe',
    amount: 1200,
    description: 'Rear bumper dented in a parking lot',
    ...overrides,
  });
}

export const clean: AgentVerdict = { suspicious: false, score: 1, rationale: 'Looks consistent' };
export const flagged: AgentVerdict = { suspicious: true, score: 8, rationale: 'Damage does not match' };

/** Agent that answers with a fixed verdict, optionally after a delay. */
export function fixedAgent(name: string, verdict: AgentVerdict, delayMs = 0): ClaimAgent {
  return {
    name,
    evaluate: () =>
      new Promise((resolve) => {
        setTimeout(() => resolve(verdict), delayMs);
      }),
  };
}

/** Agent that never answers and ignores cancellation. */
export function hangingAgent(name: string): ClaimAgent {
  return {
    name,
    evaluate: () => new Promise<AgentVerdict>(() => {}),
  };
}

export function failingAgent(name: string, message: string): ClaimAgent {
  return {
    name,
    evaluate: async () => {
      throw new Error(message);
    },
  };
}
