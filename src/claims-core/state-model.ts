import { CLAIM_STATES } from '@shared/constants';
import type { ClaimState } from '@shared/types';

export type { ClaimState };

export const INITIAL_STATE: ClaimState = 'SUBMITTED';
export const TERMINAL_STATE: ClaimState = 'FINAL_DECISION';

// ---------------------------------------------------------------------------
// Transition Table  (shared by every claim, never mutated)
// ---------------------------------------------------------------------------

/**
 * FRAUD_INVESTIGATION has no entry on either side: a claim only reaches it
 * through a per-claim insertion held by the state machine.
 */
export const TRANSITION_TABLE: Readonly<Record<ClaimState, readonly ClaimState[]>> =
  Object.freeze({
    SUBMITTED: Object.freeze(['UNDER_REVIEW'] as const),
    UNDER_REVIEW: Object.freeze(['ASSESSMENT'] as const),
    ASSESSMENT: Object.freeze(['FINAL_DECISION'] as const),
    FRAUD_INVESTIGATION: Object.freeze([] as const),
    FINAL_DECISION: Object.freeze([] as const),
  });

export function isClaimState(value: unknown): value is ClaimState {
  return typeof value === 'string' && CLAIM_STATES.some((s) => s === value);
}

export function isTerminal(state: ClaimState): boolean {
  return state === TERMINAL_STATE;
}

/**
 * Statically permitted successors of `state`.
 */
export function allowedNext(state: ClaimState): ReadonlySet<ClaimState> {
  return new Set(TRANSITION_TABLE[state]);
}

/**
 * The chain of states reachable from `state` by following the static table,
 * starting with `state` itself.
 */
export function forwardPath(state: ClaimState): ClaimState[] {
  const path: ClaimState[] = [state];
  const seen = new Set<ClaimState>(path);
  let frontier: readonly ClaimState[] = TRANSITION_TABLE[state];

  while (frontier.length > 0) {
    const next: ClaimState[] = [];
    for (const s of frontier) {
      if (seen.has(s)) continue;
      seen.add(s);
      path.push(s);
      next.push(...TRANSITION_TABLE[s]);
    }
    frontier = next;
  }

  return path;
}
