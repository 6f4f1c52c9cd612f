import type { Claim } from './claim';
import {
  allowedNext,
  forwardPath,
  isTerminal,
  type ClaimState,
} from './state-model';
import {
  InsertionConflict,
  InvalidInsertion,
  InvalidTransition,
  TerminalStateError,
} from './errors';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface PendingInsertion {
  newState: ClaimState;
  beforeState: ClaimState;
}

export interface TransitionRecord {
  claimId: string;
  fromState: ClaimState;
  toState: ClaimState;
  /** True when `toState` was reached through a staged insertion. */
  inserted: boolean;
}

// ---------------------------------------------------------------------------
// State Machine
// ---------------------------------------------------------------------------

/**
 * Applies transitions against the shared static table plus the claim's own
 * `insertion` slot:
 *
 * - staged (`entered: false`): set by `insertState`, not yet taken.
 * - entered: the claim sits in the inserted state and must resume to
 *   `beforeState` when it leaves it.
 *
 * The slot travels with the claim record, so any engine reading the claim
 * back from storage routes it the same way. `TRANSITION_TABLE` is never
 * touched.
 */
export class ClaimStateMachine {
  /**
   * States a `transition` call would currently accept for this claim.
   */
  nextStates(claim: Claim): ClaimState[] {
    const { currentState, insertion } = claim;
    if (isTerminal(currentState)) return [];

    if (insertion?.entered && insertion.newState === currentState) {
      return [insertion.beforeState];
    }

    const staticNext = [...allowedNext(currentState)];
    if (!insertion || insertion.entered) return staticNext;

    return [insertion.newState, ...staticNext.filter((s) => s !== insertion.beforeState)];
  }

  pendingInsertion(claim: Claim): PendingInsertion | undefined {
    const slot = claim.insertion;
    return slot && !slot.entered
      ? { newState: slot.newState, beforeState: slot.beforeState }
      : undefined;
  }

  transition(claim: Claim, target: ClaimState, now: Date = new Date()): TransitionRecord {
    const fromState = claim.currentState;
    if (isTerminal(fromState)) {
      throw new TerminalStateError(claim.id, fromState);
    }

    const allowed = this.nextStates(claim);
    if (target === fromState || !allowed.includes(target)) {
      throw new InvalidTransition(claim.id, fromState, target, allowed);
    }

    const slot = claim.insertion;
    const inserted = slot !== null && !slot.entered && slot.newState === target;

    // All checks passed; from here on the claim is mutated.
    if (slot && inserted) {
      claim.insertion = { ...slot, entered: true };
    } else if (slot?.entered && slot.newState === fromState) {
      claim.insertion = null;
    }

    claim.stateHistory.push(target);
    claim.currentState = target;
    claim.updatedAt = now;

    return { claimId: claim.id, fromState, toState: target, inserted };
  }

  /**
   * Stage `newState` so that the claim passes through it before reaching
   * `beforeState`. At most one insertion may be pending per claim.
   */
  insertState(claim: Claim, newState: ClaimState, beforeState: ClaimState): PendingInsertion {
    const { id, currentState, stateHistory, insertion } = claim;
    if (isTerminal(currentState)) {
      throw new TerminalStateError(id, currentState);
    }

    if (insertion && !insertion.entered) {
      throw new InsertionConflict(id, insertion.newState, newState);
    }

    if (newState === currentState || stateHistory.includes(newState)) {
      throw new InvalidInsertion(id, newState, 'state already appears in the claim history');
    }
    if (newState === beforeState) {
      throw new InvalidInsertion(id, newState, 'a state cannot be inserted before itself');
    }
    if (isTerminal(newState)) {
      throw new InvalidInsertion(id, newState, 'the terminal state cannot be inserted');
    }
    if (!allowedNext(currentState).has(beforeState)) {
      throw new InvalidInsertion(
        id,
        newState,
        `${beforeState} is not the next step from ${currentState}`,
      );
    }
    if (forwardPath(beforeState).includes(newState)) {
      throw new InvalidInsertion(id, newState, `state is still ahead on the path from ${beforeState}`);
    }

    claim.insertion = { newState, beforeState, entered: false };
    return { newState, beforeState };
  }
}
