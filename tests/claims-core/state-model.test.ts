import { describe, it, expect } from 'vitest';
import { CLAIM_STATES } from '@shared/constants';
import {
  TRANSITION_TABLE,
  allowedNext,
  forwardPath,
  isClaimState,
  isTerminal,
} from '@core/state-model';

describe('TRANSITION_TABLE', () => {
  it('has an entry for every claim state', () => {
    for (const state of CLAIM_STATES) {
      expect(TRANSITION_TABLE).toHaveProperty(state);
    }
  });

  it('never names FRAUD_INVESTIGATION as a target', () => {
    for (const targets of Object.values(TRANSITION_TABLE)) {
      expect(targets).not.toContain('FRAUD_INVESTIGATION');
    }
  });

  it('is frozen', () => {
    expect(Object.isFrozen(TRANSITION_TABLE)).toBe(true);
    expect(Object.isFrozen(TRANSITION_TABLE.SUBMITTED)).toBe(true);
  });
});

describe('allowedNext', () => {
  it('follows SUBMITTED -> UNDER_REVIEW -> ASSESSMENT -> FINAL_DECISION', () => {
    expect([...allowedNext('SUBMITTED')]).toEqual(['UNDER_REVIEW']);
    expect([...allowedNext('UNDER_REVIEW')]).toEqual(['ASSESSMENT']);
    expect([...allowedNext('ASSESSMENT')]).toEqual(['FINAL_DECISION']);
  });

  it('returns the empty set for FINAL_DECISION and FRAUD_INVESTIGATION', () => {
    expect(allowedNext('FINAL_DECISION').size).toBe(0);
    expect(allowedNext('FRAUD_INVESTIGATION').size).toBe(0);
  });
});

describe('forwardPath', () => {
  it('lists the static chain starting at the given state', () => {
    expect(forwardPath('UNDER_REVIEW')).toEqual(['UNDER_REVIEW', 'ASSESSMENT', 'FINAL_DECISION']);
    expect(forwardPath('FINAL_DECISION')).toEqual(['FINAL_DECISION']);
  });
});

describe('isClaimState / isTerminal', () => {
  it('accepts exact state names only', () => {
    expect(isClaimState('ASSESSMENT')).toBe(true);
    expect(isClaimState('assessment')).toBe(false);
    expect(isClaimState(42)).toBe(false);
  });

  it('treats only FINAL_DECISION as terminal', () => {
    expect(isTerminal('FINAL_DECISION')).toBe(true);
    expect(isTerminal('ASSESSMENT')).toBe(false);
  });
});
