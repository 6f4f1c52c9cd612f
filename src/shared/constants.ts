export const API_PREFIX = '/api';

export const CLAIM_STATES = [
  'SUBMITTED',
  'UNDER_REVIEW',
  'ASSESSMENT',
  'FRAUD_INVESTIGATION',
  'FINAL_DECISION',
] as const;

export const STORAGE_BACKENDS = ['memory', 'postgres'] as const;

export const ERROR_CODES = [
  'INVALID_TRANSITION',
  'TERMINAL_STATE',
  'INSERTION_CONFLICT',
  'INVALID_INSERTION',
  'ORCHESTRATION_IN_PROGRESS',
  'ORCHESTRATION_CANCELLED',
  'AGENT_UNAVAILABLE',
  'EVALUATION_PENDING',
  'NOT_UNDER_INVESTIGATION',
  'EVIDENCE_LOCKED',
  'CLAIM_NOT_FOUND',
  'VALIDATION_FAILED',
] as const;

/** Text-agent inconsistency score at or above which a claim is suspicious. */
export const TEXT_INCONSISTENCY_THRESHOLD = 5;

export const VERDICT_SCORE_RANGE = { min: 0, max: 10 } as const;
