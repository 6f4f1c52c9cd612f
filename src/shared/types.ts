import type { CLAIM_STATES, ERROR_CODES, STORAGE_BACKENDS } from './constants';

export type ClaimState = (typeof CLAIM_STATES)[number];
export type ErrorCode = (typeof ERROR_CODES)[number];
export type StorageBackend = (typeof STORAGE_BACKENDS)[number];

export interface ClaimEvidence {
  photoBase64?: string;
  callLog?: string;
}

/**
 * An insertion staged on, or being taken by, a single claim. `entered` flips
 * once the claim reaches `newState`; from then on `beforeState` is its only
 * way forward.
 */
export interface ClaimInsertion {
  newState: ClaimState;
  beforeState: ClaimState;
  entered: boolean;
}

export interface AuditEntry {
  actor: string;
  decision: string;
  rationale: string;
  score?: number;
  timestamp: string;
}

export interface ClaimRecord {
  id: string;
  claimantName: string;
  amount: number;
  description: string;
  evidence: ClaimEvidence;
  requiresInvestigation: boolean;
  humanOverride: boolean;
  currentState: ClaimState;
  stateHistory: ClaimState[];
  insertion: ClaimInsertion | null;
  auditLog: AuditEntry[];
  createdAt: string;
  updatedAt: string;
}

export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  code?: ErrorCode;
}

export interface ClaimSummaryRecord {
  totalClaims: number;
  stateCounts: Record<ClaimState, number>;
  flaggedForInvestigation: number;
}
