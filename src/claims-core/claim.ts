import { randomUUID } from 'crypto';
import { z } from 'zod';
import type { ClaimEvidence, ClaimInsertion } from '@shared/types';
import { INITIAL_STATE, type ClaimState } from './state-model';
import { ClaimValidationError } from './errors';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface AuditEntry {
  actor: string;
  decision: string;
  rationale: string;
  score?: number;
  timestamp: Date;
}

/**
 * A claim flowing through the workflow. Business fields are fixed at
 * creation and evidence once the claim leaves SUBMITTED. Only the state
 * machine moves `currentState`, `stateHistory` and `insertion`.
 */
export interface Claim {
  readonly id: string;
  readonly claimantName: string;
  readonly amount: number;
  readonly description: string;
  evidence: Readonly<ClaimEvidence>;
  requiresInvestigation: boolean;
  /** Set when an operator cleared the claim out of an investigation. */
  humanOverride: boolean;
  currentState: ClaimState;
  stateHistory: ClaimState[];
  insertion: ClaimInsertion | null;
  auditLog: AuditEntry[];
  readonly createdAt: Date;
  updatedAt: Date;
}

const evidenceSchema = z.object({
  photoBase64: z.string().min(1).optional(),
  callLog: z.string().min(1).optional(),
});

export const claimFieldsSchema = z.object({
  claimantName: z.string().trim().min(1, 'claimantName is required'),
  amount: z.number().positive('amount must be greater than 0'),
  description: z.string().trim().min(1, 'description is required'),
  requiresInvestigation: z.boolean().default(false),
  evidence: evidenceSchema.default({}),
});

export type ClaimFields = z.input<typeof claimFieldsSchema>;

const attachedEvidenceSchema = evidenceSchema.refine(
  (e) => e.photoBase64 !== undefined || e.callLog !== undefined,
  'provide photoBase64 or callLog',
);

function issuesOf(error: z.ZodError): string[] {
  return error.issues.map((i) => `${i.path.join('.') || 'body'}: ${i.message}`);
}

// ---------------------------------------------------------------------------
// Construction
// ---------------------------------------------------------------------------

export function createClaim(fields: unknown, now: Date = new Date()): Claim {
  const parsed = claimFieldsSchema.safeParse(fields);
  if (!parsed.success) {
    throw new ClaimValidationError(issuesOf(parsed.error));
  }

  const { claimantName, amount, description, requiresInvestigation, evidence } = parsed.data;
  return {
    id: randomUUID(),
    claimantName,
    amount,
    description,
    evidence: Object.freeze({ ...evidence }),
    requiresInvestigation,
    humanOverride: false,
    currentState: INITIAL_STATE,
    stateHistory: [INITIAL_STATE],
    insertion: null,
    auditLog: [],
    createdAt: now,
    updatedAt: now,
  };
}

/** Validate evidence sent after creation; at least one item is required. */
export function parseEvidence(input: unknown): ClaimEvidence {
  const parsed = attachedEvidenceSchema.safeParse(input);
  if (!parsed.success) {
    throw new ClaimValidationError(issuesOf(parsed.error));
  }
  return parsed.data;
}

export function appendAudit(
  claim: Claim,
  entry: Omit<AuditEntry, 'timestamp'>,
  now: Date = new Date(),
): void {
  claim.auditLog.push({ ...entry, timestamp: now });
  claim.updatedAt = now;
}

/**
 * Deep copy, so that records handed out by a repository cannot be used to
 * mutate the stored claim.
 */
export function cloneClaim(claim: Claim): Claim {
  return {
    ...claim,
    evidence: Object.freeze({ ...claim.evidence }),
    stateHistory: [...claim.stateHistory],
    insertion: claim.insertion ? { ...claim.insertion } : null,
    auditLog: claim.auditLog.map((e) => ({ ...e, timestamp: new Date(e.timestamp) })),
    createdAt: new Date(claim.createdAt),
    updatedAt: new Date(claim.updatedAt),
  };
}
