import { asc, eq } from 'drizzle-orm';
import { z } from 'zod';
import { CLAIM_STATES } from '@shared/constants';
import type { Claim } from '@core/claim';
import type { ClaimRepository } from '@core/repository';
import type { Database } from './connection';
import { claims, type ClaimRow } from './schema/claims';

const stateSchema = z.enum(CLAIM_STATES);
const historySchema = z.array(stateSchema).min(1);
const insertionSchema = z
  .object({ newState: stateSchema, beforeState: stateSchema, entered: z.boolean() })
  .nullable();
const uuidSchema = z.string().uuid();

// ---------------------------------------------------------------------------
// Row mapping
// ---------------------------------------------------------------------------

export function claimToRow(claim: Claim): ClaimRow {
  return {
    id: claim.id,
    claimantName: claim.claimantName,
    amount: claim.amount,
    description: claim.description,
    evidence: { ...claim.evidence },
    requiresInvestigation: claim.requiresInvestigation,
    humanOverride: claim.humanOverride,
    currentState: claim.currentState,
    stateHistory: [...claim.stateHistory],
    insertion: claim.insertion ? { ...claim.insertion } : null,
    auditLog: claim.auditLog.map((e) => ({ ...e, timestamp: e.timestamp.toISOString() })),
    createdAt: claim.createdAt,
    updatedAt: claim.updatedAt,
  };
}

/**
 * Rebuild a claim from its row. State values are checked, since the column
 * is plain text.
 */
export function rowToClaim(row: ClaimRow): Claim {
  const currentState = stateSchema.parse(row.currentState);
  const stateHistory = historySchema.parse(row.stateHistory);
  if (stateHistory[stateHistory.length - 1] !== currentState) {
    throw new Error(`Claim ${row.id}: stored history does not end in ${currentState}`);
  }

  return {
    id: row.id,
    claimantName: row.claimantName,
    amount: row.amount,
    description: row.description,
    evidence: Object.freeze({ ...row.evidence }),
    requiresInvestigation: row.requiresInvestigation,
    humanOverride: row.humanOverride,
    currentState,
    stateHistory,
    insertion: insertionSchema.parse(row.insertion),
    auditLog: row.auditLog.map((e) => ({ ...e, timestamp: new Date(e.timestamp) })),
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

// ---------------------------------------------------------------------------
// Repository
// ---------------------------------------------------------------------------

export class DrizzleClaimRepository implements ClaimRepository {
  constructor(private readonly db: Database) {}

  async findById(id: string): Promise<Claim | undefined> {
    if (!uuidSchema.safeParse(id).success) return undefined;
    const [row] = await this.db.select().from(claims).where(eq(claims.id, id));
    return row ? rowToClaim(row) : undefined;
  }

  async save(claim: Claim): Promise<void> {
    const row = claimToRow(claim);
    await this.db
      .insert(claims)
      .values(row)
      .onConflictDoUpdate({
        target: claims.id,
        set: {
          evidence: row.evidence,
          requiresInvestigation: row.requiresInvestigation,
          humanOverride: row.humanOverride,
          currentState: row.currentState,
          stateHistory: row.stateHistory,
          insertion: row.insertion,
          auditLog: row.auditLog,
          updatedAt: row.updatedAt,
        },
      });
  }

  async list(): Promise<Claim[]> {
    const rows = await this.db.select().from(claims).orderBy(asc(claims.createdAt));
    return rows.map(rowToClaim);
  }
}
