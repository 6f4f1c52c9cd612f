import { describe, it, expect } from 'vitest';
import { claimToRow, rowToClaim } from '@db/claim-repository';
import type { ClaimRow } from '@db/schema/claims';
import { appendAudit } from '@core/claim';
import { makeClaim } from '../helpers';

describe('claim row mapping', () => {
  it('stores history and audit entries in their jsonb shape', () => {
    const claim = makeClaim({ requiresInvestigation: true, evidence: { photoBase64: 'aGk=' } });
    appendAudit(claim, { actor: 'vision', decision: 'SUSPICIOUS', rationale: 'rear damage', score: 8 }, new Date('2026-02-01T12:00:00Z'));

    const row = claimToRow(claim);

    expect(row.stateHistory).toEqual(['SUBMITTED']);
    expect(row.currentState).toBe('SUBMITTED');
    expect(row.evidence).toEqual({ photoBase64: 'aGk=' });
    expect(row.auditLog).toEqual([
      { actor: 'vision', decision: 'SUSPICIOUS', rationale: 'rear damage', score: 8, timestamp: '2026-02-01T12:00:00.000Z' },
    ]);
  });

  it('rebuilds the same claim from a stored row', () => {
    const claim = makeClaim();
    claim.stateHistory.push('UNDER_REVIEW', 'FRAUD_INVESTIGATION');
    claim.currentState = 'FRAUD_INVESTIGATION';
    claim.insertion = { newState: 'FRAUD_INVESTIGATION', beforeState: 'ASSESSMENT', entered: true };
    claim.humanOverride = true;
    const row: ClaimRow = claimToRow(claim);

    expect(row.insertion).toEqual({
      newState: 'FRAUD_INVESTIGATION',
      beforeState: 'ASSESSMENT',
      entered: true,
    });
    expect(rowToClaim(row)).toEqual(claim);
  });

  it('refuses rows with unknown states or a history that disagrees', () => {
    const base: ClaimRow = claimToRow(makeClaim());

    expect(() => rowToClaim({ ...base, currentState: 'ARCHIVED' })).toThrow();
    expect(() => rowToClaim({ ...base, stateHistory: [] })).toThrow();
    const unknownSlot = JSON.parse('{"newState":"ESCALATED","beforeState":"ASSESSMENT","entered":false}');
    expect(() => rowToClaim({ ...base, insertion: unknownSlot })).toThrow();
    expect(() => rowToClaim({ ...base, currentState: 'UNDER_REVIEW' })).toThrow(
      'stored history does not end in UNDER_REVIEW',
    );
  });
});
