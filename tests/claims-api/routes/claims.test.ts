import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { createClaimsRouter, toClaimRecord } from '../../../src/claims-api/routes/claims';
import { createClaimWorkflow } from '@core/index';
import { MemoryClaimRepository } from '@core/repository';
import { silentLogger } from '@core/logger';
import { appendAudit } from '@core/claim';
import { makeClaim } from '../../helpers';

const routeLayerSchema = z.object({
  route: z.object({ path: z.string(), methods: z.record(z.boolean()) }),
});

function routePaths(router: ReturnType<typeof createClaimsRouter>): string[] {
  const stack: unknown[] = router.stack;
  return stack.flatMap((layer) => {
    const parsed = routeLayerSchema.safeParse(layer);
    if (!parsed.success) return [];
    const { path, methods } = parsed.data.route;
    return Object.keys(methods).map((m) => `${m.toUpperCase()} ${path}`);
  });
}

describe('claims router', () => {
  const { engine } = createClaimWorkflow({
    agents: [],
    repository: new MemoryClaimRepository(),
    logger: () => silentLogger,
  });

  it('registers the claim endpoints, summary before :id', () => {
    const paths = routePaths(createClaimsRouter(engine));
    expect(paths).toEqual([
      'GET /claims',
      'GET /claims/summary',
      'POST /claims',
      'GET /claims/:id',
      'GET /claims/:id/history',
      'POST /claims/:id/evidence',
      'POST /claims/:id/transition',
      'POST /claims/:id/advance',
      'POST /claims/:id/approve',
    ]);
  });
});

describe('toClaimRecord', () => {
  it('serializes dates as ISO strings and keeps history order', () => {
    const claim = makeClaim({ evidence: { callLog: 'hello' } });
    claim.stateHistory.push('UNDER_REVIEW');
    claim.currentState = 'UNDER_REVIEW';
    appendAudit(claim, { actor: 'text', decision: 'CLEAR', rationale: 'fine' }, new Date('2026-03-01T00:00:00Z'));

    const record = toClaimRecord(claim);

    expect(record.stateHistory).toEqual(['SUBMITTED', 'UNDER_REVIEW']);
    expect(record.insertion).toBeNull();
    expect(record.humanOverride).toBe(false);
    expect(record.evidence).toEqual({ callLog: 'hello' });
    expect(record.auditLog).toEqual([
      { actor: 'text', decision: 'CLEAR', rationale: 'fine', timestamp: '2026-03-01T00:00:00.000Z' },
    ]);
    expect(record.createdAt).toBe(claim.createdAt.toISOString());
    expect(JSON.parse(JSON.stringify(record))).toEqual(record);
  });
});
