import { Router, type NextFunction, type Request, type Response } from 'express';
import { z } from 'zod';
import { CLAIM_STATES } from '@shared/constants';
import type { ApiResponse, ClaimRecord } from '@shared/types';
import type { Claim } from '@core/claim';
import type { ClaimEngine, TransitionOutcome } from '@core/engine';
import { ClaimValidationError } from '@core/errors';

type AsyncRoute = (req: Request, res: Response) => Promise<void>;

function route(fn: AsyncRoute) {
  return (req: Request, res: Response, next: NextFunction) => {
    fn(req, res).catch(next);
  };
}

function send<T>(res: Response, data: T, status = 200): void {
  const response: ApiResponse<T> = { success: true, data };
  res.status(status).json(response);
}

/** Aborts when the client goes away before the response is written. */
function disconnectSignal(res: Response): AbortSignal {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableEnded) controller.abort();
  });
  return controller.signal;
}

export function toClaimRecord(claim: Claim): ClaimRecord {
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
    createdAt: claim.createdAt.toISOString(),
    updatedAt: claim.updatedAt.toISOString(),
  };
}

const transitionBodySchema = z.object({
  targetState: z.enum(CLAIM_STATES),
});

const clearanceBodySchema = z.object({
  operator: z.string().trim().min(1),
  reason: z.string().trim().min(1),
});

function outcomeData(outcome: TransitionOutcome) {
  return {
    claim: toClaimRecord(outcome.claim),
    transitions: outcome.transitions,
    decision: outcome.decision ?? null,
    nextStates: outcome.nextStates,
  };
}

export function createClaimsRouter(engine: ClaimEngine): Router {
  const router = Router();

  // List all claims
  router.get(
    '/claims',
    route(async (_req, res) => {
      const claims = await engine.list();
      send(res, claims.map(toClaimRecord));
    }),
  );

  // Counts per state, for dashboards
  router.get(
    '/claims/summary',
    route(async (_req, res) => {
      send(res, await engine.summary());
    }),
  );

  // Create a claim (starts in SUBMITTED)
  router.post(
    '/claims',
    route(async (req, res) => {
      const claim = await engine.create(req.body);
      send(res, { claim: toClaimRecord(claim), nextStates: engine.nextStates(claim) }, 201);
    }),
  );

  router.get(
    '/claims/:id',
    route(async (req, res) => {
      const claim = await engine.get(req.params.id);
      send(res, { claim: toClaimRecord(claim), nextStates: engine.nextStates(claim) });
    }),
  );

  router.get(
    '/claims/:id/history',
    route(async (req, res) => {
      const claim = await engine.get(req.params.id);
      send(res, {
        claimId: claim.id,
        currentState: claim.currentState,
        stateHistory: claim.stateHistory,
        pendingInsertion: engine.pendingInsertion(claim) ?? null,
      });
    }),
  );

  // Attach a damage photo or call transcript before review starts
  router.post(
    '/claims/:id/evidence',
    route(async (req, res) => {
      const claim = await engine.attachEvidence(req.params.id, req.body);
      send(res, { claim: toClaimRecord(claim), nextStates: engine.nextStates(claim) });
    }),
  );

  // Move to a specific state the machine currently allows
  router.post(
    '/claims/:id/transition',
    route(async (req, res) => {
      const parsed = transitionBodySchema.safeParse(req.body);
      if (!parsed.success) {
        throw new ClaimValidationError([
          `targetState must be one of ${CLAIM_STATES.join(', ')}`,
        ]);
      }

      const outcome = await engine.transition(
        req.params.id,
        parsed.data.targetState,
        disconnectSignal(res),
      );
      send(res, outcomeData(outcome));
    }),
  );

  // Move to whatever comes next on the claim's path
  router.post(
    '/claims/:id/advance',
    route(async (req, res) => {
      const outcome = await engine.advance(req.params.id, disconnectSignal(res));
      send(res, outcomeData(outcome));
    }),
  );

  // Operator clears an investigation and the claim resumes to assessment
  router.post(
    '/claims/:id/approve',
    route(async (req, res) => {
      const parsed = clearanceBodySchema.safeParse(req.body);
      if (!parsed.success) {
        throw new ClaimValidationError(['operator and reason are required']);
      }

      const outcome = await engine.clear(req.params.id, parsed.data.operator, parsed.data.reason);
      send(res, outcomeData(outcome));
    }),
  );

  return router;
}
