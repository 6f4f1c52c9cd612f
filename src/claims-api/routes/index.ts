import { Router } from 'express';
import type { ClaimEngine } from '@core/engine';
import healthRouter from './health';
import { createClaimsRouter } from './claims';

export function createApiRouter(engine: ClaimEngine): Router {
  const router = Router();
  router.use(healthRouter);
  router.use(createClaimsRouter(engine));
  return router;
}
