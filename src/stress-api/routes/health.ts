import { Router } from 'express';
import type { HealthRecord } from '@shared/types';
import type { DislocationSolver } from '@core/stress-field';

export function createHealthRouter(deps: { solver: DislocationSolver | null }): Router {
  const router = Router();

  router.get('/health', (_req, res) => {
    const data: HealthRecord = {
      status: 'ok',
      solverLoaded: deps.solver !== null,
      timestamp: new Date().toISOString(),
    };
    res.json({ success: true, data });
  });

  return router;
}
