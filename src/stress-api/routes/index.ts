import { Router } from 'express';
import { createHealthRouter } from './health';
import { createRunsRouter, type RunsRouterDeps } from './runs';
import { createRupturesRouter } from './ruptures';

export type ApiDependencies = RunsRouterDeps;

export function createApiRouter(deps: ApiDependencies): Router {
  const router = Router();
  router.use(createHealthRouter(deps));
  router.use('/runs', createRunsRouter(deps));
  router.use('/ruptures', createRupturesRouter(deps));
  return router;
}
