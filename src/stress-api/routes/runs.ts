import { Router } from 'express';
import { z } from 'zod';
import { modelQuake, type ModelDependencies } from '@core/model-run';
import { validateRunParameters } from '@core/run-parameters';
import type { DislocationSolver } from '@core/stress-field';
import type { RunStore } from '@db/run-store';
import type { RunListItemRecord } from '@shared/types';

export interface RunsRouterDeps extends Omit<ModelDependencies, 'solver'> {
  runStore: RunStore;
  solver: DislocationSolver | null;
}

const runIdSchema = z.string().uuid();

export function createRunsRouter(deps: RunsRouterDeps): Router {
  const router = Router();

  // POST /runs -- validate, run the model synchronously, store the outcome
  router.post('/', async (req, res, next) => {
    const validation = validateRunParameters(req.body);
    if (!validation.success) {
      return res.status(400).json({ success: false, error: validation.error });
    }
    const { solver } = deps;
    if (!solver) {
      return res
        .status(503)
        .json({ success: false, error: 'No dislocation solver is configured' });
    }
    const parameters = validation.data;

    try {
      const output = await modelQuake(req.body, {
        ruptureSource: deps.ruptureSource,
        catalogSource: deps.catalogSource,
        solver,
        visualizer: deps.visualizer,
      }).catch(async (err: unknown) => {
        const message = err instanceof Error ? err.message : String(err);
        console.error(`[MODEL] Run for ${parameters.ruptureSource} failed: ${message}`);
        await deps.runStore.create({
          ruptureSource: parameters.ruptureSource,
          parameters,
          status: 'failed',
          error: message,
        });
        throw err;
      });

      const run = await deps.runStore.create({
        ruptureSource: parameters.ruptureSource,
        parameters,
        status: 'completed',
        result: output.result,
        image: output.image,
      });
      res.status(201).json({ success: true, data: { run } });
    } catch (err) {
      next(err);
    }
  });

  // GET /runs -- list runs, newest first
  router.get('/', async (_req, res, next) => {
    try {
      const rows = await deps.runStore.list();
      const data: RunListItemRecord[] = rows.map((row) => ({
        id: row.id,
        ruptureSource: row.ruptureSource,
        status: row.status,
        error: row.error,
        createdAt: row.createdAt.toISOString(),
      }));
      res.json({ success: true, data });
    } catch (err) {
      next(err);
    }
  });

  // GET /runs/:id -- full run including the result record
  router.get('/:id', async (req, res, next) => {
    try {
      const id = runIdSchema.safeParse(req.params.id);
      const row = id.success ? await deps.runStore.get(id.data) : null;
      if (!row) {
        return res.status(404).json({ success: false, error: 'Run not found' });
      }
      res.json({ success: true, data: row });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
