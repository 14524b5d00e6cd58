import { Router } from 'express';
import { buildFaultModel, type FaultModel } from '@core/fault-model';
import type { RuptureSource } from '@core/srcmod';
import type { RuptureSummaryRecord } from '@shared/types';

export function toRuptureSummary(source: string, model: FaultModel): RuptureSummaryRecord {
  return {
    source,
    tag: model.metadata.tag ?? null,
    description: model.metadata.description ?? null,
    date: model.date,
    epicenter: model.epicenter,
    zone: model.zone,
    magnitude: model.metadata.magnitude ?? null,
    patchCount: model.patches.length,
    dipMean: model.dipMean,
    strikeMean: model.strikeMean,
  };
}

export function createRupturesRouter(deps: { ruptureSource: RuptureSource }): Router {
  const router = Router();

  // GET /ruptures/:name -- fault model summary of one rupture file
  router.get('/:name', async (req, res, next) => {
    try {
      const description = await deps.ruptureSource.readRupture(req.params.name);
      res.json({ success: true, data: toRuptureSummary(req.params.name, buildFaultModel(description)) });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
