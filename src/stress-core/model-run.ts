import type { MultiPolygon } from 'polygon-clipping';
import {
  CATALOG_QUERY_RADIUS_KM,
  DAY_MS,
  SCALAR_QUANTITIES,
  TENSOR_FIELDS,
} from '@shared/constants';
import type { ScalarQuantity, TensorFieldName } from '@shared/types';
import type { CatalogSource, CorrelatedEvent } from './catalog';
import { correlate } from './catalog-correlator';
import {
  buildFaultModel,
  type FaultModel,
  type FaultModelMetadata,
  type FaultPatch,
} from './fault-model';
import { toNestedArray, type Tensor } from './linear-algebra';
import type { UtmZone } from './projection';
import { parseRunParameters, type RunParameters } from './run-parameters';
import { buildGrid, buildRegion } from './spatial-buffer';
import type { RuptureSource } from './srcmod';
import { computeField, type DislocationSolver } from './stress-field';
import {
  cfs,
  cfsNormal,
  cfsTotal,
  deviatoric,
  invariants,
  maxShear,
  receiverOrientation,
  type ReceiverOrientation,
} from './tensor-analysis';
import { renderSafely, type ModelVisualizer } from './visualization';

// ---------------------------------------------------------------------------
// Public interfaces
// ---------------------------------------------------------------------------

export interface ModelDependencies {
  ruptureSource: RuptureSource;
  catalogSource: CatalogSource;
  solver: DislocationSolver;
  visualizer?: ModelVisualizer;
}

export interface FaultModelSummary {
  date: string;
  occurredAt: string;
  metadata: FaultModelMetadata;
  epicenter: FaultModel['epicenter'];
  zone: UtmZone;
  dipMean: number;
  strikeMean: number;
  patches: readonly FaultPatch[];
}

export interface ResultEvent extends Omit<CorrelatedEvent, 'occurredAt'> {
  occurredAt: string;
  cfs: number;
}

export type ScalarFields = Record<TensorFieldName, Record<ScalarQuantity, number[]>>;

/** Everything a run produces, as plain JSON-safe data. */
export interface ModelResult {
  parameters: RunParameters;
  faultModel: FaultModelSummary;
  receiver: ReceiverOrientation;
  region: { radius: number; outline: MultiPolygon };
  grid: {
    x: number[];
    y: number[];
    z: number;
    /** Leading grid entries that are interior samples; the rest are boundary vertices. */
    interiorCount: number;
  };
  tensors: Record<TensorFieldName, number[][][]>;
  scalars: ScalarFields;
  catalog: ResultEvent[];
  warnings: string[];
}

export interface ModelOutput {
  result: ModelResult;
  image: string | null;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function summarizeFaultModel(model: FaultModel): FaultModelSummary {
  return {
    date: model.date,
    occurredAt: model.occurredAt.toISOString(),
    metadata: model.metadata,
    epicenter: model.epicenter,
    zone: model.zone,
    dipMean: model.dipMean,
    strikeMean: model.strikeMean,
    patches: model.patches,
  };
}

/** The nine scalar quantities of one tensor field. */
export function scalarQuantities(
  tensors: readonly Tensor[],
  receiver: ReceiverOrientation,
  coefficientOfFriction: number,
): Record<ScalarQuantity, number[]> {
  const { normal, inPlane } = receiver;
  const { i1, i2, i3 } = invariants(tensors);
  return {
    cfs: cfs(tensors, normal, inPlane, coefficientOfFriction),
    cfs_shear_only: cfs(tensors, normal, inPlane, 0),
    cfs_total: cfsTotal(tensors, normal, inPlane, coefficientOfFriction),
    cfs_total_shear_only: cfsTotal(tensors, normal, inPlane, 0),
    cfs_normal: cfsNormal(tensors, normal, coefficientOfFriction),
    i1,
    i2,
    i3,
    max_shear: maxShear(tensors),
  };
}

function countScalarFields(scalars: ScalarFields): number {
  return TENSOR_FIELDS.reduce(
    (count, field) => count + SCALAR_QUANTITIES.filter((q) => q in scalars[field]).length,
    0,
  );
}

// ---------------------------------------------------------------------------
// Orchestrator
// ---------------------------------------------------------------------------

/**
 * Runs the full stress-transfer model for one rupture: patches, sampling
 * grid, tensor fields, scalar criteria, catalog correlation and a
 * best-effort plot. Invalid parameters fail before any work starts.
 */
export async function modelQuake(input: unknown, deps: ModelDependencies): Promise<ModelOutput> {
  const params = parseRunParameters(input);
  const { lameLambda, shearModulusMu, coefficientOfFriction, obsDepth } = params;

  const description = await deps.ruptureSource.readRupture(params.ruptureSource);
  const model = buildFaultModel(description);
  if (model.patches.length === 0) {
    throw new Error(`Rupture ${params.ruptureSource} produced no fault patches`);
  }
  console.warn(`[MODEL] ${params.ruptureSource}: ${model.patches.length} patches`);

  const region = buildRegion(model.patches, params.nearFieldDistance);
  const grid = buildGrid(region, params.spacingGrid);
  const samples = grid.points.map(({ x, y }) => ({ x, y, z: obsDepth }));
  console.warn(
    `[MODEL] Evaluating ${samples.length} samples (${grid.interior.length} interior)`,
  );

  const { strains, stresses } = computeField(samples, model, lameLambda, shearModulusMu, deps.solver);
  const fields: Record<TensorFieldName, Tensor[]> = {
    strains,
    stresses,
    strains_deviatoric: deviatoric(strains),
    stresses_deviatoric: deviatoric(stresses),
  };

  const receiver = receiverOrientation(model.strikeMean, model.dipMean);
  const scalars: ScalarFields = {
    strains: scalarQuantities(fields.strains, receiver, coefficientOfFriction),
    stresses: scalarQuantities(fields.stresses, receiver, coefficientOfFriction),
    strains_deviatoric: scalarQuantities(fields.strains_deviatoric, receiver, coefficientOfFriction),
    stresses_deviatoric: scalarQuantities(
      fields.stresses_deviatoric,
      receiver,
      coefficientOfFriction,
    ),
  };
  console.warn(`[MODEL] Computed ${countScalarFields(scalars)} scalar fields`);

  const catalog = await deps.catalogSource.fetchEvents({
    catalogType: params.catalogType,
    start: new Date(model.occurredAt.getTime() + DAY_MS),
    days: params.days,
    position: { latitude: model.epicenter.latitude, longitude: model.epicenter.longitude },
    radiusKm: CATALOG_QUERY_RADIUS_KM,
  });
  const nearField = correlate(catalog, model, region);
  console.warn(`[MODEL] ${nearField.length} of ${catalog.length} catalog events in the near field`);

  const eventCfs = nearField.map((event) => {
    const { stresses: eventStress } = computeField(
      [{ x: event.x, y: event.y, z: event.depth }],
      model,
      lameLambda,
      shearModulusMu,
      deps.solver,
    );
    return cfs(eventStress, receiver.normal, receiver.inPlane, coefficientOfFriction)[0];
  });

  const warnings: string[] = [];
  let image: string | null = null;
  if (deps.visualizer) {
    const outcome = renderSafely(deps.visualizer, {
      title: model.metadata.tag ?? params.ruptureSource,
      obsDepth,
      samples: grid.points,
      cfs: scalars.stresses.cfs,
      outline: region.outline,
      patches: model.patches,
      events: nearField,
      eventCfs,
    });
    image = outcome.image;
    if (outcome.error) warnings.push(`Visualization failed: ${outcome.error}`);
  }

  const result: ModelResult = {
    parameters: params,
    faultModel: summarizeFaultModel(model),
    receiver,
    region: { radius: region.radius, outline: region.outline },
    grid: {
      x: grid.points.map((p) => p.x),
      y: grid.points.map((p) => p.y),
      z: obsDepth,
      interiorCount: grid.interior.length,
    },
    tensors: {
      strains: fields.strains.map(toNestedArray),
      stresses: fields.stresses.map(toNestedArray),
      strains_deviatoric: fields.strains_deviatoric.map(toNestedArray),
      stresses_deviatoric: fields.stresses_deviatoric.map(toNestedArray),
    },
    scalars,
    catalog: nearField.map((event, i) => ({
      ...event,
      occurredAt: event.occurredAt.toISOString(),
      cfs: eventCfs[i],
    })),
    warnings,
  };

  return { result, image };
}
