import { SolverOutputError } from '@shared/errors';
import {
  IDENTITY,
  ZERO_TENSOR,
  addTensors,
  isTensor,
  rotate2d,
  scaleTensor,
  trace,
  transpose,
  type Point3,
  type Tensor,
  type Vec2,
  type Vec3,
} from './linear-algebra';
import type { FaultModel, FaultPatch } from './fault-model';

// ---------------------------------------------------------------------------
// Solver contract
// ---------------------------------------------------------------------------

export interface DislocationRequest {
  /** Medium constant (lambda + mu) / (lambda + 2 mu). */
  alpha: number;
  /** Observation point in the patch frame; z negative-down meters. */
  point: Vec3;
  /** Depth of the patch reference edge, positive down. */
  depth: number;
  dip: number;
  strikeSpan: Vec2;
  dipSpan: Vec2;
  /** Strike-slip, dip-slip and tensile components. */
  dislocation: Vec3;
}

export interface DislocationResponse {
  displacement: readonly number[];
  /** Displacement gradient; must be a finite 3x3. */
  gradient: unknown;
}

/**
 * Rectangular-dislocation solution in an elastic half-space. Supplied by the
 * host; the pipeline never implements it.
 */
export interface DislocationSolver {
  solve(request: DislocationRequest): DislocationResponse;
}

export interface StressField {
  strains: Tensor[];
  stresses: Tensor[];
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Translates by the offset, then rotates counter-clockwise by `angle` degrees. */
export function rotateCoords(
  x: number,
  y: number,
  xOffset: number,
  yOffset: number,
  angle: number,
): Vec2 {
  return rotate2d([x - xOffset, y - yOffset], angle);
}

export function symmetricPart(gradient: Tensor): Tensor {
  return scaleTensor(addTensors(gradient, transpose(gradient)), 0.5);
}

/** Isotropic Hooke's law. */
export function hookeStress(strain: Tensor, lameLambda: number, shearModulusMu: number): Tensor {
  return addTensors(
    scaleTensor(IDENTITY, lameLambda * trace(strain)),
    scaleTensor(strain, 2 * shearModulusMu),
  );
}

function patchStrain(
  point: Point3,
  patch: FaultPatch,
  alpha: number,
  solver: DislocationSolver,
): Tensor {
  const origin = patch.projected.topCenter;
  const [x, y] = rotateCoords(point.x, point.y, origin.x, origin.y, -patch.angle);
  const { gradient } = solver.solve({
    alpha,
    point: [x, y, point.z],
    depth: patch.bottomDepth,
    dip: patch.dip,
    strikeSpan: [0, patch.length],
    dipSpan: [0, patch.width],
    dislocation: [patch.slipStrike, patch.slipDip, 0],
  });
  if (!isTensor(gradient)) {
    throw new SolverOutputError('Dislocation solver returned a gradient that is not a finite 3x3');
  }
  return symmetricPart(gradient);
}

// ---------------------------------------------------------------------------
// Field evaluation
// ---------------------------------------------------------------------------

/**
 * Sums the strain contribution of every patch at every point and converts
 * the total to stress. Output order follows `points`.
 */
export function computeField(
  points: readonly Point3[],
  model: Pick<FaultModel, 'patches'>,
  lameLambda: number,
  shearModulusMu: number,
  solver: DislocationSolver,
): StressField {
  const alpha = (lameLambda + shearModulusMu) / (lameLambda + 2 * shearModulusMu);

  const strains = points.map((point) =>
    model.patches.reduce(
      (total, patch) => addTensors(total, patchStrain(point, patch, alpha, solver)),
      ZERO_TENSOR,
    ),
  );
  const stresses = strains.map((strain) => hookeStress(strain, lameLambda, shearModulusMu));

  return { strains, stresses };
}
