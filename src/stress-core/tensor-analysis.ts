// Scalar failure criteria and invariants of strain/stress tensors.
//
// Every function maps a list of tensors to a list of the same length. The
// sign convention of the Coulomb criteria is carried over unchanged: shear
// traction is resolved as n·T·s and normal traction as n·T·n, tension
// positive.

import {
  IDENTITY,
  addTensors,
  cross,
  determinant,
  multiplyVector,
  resolve,
  scaleTensor,
  toRadians,
  trace,
  type Tensor,
  type Vec3,
} from './linear-algebra';

export interface ReceiverOrientation {
  azimuth: number;
  dip: number;
  /** Unit vector normal to the receiver plane. */
  normal: Vec3;
  /** Unit vector in the preferred slip direction. */
  inPlane: Vec3;
}

export interface Invariants {
  i1: number[];
  i2: number[];
  i3: number[];
}

// ---------------------------------------------------------------------------
// Tensor reductions
// ---------------------------------------------------------------------------

/** Removes the isotropic part, leaving a trace-free tensor. */
export function deviatoric(tensors: readonly Tensor[]): Tensor[] {
  return tensors.map((t) => addTensors(t, scaleTensor(IDENTITY, -trace(t) / 3)));
}

function secondInvariant(t: Tensor): number {
  return (
    t[0][0] * t[1][1] -
    t[0][1] * t[1][0] +
    (t[1][1] * t[2][2] - t[1][2] * t[2][1]) +
    (t[0][0] * t[2][2] - t[0][2] * t[2][0])
  );
}

export function invariants(tensors: readonly Tensor[]): Invariants {
  return {
    i1: tensors.map(trace),
    i2: tensors.map(secondInvariant),
    i3: tensors.map(determinant),
  };
}

/** Eigenvalues of a symmetric 3x3 in descending order (trigonometric solution). */
export function symmetricEigenvalues(t: Tensor): Vec3 {
  const p1 = t[0][1] ** 2 + t[0][2] ** 2 + t[1][2] ** 2;
  if (p1 === 0) {
    const diagonal = [t[0][0], t[1][1], t[2][2]].sort((a, b) => b - a);
    return [diagonal[0], diagonal[1], diagonal[2]];
  }

  const q = trace(t) / 3;
  const p2 = (t[0][0] - q) ** 2 + (t[1][1] - q) ** 2 + (t[2][2] - q) ** 2 + 2 * p1;
  const p = Math.sqrt(p2 / 6);
  const B = scaleTensor(addTensors(t, scaleTensor(IDENTITY, -q)), 1 / p);
  const r = Math.min(1, Math.max(-1, determinant(B) / 2));
  const phi = Math.acos(r) / 3;

  const largest = q + 2 * p * Math.cos(phi);
  const smallest = q + 2 * p * Math.cos(phi + (2 * Math.PI) / 3);
  return [largest, 3 * q - largest - smallest, smallest];
}

/** Half the spread between the largest and smallest principal values. */
export function maxShear(tensors: readonly Tensor[]): number[] {
  return tensors.map((t) => {
    const [largest, , smallest] = symmetricEigenvalues(t);
    return (largest - smallest) / 2;
  });
}

// ---------------------------------------------------------------------------
// Coulomb failure criteria
// ---------------------------------------------------------------------------

/** Classical Coulomb failure stress: shear along `inPlane` plus friction times normal traction. */
export function cfs(
  tensors: readonly Tensor[],
  normal: Vec3,
  inPlane: Vec3,
  coefficientOfFriction: number,
): number[] {
  return tensors.map(
    (t) => resolve(t, normal, inPlane) + coefficientOfFriction * resolve(t, normal, normal),
  );
}

export function cfsNormal(
  tensors: readonly Tensor[],
  normal: Vec3,
  coefficientOfFriction: number,
): number[] {
  return tensors.map((t) => coefficientOfFriction * resolve(t, normal, normal));
}

/** Coulomb stress using the magnitude of both in-plane shear components. */
export function cfsTotal(
  tensors: readonly Tensor[],
  normal: Vec3,
  inPlane: Vec3,
  coefficientOfFriction: number,
): number[] {
  const crossDirection = cross(normal, inPlane);
  return tensors.map(
    (t) =>
      Math.abs(resolve(t, normal, inPlane)) +
      Math.abs(resolve(t, normal, crossDirection)) +
      coefficientOfFriction * resolve(t, normal, normal),
  );
}

// ---------------------------------------------------------------------------
// Receiver plane
// ---------------------------------------------------------------------------

function horizontalRotation(degrees: number): Tensor {
  const angle = toRadians(degrees);
  const cos = Math.cos(angle);
  const sin = Math.sin(angle);
  return [
    [cos, sin, 0],
    [-sin, cos, 0],
    [0, 0, 1],
  ];
}

/**
 * Receiver vectors for a plane of the given azimuth and dip: the reference
 * vectors [0,1,0] and [1,0,0] rotated by the azimuth, then by `dip - 90`.
 */
export function receiverOrientation(azimuth: number, dip: number): ReceiverOrientation {
  const byAzimuth = horizontalRotation(azimuth);
  const byDip = horizontalRotation(dip - 90);
  return {
    azimuth,
    dip,
    inPlane: multiplyVector(byDip, multiplyVector(byAzimuth, [0, 1, 0])),
    normal: multiplyVector(byDip, multiplyVector(byAzimuth, [1, 0, 0])),
  };
}
