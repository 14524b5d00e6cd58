// Small fixed-size vector and tensor helpers used across the stress pipeline.

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type Vec2 = readonly [number, number];
export type Vec3 = readonly [number, number, number];
export type Row3 = readonly [number, number, number];

/** 3x3 matrix, row-major. Strain and stress tensors are always symmetric. */
export type Tensor = readonly [Row3, Row3, Row3];

export interface Point2 {
  x: number;
  y: number;
}

export interface Point3 extends Point2 {
  z: number;
}

// ---------------------------------------------------------------------------
// Angles and rotation
// ---------------------------------------------------------------------------

export function toRadians(degrees: number): number {
  return (degrees * Math.PI) / 180;
}

/** Wraps an angle in degrees into [0, 360). */
export function wrapDegrees(degrees: number): number {
  const wrapped = ((degrees % 360) + 360) % 360;
  return wrapped === 360 ? 0 : wrapped;
}

/** Rotates a 2D vector counter-clockwise by `degrees`. */
export function rotate2d(vector: Vec2, degrees: number): Vec2 {
  const angle = toRadians(degrees);
  const cos = Math.cos(angle);
  const sin = Math.sin(angle);
  return [cos * vector[0] - sin * vector[1], sin * vector[0] + cos * vector[1]];
}

// ---------------------------------------------------------------------------
// Vectors
// ---------------------------------------------------------------------------

export function dot(a: Vec3, b: Vec3): number {
  return a[0] * b[0] + a[1] * b[1] + a[2] * b[2];
}

export function cross(a: Vec3, b: Vec3): Vec3 {
  return [
    a[1] * b[2] - a[2] * b[1],
    a[2] * b[0] - a[0] * b[2],
    a[0] * b[1] - a[1] * b[0],
  ];
}

export function norm(vector: readonly number[]): number {
  return Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
}

// ---------------------------------------------------------------------------
// Tensors
// ---------------------------------------------------------------------------

export const ZERO_TENSOR: Tensor = [
  [0, 0, 0],
  [0, 0, 0],
  [0, 0, 0],
];

export const IDENTITY: Tensor = [
  [1, 0, 0],
  [0, 1, 0],
  [0, 0, 1],
];

export function mapTensor(t: Tensor, fn: (value: number, i: number, j: number) => number): Tensor {
  return [
    [fn(t[0][0], 0, 0), fn(t[0][1], 0, 1), fn(t[0][2], 0, 2)],
    [fn(t[1][0], 1, 0), fn(t[1][1], 1, 1), fn(t[1][2], 1, 2)],
    [fn(t[2][0], 2, 0), fn(t[2][1], 2, 1), fn(t[2][2], 2, 2)],
  ];
}

export function addTensors(a: Tensor, b: Tensor): Tensor {
  return mapTensor(a, (value, i, j) => value + b[i][j]);
}

export function scaleTensor(t: Tensor, factor: number): Tensor {
  return mapTensor(t, (value) => value * factor);
}

export function transpose(t: Tensor): Tensor {
  return mapTensor(t, (_value, i, j) => t[j][i]);
}

export function trace(t: Tensor): number {
  return t[0][0] + t[1][1] + t[2][2];
}

export function determinant(t: Tensor): number {
  return (
    t[0][0] * (t[1][1] * t[2][2] - t[1][2] * t[2][1]) -
    t[0][1] * (t[1][0] * t[2][2] - t[1][2] * t[2][0]) +
    t[0][2] * (t[1][0] * t[2][1] - t[1][1] * t[2][0])
  );
}

export function multiplyVector(t: Tensor, v: Vec3): Vec3 {
  return [dot(t[0], v), dot(t[1], v), dot(t[2], v)];
}

/** Bilinear form a·T·b. */
export function resolve(t: Tensor, a: Vec3, b: Vec3): number {
  return dot(multiplyVector(t, a), b);
}

export function isSymmetric(t: Tensor): boolean {
  return t[0][1] === t[1][0] && t[0][2] === t[2][0] && t[1][2] === t[2][1];
}

/** Narrows an arbitrary nested array to a finite 3x3 matrix. */
export function isTensor(value: unknown): value is Tensor {
  return (
    Array.isArray(value) &&
    value.length === 3 &&
    value.every(
      (row) =>
        Array.isArray(row) &&
        row.length === 3 &&
        row.every((entry) => typeof entry === 'number' && Number.isFinite(entry)),
    )
  );
}

export function toNestedArray(t: Tensor): number[][] {
  return t.map((row) => [...row]);
}

/** `[min, max]` of the values, `[Infinity, -Infinity]` when empty. */
export function extent(values: readonly number[]): [number, number] {
  let min = Number.POSITIVE_INFINITY;
  let max = Number.NEGATIVE_INFINITY;
  for (const value of values) {
    if (value < min) min = value;
    if (value > max) max = value;
  }
  return [min, max];
}
