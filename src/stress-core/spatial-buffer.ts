import polygonClipping, { type MultiPolygon, type Pair } from 'polygon-clipping';
import { extent, type Point2, type Point3 } from './linear-algebra';
import type { FaultPatch } from './fault-model';

// Vertices of the polygon standing in for each disk in the outline.
const DISK_SEGMENTS = 64;

// Grid (meters) centers are snapped to when checking for duplicates.
const MERGE_TOLERANCE = 1;

// ---------------------------------------------------------------------------
// Public interfaces
// ---------------------------------------------------------------------------

/**
 * Union of open disks of `radius` around `centers`. Membership is exact;
 * `outline` is a polygonal approximation used for boundary samples and
 * rendering only.
 */
export interface BufferedRegion {
  radius: number;
  centers: readonly Point2[];
  outline: MultiPolygon;
  /** Exterior-ring vertices of the outline, closing duplicates removed. */
  vertices: readonly Point2[];
}

export interface SampleGrid {
  /** Lattice points strictly inside the region, row-major with y outer. */
  interior: Point2[];
  boundary: Point2[];
  /** `interior` followed by `boundary`. */
  points: Point2[];
}

// ---------------------------------------------------------------------------
// Region construction
// ---------------------------------------------------------------------------

function diskRing(center: Point2, radius: number): Pair[] {
  const ring: Pair[] = [];
  for (let i = 0; i < DISK_SEGMENTS; i++) {
    const theta = (2 * Math.PI * i) / DISK_SEGMENTS;
    ring.push([center.x + radius * Math.cos(theta), center.y + radius * Math.sin(theta)]);
  }
  return ring;
}

// Corners shared by neighbouring patches differ only by rounding error; those
// falling in the same MERGE_TOLERANCE cell keep the first one seen.
function distinctPoints(points: readonly Point2[]): Point2[] {
  const seen = new Map<string, Point2>();
  for (const { x, y } of points) {
    const key = `${Math.round(x / MERGE_TOLERANCE)},${Math.round(y / MERGE_TOLERANCE)}`;
    if (!seen.has(key)) seen.set(key, { x, y });
  }
  return [...seen.values()];
}

function insideAnother(point: Pair, centers: readonly Point2[], skip: number, radius: number): boolean {
  const radiusSq = radius * radius;
  return centers.some((center, i) => {
    if (i === skip) return false;
    const dx = point[0] - center.x;
    const dy = point[1] - center.y;
    return dx * dx + dy * dy < radiusSq;
  });
}

/** Pairwise union, level by level, so no single sweep sees every disk. */
function unionAll(polygons: readonly MultiPolygon[]): MultiPolygon {
  let level = polygons;
  while (level.length > 1) {
    const next: MultiPolygon[] = [];
    for (let i = 0; i < level.length; i += 2) {
      const right = level[i + 1];
      next.push(right ? polygonClipping.union(level[i], right) : level[i]);
    }
    level = next;
  }
  return level[0] ?? [];
}

function exteriorVertices(outline: MultiPolygon): Point2[] {
  const vertices: Point2[] = [];
  for (const [exterior] of outline) {
    const ring = exterior.slice();
    const first = ring[0];
    const last = ring[ring.length - 1];
    if (ring.length > 1 && first[0] === last[0] && first[1] === last[1]) ring.pop();
    for (const [x, y] of ring) vertices.push({ x, y });
  }
  return vertices;
}

export function buildRegionFromPoints(points: readonly Point2[], radius: number): BufferedRegion {
  if (!(radius > 0)) {
    throw new RangeError(`Buffer radius must be positive, got ${radius}`);
  }
  const centers = distinctPoints(points);
  if (centers.length === 0) {
    return { radius, centers, outline: [], vertices: [] };
  }

  // Disks whose sample points all fall inside other disks add nothing to the
  // outline and are left out of the union.
  const disks: MultiPolygon[] = [];
  centers.forEach((center, i) => {
    const ring = diskRing(center, radius);
    if (ring.every((point) => insideAnother(point, centers, i, radius))) return;
    disks.push([[[...ring, ring[0]]]]);
  });

  const outline = unionAll(disks);
  return { radius, centers, outline, vertices: exteriorVertices(outline) };
}

/** Region around every distinct projected corner of the patches. */
export function buildRegion(patches: readonly FaultPatch[], radius: number): BufferedRegion {
  return buildRegionFromPoints(
    patches.flatMap((patch) => patch.projected.corners),
    radius,
  );
}

export function regionContains(region: BufferedRegion, point: Point2 | Point3): boolean {
  const radiusSq = region.radius * region.radius;
  return region.centers.some((center) => {
    const dx = point.x - center.x;
    const dy = point.y - center.y;
    return dx * dx + dy * dy < radiusSq;
  });
}

// ---------------------------------------------------------------------------
// Sampling
// ---------------------------------------------------------------------------

/** Half-open range [start, stop) in steps of `step`. */
export function arange(start: number, stop: number, step: number): number[] {
  const count = Math.max(0, Math.ceil((stop - start) / step));
  return Array.from({ length: count }, (_, i) => start + i * step);
}

export function buildGrid(region: BufferedRegion, spacing: number): SampleGrid {
  if (!(spacing > 0)) {
    throw new RangeError(`Grid spacing must be positive, got ${spacing}`);
  }
  if (region.centers.length === 0) {
    return { interior: [], boundary: [], points: [] };
  }

  const [minX, maxX] = extent(region.centers.map((c) => c.x));
  const [minY, maxY] = extent(region.centers.map((c) => c.y));
  const columns = arange(minX - region.radius, maxX + region.radius, spacing);
  const rows = arange(minY - region.radius, maxY + region.radius, spacing);

  const interior: Point2[] = [];
  for (const y of rows) {
    for (const x of columns) {
      if (regionContains(region, { x, y })) interior.push({ x, y });
    }
  }
  const boundary = region.vertices.map(({ x, y }) => ({ x, y }));

  return { interior, boundary, points: [...interior, ...boundary] };
}
