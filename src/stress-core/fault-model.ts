import { KM_TO_M } from '@shared/constants';
import { RuptureParseError } from '@shared/errors';
import { rotate2d, wrapDegrees, type Point2, type Point3 } from './linear-algebra';
import { createUtmProjector, type UtmProjector, type UtmZone } from './projection';
import type { RuptureDescription, RuptureSegment, SubfaultRow } from './srcmod';

// ---------------------------------------------------------------------------
// Public interfaces
// ---------------------------------------------------------------------------

/**
 * Patch corners in one frame. Corners 1 and 2 lie on the top edge, 3 and 4
 * on the bottom edge directly down-dip of 1 and 2.
 */
export interface PatchGeometry {
  topCenter: Point3;
  corners: readonly [Point3, Point3, Point3, Point3];
}

export interface FaultPatch {
  latitude: number;
  longitude: number;
  /** Meters relative to the hypocenter, as given in the rupture file. */
  local: PatchGeometry;
  /** UTM meters in the epicenter's zone. */
  projected: PatchGeometry;
  /** Depth of the top edge in meters, positive down. */
  topDepth: number;
  bottomDepth: number;
  dip: number;
  strike: number;
  rake: number;
  slip: number;
  slipStrike: number;
  slipDip: number;
  length: number;
  width: number;
  /** Cartesian rotation of the strike direction from +x, counter-clockwise. */
  angle: number;
}

export interface FaultModelMetadata {
  tag?: string;
  description?: string;
  depth?: number;
  magnitude?: number;
  moment?: number;
}

export interface FaultModel {
  date: string;
  occurredAt: Date;
  metadata: FaultModelMetadata;
  epicenter: { latitude: number; longitude: number; x: number; y: number };
  zone: UtmZone;
  project(longitude: number, latitude: number): Point2;
  patches: readonly FaultPatch[];
  dipMean: number;
  strikeMean: number;
}

// ---------------------------------------------------------------------------
// Header maps
// ---------------------------------------------------------------------------

const TAG_MAP = [
  ['EVENTTAG', 'tag'],
  ['EVENT', 'description'],
] as const;

const FIELD_MAP = [
  ['DEP', 'depth'],
  ['MW', 'magnitude'],
  ['MO', 'moment'],
] as const;

function readMetadata(description: RuptureDescription): FaultModelMetadata {
  const metadata: FaultModelMetadata = {};
  for (const [name, key] of TAG_MAP) {
    const value = description.tags[name];
    if (value === undefined) {
      console.warn(`[MODEL] Rupture header has no ${name} tag`);
      continue;
    }
    metadata[key] = value;
  }
  for (const [name, key] of FIELD_MAP) {
    const value = description.fields[name];
    if (value === undefined || Number.isNaN(value)) {
      console.warn(`[MODEL] Rupture header has no ${name} field`);
      continue;
    }
    metadata[key] = value;
  }
  return metadata;
}

function requireField(fields: Readonly<Record<string, number>>, name: string, context: string): number {
  const value = fields[name];
  if (value === undefined || Number.isNaN(value)) {
    throw new RuptureParseError(`${context} has no ${name} field`);
  }
  return value;
}

// ---------------------------------------------------------------------------
// Segment decomposition
// ---------------------------------------------------------------------------

interface SegmentGeometry {
  strike: number;
  dip: number;
  angle: number;
  length: number;
  width: number;
  topOffset: Point2;
  downDipOffset: Point3;
}

function segmentGeometry(
  segment: RuptureSegment,
  header: Readonly<Record<string, number>>,
): SegmentGeometry {
  const strike = wrapDegrees(
    segment.fields.STRIKE ?? requireField(header, 'STRK', 'Rupture header'),
  );
  const dip = segment.fields.DIP ?? requireField(header, 'DIP', 'Rupture header');
  const angle = wrapDegrees(90 - strike);

  const length = (segment.fields.DX ?? requireField(header, 'DX', 'Rupture header')) * KM_TO_M;
  const width =
    segment.fields.LEN !== undefined
      ? (segment.fields.LEN / segment.rows.length) * KM_TO_M
      : requireField(header, 'DZ', 'Rupture header') * KM_TO_M;

  const [topX, topY] = rotate2d([length / 2, 0], angle);
  const first = segment.rows[0][0];
  const second = segment.rows[1][0];

  return {
    strike,
    dip,
    angle,
    length,
    width,
    topOffset: { x: topX, y: topY },
    downDipOffset: {
      x: (second.X - first.X) * KM_TO_M,
      y: (second.Y - first.Y) * KM_TO_M,
      z: (second.Z - first.Z) * KM_TO_M,
    },
  };
}

function patchGeometry(topCenter: Point3, top: Point2, downDip: Point3): PatchGeometry {
  const { x, y, z } = topCenter;
  return {
    topCenter,
    corners: [
      { x: x + top.x, y: y + top.y, z },
      { x: x - top.x, y: y - top.y, z },
      { x: x + downDip.x + top.x, y: y + downDip.y + top.y, z: z + downDip.z },
      { x: x + downDip.x - top.x, y: y + downDip.y - top.y, z: z + downDip.z },
    ],
  };
}

function buildPatch(
  row: SubfaultRow,
  geometry: SegmentGeometry,
  project: FaultModel['project'],
): FaultPatch {
  const z = row.Z * KM_TO_M;
  const local = { x: row.X * KM_TO_M, y: row.Y * KM_TO_M, z };
  const projected = { ...project(row.LON, row.LAT), z };

  const slip = row.SLIP ?? 0;
  const rake = row.RAKE ?? 0;
  const [slipStrike, slipDip] = rotate2d([slip, 0], rake);

  return Object.freeze({
    latitude: row.LAT,
    longitude: row.LON,
    local: patchGeometry(local, geometry.topOffset, geometry.downDipOffset),
    projected: patchGeometry(projected, geometry.topOffset, geometry.downDipOffset),
    topDepth: z,
    bottomDepth: z + geometry.downDipOffset.z,
    dip: geometry.dip,
    strike: geometry.strike,
    rake,
    slip,
    slipStrike,
    slipDip,
    length: geometry.length,
    width: geometry.width,
    angle: geometry.angle,
  });
}

function epicenterProjector(latitude: number, longitude: number): UtmProjector {
  try {
    return createUtmProjector(latitude, longitude);
  } catch (err) {
    if (err instanceof RangeError) {
      throw new RuptureParseError(`Epicenter cannot be projected: ${err.message}`);
    }
    throw err;
  }
}

function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

// ---------------------------------------------------------------------------
// Builder
// ---------------------------------------------------------------------------

/**
 * Decomposes a rupture description into rectangular dislocation patches,
 * one per sub-fault, with corners in both the local and UTM frames.
 * Segments with fewer than two depth rows are skipped.
 */
export function buildFaultModel(description: RuptureDescription): FaultModel {
  const metadata = readMetadata(description);
  const latitude = requireField(description.fields, 'LAT', 'Rupture header');
  const longitude = requireField(description.fields, 'LON', 'Rupture header');

  const projector = epicenterProjector(latitude, longitude);
  const project = projector.project;
  const epicenter = project(longitude, latitude);

  const patches: FaultPatch[] = [];
  for (const segment of description.segments) {
    if (segment.rows.length < 2) continue;
    const geometry = segmentGeometry(segment, description.fields);
    for (const depthRow of segment.rows) {
      for (const row of depthRow) {
        patches.push(buildPatch(row, geometry, project));
      }
    }
  }

  for (const patch of patches) {
    if (patch.dip < -180 || patch.dip > 180) {
      throw new RuptureParseError(`Patch dip ${patch.dip} is outside [-180, 180]`);
    }
  }

  return {
    date: description.date,
    occurredAt: description.occurredAt,
    metadata,
    epicenter: { latitude, longitude, ...epicenter },
    zone: projector.zone,
    project,
    patches: Object.freeze(patches),
    dipMean: mean(patches.map((p) => p.dip)),
    strikeMean: mean(patches.map((p) => p.strike)),
  };
}
