import type { FaultPatch } from '../../src/stress-core/fault-model';
import type { Point3 } from '../../src/stress-core/linear-algebra';

/** A vertical strike-slip patch with its projected top-center at `center`. */
export function makePatch(center: Point3, overrides: Partial<FaultPatch> = {}): FaultPatch {
  const corners: FaultPatch['projected']['corners'] = [
    { x: center.x, y: center.y + 5000, z: center.z },
    { x: center.x, y: center.y - 5000, z: center.z },
    { x: center.x, y: center.y + 5000, z: center.z + 5000 },
    { x: center.x, y: center.y - 5000, z: center.z + 5000 },
  ];
  return {
    latitude: 0,
    longitude: 0,
    local: { topCenter: center, corners },
    projected: { topCenter: center, corners },
    topDepth: center.z,
    bottomDepth: center.z + 5000,
    dip: 90,
    strike: 0,
    rake: 0,
    slip: 1,
    slipStrike: 1,
    slipDip: 0,
    length: 10000,
    width: 5000,
    angle: 90,
    ...overrides,
  };
}
