import { describe, it, expect } from 'vitest';
import {
  geodesicDistanceKm,
  greatCircleDistanceKm,
  vincentyDistanceKm,
} from '../../src/stress-core/geodesy';
import { GeodesicConvergenceError } from '../../src/shared/errors';

const origin = { latitude: 0, longitude: 0 };
const oneDegreeEast = { latitude: 0, longitude: 1 };

describe('vincentyDistanceKm', () => {
  it('measures one degree of longitude on the equator', () => {
    expect(vincentyDistanceKm(origin, oneDegreeEast)).toBeCloseTo(111.3195, 3);
  });

  it('returns zero for coincident points', () => {
    expect(vincentyDistanceKm({ latitude: 35, longitude: 139 }, { latitude: 35, longitude: 139 })).toBe(0);
  });

  it('throws when the iteration does not settle', () => {
    expect(() =>
      vincentyDistanceKm({ latitude: 0.5, longitude: 0 }, { latitude: -0.5, longitude: 179.7 }, { maxIterations: 1 }),
    ).toThrow(GeodesicConvergenceError);
  });
});

describe('geodesicDistanceKm', () => {
  it('uses the ellipsoidal distance when it converges', () => {
    expect(geodesicDistanceKm(origin, oneDegreeEast)).toBeCloseTo(111.3195, 3);
  });

  it('falls back to the great-circle distance on non-convergence', () => {
    const a = { latitude: 10, longitude: 20 };
    const b = { latitude: 12, longitude: 23 };
    expect(geodesicDistanceKm(a, b, { maxIterations: 1 })).toBe(greatCircleDistanceKm(a, b));
  });

  it('great-circle distance of one equatorial degree', () => {
    expect(greatCircleDistanceKm(origin, oneDegreeEast)).toBeCloseTo(111.19508, 4);
  });
});
