import { describe, it, expect } from 'vitest';
import { createUtmProjector, utmZoneFor } from '../../src/stress-core/projection';

describe('utmZoneFor', () => {
  it('finds the zone and band of central Japan', () => {
    expect(utmZoneFor(35, 139)).toEqual({ number: 54, letter: 'S' });
  });

  it('applies the southwest Norway exception', () => {
    expect(utmZoneFor(60, 5).number).toBe(32);
  });

  it('applies the Svalbard exceptions', () => {
    expect(utmZoneFor(78, 15).number).toBe(33);
  });

  it('rejects latitudes outside the UTM range', () => {
    expect(() => utmZoneFor(85, 0)).toThrow(RangeError);
    expect(() => utmZoneFor(-81, 0)).toThrow(RangeError);
  });
});

describe('createUtmProjector', () => {
  it('maps the central meridian on the equator to the false easting', () => {
    const projector = createUtmProjector(35, 139);
    const { x, y } = projector.project(141, 0);
    expect(x).toBeCloseTo(500000, 3);
    expect(y).toBeCloseTo(0, 3);
  });

  it('puts points west of the central meridian below the false easting', () => {
    const projector = createUtmProjector(35, 139);
    expect(projector.project(139, 35).x).toBeLessThan(500000);
  });
});
