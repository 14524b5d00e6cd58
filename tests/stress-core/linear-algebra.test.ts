import { describe, it, expect } from 'vitest';
import {
  determinant,
  extent,
  isTensor,
  norm,
  rotate2d,
  transpose,
  wrapDegrees,
  type Tensor,
} from '../../src/stress-core/linear-algebra';

describe('rotate2d', () => {
  it('rotates counter-clockwise', () => {
    const [x, y] = rotate2d([1, 0], 90);
    expect(x).toBeCloseTo(0, 12);
    expect(y).toBeCloseTo(1, 12);
  });

  it('preserves length for any angle', () => {
    for (const angle of [0, 17, 90, 135.5, 270, -42]) {
      expect(norm(rotate2d([3, -4], angle))).toBeCloseTo(5, 10);
    }
  });

  it('returns the original vector after a full turn', () => {
    for (const v of [[1, 0], [3, -4], [-2.5, 7]] as const) {
      const [x, y] = rotate2d([v[0], v[1]], 360);
      expect(x).toBeCloseTo(v[0], 12);
      expect(y).toBeCloseTo(v[1], 12);
    }
  });
});

describe('extent', () => {
  it('finds the bounds', () => {
    expect(extent([3, -1, 7, 2])).toEqual([-1, 7]);
    expect(extent([])).toEqual([Number.POSITIVE_INFINITY, Number.NEGATIVE_INFINITY]);
  });

  it('handles arrays too long to spread into Math.min', () => {
    const values = Array.from({ length: 500_000 }, (_, i) => i - 1000);
    expect(extent(values)).toEqual([-1000, 498_999]);
  });
});

describe('wrapDegrees', () => {
  it('wraps into [0, 360)', () => {
    expect(wrapDegrees(90)).toBe(90);
    expect(wrapDegrees(-90)).toBe(270);
    expect(wrapDegrees(360)).toBe(0);
    expect(wrapDegrees(725)).toBe(5);
  });
});

describe('tensor helpers', () => {
  const t: Tensor = [
    [2, 1, 0],
    [3, 4, 5],
    [0, 6, 7],
  ];

  it('computes the determinant', () => {
    // 2*(28-30) - 1*(21-0) + 0
    expect(determinant(t)).toBe(-25);
  });

  it('transposes', () => {
    expect(transpose(t)[0]).toEqual([2, 3, 0]);
  });

  it('recognizes finite 3x3 arrays', () => {
    expect(isTensor(t)).toBe(true);
    expect(isTensor([[1, 2, 3]])).toBe(false);
    expect(isTensor([[1, 2, 3], [4, 5, 6], [7, 8, Number.NaN]])).toBe(false);
    expect(isTensor('not a tensor')).toBe(false);
  });
});
