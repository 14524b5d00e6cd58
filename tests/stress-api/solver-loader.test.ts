import { describe, it, expect } from 'vitest';
import path from 'path';
import { fileURLToPath } from 'url';
import { isDislocationSolver, loadSolver } from '../../src/stress-api/solver-loader';
import { ConfigurationError } from '../../src/shared/errors';

const solvers = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../fixtures/solvers');

describe('isDislocationSolver', () => {
  it('accepts objects with a solve function', () => {
    expect(isDislocationSolver({ solve: () => null })).toBe(true);
    expect(isDislocationSolver({ solve: 1 })).toBe(false);
    expect(isDislocationSolver(null)).toBe(false);
  });
});

describe('loadSolver', () => {
  it('returns null when no module is configured', async () => {
    await expect(loadSolver(null)).resolves.toBeNull();
  });

  it('uses the default export', async () => {
    const solver = await loadSolver(path.join(solvers, 'zero-solver.ts'));
    expect(solver).not.toBeNull();
    expect(solver?.solve({
      alpha: 0.5,
      point: [0, 0, 0],
      depth: 0,
      dip: 90,
      strikeSpan: [-1, 1],
      dipSpan: [-1, 1],
      dislocation: [1, 0, 0],
    }).displacement).toEqual([0, 0, 0]);
  });

  it('rejects modules without a solver', async () => {
    await expect(loadSolver(path.join(solvers, 'not-a-solver.ts'))).rejects.toThrow(
      ConfigurationError,
    );
  });
});
