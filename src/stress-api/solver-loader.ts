import path from 'path';
import { pathToFileURL } from 'url';
import type { DislocationSolver } from '@core/stress-field';
import { ConfigurationError } from '@shared/errors';

export function isDislocationSolver(value: unknown): value is DislocationSolver {
  return (
    typeof value === 'object' &&
    value !== null &&
    'solve' in value &&
    typeof value.solve === 'function'
  );
}

/**
 * Imports the dislocation solver module named by the configuration. The
 * module's default export is used when it is a solver, else the module
 * namespace itself.
 */
export async function loadSolver(modulePath: string | null): Promise<DislocationSolver | null> {
  if (!modulePath) return null;

  const url = pathToFileURL(path.resolve(modulePath)).href;
  const loaded: unknown = await import(url);
  const candidate =
    typeof loaded === 'object' && loaded !== null && 'default' in loaded ? loaded.default : undefined;

  if (isDislocationSolver(candidate)) return candidate;
  if (isDislocationSolver(loaded)) return loaded;
  throw new ConfigurationError(`Module ${modulePath} does not export a solve() function`);
}
