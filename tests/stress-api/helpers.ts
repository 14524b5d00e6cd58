import { randomUUID } from 'crypto';
import path from 'path';
import { fileURLToPath } from 'url';
import type { RunListItem, RunStore } from '../../src/db/run-store';
import type { NewRunRow, RunRow } from '../../src/db/schema/runs';
import type { CatalogSource } from '../../src/stress-core/catalog';
import type { DislocationSolver } from '../../src/stress-core/stress-field';
import { FileRuptureSource } from '../../src/stress-core/srcmod';
import type { ApiDependencies } from '../../src/stress-api/routes/index';

export const srcmodFixtures = path.resolve(
  path.dirname(fileURLToPath(import.meta.url)),
  '../fixtures/srcmod',
);

/** Keeps runs in memory, newest first on list. */
export class MemoryRunStore implements RunStore {
  rows: RunRow[] = [];

  async create(run: NewRunRow): Promise<RunRow> {
    const row: RunRow = {
      id: run.id ?? randomUUID(),
      ruptureSource: run.ruptureSource,
      parameters: run.parameters,
      status: run.status,
      result: run.result ?? null,
      image: run.image ?? null,
      error: run.error ?? null,
      createdAt: run.createdAt ?? new Date(Date.UTC(2024, 0, 1, 0, 0, this.rows.length)),
    };
    this.rows.push(row);
    return row;
  }

  async list(): Promise<RunListItem[]> {
    return [...this.rows]
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
      .map(({ id, ruptureSource, status, error, createdAt }) => ({
        id,
        ruptureSource,
        status,
        error,
        createdAt,
      }));
  }

  async get(id: string): Promise<RunRow | null> {
    return this.rows.find((row) => row.id === id) ?? null;
  }
}

export const zeroSolver: DislocationSolver = {
  solve: () => ({
    displacement: [0, 0, 0],
    gradient: [
      [0, 0, 0],
      [0, 0, 0],
      [0, 0, 0],
    ],
  }),
};

export const emptyCatalog: CatalogSource = {
  fetchEvents: async () => [],
};

export function testDependencies(overrides: Partial<ApiDependencies> = {}): ApiDependencies {
  return {
    ruptureSource: new FileRuptureSource(srcmodFixtures),
    catalogSource: emptyCatalog,
    solver: zeroSolver,
    runStore: new MemoryRunStore(),
    ...overrides,
  };
}
