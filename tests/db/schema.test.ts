import { describe, it, expect } from 'vitest';
import { getTableName } from 'drizzle-orm';
import { getTableConfig } from 'drizzle-orm/pg-core';
import { runs } from '@db/schema';

describe('runs schema', () => {
  it('exports a runs table', () => {
    expect(getTableName(runs)).toBe('runs');
  });

  it('has the run columns', () => {
    const columns = getTableConfig(runs).columns.map((c) => c.name);
    expect(columns).toEqual([
      'id',
      'rupture_source',
      'parameters',
      'status',
      'result',
      'image',
      'error',
      'created_at',
    ]);
  });

  it('requires parameters and status but not a result', () => {
    expect(runs.parameters.notNull).toBe(true);
    expect(runs.status.notNull).toBe(true);
    expect(runs.result.notNull).toBe(false);
    expect(runs.id.primary).toBe(true);
  });
});
