import { desc, eq } from 'drizzle-orm';
import type { NodePgDatabase } from 'drizzle-orm/node-postgres';
import type * as schema from './schema';
import { runs, type NewRunRow, type RunRow } from './schema/runs';

export type RunListItem = Pick<RunRow, 'id' | 'ruptureSource' | 'status' | 'error' | 'createdAt'>;

/** Where finished runs are handed off. */
export interface RunStore {
  create(run: NewRunRow): Promise<RunRow>;
  /** Newest first, without result bodies. */
  list(): Promise<RunListItem[]>;
  get(id: string): Promise<RunRow | null>;
}

export class DrizzleRunStore implements RunStore {
  constructor(private readonly db: NodePgDatabase<typeof schema>) {}

  async create(run: NewRunRow): Promise<RunRow> {
    const [row] = await this.db.insert(runs).values(run).returning();
    return row;
  }

  async list(): Promise<RunListItem[]> {
    return this.db
      .select({
        id: runs.id,
        ruptureSource: runs.ruptureSource,
        status: runs.status,
        error: runs.error,
        createdAt: runs.createdAt,
      })
      .from(runs)
      .orderBy(desc(runs.createdAt));
  }

  async get(id: string): Promise<RunRow | null> {
    const [row] = await this.db.select().from(runs).where(eq(runs.id, id));
    return row ?? null;
  }
}
