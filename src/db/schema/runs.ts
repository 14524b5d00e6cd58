import { pgTable, uuid, text, jsonb, timestamp } from 'drizzle-orm/pg-core';
import type { ModelResult } from '@core/model-run';
import type { RunParameters } from '@core/run-parameters';
import type { RunStatus } from '@shared/types';

export const runs = pgTable('runs', {
  id: uuid('id').primaryKey().defaultRandom(),
  ruptureSource: text('rupture_source').notNull(),
  parameters: jsonb('parameters').$type<RunParameters>().notNull(),
  status: text('status').$type<RunStatus>().notNull(),
  result: jsonb('result').$type<ModelResult>(),
  image: text('image'),
  error: text('error'),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
});

export type RunRow = typeof runs.$inferSelect;
export type NewRunRow = typeof runs.$inferInsert;
