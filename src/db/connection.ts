import { drizzle } from 'drizzle-orm/node-postgres';
import pg from 'pg';
import { config } from '@api/config';
import * as schema from './schema';

export const pool = new pg.Pool({ connectionString: config.database.url });

export const db = drizzle(pool, { schema });
