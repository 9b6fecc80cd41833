import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres';
import pg from 'pg';
import * as schema from './schema';

export type Database = NodePgDatabase<typeof schema>;

export interface DatabaseHandle {
  db: Database;
  close(): Promise<void>;
}

export function connectDatabase(url: string): DatabaseHandle {
  const pool = new pg.Pool({ connectionString: url });
  pool.on('error', (err) => {
    console.error('[DB] Idle client error:', err.message);
  });
  return {
    db: drizzle(pool, { schema }),
    close: () => pool.end(),
  };
}
