import { drizzle, type PostgresJsDatabase } from 'drizzle-orm/postgres-js';
import { sql } from 'drizzle-orm';
import postgres from 'postgres';
import * as schema from './schema';

type DrizzleDB = PostgresJsDatabase<typeof schema>;

export type Database = DrizzleDB;

interface DbHandle {
  db: DrizzleDB;
  client: postgres.Sql;
}

// A CLI run opens one pool and closes it on exit; keep it on globalThis so
// re-imports under tsx watch do not leak connections.
const globalForDb = globalThis as unknown as { __salesim_db?: DbHandle };

function getHandle(): DbHandle {
  if (!globalForDb.__salesim_db) {
    const connectionString = process.env.DATABASE_URL;
    if (!connectionString) {
      throw new Error('DATABASE_URL environment variable is required');
    }
    // The generator is sequential (one record per round-trip), so a small
    // pool is enough. Raise DB_POOL_MAX only when running several jobs at once.
    const client = postgres(connectionString, {
      max: parseInt(process.env.DB_POOL_MAX || '2', 10),
      prepare: process.env.DB_PREPARE_STATEMENTS === 'true',
      idle_timeout: 20,
      max_lifetime: 300,
      connect_timeout: 10,
      onnotice: (notice) => {
        console.warn(`[pg-notice] ${notice.severity}: ${notice.message}`);
      },
    });
    globalForDb.__salesim_db = { db: drizzle(client, { schema }), client };
  }
  return globalForDb.__salesim_db;
}

export const db: DrizzleDB = new Proxy({} as DrizzleDB, {
  get(_target, prop, receiver) {
    const instance = getHandle().db;
    const value = Reflect.get(instance, prop, receiver);
    if (typeof value === 'function') {
      return value.bind(instance);
    }
    return value;
  },
});

/** Ends the shared pool. Safe to call when no connection was ever opened. */
export async function closeDb(): Promise<void> {
  const handle = globalForDb.__salesim_db;
  if (!handle) return;
  globalForDb.__salesim_db = undefined;
  await handle.client.end({ timeout: 5 });
}

export { sql, schema };
