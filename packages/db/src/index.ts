export { db, closeDb, sql, schema } from './client';
export type { Database } from './client';
export * from './schema';
