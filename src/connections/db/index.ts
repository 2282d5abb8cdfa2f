export { createPool, createDatabase, connectDatabase } from './connection';
export type { Database } from './connection';
export { runMigrations, rollbackLastMigration } from './migrate';
