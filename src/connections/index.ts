// Database
export { createPool, createDatabase, connectDatabase, runMigrations, rollbackLastMigration } from './db';
export type { Database } from './db';

// Config - All configurations in one place
export { loadAppConfig } from './config/app.config';
export type { AppConfig } from './config/app.config';
export { loadDatabaseConfig } from './config/database.config';
