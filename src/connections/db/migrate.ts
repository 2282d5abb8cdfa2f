import dotenv from 'dotenv';
import { Pool } from 'pg';
import { loadDatabaseConfig } from '../config/database.config';
import { logger } from '../../utils/logging';
import { createPool } from './connection';
import { migrations } from './migrations';
import { Migration } from './migrations/types';

// Create migrations table if not exists
const createMigrationsTable = async (pool: Pool) => {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS migrations (
      id SERIAL PRIMARY KEY,
      name VARCHAR(255) UNIQUE NOT NULL,
      executed_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
    )
  `);
};

const isMigrationExecuted = async (pool: Pool, name: string): Promise<boolean> => {
  const result = await pool.query('SELECT id FROM migrations WHERE name = $1', [name]);
  return result.rows.length > 0;
};

const runMigration = async (pool: Pool, name: string, migration: Migration) => {
  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    await migration.up(client);
    await client.query('INSERT INTO migrations (name) VALUES ($1)', [name]);
    await client.query('COMMIT');
    logger.info(`Migration ${name} executed successfully`);
  } catch (error) {
    await client.query('ROLLBACK');
    logger.error(`Migration ${name} failed`, { error: error instanceof Error ? error.message : String(error) });
    throw error;
  } finally {
    client.release();
  }
};

const rollbackMigration = async (pool: Pool, name: string, migration: Migration) => {
  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    await migration.down(client);
    await client.query('DELETE FROM migrations WHERE name = $1', [name]);
    await client.query('COMMIT');
    logger.info(`Migration ${name} rolled back successfully`);
  } catch (error) {
    await client.query('ROLLBACK');
    logger.error(`Migration ${name} rollback failed`, { error: error instanceof Error ? error.message : String(error) });
    throw error;
  } finally {
    client.release();
  }
};

/**
 * Run all pending migrations in declaration order.
 * Already executed migrations are skipped.
 */
export const runMigrations = async (pool: Pool): Promise<void> => {
  await createMigrationsTable(pool);

  logger.info(`Found ${migrations.length} migration files`);

  for (const { name, migration } of migrations) {
    if (await isMigrationExecuted(pool, name)) {
      logger.debug(`Migration ${name} already executed, skipping`);
      continue;
    }

    await runMigration(pool, name, migration);
  }
};

// Rollback last migration
export const rollbackLastMigration = async (pool: Pool): Promise<void> => {
  await createMigrationsTable(pool);

  const result = await pool.query<{ name: string }>(
    'SELECT name FROM migrations ORDER BY executed_at DESC, id DESC LIMIT 1'
  );

  if (result.rows.length === 0) {
    logger.info('No migrations to rollback');
    return;
  }

  const lastMigrationName = result.rows[0].name;
  const migrationInfo = migrations.find(m => m.name === lastMigrationName);

  if (!migrationInfo) {
    throw new Error(`Migration ${lastMigrationName} not found in migrations list`);
  }

  await rollbackMigration(pool, lastMigrationName, migrationInfo.migration);
};

const main = async (command: string | undefined) => {
  dotenv.config();
  const pool = createPool(loadDatabaseConfig());

  try {
    if (command === 'rollback') {
      await rollbackLastMigration(pool);
    } else {
      await runMigrations(pool);
      logger.info('All migrations completed successfully!');
    }
  } finally {
    await pool.end();
  }
};

// Run if called directly
if (require.main === module) {
  main(process.argv[2]).catch((error: unknown) => {
    logger.error('Migration error', { error: error instanceof Error ? error.message : String(error) });
    process.exit(1);
  });
}
