import { PoolClient } from 'pg';
import { Migration } from './types';

export const migration: Migration = {
  async up(client: PoolClient) {
    await client.query(`
      CREATE TABLE IF NOT EXISTS sessions (
        id UUID PRIMARY KEY,
        user_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
        created_at TIMESTAMPTZ DEFAULT CURRENT_TIMESTAMP,
        expires_at TIMESTAMPTZ NOT NULL
      )
    `);

    await client.query(`
      CREATE INDEX IF NOT EXISTS idx_sessions_user ON sessions(user_id)
    `);

    await client.query(`
      CREATE INDEX IF NOT EXISTS idx_sessions_expires_at ON sessions(expires_at)
    `);
  },

  async down(client: PoolClient) {
    await client.query('DROP INDEX IF EXISTS idx_sessions_expires_at');
    await client.query('DROP INDEX IF EXISTS idx_sessions_user');
    await client.query('DROP TABLE IF EXISTS sessions CASCADE');
  },
};
