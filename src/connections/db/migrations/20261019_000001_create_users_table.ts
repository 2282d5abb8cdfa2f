import { PoolClient } from 'pg';
import { Migration } from './types';

export const migration: Migration = {
  async up(client: PoolClient) {
    await client.query(`
      CREATE TABLE IF NOT EXISTS users (
        id SERIAL PRIMARY KEY,
        -- Case-sensitive login name
        username VARCHAR(50) UNIQUE NOT NULL,
        password_hash VARCHAR(255) NOT NULL,
        created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
        updated_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
      )
    `);
  },

  async down(client: PoolClient) {
    await client.query('DROP TABLE IF EXISTS users CASCADE');
  },
};
