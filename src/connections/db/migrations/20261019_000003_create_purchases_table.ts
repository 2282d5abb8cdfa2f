import { PoolClient } from 'pg';
import { Migration } from './types';

export const migration: Migration = {
  async up(client: PoolClient) {
    // Rows are loaded by an external process; the API only reads them
    await client.query(`
      CREATE TABLE IF NOT EXISTS purchases (
        id SERIAL PRIMARY KEY,
        product_code INTEGER NOT NULL,
        description VARCHAR(255) NOT NULL,
        quantity NUMERIC(15, 3) NOT NULL,
        unit_price NUMERIC(15, 2) NOT NULL,
        -- quantity * unit_price, not enforced
        total_value NUMERIC(15, 2) NOT NULL,
        date DATE,
        account_id INTEGER,
        user_id INTEGER REFERENCES users(id) ON DELETE SET NULL
      )
    `);

    await client.query(`
      CREATE INDEX IF NOT EXISTS idx_purchases_product_code ON purchases(product_code)
    `);

    await client.query(`
      CREATE INDEX IF NOT EXISTS idx_purchases_date ON purchases(date DESC)
    `);

    await client.query(`
      CREATE INDEX IF NOT EXISTS idx_purchases_account ON purchases(account_id)
    `);
  },

  async down(client: PoolClient) {
    await client.query('DROP INDEX IF EXISTS idx_purchases_account');
    await client.query('DROP INDEX IF EXISTS idx_purchases_date');
    await client.query('DROP INDEX IF EXISTS idx_purchases_product_code');
    await client.query('DROP TABLE IF EXISTS purchases CASCADE');
  },
};
