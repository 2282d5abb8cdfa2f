import { PoolClient } from 'pg';
import { Migration } from './types';

export const migration: Migration = {
  async up(client: PoolClient) {
    await client.query(`
      CREATE TABLE IF NOT EXISTS stock_movements (
        id SERIAL PRIMARY KEY,
        product_code INTEGER NOT NULL,
        description VARCHAR(255) NOT NULL,
        quantity NUMERIC(15, 3) NOT NULL,
        unit_value NUMERIC(15, 2) NOT NULL,
        total_value NUMERIC(15, 2) NOT NULL,
        physical_quantity NUMERIC(15, 3) NOT NULL,
        inbound_quantity NUMERIC(15, 3) NOT NULL,
        outbound_quantity NUMERIC(15, 3) NOT NULL,
        date DATE,
        account_id INTEGER,
        user_id INTEGER REFERENCES users(id) ON DELETE SET NULL
      )
    `);

    await client.query(`
      CREATE INDEX IF NOT EXISTS idx_stock_movements_product_code ON stock_movements(product_code)
    `);

    await client.query(`
      CREATE INDEX IF NOT EXISTS idx_stock_movements_date ON stock_movements(date DESC)
    `);

    await client.query(`
      CREATE INDEX IF NOT EXISTS idx_stock_movements_account ON stock_movements(account_id)
    `);
  },

  async down(client: PoolClient) {
    await client.query('DROP INDEX IF EXISTS idx_stock_movements_account');
    await client.query('DROP INDEX IF EXISTS idx_stock_movements_date');
    await client.query('DROP INDEX IF EXISTS idx_stock_movements_product_code');
    await client.query('DROP TABLE IF EXISTS stock_movements CASCADE');
  },
};
