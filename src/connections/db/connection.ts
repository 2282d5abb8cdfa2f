import { Pool, PoolConfig, QueryResultRow } from 'pg';
import { logger } from '../../utils/logging';

/**
 * Narrow query surface shared by repositories and report queries.
 * Resolves with the result rows only.
 */
export interface Database {
  query<R extends QueryResultRow>(text: string, values?: unknown[]): Promise<R[]>;
}

export const createPool = (config: PoolConfig): Pool => {
  const pool = new Pool(config);

  pool.on('error', (err: Error) => {
    logger.error('Unexpected error on idle client', { error: err.message, stack: err.stack });
  });

  return pool;
};

export const createDatabase = (pool: Pool): Database => ({
  async query<R extends QueryResultRow>(text: string, values: unknown[] = []) {
    const result = await pool.query<R>(text, values);
    return result.rows;
  },
});

const wait = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

/**
 * Connect to database and verify connection with retry logic
 */
export const connectDatabase = async (
  pool: Pool,
  maxRetries: number = 10,
  retryDelay: number = 2000
): Promise<void> => {
  for (let attempt = 1; attempt <= maxRetries; attempt++) {
    try {
      await pool.query('SELECT NOW()');
      logger.info('Database connected successfully');
      return;
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      if (attempt >= maxRetries) {
        logger.error(`Database connection error after ${maxRetries} attempts:`, {
          error: error.message,
          stack: error.stack,
        });
        throw error;
      }
      logger.warn(`Database connection attempt ${attempt}/${maxRetries} failed, retrying in ${retryDelay}ms...`, {
        error: error.message,
      });
      await wait(retryDelay);
    }
  }
};
