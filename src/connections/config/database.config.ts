import type { PoolConfig } from 'pg';

export const loadDatabaseConfig = (env: NodeJS.ProcessEnv = process.env): PoolConfig => {
  if (env.DATABASE_URL) {
    return {
      connectionString: env.DATABASE_URL,
      max: parseInt(env.DB_POOL_MAX || '10', 10),
    };
  }

  return {
    host: env.DB_HOST || 'localhost',
    port: parseInt(env.DB_PORT || '5432', 10),
    user: env.DB_USER || 'postgres',
    password: env.DB_PASSWORD || 'postgres',
    database: env.DB_NAME || 'reports',
    max: parseInt(env.DB_POOL_MAX || '10', 10),
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 5000,
  };
};
