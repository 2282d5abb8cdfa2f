import dotenv from 'dotenv';
import { createApp } from './app';
import {
  connectDatabase,
  createDatabase,
  createPool,
  loadAppConfig,
  loadDatabaseConfig,
  runMigrations,
} from './connections';
import { createAuthService } from './modules/auth/auth.service';
import { createSessionsRepository } from './modules/auth/sessions.repository';
import { createUsersRepository } from './modules/auth/users.repository';
import { createReportsService } from './modules/reports/reports.service';
import { logger } from './utils/logging';

dotenv.config();

/**
 * Initialize connections and start server
 */
const startServer = async () => {
  const config = loadAppConfig();
  const pool = createPool(loadDatabaseConfig());
  const db = createDatabase(pool);

  logger.info('Connecting to database...');
  await connectDatabase(pool);

  logger.info('Running database migrations...');
  await runMigrations(pool);

  const auth = createAuthService(createUsersRepository(db), createSessionsRepository(db), {
    jwtSecret: config.jwtSecret,
    sessionTtlSeconds: config.sessionTtlSeconds,
    defaultRedirect: config.defaultRedirect,
    defaultUser: config.defaultUser,
  });
  const reports = createReportsService(db, { locale: config.reportLocale });

  if (config.defaultUser.enabled) {
    await auth.ensureDefaultUser();
  }

  const app = createApp({ config, db, auth, reports });

  const server = app.listen(config.port, () => {
    logger.info(`Server is running on port ${config.port}`);
    logger.info(`Environment: ${config.nodeEnv}`);
  });

  const shutdown = (signal: string) => {
    logger.info(`${signal} received, shutting down...`);
    server.close(() => {
      pool.end()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error('Failed to close database pool', {
            error: error instanceof Error ? error.message : String(error),
          });
          process.exit(1);
        });
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
};

startServer().catch((error: unknown) => {
  const err = error instanceof Error ? error : new Error(String(error));
  logger.error('Failed to start server:', { error: err.message, stack: err.stack });
  logger.error('Exiting application...');
  process.exit(1);
});
