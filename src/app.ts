import express from 'express';
import cors, { CorsOptions } from 'cors';
import { AppConfig } from './connections/config/app.config';
import { Database } from './connections/db/connection';
import { AuthService } from './modules/auth/auth.service';
import { ReportsService } from './modules/reports/reports.service';
import { createRouter } from './routes';
import { createErrorHandler, notFoundHandler } from './middlewares/error.middleware';
import { logger } from './utils/logging';

export interface AppDependencies {
  config: AppConfig;
  db: Database;
  auth: AuthService;
  reports: ReportsService;
}

const DEV_ORIGINS = [
  'http://localhost:3000',
  'http://localhost:5173',
];

export const buildCorsOptions = (config: AppConfig): CorsOptions => {
  const allowedOrigins = new Set<string>(config.corsOrigins);
  if (config.frontendUrl) {
    allowedOrigins.add(config.frontendUrl);
  }
  if (config.nodeEnv === 'development') {
    DEV_ORIGINS.forEach(origin => allowedOrigins.add(origin));
  }

  return {
    origin: (origin, callback) => {
      // Allow requests with no origin (like curl requests)
      if (!origin || allowedOrigins.has(origin)) {
        return callback(null, true);
      }
      callback(new Error('Not allowed by CORS'));
    },
    credentials: true,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-Requested-With', 'Accept', 'Origin'],
    exposedHeaders: ['X-RateLimit-Limit', 'X-RateLimit-Remaining', 'X-RateLimit-Reset'],
    maxAge: 86400, // 24 hours
    optionsSuccessStatus: 200,
  };
};

export const createApp = ({ config, db, auth, reports }: AppDependencies) => {
  const app = express();

  // Middleware
  app.use(cors(buildCorsOptions(config)));
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  // Health check
  app.get('/health', async (_req, res) => {
    try {
      await db.query('SELECT 1');
      res.json({ status: 'ok', database: 'connected' });
    } catch (error) {
      logger.error('[Health] Database check failed', {
        error: error instanceof Error ? error.message : String(error),
      });
      res.status(500).json({ status: 'error', database: 'disconnected' });
    }
  });

  // API Routes
  app.use('/api', createRouter({ config, auth, reports }));

  // Error handling
  app.use(notFoundHandler);
  app.use(createErrorHandler(config.nodeEnv));

  return app;
};
