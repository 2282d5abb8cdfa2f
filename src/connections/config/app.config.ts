import type { ReportLocale } from '../../modules/reports/reports.types';

export interface AppConfig {
  port: number;
  nodeEnv: string;
  jwtSecret: string;
  sessionTtlSeconds: number;
  frontendUrl: string;
  corsOrigins: string[];
  defaultRedirect: string;
  reportLocale: ReportLocale;
  defaultUser: {
    enabled: boolean;
    username: string;
    password: string;
  };
  loginRateLimit: {
    windowMs: number;
    maxRequests: number;
  };
}

/**
 * Parse CORS origins from environment variable
 * Supports comma or space separated values
 */
export const parseCorsOrigins = (value: string | undefined): string[] => {
  if (!value) {
    return [];
  }

  return value
    .split(/[,\s]+/)
    .map(origin => origin.trim())
    .filter(origin => origin.length > 0);
};

const parseInteger = (value: string | undefined, fallback: number): number => {
  const parsed = parseInt(value || '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

const parseLocale = (value: string | undefined): ReportLocale =>
  value === 'pt-BR' ? 'pt-BR' : 'en-US';

export const loadAppConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const nodeEnv = env.NODE_ENV || 'development';

  return {
    port: parseInteger(env.APP_PORT || env.PORT, 3000),
    nodeEnv,
    jwtSecret: env.JWT_SECRET || 'secret',
    sessionTtlSeconds: parseInteger(env.SESSION_TTL_SECONDS, 3600),
    frontendUrl: env.FRONTEND_URL || 'http://localhost:5173',
    corsOrigins: parseCorsOrigins(env.CORS_ORIGINS),
    defaultRedirect: env.DEFAULT_REDIRECT || '/purchases',
    reportLocale: parseLocale(env.REPORT_LOCALE),
    defaultUser: {
      enabled: (env.CREATE_DEFAULT_USER || 'true') !== 'false',
      username: env.DEFAULT_USERNAME || 'admin',
      password: env.DEFAULT_PASSWORD || 'admin123',
    },
    loginRateLimit: {
      windowMs: parseInteger(env.LOGIN_RATE_WINDOW_MS, 15 * 60 * 1000),
      maxRequests: parseInteger(env.LOGIN_RATE_MAX, 5),
    },
  };
};
