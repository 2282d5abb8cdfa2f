import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import path from 'path';
import fs from 'fs';

type LogMeta = Record<string, unknown>;

const LOG_MAX_SIZE = '10MB';
const LOG_RETENTION = '30d';

class LoggingConfig {
  private logLevel: string;
  private compression: boolean;
  private logDir: string;
  private fileLogging: boolean;
  private silent: boolean;

  constructor(env: NodeJS.ProcessEnv = process.env) {
    this.logLevel = env.LOG_LEVEL || 'INFO';
    this.compression = true;
    this.logDir = env.LOG_DIR || path.join(__dirname, '../../logs');

    // Test runs log nowhere
    this.silent = env.NODE_ENV === 'test';
    this.fileLogging = !this.silent && env.LOG_TO_FILE !== 'false';

    if (this.fileLogging && !fs.existsSync(this.logDir)) {
      fs.mkdirSync(this.logDir, { recursive: true });
    }
  }

  private formatLine(info: winston.Logform.TransformableInfo, stackPrefix: string): string {
    const { timestamp, level, message, stack, ...meta } = info;
    const stackStr = stack ? `\n${stackPrefix}${String(stack)}` : '';
    const metaStr = Object.keys(meta).length ? ` | ${JSON.stringify(meta)}` : '';
    return `${String(timestamp)} | ${level} | ${String(message)}${metaStr}${stackStr}`;
  }

  private createConsoleFormat() {
    return winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
      winston.format.colorize({ all: true }),
      winston.format.printf(info => this.formatLine(info, ''))
    );
  }

  private createFileFormat() {
    return winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
      winston.format.errors({ stack: true }),
      winston.format.printf(info => this.formatLine(info, 'Stack: '))
    );
  }

  private createRotatingFile(name: string, level?: string): DailyRotateFile {
    return new DailyRotateFile({
      filename: path.join(this.logDir, `${name}-%DATE%.log`),
      datePattern: 'YYYY-MM-DD',
      maxSize: LOG_MAX_SIZE,
      maxFiles: LOG_RETENTION,
      zippedArchive: this.compression,
      level,
      format: this.createFileFormat(),
    });
  }

  setupLogging(): winston.Logger {
    const logger = winston.createLogger({
      level: this.logLevel.toLowerCase(),
      format: this.createFileFormat(),
      transports: [],
      silent: this.silent,
      exitOnError: false,
    });

    // Console transport - with colors and nice formatting
    logger.add(new winston.transports.Console({
      level: this.logLevel.toLowerCase(),
      format: this.createConsoleFormat(),
    }));

    if (this.fileLogging) {
      logger.add(this.createRotatingFile('sys'));
      logger.add(this.createRotatingFile('error', 'error'));
      // combined keeps every level
      logger.add(this.createRotatingFile('combined', 'silly'));
    }

    return logger;
  }

  getLogger(name?: string): winston.Logger {
    if (name) {
      return logger.child({ name });
    }
    return logger;
  }
}

export const loggingConfig = new LoggingConfig();

// Setup logging when module is imported
export const logger = loggingConfig.setupLogging();

export function auditLog(event: string, details: LogMeta = {}) {
  logger.info(`[AUDIT] ${event}`, details);
}
