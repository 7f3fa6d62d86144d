import winston from 'winston';
import path from 'path';

/**
 * Logger Configuration
 *
 * Structured logging for the classification pipeline.
 *
 * Environment:
 * - LOG_LEVEL: winston level (default 'info')
 * - LOG_DIR: directory for log files (default ./logs)
 * - LOG_TO_FILE: set to 'false' to keep logs on the console only
 * - LOG_SILENT: set to 'true' to mute every transport
 */

const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.splat(),
  winston.format.json()
);

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.printf(({ timestamp, level, message, ...metadata }) => {
    let msg = `${timestamp} [${level}] ${message}`;
    if (Object.keys(metadata).length > 0) {
      msg += ` ${JSON.stringify(metadata)}`;
    }
    return msg;
  })
);

function buildTransports(silent: boolean): winston.transport[] {
  const transports: winston.transport[] = [
    new winston.transports.Console({
      format: consoleFormat,
      stderrLevels: ['error', 'warn', 'info', 'debug'],
      silent,
    }),
  ];

  if (process.env.LOG_TO_FILE === 'false' || silent) {
    return transports;
  }

  const logDir = process.env.LOG_DIR || path.join(process.cwd(), 'logs');
  transports.push(
    new winston.transports.File({
      filename: path.join(logDir, 'combined.log'),
      maxsize: 5242880, // 5MB
      maxFiles: 5,
    }),
    new winston.transports.File({
      filename: path.join(logDir, 'error.log'),
      level: 'error',
      maxsize: 5242880, // 5MB
      maxFiles: 5,
    })
  );

  return transports;
}

/**
 * Create a logger instance
 * @param component Component name (e.g., 'ConcurrentRunner', 'RecordLoader')
 */
export function createLogger(component: string): winston.Logger {
  const silent = process.env.LOG_SILENT === 'true';

  return winston.createLogger({
    level: process.env.LOG_LEVEL || 'info',
    format: logFormat,
    defaultMeta: { component },
    transports: buildTransports(silent),
  });
}

/**
 * Default logger instance
 */
export const logger = createLogger('App');

/**
 * Helper to log job events with consistent formatting
 */
export class JobLogger {
  private logger: winston.Logger;
  private jobId: string;

  constructor(jobId: string) {
    this.jobId = jobId;
    this.logger = createLogger(`Job:${jobId}`);
  }

  info(message: string, metadata?: object) {
    this.logger.info(message, { jobId: this.jobId, ...metadata });
  }

  error(message: string, error?: Error | unknown, metadata?: object) {
    this.logger.error(message, {
      jobId: this.jobId,
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
      ...metadata,
    });
  }

  warn(message: string, metadata?: object) {
    this.logger.warn(message, { jobId: this.jobId, ...metadata });
  }

  debug(message: string, metadata?: object) {
    this.logger.debug(message, { jobId: this.jobId, ...metadata });
  }

  started(metadata?: object) {
    this.info('Job started', metadata);
  }

  completed(metadata?: object) {
    this.info('Job completed', metadata);
  }

  failed(error: Error | unknown, metadata?: object) {
    this.error('Job failed', error, metadata);
  }
}
