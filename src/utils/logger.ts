/**
 * Structured Logging with Winston
 * Provides consistent, structured logging across the gateway
 */

import winston from 'winston';
import path from 'path';
import fs from 'fs';

type LogMeta = Record<string, unknown>;
type LogTransport =
  | InstanceType<typeof winston.transports.Console>
  | InstanceType<typeof winston.transports.File>;

// File logging is opt-in; the CLI and tests stay on the console
const LOG_DIR = process.env.CHATGATE_LOG_DIR;

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'HH:mm:ss' }),
  winston.format.printf(({ level, message, timestamp, requestId, ...meta }) => {
    const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    const reqId = requestId && typeof requestId === 'string' ? ` [${requestId.substring(0, 8)}]` : '';
    return `${timestamp}${reqId} ${level}: ${message}${metaStr}`;
  })
);

const fileFormat = winston.format.combine(
  winston.format.timestamp(),
  winston.format.errors({ stack: true }),
  winston.format.json()
);

const logLevel = process.env.LOG_LEVEL || process.env.CHATGATE_LOG_LEVEL || 'info';
const isVerbose = process.env.CHATGATE_VERBOSE === 'true' || process.env.DEBUG === 'true';

function createTransports(): LogTransport[] {
  const transports: LogTransport[] = [
    // Console output (only warnings and errors by default)
    new winston.transports.Console({
      level: isVerbose ? 'debug' : 'warn',
      format: consoleFormat,
      silent: process.env.CHATGATE_SILENT === 'true',
    }),
  ];

  if (LOG_DIR) {
    fs.mkdirSync(LOG_DIR, { recursive: true });
    transports.push(
      new winston.transports.File({
        filename: path.join(LOG_DIR, 'combined.log'),
        format: fileFormat,
        maxsize: 10 * 1024 * 1024, // 10MB
        maxFiles: 5,
        tailable: true,
      }),
      new winston.transports.File({
        filename: path.join(LOG_DIR, 'error.log'),
        level: 'error',
        format: fileFormat,
        maxsize: 10 * 1024 * 1024, // 10MB
        maxFiles: 5,
        tailable: true,
      })
    );
  }

  return transports;
}

/**
 * Main application logger
 */
export const logger = winston.createLogger({
  level: isVerbose ? 'debug' : logLevel,
  defaultMeta: {
    service: 'chatgate',
    pid: process.pid,
  },
  transports: createTransports(),
});

/**
 * Raise the console transport to debug output (CLI --verbose)
 */
export function setConsoleVerbose(verbose: boolean): void {
  for (const transport of logger.transports) {
    if (transport instanceof winston.transports.Console) {
      transport.level = verbose ? 'debug' : 'warn';
    }
  }
  if (verbose) {
    logger.level = 'debug';
  }
}

/**
 * Create a request-scoped logger with correlation ID
 */
export function createRequestLogger(requestId: string): winston.Logger {
  return logger.child({ requestId });
}

/**
 * Create a component-specific logger
 */
export function createComponentLogger(component: string): winston.Logger {
  return logger.child({ component });
}

/**
 * Structured log helpers
 */
export const log = {
  /**
   * Log an error with stack trace
   */
  error: (message: string, error?: Error, meta?: LogMeta) => {
    if (error) {
      logger.error(message, {
        error: {
          message: error.message,
          stack: error.stack,
          name: error.name,
        },
        ...meta,
      });
    } else {
      logger.error(message, meta);
    }
  },

  warn: (message: string, meta?: LogMeta) => {
    logger.warn(message, meta);
  },

  info: (message: string, meta?: LogMeta) => {
    logger.info(message, meta);
  },

  debug: (message: string, meta?: LogMeta) => {
    logger.debug(message, meta);
  },

  /**
   * Log an HTTP request/response
   */
  http: (method: string, url: string, statusCode?: number, duration?: number) => {
    logger.http('HTTP Request', {
      method,
      url,
      statusCode,
      duration,
    });
  },

  /**
   * Log performance metric
   */
  perf: (operation: string, duration: number, meta?: LogMeta) => {
    logger.info(`Performance: ${operation}`, {
      operation,
      duration,
      unit: 'ms',
      ...meta,
    });
  },
};

/**
 * Performance measurement utility
 */
export class PerformanceTimer {
  private startTime: number;
  private name: string;
  private meta?: LogMeta;

  constructor(name: string, meta?: LogMeta) {
    this.name = name;
    this.meta = meta;
    this.startTime = Date.now();
    log.debug(`Starting: ${name}`, meta);
  }

  /**
   * End timing and log result
   */
  end(additionalMeta?: LogMeta): number {
    const duration = Date.now() - this.startTime;
    log.perf(this.name, duration, { ...this.meta, ...additionalMeta });
    return duration;
  }
}
