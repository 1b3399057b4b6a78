import { createRequire } from 'node:module';
import * as Sentry from '@sentry/node';
import type { NextFunction, Request, Response } from 'express';
import pino, { type Logger as PinoLogger } from 'pino';
import pinoHttp from 'pino-http';

const localRequire = createRequire(import.meta.url);

export const LOG_LEVELS = {
  ERROR: 'error',
  WARN: 'warn',
  INFO: 'info',
  DEBUG: 'debug',
  TRACE: 'trace'
} as const;

export type LogLevel = typeof LOG_LEVELS[keyof typeof LOG_LEVELS];

export interface LogContext {
  sessionId?: string;
  saleId?: number;
  productName?: string;
  customerName?: string | null;
  ipAddress?: string;
  userAgent?: string;
  requestId?: string;
  duration?: number;
  [key: string]: unknown;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
  error?: { name: string; message: string; stack?: string };
}

const levelValues = Object.values(LOG_LEVELS);

function isLogLevel(value: string | undefined): value is LogLevel {
  return levelValues.some((level) => level === value);
}

class Logger {
  private logLevel: LogLevel;
  private isDevelopment: boolean;
  private sentryEnabled = false;
  readonly pino: PinoLogger;

  constructor() {
    const configured = process.env.LOG_LEVEL;
    this.logLevel = isLogLevel(configured) ? configured : LOG_LEVELS.INFO;
    this.isDevelopment = process.env.NODE_ENV === 'development';

    // Enable pretty logs in development only if pino-pretty is available
    let hasPretty = false;
    if (this.isDevelopment) {
      try {
        localRequire.resolve('pino-pretty');
        hasPretty = true;
      } catch {
        hasPretty = false;
      }
    }

    this.pino = pino({
      level: this.logLevel,
      base: {
        service: 'harbor-pos',
        env: process.env.NODE_ENV,
      },
      formatters: {
        level: (label) => ({ level: label }),
        bindings: (bindings) => ({ pid: bindings.pid, hostname: bindings.hostname }),
      },
      transport: this.isDevelopment && hasPretty
        ? {
            target: 'pino-pretty',
            options: { colorize: true, translateTime: 'SYS:standard' },
          }
        : undefined,
    });

    const rawDsn = String(process.env.SENTRY_DSN ?? '').trim();
    if (rawDsn) {
      try {
        Sentry.init({
          dsn: rawDsn,
          environment: process.env.NODE_ENV || 'development',
          tracesSampleRate: Number(process.env.SENTRY_TRACES_SAMPLE_RATE || 0.0),
        });
        this.sentryEnabled = true;
      } catch (error) {
        this.pino.warn({ error: error instanceof Error ? error.message : String(error) }, 'Sentry initialization failed (non-fatal)');
      }
    }
  }

  private shouldLog(level: LogLevel): boolean {
    return levelValues.indexOf(level) <= levelValues.indexOf(this.logLevel);
  }

  private formatLog(level: LogLevel, message: string, context?: LogContext, error?: Error): LogEntry {
    return {
      timestamp: new Date().toISOString(),
      level,
      message,
      context,
      error: error ? {
        name: error.name,
        message: error.message,
        stack: error.stack
      } : undefined
    };
  }

  private outputLog(logEntry: LogEntry): void {
    const { level, message, context, error } = logEntry;
    const payload: Record<string, unknown> = { ...context };
    if (error) {
      payload.err = error;
    }
    switch (level) {
      case LOG_LEVELS.ERROR:
        this.pino.error(payload, message);
        break;
      case LOG_LEVELS.WARN:
        this.pino.warn(payload, message);
        break;
      case LOG_LEVELS.DEBUG:
        this.pino.debug(payload, message);
        break;
      case LOG_LEVELS.TRACE:
        this.pino.trace(payload, message);
        break;
      default:
        this.pino.info(payload, message);
    }
  }

  error(message: string, context?: LogContext, error?: unknown): void {
    if (!this.shouldLog(LOG_LEVELS.ERROR)) return;
    const err = error instanceof Error ? error : error !== undefined ? new Error(String(error)) : undefined;
    this.outputLog(this.formatLog(LOG_LEVELS.ERROR, message, context, err));
    if (this.sentryEnabled && err) {
      try {
        Sentry.withScope((scope) => {
          if (context) Object.entries(context).forEach(([k, v]) => scope.setTag(k, String(v)));
          scope.setExtra('message', message);
          Sentry.captureException(err);
        });
      } catch (scopeError) {
        this.pino.warn({ scopeError: scopeError instanceof Error ? scopeError.message : scopeError }, 'Failed to capture exception in Sentry');
      }
    }
  }

  warn(message: string, context?: LogContext): void {
    if (this.shouldLog(LOG_LEVELS.WARN)) {
      this.outputLog(this.formatLog(LOG_LEVELS.WARN, message, context));
    }
  }

  info(message: string, context?: LogContext): void {
    if (this.shouldLog(LOG_LEVELS.INFO)) {
      this.outputLog(this.formatLog(LOG_LEVELS.INFO, message, context));
    }
  }

  debug(message: string, context?: LogContext): void {
    if (this.shouldLog(LOG_LEVELS.DEBUG)) {
      this.outputLog(this.formatLog(LOG_LEVELS.DEBUG, message, context));
    }
  }

  trace(message: string, context?: LogContext): void {
    if (this.shouldLog(LOG_LEVELS.TRACE)) {
      this.outputLog(this.formatLog(LOG_LEVELS.TRACE, message, context));
    }
  }

  // Specialized logging methods for key events
  logSaleEvent(event: 'finalized' | 'deleted' | 'synced', context: LogContext & { total?: string }): void {
    this.info(`Sale event: ${event}`, context);
  }

  logCartEvent(event: 'item_added' | 'quantity_adjusted' | 'item_removed' | 'customer_set' | 'cleared' | 'line_not_found', context: LogContext): void {
    this.debug(`Cart event: ${event}`, context);
  }

  logSecurityEvent(event: 'invalid_api_key' | 'rate_limit_exceeded', context: LogContext): void {
    this.warn(`Security event: ${event}`, context);
  }

  // Request logging middleware
  logRequest(req: Request, res: Response, duration: number): void {
    const context: LogContext = {
      method: req.method,
      path: req.path,
      statusCode: res.statusCode,
      duration,
      ipAddress: req.ip || req.socket.remoteAddress,
      userAgent: req.get('User-Agent'),
      sessionId: req.sessionID,
      requestId: res.locals.requestId
    };

    if (res.statusCode >= 500) {
      this.error(`HTTP ${req.method} ${req.path} - ${res.statusCode}`, context);
    } else if (res.statusCode >= 400) {
      this.warn(`HTTP ${req.method} ${req.path} - ${res.statusCode}`, context);
    } else {
      this.info(`HTTP ${req.method} ${req.path} - ${res.statusCode}`, context);
    }
  }
}

export const logger = new Logger();

// Pino HTTP middleware (optional for direct req.log usage)
export const pinoHttpMiddleware = pinoHttp({
  logger: logger.pino,
  autoLogging: false,
  redact: {
    paths: ['req.headers.authorization', 'req.headers.cookie', 'req.headers["x-api-key"]', 'res.headers["set-cookie"]'],
    remove: true,
  },
});

// Middleware for request logging
export const requestLogger = (req: Request, res: Response, next: NextFunction): void => {
  const start = Date.now();

  res.on('finish', () => {
    const duration = Date.now() - start;
    logger.logRequest(req, res, duration);
  });

  next();
};

// Utility function to extract context from request
export const extractLogContext = (req: Request, additionalContext?: Partial<LogContext>): LogContext => ({
  sessionId: req.sessionID,
  ipAddress: req.ip || req.socket.remoteAddress,
  userAgent: req.get('User-Agent'),
  ...additionalContext,
});
