/**
 * Structured Logger
 *
 * One JSON line per entry, written through console so the host (Vercel,
 * systemd, docker) collects it as-is. Supports:
 * - Correlation IDs for one aggregation round or one chat update
 * - Masking of credential-looking fields (provider keys, bot token)
 * - Level filtering from LOG_LEVEL
 */

import { nanoid } from 'nanoid';

/**
 * Log levels ordered by severity
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  FATAL = 4,
}

const LOG_LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: 'debug',
  [LogLevel.INFO]: 'info',
  [LogLevel.WARN]: 'warn',
  [LogLevel.ERROR]: 'error',
  [LogLevel.FATAL]: 'fatal',
};

/**
 * Context carried by a logger and copied into every entry
 */
export interface LogContext {
  /** Unique ID of one update or one aggregation round */
  correlationId?: string;
  /** Chat that submitted the URL */
  submitterId?: string;
  /** Service/module name */
  service?: string;
  [key: string]: unknown;
}

export interface LogEntry {
  timestamp: string;
  level: string;
  message: string;
  correlationId?: string;
  submitterId?: string;
  service?: string;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
  duration?: number;
  [key: string]: unknown;
}

/**
 * Field names whose values never reach the output
 */
const SENSITIVE_PATTERNS = [
  /password/i,
  /token/i,
  /secret/i,
  /apikey/i,
  /api_key/i,
  /app_key/i,
  /auth_?key/i,
  /authorization/i,
  /credential/i,
];

function isSensitiveField(fieldName: string): boolean {
  return SENSITIVE_PATTERNS.some((pattern) => pattern.test(fieldName));
}

/**
 * Recursively mask sensitive data in an object
 */
export function maskSensitiveData(data: unknown, depth = 0): unknown {
  if (depth > 10) return '[MAX_DEPTH]';

  if (data === null || data === undefined) {
    return data;
  }

  if (typeof data === 'string') {
    // Telegram bot tokens look like 123456:AA...
    if (/^\d{6,}:[A-Za-z0-9_-]{30,}$/.test(data)) {
      return '[BOT_TOKEN_REDACTED]';
    }
    if (/^[a-zA-Z0-9]{32,}$/.test(data)) {
      return '[API_KEY_REDACTED]';
    }
    return data;
  }

  if (Array.isArray(data)) {
    return data.map((item) => maskSensitiveData(item, depth + 1));
  }

  if (typeof data === 'object') {
    const masked: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(data)) {
      masked[key] = isSensitiveField(key) ? '[REDACTED]' : maskSensitiveData(value, depth + 1);
    }
    return masked;
  }

  return data;
}

function formatError(error: Error): { name: string; message: string; stack?: string } {
  return {
    name: error.name,
    message: error.message,
    stack: process.env.NODE_ENV !== 'production' ? error.stack : undefined,
  };
}

function getMinLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  switch (envLevel) {
    case 'debug':
      return LogLevel.DEBUG;
    case 'info':
      return LogLevel.INFO;
    case 'warn':
    case 'warning':
      return LogLevel.WARN;
    case 'error':
      return LogLevel.ERROR;
    case 'fatal':
      return LogLevel.FATAL;
    default:
      return process.env.NODE_ENV === 'production' ? LogLevel.INFO : LogLevel.DEBUG;
  }
}

/**
 * Logger class with context binding
 */
export class Logger {
  private context: LogContext;
  private minLevel: LogLevel;
  private service: string;

  constructor(service: string, context: LogContext = {}) {
    this.service = service;
    this.context = context;
    this.minLevel = getMinLevel();
  }

  /**
   * Create a child logger with additional context
   */
  child(additionalContext: LogContext): Logger {
    const childLogger = new Logger(this.service, {
      ...this.context,
      ...additionalContext,
    });
    childLogger.minLevel = this.minLevel;
    return childLogger;
  }

  /**
   * Create logger with correlation ID
   */
  withCorrelationId(correlationId: string): Logger {
    return this.child({ correlationId });
  }

  /**
   * Create logger bound to a submitting chat
   */
  withSubmitter(submitterId: string): Logger {
    return this.child({ submitterId });
  }

  private write(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (level < this.minLevel) {
      return;
    }

    const { correlationId, submitterId, service: _service, ...extra } = this.context;
    const maskedMeta = maskSensitiveData({ ...extra, ...meta });

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level: LOG_LEVEL_NAMES[level],
      message,
      service: this.service,
      ...(correlationId ? { correlationId } : {}),
      ...(submitterId ? { submitterId } : {}),
      ...(typeof maskedMeta === 'object' && maskedMeta !== null ? maskedMeta : {}),
    };

    const json = JSON.stringify(entry);

    switch (level) {
      case LogLevel.DEBUG:
        console.debug(json);
        break;
      case LogLevel.INFO:
        console.info(json);
        break;
      case LogLevel.WARN:
        console.warn(json);
        break;
      case LogLevel.ERROR:
      case LogLevel.FATAL:
        console.error(json);
        break;
    }
  }

  /**
   * Log debug message
   */
  debug(message: string, meta?: Record<string, unknown>): void {
    this.write(LogLevel.DEBUG, message, meta);
  }

  /**
   * Log info message
   */
  info(message: string, meta?: Record<string, unknown>): void {
    this.write(LogLevel.INFO, message, meta);
  }

  /**
   * Log warning message
   */
  warn(message: string, meta?: Record<string, unknown>): void {
    this.write(LogLevel.WARN, message, meta);
  }

  /**
   * Log error message
   */
  error(message: string, errorOrMeta?: Error | Record<string, unknown>, meta?: Record<string, unknown>): void {
    this.write(LogLevel.ERROR, message, mergeErrorMeta(errorOrMeta, meta));
  }

  /**
   * Log fatal message
   */
  fatal(message: string, errorOrMeta?: Error | Record<string, unknown>, meta?: Record<string, unknown>): void {
    this.write(LogLevel.FATAL, message, mergeErrorMeta(errorOrMeta, meta));
  }

  /**
   * Time an async operation
   */
  async time<T>(
    operation: string,
    fn: () => Promise<T>,
    meta?: Record<string, unknown>
  ): Promise<T> {
    const start = Date.now();
    try {
      const result = await fn();
      this.info(`${operation} completed`, { ...meta, duration: Date.now() - start, success: true });
      return result;
    } catch (error) {
      this.error(`${operation} failed`, toError(error), {
        ...meta,
        duration: Date.now() - start,
        success: false,
      });
      throw error;
    }
  }
}

function mergeErrorMeta(
  errorOrMeta?: Error | Record<string, unknown>,
  meta?: Record<string, unknown>
): Record<string, unknown> {
  const finalMeta: Record<string, unknown> = meta ?? {};

  if (errorOrMeta instanceof Error) {
    return { ...finalMeta, error: formatError(errorOrMeta) };
  }
  if (errorOrMeta) {
    return { ...finalMeta, ...errorOrMeta };
  }
  return finalMeta;
}

/**
 * Coerce a caught value to an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Generate a correlation ID
 */
export function generateCorrelationId(): string {
  return `cid_${nanoid(21)}`;
}

/**
 * Create a logger for a service
 */
export function createLogger(service: string, context?: LogContext): Logger {
  return new Logger(service, context);
}

/**
 * Pre-configured loggers
 */
export const loggers = {
  verifier: createLogger('verifier'),
  aggregator: createLogger('aggregator'),
  reports: createLogger('reports'),
  broadcast: createLogger('broadcast'),
  bot: createLogger('bot'),
  api: createLogger('api'),
  config: createLogger('config'),
  db: createLogger('database'),
};

/**
 * Default logger
 */
export const log = createLogger('linkwatch');
