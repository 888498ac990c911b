/**
 * Structured logging for the compatibility audit
 *
 * JSON logging through pino with context preservation and redaction of
 * credential fields. Logs are written to stderr so stdout stays reserved for
 * the text report.
 *
 * @license MIT
 */

import pino, { type Logger as PinoLogger, type LoggerOptions } from 'pino';

// ==============================================
// Types and Interfaces
// ==============================================

/**
 * Log levels supported by the system
 */
export enum LogLevel {
  TRACE = 'trace',
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
  FATAL = 'fatal',
  SILENT = 'silent',
}

/**
 * Structured log context for operations
 */
export interface LogContext {
  /** Operation being performed */
  operation?: string;
  /** Check being executed */
  check?: string;
  /** Host or alias the run targets */
  target?: string;
  /** Duration of operation in milliseconds */
  duration?: number;
  /** Component generating the log */
  component?: string;
  /** Additional context data */
  [key: string]: unknown;
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  /** Log level (default: ORA_AUDIT_LOG_LEVEL or info) */
  level?: LogLevel;
  /** Enable pretty printing for development */
  prettyPrint?: boolean;
  /** Service name for logs */
  serviceName?: string;
  /** Environment (development, production, test) */
  environment?: string;
  /** Enable/disable sensitive data sanitization */
  sanitizeSensitiveData?: boolean;
  /** Additional base context to include in all logs */
  baseContext?: Record<string, unknown>;
  /** Custom Pino options */
  pinoOptions?: Partial<LoggerOptions>;
}

/**
 * Timing information for operations
 */
export interface TimingInfo {
  startTime: Date;
  endTime: Date;
  duration: number;
}

// ==============================================
// Sensitive Data Patterns
// ==============================================

const SENSITIVE_PATTERNS = [
  /password/i,
  /secret/i,
  /token/i,
  /credential/i,
  /wallet/i,
];

const SENSITIVE_FIELDS = new Set([
  'password',
  'secret',
  'token',
  'connectstring',
  'credentials',
  'authorization',
]);

// ==============================================
// Utility Functions
// ==============================================

/**
 * Redact sensitive values from log context
 */
export function sanitizeLogValue(value: unknown, depth = 0): unknown {
  if (depth > 10) {
    return '[Maximum depth reached]';
  }

  if (value === null || value === undefined) {
    return value;
  }

  if (typeof value === 'string') {
    return sanitizeString(value);
  }

  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return value;
  }

  if (value instanceof Date) {
    return value.toISOString();
  }

  if (value instanceof Error) {
    return {
      name: value.name,
      message: sanitizeString(value.message),
      stack: process.env.NODE_ENV === 'development' ? value.stack : undefined,
    };
  }

  if (Array.isArray(value)) {
    return value.map(item => sanitizeLogValue(item, depth + 1));
  }

  if (typeof value === 'object') {
    const sanitized: Record<string, unknown> = {};

    for (const [key, entry] of Object.entries(value)) {
      if (SENSITIVE_FIELDS.has(key.toLowerCase()) || SENSITIVE_PATTERNS.some(pattern => pattern.test(key))) {
        sanitized[key] = '[REDACTED]';
      } else {
        sanitized[key] = sanitizeLogValue(entry, depth + 1);
      }
    }

    return sanitized;
  }

  return String(value);
}

function sanitizeString(str: string): string {
  return str
    .replace(/((?:password|pwd|secret|token)=)[^\s;&]+/gi, '$1[REDACTED]')
    .replace(/([a-z0-9_]+)\/[^@\s]+@/gi, '$1/***@');
}

function sanitizeContext(context: LogContext): Record<string, unknown> {
  const sanitized = sanitizeLogValue(context);
  return typeof sanitized === 'object' && sanitized !== null && !Array.isArray(sanitized)
    ? { ...sanitized }
    : {};
}

function resolveLevel(level?: LogLevel): LogLevel {
  if (level) {
    return level;
  }

  const fromEnv = process.env.ORA_AUDIT_LOG_LEVEL;
  const known = Object.values(LogLevel).find(candidate => candidate === fromEnv);
  return known ?? LogLevel.INFO;
}

// ==============================================
// Structured Logger Implementation
// ==============================================

/**
 * Structured logger with context preservation and sensitive data sanitization
 */
export class StructuredLogger {
  private readonly logger: PinoLogger;
  private readonly config: Required<LoggerConfig>;
  private readonly baseContext: Record<string, unknown>;

  constructor(config: LoggerConfig = {}) {
    this.config = {
      level: resolveLevel(config.level),
      prettyPrint: config.prettyPrint ?? process.env.NODE_ENV === 'development',
      serviceName: config.serviceName || 'ora-compat-audit',
      environment: config.environment || process.env.NODE_ENV || 'production',
      sanitizeSensitiveData: config.sanitizeSensitiveData !== false,
      baseContext: config.baseContext || {},
      pinoOptions: config.pinoOptions || {},
    };

    this.baseContext = {
      service: this.config.serviceName,
      environment: this.config.environment,
      pid: process.pid,
      ...this.config.baseContext,
    };

    const pinoConfig: LoggerOptions = {
      level: this.config.level,
      base: this.baseContext,
      timestamp: pino.stdTimeFunctions.isoTime,
      formatters: {
        level: (label) => ({ level: label }),
      },
      ...this.config.pinoOptions,
    };

    if (this.config.prettyPrint) {
      pinoConfig.transport = {
        target: 'pino-pretty',
        options: {
          colorize: true,
          ignore: 'pid,service,environment',
          translateTime: 'HH:MM:ss.l',
          destination: 2,
        },
      };
      this.logger = pino(pinoConfig);
    } else {
      this.logger = pino(pinoConfig, pino.destination(2));
    }
  }

  /**
   * Create a child logger with additional context
   */
  child(context: LogContext): StructuredLogger {
    const childContext = this.config.sanitizeSensitiveData
      ? sanitizeContext(context)
      : context;

    return new StructuredLogger({
      ...this.config,
      baseContext: {
        ...this.config.baseContext,
        ...childContext,
      },
    });
  }

  /**
   * Create a timing tracker for operations
   */
  createTimer(): {
    end(message?: string, context?: LogContext): TimingInfo;
  } {
    const startTime = new Date();

    return {
      end: (message?: string, context?: LogContext) => {
        const endTime = new Date();
        const timing = {
          startTime,
          endTime,
          duration: endTime.getTime() - startTime.getTime(),
        };

        if (message) {
          this.debug(message, { ...context, duration: timing.duration });
        }

        return timing;
      },
    };
  }

  trace(message: string, context?: LogContext): void {
    this.log(LogLevel.TRACE, message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log(LogLevel.WARN, message, context);
  }

  error(message: string, error?: unknown, context?: LogContext): void {
    const errorContext = error ? { error } : {};
    this.log(LogLevel.ERROR, message, { ...errorContext, ...context });
  }

  fatal(message: string, error?: unknown, context?: LogContext): void {
    const errorContext = error ? { error } : {};
    this.log(LogLevel.FATAL, message, { ...errorContext, ...context });
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (level === LogLevel.SILENT) {
      return;
    }

    const payload = context && this.config.sanitizeSensitiveData
      ? sanitizeContext(context)
      : context;

    this.logger[level](payload || {}, message);
  }

  /**
   * Check if a log level is enabled
   */
  isLevelEnabled(level: LogLevel): boolean {
    return this.logger.isLevelEnabled(level);
  }

  /**
   * Get current logger configuration
   */
  getConfig(): Required<LoggerConfig> {
    return { ...this.config };
  }

  /**
   * Flush any pending logs
   */
  flush(): void {
    this.logger.flush();
  }
}

// ==============================================
// Convenience Functions
// ==============================================

/**
 * Create a logger for a specific component
 */
export function createComponentLogger(component: string, config?: LoggerConfig): StructuredLogger {
  return new StructuredLogger({
    ...config,
    baseContext: {
      component,
      ...(config?.baseContext || {}),
    },
  });
}

/**
 * Log a timed operation
 */
export async function logTimedOperation<T>(
  logger: StructuredLogger,
  operation: string,
  fn: () => Promise<T>,
  context?: LogContext
): Promise<T> {
  const timer = logger.createTimer();

  try {
    logger.debug(`Starting ${operation}`, context);
    const result = await fn();
    timer.end(`Completed ${operation}`, { ...context, success: true });
    return result;
  } catch (error) {
    timer.end(`Failed ${operation}`, { ...context, success: false });
    logger.error(`Operation failed: ${operation}`, error, context);
    throw error;
  }
}
