/**
 * Error classes for the compatibility audit
 *
 * Every failure the audit can hit maps to one of these types so the CLI can
 * report a single operator-facing message and exit non-zero.
 *
 * @license MIT
 */

// ==============================================
// Base Error Class
// ==============================================

/**
 * Base class for all audit errors
 */
export abstract class AuditError extends Error {
  public readonly code: string;
  public readonly timestamp: Date;

  constructor(message: string, code: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
    this.code = code;
    this.timestamp = new Date();

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Convert error to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      timestamp: this.timestamp.toISOString(),
    };
  }
}

// ==============================================
// Error Types
// ==============================================

/**
 * Missing or malformed check document, or invalid connection options
 */
export class ConfigurationError extends AuditError {
  public readonly field?: string;

  constructor(message: string, field?: string, options?: { cause?: unknown }) {
    super(message, 'CONFIGURATION_ERROR', options);
    this.field = field;
  }

  static missingRequired(field: string): ConfigurationError {
    return new ConfigurationError(
      `Required configuration field missing: ${field}`,
      field
    );
  }

  static invalidFormat(field: string, format: string): ConfigurationError {
    return new ConfigurationError(
      `Invalid format for ${field}: expected ${format}`,
      field
    );
  }

  static duplicateCheck(name: string): ConfigurationError {
    return new ConfigurationError(
      `Duplicate check name: ${name}`,
      'validations'
    );
  }
}

/**
 * Password could not be resolved (secret store context missing or lookup failed)
 */
export class CredentialError extends AuditError {
  public readonly secretName?: string;

  constructor(message: string, secretName?: string, options?: { cause?: unknown }) {
    super(message, 'CREDENTIAL_ERROR', options);
    this.secretName = secretName;
  }

  static missingProject(variable: string): CredentialError {
    return new CredentialError(`${variable} environment variable is not set.`);
  }

  static lookupFailed(secretName: string, cause?: unknown): CredentialError {
    return new CredentialError(
      `Failed to read secret ${secretName} from the secret store`,
      secretName,
      { cause }
    );
  }

  static emptySecret(secretName: string): CredentialError {
    return new CredentialError(`Secret ${secretName} has no payload`, secretName);
  }
}

/**
 * Database connection could not be opened
 *
 * The driver message is mapped to a safe summary; the original error is kept
 * as `cause` for debug logging.
 */
export class ConnectionError extends AuditError {
  public readonly target?: string;

  constructor(message: string, target?: string, originalError?: unknown) {
    super(
      ConnectionError.sanitizeConnectionError(message, originalError),
      'CONNECTION_FAILED',
      { cause: originalError }
    );
    this.target = target;
  }

  private static sanitizeConnectionError(message: string, originalError?: unknown): string {
    const detail = originalError instanceof Error ? originalError.message : '';
    const lowerMessage = `${message} ${detail}`.toLowerCase();

    if (lowerMessage.includes('dpi-1047') || lowerMessage.includes('oracle client librar')) {
      return 'Oracle Client libraries could not be loaded - check the thick client library directory';
    }

    if (lowerMessage.includes('ora-01017') || lowerMessage.includes('invalid username/password')) {
      return 'Authentication failed - check credentials';
    }

    if (lowerMessage.includes('ora-12514') || (lowerMessage.includes('service') && lowerMessage.includes('not registered'))) {
      return 'Service not found - check service name';
    }

    if (lowerMessage.includes('ora-12154') || lowerMessage.includes('njs-517') || lowerMessage.includes('could not resolve')) {
      return 'Connect identifier could not be resolved - check the alias and tnsnames location';
    }

    if (lowerMessage.includes('connection refused') || lowerMessage.includes('econnrefused')) {
      return 'Connection refused - check host and port';
    }

    if (lowerMessage.includes('timed out') || lowerMessage.includes('timeout')) {
      return 'Connection timeout - check network connectivity';
    }

    if (lowerMessage.includes('ssl') || lowerMessage.includes('tls')) {
      return 'SSL/TLS connection failed - check protocol and wallet configuration';
    }

    return 'Database connection failed - check configuration';
  }
}

/**
 * A check's SQL statement failed; aborts the batch in fail-fast mode
 */
export class CheckExecutionError extends AuditError {
  public readonly checkName: string;

  constructor(checkName: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Check "${checkName}" failed: ${detail}`, 'CHECK_FAILED', { cause });
    this.checkName = checkName;
  }

  toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), checkName: this.checkName };
  }
}

/**
 * Report could not be produced or written
 */
export class RenderError extends AuditError {
  public readonly path?: string;

  constructor(message: string, path?: string, options?: { cause?: unknown }) {
    super(message, 'RENDER_FAILED', options);
    this.path = path;
  }

  static notWritable(path: string, cause?: unknown): RenderError {
    return new RenderError(`Cannot write report to ${path}`, path, { cause });
  }
}

// ==============================================
// Error Utilities
// ==============================================

/**
 * Helpers for turning arbitrary thrown values into operator-facing output
 */
export class ErrorHandler {
  /**
   * Normalize any thrown value to an AuditError
   */
  static normalize(error: unknown): AuditError {
    if (error instanceof AuditError) {
      return error;
    }

    if (error instanceof Error) {
      return new UnexpectedError(error.message, error);
    }

    return new UnexpectedError('Unknown error occurred', error);
  }

  /**
   * Get user-facing error message
   */
  static getUserMessage(error: unknown): string {
    return this.normalize(error).message;
  }

  /**
   * Get error code
   */
  static getErrorCode(error: unknown): string {
    return this.normalize(error).code;
  }
}

/**
 * Anything thrown that is not one of the audit's own errors
 */
export class UnexpectedError extends AuditError {
  constructor(message: string, cause?: unknown) {
    super(message, 'UNEXPECTED_ERROR', { cause });
  }
}
