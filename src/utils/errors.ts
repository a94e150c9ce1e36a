/**
 * Base error class for all feed errors
 * Provides structured error information with context and retry guidance
 */
export class IntegrationError extends Error {
  /**
   * Unique error code for categorization
   * Format: CATEGORY_SPECIFIC_ERROR (e.g., CONNECTION_TIMEOUT, VALIDATION_ENDPOINT_INVALID)
   */
  readonly code: string;

  /**
   * Indicates if this error is transient and can be retried
   */
  readonly retriable: boolean;

  /**
   * Additional context for debugging and logging
   * Should include relevant data without exposing sensitive information
   */
  readonly context: Record<string, unknown>;

  /**
   * Original error that caused this error (if applicable)
   */
  readonly cause?: Error;

  /**
   * Timestamp when the error occurred
   */
  readonly timestamp: Date;

  /**
   * Creates a new IntegrationError
   * @param message - Human-readable error message
   * @param code - Unique error code
   * @param retriable - Whether this error can be retried
   * @param context - Additional context information
   * @param cause - Original error (optional)
   */
  constructor(
    message: string,
    code: string,
    retriable: boolean,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.retriable = retriable;
    this.context = context || {};
    this.cause = cause;
    this.timestamp = new Date();

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Converts error to JSON for logging/serialization
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      retriable: this.retriable,
      context: ErrorUtils.sanitizeContext(this.context),
      timestamp: this.timestamp.toISOString(),
      cause: this.cause
        ? {
            name: this.cause.name,
            message: this.cause.message,
          }
        : undefined,
    };
  }
}

export type ConnectionErrorType = 'TIMEOUT' | 'REFUSED' | 'UNAUTHORIZED' | 'UNKNOWN';

/**
 * Session establishment errors (unreachable endpoint, rejected credential, etc.)
 */
export class ConnectionError extends IntegrationError {
  /**
   * Feed endpoint that failed
   */
  readonly endpoint: string;

  readonly connectionType: ConnectionErrorType;

  constructor(
    message: string,
    code: string,
    endpoint: string,
    connectionType: ConnectionErrorType,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    // A rejected credential will be rejected again
    super(message, code, connectionType !== 'UNAUTHORIZED', { endpoint, ...context }, cause);
    this.endpoint = endpoint;
    this.connectionType = connectionType;
  }

  static timeout(endpoint: string, timeoutMs: number, cause?: Error): ConnectionError {
    return new ConnectionError(
      `Connection timeout after ${timeoutMs}ms`,
      'CONNECTION_TIMEOUT',
      endpoint,
      'TIMEOUT',
      { timeoutMs },
      cause
    );
  }

  static refused(endpoint: string, cause?: Error): ConnectionError {
    return new ConnectionError(
      `Connection refused`,
      'CONNECTION_REFUSED',
      endpoint,
      'REFUSED',
      {},
      cause
    );
  }

  static unauthorized(endpoint: string, cause?: Error): ConnectionError {
    return new ConnectionError(
      `Feed rejected the API key`,
      'CONNECTION_UNAUTHORIZED',
      endpoint,
      'UNAUTHORIZED',
      {},
      cause
    );
  }
}

/**
 * Input validation error
 * Not retriable - indicates client-side error
 */
export class ValidationError extends IntegrationError {
  /**
   * Field or parameter that failed validation
   */
  readonly field: string;

  /**
   * Expected format or constraint
   */
  readonly expected: string;

  /**
   * Actual value received (sanitized)
   */
  readonly received: string;

  constructor(
    message: string,
    field: string,
    expected: string,
    received: string,
    context?: Record<string, unknown>
  ) {
    super(message, `VALIDATION_${field.toUpperCase()}_INVALID`, false, context);
    this.field = field;
    this.expected = expected;
    this.received = received;
  }

  static missingApiKey(): ValidationError {
    return new ValidationError(
      'A feed API key is required',
      'apiKey',
      'Non-empty string',
      '[REDACTED]'
    );
  }

  static invalidParameter(
    paramName: string,
    expected: string,
    received: unknown
  ): ValidationError {
    return new ValidationError(
      `Invalid parameter ${paramName}`,
      paramName,
      expected,
      String(received)
    );
  }
}

/**
 * Vendor delivery failed after the subscription was opened
 */
export class SubscriptionError extends IntegrationError {
  readonly streamType: string;

  constructor(streamType: string, cause?: Error) {
    super(
      `Feed subscription for ${streamType} terminated: ${cause?.message ?? 'unknown reason'}`,
      'SUBSCRIPTION_FAILED',
      cause ? ErrorUtils.isRetriable(cause) : true,
      { streamType },
      cause
    );
    this.streamType = streamType;
  }
}

/**
 * Utility functions for error handling
 */
export class ErrorUtils {
  private static readonly SENSITIVE_KEYS = [
    'apiKey',
    'api_key',
    'secret',
    'password',
    'token',
    'privateKey',
    'private_key',
    'mnemonic',
    'seed',
  ];

  /**
   * Determines if an error is retriable
   */
  static isRetriable(error: Error): boolean {
    if (error instanceof IntegrationError) {
      return error.retriable;
    }

    const message = error.message.toLowerCase();
    return (
      message.includes('timeout') ||
      message.includes('econnreset') ||
      message.includes('econnrefused') ||
      message.includes('etimedout') ||
      message.includes('enotfound') ||
      message.includes('network') ||
      message.includes('socket')
    );
  }

  /**
   * Extracts error code from any error type
   * @returns Error code or 'UNKNOWN'
   */
  static getErrorCode(error: Error): string {
    if (error instanceof IntegrationError) {
      return error.code;
    }

    if ('code' in error && typeof error.code === 'string') {
      return error.code;
    }

    return 'UNKNOWN';
  }

  /**
   * Normalizes a thrown value into an Error
   */
  static toError(value: unknown): Error {
    return value instanceof Error ? value : new Error(String(value));
  }

  /**
   * Safely converts any error to IntegrationError
   */
  static toIntegrationError(
    error: Error,
    defaultCode: string = 'UNKNOWN_ERROR'
  ): IntegrationError {
    if (error instanceof IntegrationError) {
      return error;
    }

    const code = this.getErrorCode(error);

    return new IntegrationError(
      error.message || 'An unknown error occurred',
      code === 'UNKNOWN' ? defaultCode : code,
      this.isRetriable(error),
      {},
      error
    );
  }

  /**
   * Sanitizes error context to remove sensitive data
   * @returns Sanitized context safe for logging
   */
  static sanitizeContext(context: Record<string, unknown>): Record<string, unknown> {
    const sanitized: Record<string, unknown> = {};

    for (const [key, value] of Object.entries(context)) {
      const lowerKey = key.toLowerCase();

      const isSensitive = this.SENSITIVE_KEYS.some((sensitive) =>
        lowerKey.includes(sensitive.toLowerCase())
      );

      if (isSensitive) {
        sanitized[key] = '[REDACTED]';
        continue;
      }

      if (isPlainRecord(value)) {
        sanitized[key] = this.sanitizeContext(value);
      } else {
        sanitized[key] = value;
      }
    }

    return sanitized;
  }
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
