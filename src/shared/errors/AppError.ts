/**
 * Base application error class
 */
export abstract class AppError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);

    this.name = this.constructor.name;
    this.code = code;
    this.details = details;

    Error.captureStackTrace(this, this.constructor);
  }
}

export type NetworkFailureReason = 'connection' | 'timeout' | 'tls' | 'truncated' | 'unknown';

/**
 * Connect, timeout, TLS and mid-body transport failures
 */
export class NetworkError extends AppError {
  constructor(
    message: string,
    public readonly reason: NetworkFailureReason = 'unknown',
    details?: Record<string, unknown>
  ) {
    super(message, 'NETWORK_ERROR', { reason, ...details });
  }
}

/**
 * Non-2xx response from the server
 */
export class HttpStatusError extends AppError {
  constructor(
    public readonly status: number,
    public readonly statusText: string = '',
    public readonly retryAfterSeconds?: number
  ) {
    super(
      statusText ? `HTTP ${status} ${statusText}` : `HTTP ${status}`,
      'HTTP_ERROR',
      { status, statusText, retryAfterSeconds }
    );
  }
}

export type ValidationFailureReason =
  | 'empty'
  | 'too-small'
  | 'size'
  | 'signature'
  | 'structure'
  | 'range';

/**
 * Downloaded content failed an integrity check
 */
export class ValidationError extends AppError {
  constructor(
    message: string,
    public readonly reason: ValidationFailureReason,
    details?: Record<string, unknown>
  ) {
    super(message, 'VALIDATION_ERROR', { reason, ...details });
  }
}

/**
 * Destination unwritable, disk full, rename failed
 */
export class FilesystemError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'FILESYSTEM_ERROR', details);
  }
}

/**
 * Invalid request or configuration value
 */
export class ConfigurationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', details);
  }
}

/**
 * The caller aborted the run
 */
export class CancelledError extends AppError {
  constructor(message: string = 'Download cancelled') {
    super(message, 'CANCELLED');
  }
}

/**
 * Internal error
 */
export class InternalError extends AppError {
  constructor(message: string = 'Internal error', details?: Record<string, unknown>) {
    super(message, 'INTERNAL_ERROR', details);
  }
}
