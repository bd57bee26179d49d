import {
  AppError,
  CancelledError,
  ConfigurationError,
  FilesystemError,
  HttpStatusError,
  NetworkError,
  ValidationError
} from '../../shared/errors/AppError';

/**
 * What the engine does after a failed attempt
 */
export enum RetryDisposition {
  /** Transient; retry and resume if the server allows */
  RETRY = 'RETRY',
  /** Terminal; stop now */
  NO_RETRY = 'NO_RETRY',
  /** Retry, but never trust the bytes already on disk */
  PARTIAL_RETRY = 'PARTIAL_RETRY'
}

export type Classification =
  | {
      disposition: RetryDisposition.RETRY;
      /** Server-suggested wait from Retry-After */
      retryAfterSeconds?: number;
      /** Failure looks like the client is being blocked; switch identification */
      blocking: boolean;
    }
  | { disposition: RetryDisposition.NO_RETRY }
  | { disposition: RetryDisposition.PARTIAL_RETRY };

const TERMINAL_STATUSES = new Set([400, 401, 403, 404, 410]);
const RETRYABLE_CLIENT_STATUSES = new Set([408, 429]);
const RANGE_NOT_SATISFIABLE = 416;

function retry(blocking: boolean = false, retryAfterSeconds?: number): Classification {
  return retryAfterSeconds === undefined
    ? { disposition: RetryDisposition.RETRY, blocking }
    : { disposition: RetryDisposition.RETRY, blocking, retryAfterSeconds };
}

function classifyStatus(error: HttpStatusError): Classification {
  const { status } = error;

  if (TERMINAL_STATUSES.has(status)) {
    return { disposition: RetryDisposition.NO_RETRY };
  }
  if (status === 429) {
    return retry(true, error.retryAfterSeconds);
  }
  if (RETRYABLE_CLIENT_STATUSES.has(status) || status >= 500) {
    return retry();
  }
  if (status === RANGE_NOT_SATISFIABLE) {
    return { disposition: RetryDisposition.PARTIAL_RETRY };
  }
  if (status >= 400 && status < 500) {
    return { disposition: RetryDisposition.NO_RETRY };
  }
  return retry();
}

/**
 * Map a failure to a retry disposition. Total: anything unrecognised is
 * retried.
 */
export function classifyFailure(error: AppError): Classification {
  if (error instanceof HttpStatusError) {
    return classifyStatus(error);
  }
  if (error instanceof NetworkError) {
    return retry(error.reason === 'connection' || error.reason === 'tls');
  }
  if (error instanceof ValidationError) {
    return { disposition: RetryDisposition.PARTIAL_RETRY };
  }
  if (
    error instanceof FilesystemError ||
    error instanceof ConfigurationError ||
    error instanceof CancelledError
  ) {
    return { disposition: RetryDisposition.NO_RETRY };
  }
  return retry();
}
