import {
  AppError,
  CancelledError,
  FilesystemError,
  HttpStatusError,
  InternalError,
  NetworkError,
  NetworkFailureReason
} from './AppError';

/**
 * What the caller knew when the error surfaced
 */
export interface NormalizeContext {
  /** The per-attempt timer fired */
  timedOut?: boolean;
  /** The caller's signal fired */
  cancelled?: boolean;
  /** Timeout that applied, for the message */
  timeoutMs?: number;
}

const FILESYSTEM_CODES = new Set([
  'EACCES',
  'EPERM',
  'ENOSPC',
  'EROFS',
  'EISDIR',
  'ENOTDIR',
  'EEXIST',
  'EMFILE',
  'ENFILE',
  'EDQUOT',
  'EBUSY'
]);

const CONNECTION_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ECONNABORTED',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'ENETDOWN',
  'EPIPE',
  'UND_ERR_SOCKET'
]);

const TIMEOUT_CODES = new Set(['ETIMEDOUT', 'ESOCKETTIMEDOUT', 'UND_ERR_CONNECT_TIMEOUT']);

function readString(value: unknown, key: string): string | undefined {
  if (typeof value !== 'object' || value === null || !(key in value)) {
    return undefined;
  }
  const field: unknown = Reflect.get(value, key);
  return typeof field === 'string' ? field : undefined;
}

function isTlsCode(code: string): boolean {
  return (
    code === 'EPROTO' ||
    code.startsWith('CERT_') ||
    code.startsWith('ERR_TLS_') ||
    code.startsWith('ERR_SSL_') ||
    code.startsWith('UNABLE_TO_') ||
    code.includes('SELF_SIGNED')
  );
}

function networkReasonFor(code: string | undefined, message: string): NetworkFailureReason {
  if (code) {
    if (TIMEOUT_CODES.has(code)) return 'timeout';
    if (CONNECTION_CODES.has(code)) return 'connection';
    if (isTlsCode(code)) return 'tls';
    if (code === 'ERR_STREAM_PREMATURE_CLOSE') return 'truncated';
  }

  if (/premature close/i.test(message)) return 'truncated';
  if (/certificate|ssl|tls/i.test(message)) return 'tls';
  if (/timed? ?out/i.test(message)) return 'timeout';
  if (/socket hang up|ECONNRESET/i.test(message)) return 'connection';
  return 'unknown';
}

/**
 * Map anything thrown by the transport or the filesystem into the
 * application error taxonomy
 */
export function normalizeError(error: unknown, context: NormalizeContext = {}): AppError {
  if (error instanceof AppError) {
    return error;
  }

  const name = readString(error, 'name');
  const code = readString(error, 'code');
  const message = error instanceof Error ? error.message : String(error);

  if (name === 'AbortError' || context.cancelled || context.timedOut) {
    if (context.cancelled) {
      return new CancelledError();
    }
    const timeout = context.timeoutMs !== undefined ? ` after ${context.timeoutMs}ms` : '';
    return new NetworkError(`Request timed out${timeout}`, 'timeout');
  }

  if (code && FILESYSTEM_CODES.has(code) && readString(error, 'syscall')) {
    return new FilesystemError(message, { code });
  }

  if (code === 'ENOENT' && readString(error, 'syscall') && readString(error, 'path')) {
    return new FilesystemError(message, { code });
  }

  if (name === 'FetchError' || code !== undefined) {
    return new NetworkError(message, networkReasonFor(code, message), code ? { code } : undefined);
  }

  if (error instanceof Error) {
    return new NetworkError(message, networkReasonFor(undefined, message));
  }

  return new InternalError(message);
}

/**
 * One-line cause for user-facing messages
 */
export function describeError(error: AppError): string {
  if (error instanceof HttpStatusError) {
    return error.message;
  }
  if (error instanceof NetworkError) {
    switch (error.reason) {
      case 'timeout':
        return `Timeout: ${error.message}`;
      case 'tls':
        return `TLS error: ${error.message}`;
      case 'connection':
        return `Connection error: ${error.message}`;
      case 'truncated':
        return `Transfer interrupted: ${error.message}`;
      default:
        return `Network error: ${error.message}`;
    }
  }
  return error.message;
}
