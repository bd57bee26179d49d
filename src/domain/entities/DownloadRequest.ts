import { ConfigurationError } from '../../shared/errors/AppError';
import { DownloadUrl } from '../value-objects/DownloadUrl';
import { Filename } from '../value-objects/Filename';

/**
 * Bounds and defaults for request fields
 */
export const REQUEST_LIMITS = {
  maxRetries: { min: 0, max: 10, default: 3 },
  baseRetryDelaySeconds: { min: 0.1, max: 60.0, default: 5.0 },
  timeoutSeconds: { min: 5.0, max: 300.0, default: 30.0 }
} as const;

/**
 * Loosely-typed request as supplied by a caller; numeric fields fall back
 * to the defaults above
 */
export interface DownloadRequestInput {
  url: string;
  destinationDirectory: string;
  filename?: string;
  maxRetries?: number;
  baseRetryDelaySeconds?: number;
  timeoutSeconds?: number;
}

/**
 * Validated, immutable request for one run
 */
export interface DownloadRequest {
  readonly url: DownloadUrl;
  readonly destinationDirectory: string;
  readonly filename: Filename;
  readonly maxRetries: number;
  readonly baseRetryDelaySeconds: number;
  readonly timeoutSeconds: number;
}

function checkRange(
  field: keyof typeof REQUEST_LIMITS,
  value: number | undefined,
  integer: boolean = false
): number {
  const limits = REQUEST_LIMITS[field];
  const resolved = value ?? limits.default;

  if (typeof resolved !== 'number' || !Number.isFinite(resolved)) {
    throw new ConfigurationError(`${field} must be a number`, { field, value });
  }
  if (integer && !Number.isInteger(resolved)) {
    throw new ConfigurationError(`${field} must be an integer`, { field, value });
  }
  if (resolved < limits.min || resolved > limits.max) {
    throw new ConfigurationError(
      `${field} must be between ${limits.min} and ${limits.max} (got ${resolved})`,
      { field, value }
    );
  }
  return resolved;
}

/**
 * Validate caller input. Throws ConfigurationError on the first bad field.
 */
export function parseDownloadRequest(input: DownloadRequestInput): DownloadRequest {
  const url = new DownloadUrl(input.url);

  if (!input.destinationDirectory || input.destinationDirectory.trim().length === 0) {
    throw new ConfigurationError('destinationDirectory is required');
  }

  const filename = input.filename !== undefined
    ? new Filename(input.filename)
    : Filename.fromUrl(url.toString());

  return Object.freeze({
    url,
    destinationDirectory: input.destinationDirectory,
    filename,
    maxRetries: checkRange('maxRetries', input.maxRetries, true),
    baseRetryDelaySeconds: checkRange('baseRetryDelaySeconds', input.baseRetryDelaySeconds),
    timeoutSeconds: checkRange('timeoutSeconds', input.timeoutSeconds)
  });
}
