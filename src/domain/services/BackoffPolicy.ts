export interface BackoffOptions {
  maxDelaySeconds?: number;
  jitterRatio?: number;
  /** Uniform source in [0, 1) */
  random?: () => number;
}

export const DEFAULT_MAX_DELAY_SECONDS = 120;
export const DEFAULT_JITTER_RATIO = 0.1;

/**
 * Exponential backoff with additive jitter.
 *
 * The wait after failed attempt `n` is `baseDelay * 2^(n-1)`, capped at
 * `maxDelaySeconds`, plus up to `jitterRatio` of that value. A larger
 * server-suggested delay replaces the computed one. No result exceeds the
 * cap.
 */
export class BackoffPolicy {
  private readonly maxDelaySeconds: number;
  private readonly jitterRatio: number;
  private readonly random: () => number;

  constructor(options: BackoffOptions = {}) {
    this.maxDelaySeconds = options.maxDelaySeconds ?? DEFAULT_MAX_DELAY_SECONDS;
    this.jitterRatio = options.jitterRatio ?? DEFAULT_JITTER_RATIO;
    this.random = options.random ?? Math.random;
  }

  /**
   * Capped exponential delay without jitter
   */
  baseDelay(attemptNumber: number, baseDelaySeconds: number): number {
    const exponent = Math.max(0, attemptNumber - 1);
    return Math.min(baseDelaySeconds * Math.pow(2, exponent), this.maxDelaySeconds);
  }

  /**
   * Seconds to wait after failed attempt `attemptNumber` (1-based)
   */
  delay(attemptNumber: number, baseDelaySeconds: number, serverSuggestedDelaySeconds?: number): number {
    const computed = this.baseDelay(attemptNumber, baseDelaySeconds);
    const jitter = this.random() * computed * this.jitterRatio;
    const jittered = computed + jitter;

    const chosen = serverSuggestedDelaySeconds !== undefined && serverSuggestedDelaySeconds > jittered
      ? serverSuggestedDelaySeconds
      : jittered;

    return Math.min(chosen, this.maxDelaySeconds);
  }
}

/**
 * Parse a Retry-After header (delta-seconds or HTTP-date) into seconds
 */
export function parseRetryAfter(value: string | null | undefined, now: number = Date.now()): number | undefined {
  if (!value) return undefined;

  const trimmed = value.trim();
  if (/^\d+(\.\d+)?$/.test(trimmed)) {
    return Number(trimmed);
  }

  const date = Date.parse(trimmed);
  if (!Number.isNaN(date)) {
    const seconds = (date - now) / 1000;
    return seconds > 0 ? seconds : 0;
  }

  return undefined;
}
