/**
 * Metrics shared by both outcome shapes
 */
export interface DownloadMetrics {
  fileSizeBytes: number;
  bytesDownloaded: number;
  attemptsUsed: number;
  /** Attempts the request allowed (maxRetries + 1) */
  attemptsAllowed: number;
  downloadTimeSeconds: number;
  totalTimeSeconds: number;
  averageSpeedBytesPerSecond: number;
  resumed: boolean;
}

export interface SuccessfulDownload extends DownloadMetrics {
  readonly success: true;
  readonly localPath: string;
  readonly errorMessage?: undefined;
  /** Advisory findings from validation */
  readonly warnings: string[];
  /** From the `%PDF-x.y` header, when present */
  readonly pdfVersion?: string;
}

export interface FailedDownload extends DownloadMetrics {
  readonly success: false;
  readonly localPath?: undefined;
  readonly errorMessage: string;
  /** Error code of the terminal failure */
  readonly errorCode: string;
  readonly warnings: string[];
  readonly pdfVersion?: undefined;
}

/**
 * Final result of one run
 */
export type DownloadOutcome = SuccessfulDownload | FailedDownload;

/**
 * Average speed in bytes per second, 0 when nothing moved
 */
export function averageSpeed(bytes: number, seconds: number): number {
  return bytes > 0 && seconds > 0 ? bytes / seconds : 0;
}

export const DownloadOutcome = {
  /**
   * Create a successful outcome
   */
  success(
    localPath: string,
    metrics: DownloadMetrics,
    warnings: string[] = [],
    pdfVersion?: string
  ): SuccessfulDownload {
    return Object.freeze({
      success: true,
      localPath,
      ...metrics,
      warnings,
      ...(pdfVersion !== undefined && { pdfVersion })
    });
  },

  /**
   * Create a failed outcome
   */
  failure(errorMessage: string, errorCode: string, metrics: DownloadMetrics, warnings: string[] = []): FailedDownload {
    return Object.freeze({
      success: false,
      errorMessage,
      errorCode,
      ...metrics,
      fileSizeBytes: 0,
      warnings
    });
  }
} as const;
