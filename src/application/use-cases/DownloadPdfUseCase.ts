import * as path from 'path';
import { DownloadOutcome, IFileStorage } from '../../domain';
import { ILogger } from '../../shared';
import { DownloadEngine } from '../engine/DownloadEngine';

/**
 * Download PDF use case request
 */
export interface DownloadPdfRequest {
  url: string;
  outputDir?: string;
  filename?: string;
  maxRetries?: number;
  retryDelay?: number;
  timeout?: number;
  signal?: AbortSignal;
}

/**
 * Values used for fields the request leaves out
 */
export interface DownloadDefaults {
  outputDir: string;
  maxRetries: number;
  retryDelay: number;
  timeout: number;
}

/**
 * Use case for downloading a single PDF
 */
export class DownloadPdfUseCase {
  constructor(
    private readonly engine: DownloadEngine,
    private readonly storage: IFileStorage,
    private readonly defaults: DownloadDefaults,
    private readonly logger: ILogger
  ) {}

  /**
   * Execute the use case. Failures are reported in the outcome.
   */
  async execute(request: DownloadPdfRequest): Promise<DownloadOutcome> {
    const outputDir = path.resolve(request.outputDir ?? this.defaults.outputDir);
    this.logger.info('Starting PDF download', { url: request.url, outputDir });

    try {
      await this.storage.ensureDirectory(outputDir);
    } catch (error: unknown) {
      // The engine's destination check reports this as the run's failure
      this.logger.warn(`Could not prepare ${outputDir}`, {
        error: error instanceof Error ? error.message : String(error)
      });
    }

    const outcome = await this.engine.run(
      {
        url: request.url,
        destinationDirectory: outputDir,
        filename: request.filename,
        maxRetries: request.maxRetries ?? this.defaults.maxRetries,
        baseRetryDelaySeconds: request.retryDelay ?? this.defaults.retryDelay,
        timeoutSeconds: request.timeout ?? this.defaults.timeout
      },
      { signal: request.signal }
    );

    if (outcome.success) {
      this.logger.info('Download completed successfully', {
        path: outcome.localPath,
        size: outcome.fileSizeBytes,
        attempts: outcome.attemptsUsed
      });
    } else {
      this.logger.error('Download failed', undefined, {
        code: outcome.errorCode,
        attempts: outcome.attemptsUsed
      });
    }

    return outcome;
  }
}

/**
 * Factory function to create use case
 */
export function createDownloadPdfUseCase(
  engine: DownloadEngine,
  storage: IFileStorage,
  defaults: DownloadDefaults,
  logger: ILogger
): DownloadPdfUseCase {
  return new DownloadPdfUseCase(engine, storage, defaults, logger);
}
