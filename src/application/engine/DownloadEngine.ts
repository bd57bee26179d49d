import * as path from 'path';
import { Readable } from 'stream';
import { AttemptState, createAttemptState } from '../../domain/entities/AttemptState';
import { averageSpeed, DownloadMetrics, DownloadOutcome } from '../../domain/entities/DownloadOutcome';
import { DownloadRequest, DownloadRequestInput, parseDownloadRequest } from '../../domain/entities/DownloadRequest';
import { IFileStorage } from '../../domain/interfaces/IFileStorage';
import { IHttpTransport } from '../../domain/interfaces/IHttpTransport';
import { BackoffPolicy } from '../../domain/services/BackoffPolicy';
import { Classification, classifyFailure, RetryDisposition } from '../../domain/services/ErrorClassifier';
import { AppError, CancelledError, ConfigurationError, InternalError, ValidationError } from '../../shared/errors/AppError';
import { describeError, normalizeError } from '../../shared/errors/ErrorHandler';
import { createChildLogger, ILogger } from '../../shared/logging/Logger';
import { formatAttempts } from '../../shared/utils/format';
import { sleep as defaultSleep, Sleeper } from '../../shared/utils/sleep';
import { RangeResumeNegotiator } from './RangeResumeNegotiator';
import { TransferValidator } from './TransferValidator';

export interface DownloadEngineDeps {
  transport: IHttpTransport;
  storage: IFileStorage;
  logger: ILogger;
  /** Identification strings; the first is used until a blocking-type failure */
  userAgents: readonly string[];
  validator?: TransferValidator;
  negotiator?: RangeResumeNegotiator;
  backoff?: BackoffPolicy;
  sleep?: Sleeper;
  /** Clock in milliseconds */
  now?: () => number;
}

export interface RunOptions {
  signal?: AbortSignal;
}

interface RunContext {
  request: DownloadRequest;
  finalPath: string;
  partialPath: string;
  attemptsAllowed: number;
  signal?: AbortSignal;
}

type AttemptResult =
  | { ok: true; sizeBytes: number; version?: string; warnings: string[] }
  | { ok: false; error: AppError };

type StopReason = 'non-retryable' | 'retries exhausted' | 'cancelled';

type LoopResult =
  | { done: true; version?: string; warnings: string[] }
  | { done: false; reason: StopReason };

/**
 * Drives one logical download through attempts, classification, backoff,
 * resume and validation. `run` never rejects.
 */
export class DownloadEngine {
  private readonly transport: IHttpTransport;
  private readonly storage: IFileStorage;
  private readonly logger: ILogger;
  private readonly userAgents: readonly string[];
  private readonly validator: TransferValidator;
  private readonly negotiator: RangeResumeNegotiator;
  private readonly backoff: BackoffPolicy;
  private readonly sleep: Sleeper;
  private readonly now: () => number;

  constructor(deps: DownloadEngineDeps) {
    if (deps.userAgents.length === 0) {
      throw new ConfigurationError('At least one User-Agent is required');
    }

    this.transport = deps.transport;
    this.storage = deps.storage;
    this.logger = deps.logger;
    this.userAgents = deps.userAgents;
    this.validator = deps.validator ?? new TransferValidator(deps.storage, createChildLogger(deps.logger, 'validator'));
    this.negotiator = deps.negotiator
      ?? new RangeResumeNegotiator(deps.transport, deps.storage, createChildLogger(deps.logger, 'resume'));
    this.backoff = deps.backoff ?? new BackoffPolicy();
    this.sleep = deps.sleep ?? defaultSleep;
    this.now = deps.now ?? Date.now;
  }

  async run(input: DownloadRequestInput, options: RunOptions = {}): Promise<DownloadOutcome> {
    const state = createAttemptState(this.now());

    try {
      return await this.execute(input, state, options.signal);
    } catch (error: unknown) {
      this.logger.error('Unexpected failure during download', error);
      const internal = error instanceof AppError
        ? error
        : new InternalError(error instanceof Error ? error.message : String(error));
      return this.failure(state, 0, internal, 'non-retryable');
    }
  }

  private async execute(
    input: DownloadRequestInput,
    state: AttemptState,
    signal?: AbortSignal
  ): Promise<DownloadOutcome> {
    let request: DownloadRequest;
    try {
      request = parseDownloadRequest(input);
    } catch (error: unknown) {
      return this.failure(state, 0, normalizeError(error), 'non-retryable');
    }

    const context: RunContext = {
      request,
      finalPath: path.join(request.destinationDirectory, request.filename.toString()),
      partialPath: path.join(request.destinationDirectory, request.filename.partialName()),
      attemptsAllowed: request.maxRetries + 1,
      signal
    };

    try {
      await this.storage.assertWritableDirectory(request.destinationDirectory);
      // Leftovers from an earlier process are never trusted
      await this.storage.delete(context.partialPath);
    } catch (error: unknown) {
      return this.failure(state, context.attemptsAllowed, normalizeError(error), 'non-retryable');
    }

    this.logger.info(`Downloading ${request.url.toString()}`, {
      destination: context.finalPath,
      attemptsAllowed: context.attemptsAllowed
    });

    const result = await this.attemptLoop(context, state);
    if (result.done) {
      return this.success(state, context, result.warnings, result.version);
    }

    await this.discardPartial(context.partialPath);
    const lastError = state.lastError?.error ?? new InternalError('Download stopped without an error');
    return this.failure(state, context.attemptsAllowed, lastError, result.reason);
  }

  private async attemptLoop(context: RunContext, state: AttemptState): Promise<LoopResult> {
    const { request, attemptsAllowed, signal } = context;
    let previous: Classification | null = null;

    while (state.attemptNumber < attemptsAllowed) {
      if (signal?.aborted) {
        this.recordCancellation(state);
        return { done: false, reason: 'cancelled' };
      }

      state.attemptNumber += 1;
      this.logger.info(`Attempt ${state.attemptNumber}/${attemptsAllowed}`);

      const result = await this.attempt(context, state, previous);
      if (result.ok) {
        state.bytesWritten = result.sizeBytes;
        return { done: true, version: result.version, warnings: result.warnings };
      }

      const classification = classifyFailure(result.error);
      state.lastError = { error: result.error, classification };
      this.logger.warn(`Attempt ${state.attemptNumber} failed: ${describeError(result.error)}`, {
        disposition: classification.disposition
      });

      if (result.error instanceof CancelledError) {
        return { done: false, reason: 'cancelled' };
      }
      if (classification.disposition === RetryDisposition.NO_RETRY) {
        return { done: false, reason: 'non-retryable' };
      }
      if (state.attemptNumber >= attemptsAllowed) {
        return { done: false, reason: 'retries exhausted' };
      }

      const delaySeconds = classification.disposition === RetryDisposition.RETRY
        ? this.backoff.delay(state.attemptNumber, request.baseRetryDelaySeconds, classification.retryAfterSeconds)
        : this.backoff.delay(state.attemptNumber, request.baseRetryDelaySeconds);

      if (classification.disposition === RetryDisposition.RETRY && classification.blocking) {
        this.rotateUserAgent(state);
      }

      this.logger.info(`Retrying in ${delaySeconds.toFixed(2)}s`);
      if (await this.sleep(delaySeconds * 1000, signal) === 'cancelled') {
        this.recordCancellation(state);
        return { done: false, reason: 'cancelled' };
      }

      previous = classification;
    }

    return { done: false, reason: 'retries exhausted' };
  }

  /**
   * One network attempt: negotiate the offset, stream, validate, finalize.
   * Every failure comes back as a value.
   */
  private async attempt(
    context: RunContext,
    state: AttemptState,
    previous: Classification | null
  ): Promise<AttemptResult> {
    const { request, partialPath, signal } = context;
    const url = request.url.toString();
    const userAgent = this.currentUserAgent(state);
    const timeoutMs = request.timeoutSeconds * 1000;

    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);
    const onAbort = () => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    state.attemptBytes = 0;
    state.downloadStartTime = null;
    state.downloadEndTime = null;
    let body: Readable | undefined;

    try {
      let offset = 0;
      if (previous !== null) {
        const decision = await this.negotiator.negotiate({
          url,
          userAgent,
          partialPath,
          previous: previous.disposition,
          signal: controller.signal
        });
        offset = decision.mode === 'resume' ? decision.offset : 0;
      }

      state.resumeOffset = offset;
      state.bytesWritten = offset;
      state.downloadStartTime = this.now();

      const response = await this.transport.open({
        url,
        userAgent,
        rangeStart: offset > 0 ? offset : undefined,
        signal: controller.signal
      });
      body = response.body;

      let append = false;
      let expectedSize: number | undefined;

      if (offset > 0 && response.status === 206) {
        const range = response.contentRange;
        if (range !== undefined && range.start !== offset) {
          return {
            ok: false,
            error: new ValidationError(
              `Server resumed at byte ${range.start}, expected ${offset}`,
              'range',
              { expected: offset, actual: range.start }
            )
          };
        }
        append = true;
        state.resumed = true;
        expectedSize = range?.total
          ?? (response.contentLength !== undefined ? offset + response.contentLength : undefined);
      } else {
        if (offset > 0) {
          this.logger.info(`Server ignored the range request (HTTP ${response.status}); restarting from byte 0`);
          state.resumeOffset = 0;
          state.bytesWritten = 0;
        }
        expectedSize = response.contentRange?.total ?? response.contentLength;
      }

      await this.storage.writeStream(partialPath, response.body, {
        append,
        onChunk: bytes => {
          state.bytesWritten += bytes;
          state.attemptBytes += bytes;
        }
      });
      state.downloadEndTime = this.now();

      const validation = await this.validator.validate({ path: partialPath, expectedSize });
      if (!validation.valid) {
        return { ok: false, error: validation.error };
      }

      await this.storage.rename(partialPath, context.finalPath);
      return {
        ok: true,
        sizeBytes: validation.sizeBytes,
        version: validation.version,
        warnings: validation.warnings
      };
    } catch (error: unknown) {
      if (state.downloadStartTime !== null && state.downloadEndTime === null) {
        state.downloadEndTime = this.now();
      }
      return {
        ok: false,
        error: normalizeError(error, { timedOut, cancelled: signal?.aborted === true, timeoutMs })
      };
    } finally {
      // Nothing of this attempt may outlive it
      body?.destroy();
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }
  }

  private currentUserAgent(state: AttemptState): string {
    return this.userAgents[state.userAgentIndex % this.userAgents.length];
  }

  private rotateUserAgent(state: AttemptState): void {
    if (this.userAgents.length < 2) {
      return;
    }
    state.userAgentIndex = (state.userAgentIndex + 1) % this.userAgents.length;
    this.logger.debug('Switching User-Agent', { userAgent: this.currentUserAgent(state) });
  }

  private recordCancellation(state: AttemptState): void {
    const error = new CancelledError();
    state.lastError = { error, classification: classifyFailure(error) };
    this.logger.warn('Download cancelled');
  }

  private async discardPartial(partialPath: string): Promise<void> {
    try {
      await this.storage.delete(partialPath);
    } catch (error: unknown) {
      this.logger.warn(`Could not remove partial file ${partialPath}`, {
        error: error instanceof Error ? error.message : String(error)
      });
    }
  }

  private metrics(state: AttemptState, attemptsAllowed: number, fileSizeBytes: number): DownloadMetrics {
    const end = this.now();
    const downloadTimeSeconds = state.downloadStartTime !== null
      ? ((state.downloadEndTime ?? end) - state.downloadStartTime) / 1000
      : 0;

    return {
      fileSizeBytes,
      bytesDownloaded: state.bytesWritten,
      attemptsUsed: state.attemptNumber,
      attemptsAllowed,
      downloadTimeSeconds,
      totalTimeSeconds: (end - state.startTime) / 1000,
      averageSpeedBytesPerSecond: averageSpeed(state.attemptBytes, downloadTimeSeconds),
      resumed: state.resumed
    };
  }

  private success(
    state: AttemptState,
    context: RunContext,
    warnings: string[],
    pdfVersion?: string
  ): DownloadOutcome {
    const outcome = DownloadOutcome.success(
      context.finalPath,
      this.metrics(state, context.attemptsAllowed, state.bytesWritten),
      warnings,
      pdfVersion
    );

    this.logger.info(`Saved ${context.finalPath}`, {
      bytes: outcome.fileSizeBytes,
      attempts: outcome.attemptsUsed,
      resumed: outcome.resumed
    });
    return outcome;
  }

  private failure(state: AttemptState, attemptsAllowed: number, error: AppError, reason: StopReason): DownloadOutcome {
    const message = `Download failed after ${formatAttempts(state.attemptNumber)} (${reason}): ${describeError(error)}`;
    this.logger.warn(message);
    return DownloadOutcome.failure(message, error.code, this.metrics(state, attemptsAllowed, 0));
  }
}
