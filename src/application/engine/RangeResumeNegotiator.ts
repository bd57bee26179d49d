import { IFileStorage } from '../../domain/interfaces/IFileStorage';
import { IHttpTransport } from '../../domain/interfaces/IHttpTransport';
import { RetryDisposition } from '../../domain/services/ErrorClassifier';
import { ILogger } from '../../shared/logging/Logger';

export interface ResumeContext {
  url: string;
  userAgent: string;
  partialPath: string;
  /** Disposition of the failure that ended the previous attempt */
  previous: RetryDisposition;
  signal?: AbortSignal;
}

export type ResumeDecision =
  | { mode: 'resume'; offset: number }
  | { mode: 'restart'; reason: string };

/**
 * Decides, before a retry, whether the bytes already in the working file
 * can be kept. Anything short of a positive answer discards them.
 */
export class RangeResumeNegotiator {
  constructor(
    private readonly transport: IHttpTransport,
    private readonly storage: IFileStorage,
    private readonly logger: ILogger
  ) {}

  async negotiate(context: ResumeContext): Promise<ResumeDecision> {
    if (context.previous !== RetryDisposition.RETRY) {
      return this.restart(context.partialPath, 'previous bytes failed validation');
    }

    const existing = await this.storage.sizeOf(context.partialPath);
    if (existing === 0) {
      return { mode: 'restart', reason: 'no partial data' };
    }

    const probe = await this.transport.probeRangeSupport({
      url: context.url,
      userAgent: context.userAgent,
      signal: context.signal
    });

    if (!probe.supported) {
      return this.restart(context.partialPath, 'server does not accept byte ranges');
    }

    if (probe.contentLength !== undefined && existing >= probe.contentLength) {
      return this.restart(
        context.partialPath,
        `partial file (${existing} bytes) is not shorter than the resource (${probe.contentLength} bytes)`
      );
    }

    this.logger.info(`Resuming from byte ${existing}`);
    return { mode: 'resume', offset: existing };
  }

  private async restart(partialPath: string, reason: string): Promise<ResumeDecision> {
    await this.storage.delete(partialPath);
    this.logger.debug(`Restarting from byte 0: ${reason}`);
    return { mode: 'restart', reason };
  }
}
