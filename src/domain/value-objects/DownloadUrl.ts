import { ConfigurationError } from '../../shared/errors/AppError';

const SUPPORTED_PROTOCOLS = ['http:', 'https:'];

/**
 * Value object representing an absolute HTTP(S) URL
 */
export class DownloadUrl {
  private readonly url: URL;

  constructor(url: string) {
    if (!url || url.trim().length === 0) {
      throw new ConfigurationError('URL is required');
    }

    let parsed: URL;
    try {
      parsed = new URL(url.trim());
    } catch {
      throw new ConfigurationError(`Invalid URL: ${url}`);
    }

    if (!SUPPORTED_PROTOCOLS.includes(parsed.protocol)) {
      throw new ConfigurationError(
        `Unsupported URL scheme '${parsed.protocol.replace(/:$/, '')}': only http and https are allowed`
      );
    }

    if (!parsed.hostname) {
      throw new ConfigurationError(`URL has no host: ${url}`);
    }

    this.url = parsed;
  }

  toString(): string {
    return this.url.toString();
  }
}
