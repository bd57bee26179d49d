import { ConfigurationError } from '../../shared/errors/AppError';

/**
 * Value object representing a safe PDF filename
 */
export class Filename {
  static readonly EXTENSION = '.pdf';
  static readonly FALLBACK = 'document.pdf';
  private static readonly MAX_LENGTH = 255;
  private static readonly RESERVED_CHARS = /[<>:"|?*\x00-\x1f]/g;
  private static readonly RESERVED_NAMES = [
    'CON', 'PRN', 'AUX', 'NUL',
    'COM1', 'COM2', 'COM3', 'COM4', 'COM5', 'COM6', 'COM7', 'COM8', 'COM9',
    'LPT1', 'LPT2', 'LPT3', 'LPT4', 'LPT5', 'LPT6', 'LPT7', 'LPT8', 'LPT9'
  ];

  private readonly value: string;

  constructor(filename: string) {
    if (!filename || filename.trim().length === 0) {
      throw new ConfigurationError('Filename cannot be empty');
    }

    const sanitized = Filename.sanitize(filename);
    if (!sanitized) {
      throw new ConfigurationError(`Filename is not usable: ${filename}`);
    }
    this.value = sanitized;
  }

  /**
   * Get the sanitized filename
   */
  toString(): string {
    return this.value;
  }

  /**
   * Get filename without extension
   */
  getBasename(): string {
    const lastDot = this.value.lastIndexOf('.');
    return lastDot > 0 ? this.value.substring(0, lastDot) : this.value;
  }

  /**
   * Name of the in-progress file next to the final one
   */
  partialName(): string {
    return `${this.value}.part`;
  }

  equals(other: Filename): boolean {
    return this.value === other.value;
  }

  /**
   * Sanitize for filesystem use. Returns '' when nothing usable is left.
   */
  private static sanitize(filename: string): string {
    let sanitized = filename.replace(/[/\\]/g, '_');

    sanitized = sanitized.replace(Filename.RESERVED_CHARS, '_');

    // Leading/trailing dots and spaces
    sanitized = sanitized.trim().replace(/^[.\s]+|[.\s]+$/g, '');

    if (sanitized.replace(/_/g, '').length === 0) {
      return '';
    }

    // Windows device names
    const stem = Filename.stemOf(sanitized);
    if (Filename.RESERVED_NAMES.includes(stem.toUpperCase())) {
      sanitized = '_' + sanitized;
    }

    if (!sanitized.toLowerCase().endsWith(Filename.EXTENSION)) {
      sanitized += Filename.EXTENSION;
    }

    if (sanitized.length > Filename.MAX_LENGTH) {
      const keep = Filename.MAX_LENGTH - Filename.EXTENSION.length;
      sanitized = sanitized.substring(0, keep) + Filename.EXTENSION;
    }

    return sanitized;
  }

  private static stemOf(filename: string): string {
    const lastDot = filename.lastIndexOf('.');
    return lastDot > 0 ? filename.substring(0, lastDot) : filename;
  }

  /**
   * Create filename from the URL's final path segment, falling back to
   * `document.pdf` when the segment is empty or unsafe
   */
  static fromUrl(url: string): Filename {
    let segment: string | undefined;
    try {
      segment = new URL(url).pathname.split('/').filter(Boolean).pop();
      if (segment !== undefined) {
        segment = decodeURIComponent(segment);
      }
    } catch {
      segment = undefined;
    }

    if (segment === undefined || segment === '.' || segment === '..') {
      return Filename.fallback();
    }

    const sanitized = Filename.sanitize(segment);
    return sanitized ? new Filename(sanitized) : Filename.fallback();
  }

  static fallback(): Filename {
    return new Filename(Filename.FALLBACK);
  }
}
