import { IFileStorage } from '../../domain/interfaces/IFileStorage';
import { ValidationError } from '../../shared/errors/AppError';
import { ILogger } from '../../shared/logging/Logger';

/**
 * How a missing trailer is treated: `hard` rejects the transfer, `soft`
 * reports a warning and accepts it
 */
export type StructureCheckMode = 'hard' | 'soft';

export const MIN_PDF_SIZE = 100;
const PDF_SIGNATURE = Buffer.from('%PDF', 'latin1');
const HEADER_WINDOW = 1024;
const TRAILER_WINDOW = 1024;

export interface ValidationInput {
  path: string;
  /** Total size the server declared, when it declared one */
  expectedSize?: number;
}

export type ValidationResult =
  | { valid: true; sizeBytes: number; version?: string; warnings: string[] }
  | { valid: false; error: ValidationError; warnings: string[] };

/**
 * Integrity gate run once per completed attempt, before the working file
 * is moved into place
 */
export class TransferValidator {
  constructor(
    private readonly storage: IFileStorage,
    private readonly logger: ILogger,
    private readonly structureCheck: StructureCheckMode = 'hard'
  ) {}

  async validate(input: ValidationInput): Promise<ValidationResult> {
    const warnings: string[] = [];
    const size = await this.storage.sizeOf(input.path);

    if (size === 0) {
      return this.reject(new ValidationError('Downloaded file is empty', 'empty'), warnings);
    }

    if (input.expectedSize !== undefined && size !== input.expectedSize) {
      return this.reject(
        new ValidationError(
          `Size mismatch: expected ${input.expectedSize} bytes, got ${size}`,
          'size',
          { expected: input.expectedSize, actual: size }
        ),
        warnings
      );
    }

    if (size < MIN_PDF_SIZE) {
      return this.reject(
        new ValidationError(`File too small to be a PDF (${size} bytes)`, 'too-small', { actual: size }),
        warnings
      );
    }

    const header = await this.storage.readRange(input.path, 0, HEADER_WINDOW);
    if (!header.subarray(0, PDF_SIGNATURE.length).equals(PDF_SIGNATURE)) {
      return this.reject(new ValidationError('Missing PDF signature', 'signature'), warnings);
    }

    const headerText = header.toString('latin1');
    const version = /^%PDF-(\d+\.\d+)/.exec(headerText)?.[1];
    if (version === undefined) {
      warnings.push('PDF version not found in header');
    }

    const footer = await this.storage.readRange(input.path, Math.max(0, size - TRAILER_WINDOW), TRAILER_WINDOW);
    const footerText = footer.toString('latin1');

    if (!footerText.includes('%%EOF')) {
      if (/trailer|xref|startxref/.test(footerText)) {
        warnings.push('PDF has trailer structure but no %%EOF marker');
      } else if (this.structureCheck === 'hard') {
        return this.reject(new ValidationError('PDF trailer not found', 'structure'), warnings);
      } else {
        warnings.push('PDF trailer not found');
      }
    }

    if (!['obj', '<<', '>>'].some(marker => headerText.includes(marker))) {
      warnings.push('No object markers near the start of the file');
    }
    if (!headerText.includes('xref') && !footerText.includes('xref')) {
      warnings.push('No cross-reference table found');
    }
    if (!headerText.includes('/Root') && !footerText.includes('/Root')) {
      warnings.push('No root object reference found');
    }

    for (const warning of warnings) {
      this.logger.warn(`Validation warning: ${warning}`, { path: input.path });
    }

    return version === undefined
      ? { valid: true, sizeBytes: size, warnings }
      : { valid: true, sizeBytes: size, version, warnings };
  }

  private reject(error: ValidationError, warnings: string[]): ValidationResult {
    this.logger.debug(`Validation failed: ${error.message}`, { reason: error.reason });
    return { valid: false, error, warnings };
  }
}
