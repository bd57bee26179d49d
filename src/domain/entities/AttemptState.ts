import { AppError } from '../../shared/errors/AppError';
import { Classification } from '../services/ErrorClassifier';

export interface ClassifiedFailure {
  error: AppError;
  classification: Classification;
}

/**
 * Mutable bookkeeping for one run. Created and owned by a single
 * DownloadEngine.run call; never shared.
 */
export interface AttemptState {
  attemptNumber: number;
  /** Bytes currently in the working file */
  bytesWritten: number;
  /** Offset the current attempt resumed from, 0 for a fresh start */
  resumeOffset: number;
  /** Bytes received over the network by the latest attempt */
  attemptBytes: number;
  lastError: ClassifiedFailure | null;
  resumed: boolean;
  userAgentIndex: number;
  startTime: number;
  downloadStartTime: number | null;
  downloadEndTime: number | null;
}

export function createAttemptState(startTime: number): AttemptState {
  return {
    attemptNumber: 0,
    bytesWritten: 0,
    resumeOffset: 0,
    attemptBytes: 0,
    lastError: null,
    resumed: false,
    userAgentIndex: 0,
    startTime,
    downloadStartTime: null,
    downloadEndTime: null
  };
}
