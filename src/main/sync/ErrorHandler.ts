import { SyncError, SyncErrorCode } from '../../types/sync';
import SecureLogger from '../secure-logger';

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class ErrorHandler {
  /**
   * Classify a file system error into a SyncError. The message keeps the
   * underlying description so it can be relayed to the caller as-is.
   */
  classifyError(error: unknown): SyncError {
    if (error instanceof SyncError) {
      return error;
    }

    const message = describeError(error);
    const errno = isErrnoException(error) ? error.code : undefined;
    const details = errno ? { errno } : undefined;

    switch (errno) {
      case 'ENOENT':
        return new SyncError(
          message,
          SyncErrorCode.FILE_NOT_FOUND,
          false,
          'The requested file was not found.',
          details
        );

      case 'EACCES':
      case 'EPERM':
        return new SyncError(
          message,
          SyncErrorCode.PERMISSION_DENIED,
          false,
          'Permission denied. Please check folder permissions.',
          details
        );

      case 'ENOSPC':
        return new SyncError(
          message,
          SyncErrorCode.INSUFFICIENT_SPACE,
          false,
          'Not enough disk space to copy this file.',
          details
        );

      case 'EISDIR':
      case 'ERR_FS_EISDIR':
        return new SyncError(
          message,
          SyncErrorCode.IS_DIRECTORY,
          false,
          'A folder exists where a file was expected.',
          details
        );

      case 'EEXIST':
        return new SyncError(
          message,
          SyncErrorCode.ALREADY_EXISTS,
          false,
          'A file already exists where a folder was expected.',
          details
        );
    }

    return new SyncError(
      message || 'Unknown error',
      SyncErrorCode.UNKNOWN_ERROR,
      false,
      'An unexpected error occurred.',
      { originalError: error }
    );
  }

  /**
   * Create a user-friendly error message
   */
  getUserMessage(error: SyncError): string {
    const retryInfo = error.retryable ? ' Try again later.' : '';
    return `${error.userMessage}${retryInfo}`;
  }

  logError(error: SyncError, context: Record<string, unknown>): void {
    const logData = {
      code: error.code,
      message: error.message,
      retryable: error.retryable,
      ...context
    };

    if (error.retryable) {
      SecureLogger.warn('[Transfer] Recoverable error:', logData);
    } else {
      SecureLogger.error('[Transfer] Transfer error:', logData);
    }
  }
}
