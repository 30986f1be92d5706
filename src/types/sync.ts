/**
 * Type definitions for the transfer system
 */

export enum TransferDirection {
  Upload = 'upload',
  Download = 'download'
}

// Status codes recorded on failed requests
export const STATUS_SERVICE_UNAVAILABLE = 503;
export const STATUS_IO_FAILURE = 404;

export const DOCUMENTS_DIRECTORY = 'Documents';
export const DEFAULT_INDEX_FILENAME = 'index.org';

export interface TransferDelegate {
  onComplete(request: TransferRequest): void;
  onFailed(request: TransferRequest): void;
}

// Owned by the queue from enqueue until one of the delegate methods fires
export interface TransferRequest {
  remoteLocator: string | null;
  localPath: string;
  direction: TransferDirection;
  isDummy: boolean;
  abortOnFailure: boolean;
  success: boolean;
  errorText?: string;
  statusCode?: number;
  delegate: TransferDelegate;
}

export interface TransferRequestInit {
  remoteLocator: string | null;
  localPath: string;
  direction: TransferDirection;
  delegate: TransferDelegate;
  isDummy?: boolean;
  abortOnFailure?: boolean;
}

export function createTransferRequest(init: TransferRequestInit): TransferRequest {
  return {
    remoteLocator: init.remoteLocator,
    localPath: init.localPath,
    direction: init.direction,
    delegate: init.delegate,
    isDummy: init.isDummy ?? false,
    abortOnFailure: init.abortOnFailure ?? false,
    success: false
  };
}

// Container resolution
export type ResolutionOutcome =
  | { kind: 'already_resolved' }
  | { kind: 'resolved'; path: string }
  | { kind: 'unavailable' }
  | { kind: 'failed'; error: SyncError };

// Copy operation result
export type CopyResult =
  | { ok: true }
  | { ok: false; error: SyncError };

// Status published to the observer
export interface TransferStatus {
  transferFilename: string;
  progressCurrent: number;
  progressTotal: number;
}

// Error types
export class SyncError extends Error {
  constructor(
    message: string,
    public code: SyncErrorCode,
    public retryable: boolean,
    public userMessage: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'SyncError';
  }
}

/**
 * Raised when a caller or upstream data breaks the queue's contract: an
 * unsupported direction, an undecodable path, a missing upload source or a
 * request enqueued twice. Never delivered through a delegate.
 */
export class ContractViolationError extends Error {
  constructor(message: string, public details?: Record<string, unknown>) {
    super(message);
    this.name = 'ContractViolationError';
  }
}

export enum SyncErrorCode {
  // File system errors
  FILE_NOT_FOUND = 'FILE_NOT_FOUND',
  PERMISSION_DENIED = 'PERMISSION_DENIED',
  INSUFFICIENT_SPACE = 'INSUFFICIENT_SPACE',
  IS_DIRECTORY = 'IS_DIRECTORY',
  ALREADY_EXISTS = 'ALREADY_EXISTS',

  // Container errors
  SERVICE_UNAVAILABLE = 'SERVICE_UNAVAILABLE',
  CONTAINER_CREATION_FAILED = 'CONTAINER_CREATION_FAILED',

  UNKNOWN_ERROR = 'UNKNOWN_ERROR'
}
