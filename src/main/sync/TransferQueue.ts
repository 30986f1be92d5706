import * as path from 'path';
import {
  ContractViolationError,
  CopyResult,
  STATUS_IO_FAILURE,
  STATUS_SERVICE_UNAVAILABLE,
  SyncError,
  SyncErrorCode,
  TransferDirection,
  TransferRequest
} from '../../types/sync';
import SecureLogger from '../secure-logger';
import { ErrorHandler, describeError } from './ErrorHandler';
import { IContainerState, IFileCopier, IStatusObserver } from './interfaces';

export const SERVICE_UNAVAILABLE_TEXT = 'Cannot reach cloud storage.';

export interface TransferQueueOptions {
  /**
   * Called when a copy in flight breaks the queue's contract. The default
   * logs the error and rethrows it on the next tick, terminating the process.
   */
  onFatalError?: (error: Error) => void;
}

function crashOnFatalError(error: Error): void {
  SecureLogger.error('[TransferQueue] Fatal contract violation:', error);
  process.nextTick(() => {
    throw error;
  });
}

function decodePath(value: string, label: string): string {
  try {
    return decodeURIComponent(value);
  } catch (error) {
    throw new ContractViolationError(`Cannot decode ${label} from ${value}`, { cause: error });
  }
}

// Last path component of a locator, for display only
function displayName(locator: string): string {
  const name = path.basename(locator);
  try {
    return decodeURIComponent(name);
  } catch {
    return name;
  }
}

/**
 * FIFO queue of transfers with a single transfer in flight.
 *
 * All state transitions run synchronously on the event loop. Copies are
 * asynchronous and re-enter the queue through their promise continuation,
 * which is the only place a transfer is finished after it starts copying.
 */
export class TransferQueue {
  private pending: TransferRequest[] = [];
  private activeTransfer: TransferRequest | null = null;
  private paused = false;
  private draining = false;
  private readonly enqueued = new WeakSet<TransferRequest>();
  private readonly onFatalError: (error: Error) => void;

  constructor(
    private container: IContainerState,
    private statusObserver: IStatusObserver,
    private fileCopier: IFileCopier,
    options: TransferQueueOptions = {},
    private errorHandler: ErrorHandler = new ErrorHandler()
  ) {
    this.onFatalError = options.onFatalError ?? crashOnFatalError;
  }

  enqueue(request: TransferRequest): void {
    if (this.enqueued.has(request)) {
      throw new ContractViolationError(`Transfer request for ${request.remoteLocator ?? request.localPath} was already enqueued`);
    }
    this.enqueued.add(request);
    this.pending.push(request);
    SecureLogger.debug(`[TransferQueue] Enqueued ${request.direction} (${this.pending.length} pending)`);
    this.statusObserver.showStatus();
    this.dispatchNext();
  }

  pause(): void {
    this.paused = true;
  }

  resume(): void {
    this.paused = false;
    this.dispatchNext();
  }

  // Drops requests that have not started; the active transfer still finishes
  abort(): void {
    if (this.pending.length > 0) {
      SecureLogger.log(`[TransferQueue] Aborted ${this.pending.length} pending transfers`);
    }
    this.pending = [];
  }

  busy(): boolean {
    return this.pending.length > 0 || this.activeTransfer !== null;
  }

  queueSize(): number {
    return this.pending.length;
  }

  isPaused(): boolean {
    return this.paused;
  }

  getActiveTransfer(): TransferRequest | null {
    return this.activeTransfer;
  }

  /**
   * Sole gate for the single-transfer invariant; called from enqueue, resume
   * and finish. Requests that finish synchronously (dummies, unreachable
   * container) are drained by the loop rather than by recursion, so a nested
   * call made while draining returns and leaves the work to the outer loop.
   * The first callback error is rethrown once the queue has drained.
   */
  private dispatchNext(): void {
    if (this.draining) return;

    this.draining = true;
    let failure: { error: unknown } | null = null;
    try {
      for (;;) {
        try {
          if (!this.startNext()) break;
        } catch (error) {
          if (failure === null) {
            failure = { error };
          } else {
            SecureLogger.error('[TransferQueue] Transfer callback failed:', error);
          }
        }
      }
    } finally {
      this.draining = false;
    }

    if (failure !== null) {
      throw failure.error;
    }
  }

  // Starts the head request; true when it already finished and the next may start
  private startNext(): boolean {
    if (this.paused || this.activeTransfer !== null) return false;

    const next = this.pending[0];
    if (next === undefined || !next.remoteLocator) return false;

    this.pending.shift();
    this.activeTransfer = next;
    next.success = true;

    this.statusObserver.transferFilename = displayName(next.remoteLocator);
    this.statusObserver.progressCurrent = 0;
    this.statusObserver.progressTotal = 0;
    this.statusObserver.updateStatus();

    SecureLogger.debug(`[TransferQueue] Dispatching ${next.direction} of ${next.remoteLocator}`);
    this.process(next);
    return this.activeTransfer === null;
  }

  private process(request: TransferRequest): void {
    // Dummies need no container, so they succeed even before it resolves
    if (request.isDummy) {
      request.success = true;
      this.finish(request);
      return;
    }

    const documentsPath = this.container.documentsPath;
    if (documentsPath === null) {
      const unavailable = new SyncError(
        SERVICE_UNAVAILABLE_TEXT,
        SyncErrorCode.SERVICE_UNAVAILABLE,
        true,
        'Cloud storage is unavailable.'
      );
      this.errorHandler.logError(unavailable, { direction: request.direction, remoteLocator: request.remoteLocator });
      request.errorText = unavailable.message;
      request.statusCode = STATUS_SERVICE_UNAVAILABLE;
      request.success = false;
      this.finish(request);
      return;
    }

    const remotePath = this.resolveRemotePath(request, documentsPath);
    const localPath = decodePath(request.localPath, 'local path');

    let operation: Promise<CopyResult>;
    switch (request.direction) {
      case TransferDirection.Download:
        operation = this.fileCopier.download(remotePath, localPath);
        break;
      case TransferDirection.Upload:
        operation = this.fileCopier.upload(localPath, remotePath);
        break;
      default: {
        const unsupported: never = request.direction;
        throw new ContractViolationError(`Unsupported transfer direction: ${String(unsupported)}`);
      }
    }

    operation
      .then(result => this.completeCopy(request, result))
      .catch((error: unknown) => {
        this.onFatalError(error instanceof Error ? error : new Error(describeError(error)));
      });
  }

  private resolveRemotePath(request: TransferRequest, documentsPath: string): string {
    const locator = request.remoteLocator;
    if (!locator) {
      throw new ContractViolationError('Transfer request has no remote locator');
    }

    let rawPath = locator;
    if (locator.startsWith('file:')) {
      try {
        rawPath = new URL(locator).pathname;
      } catch (error) {
        throw new ContractViolationError(`Cannot create remote path from ${locator}`, { cause: error });
      }
    }

    const remotePath = decodePath(rawPath, 'remote path');
    return path.isAbsolute(remotePath) ? remotePath : path.join(documentsPath, remotePath);
  }

  private completeCopy(request: TransferRequest, result: CopyResult): void {
    if (result.ok) {
      request.success = true;
    } else {
      request.errorText = result.error.message;
      request.statusCode = STATUS_IO_FAILURE;
      request.success = false;
    }

    this.statusObserver.progressTotal = 100;
    this.statusObserver.progressCurrent = 100;
    this.statusObserver.updateStatus();
    this.finish(request);
  }

  private finish(request: TransferRequest): void {
    if (this.activeTransfer !== request) {
      throw new ContractViolationError('Finished a transfer that is not active');
    }

    if (!request.success && request.abortOnFailure && this.pending.length > 0) {
      SecureLogger.warn(`[TransferQueue] Transfer failed, dropping ${this.pending.length} pending transfers`);
      this.pending = [];
    }

    try {
      if (request.success) {
        request.delegate.onComplete(request);
      } else {
        request.delegate.onFailed(request);
      }
    } finally {
      this.activeTransfer = null;
      this.dispatchNext();
    }
  }
}
