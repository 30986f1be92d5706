import { EventEmitter } from 'events';
import { TransferStatus } from '../../types/sync';
import { IStatusObserver } from './interfaces';
import SecureLogger from '../secure-logger';

/**
 * Status observer that republishes the queue's progress as events:
 * - 'visible' whenever a transfer is enqueued
 * - 'status' with a TransferStatus snapshot on every updateStatus()
 */
export class SyncStatusTracker extends EventEmitter implements IStatusObserver {
  transferFilename = '';
  progressTotal = 0;
  progressCurrent = 0;

  private lastStatus: TransferStatus | null = null;

  showStatus(): void {
    this.emit('visible');
  }

  updateStatus(): void {
    const status = this.snapshot();
    this.lastStatus = status;
    SecureLogger.debug(`[SyncStatusTracker] ${status.transferFilename}: ${status.progressCurrent}/${status.progressTotal}`);
    this.emit('status', status);
  }

  getLastStatus(): TransferStatus | null {
    return this.lastStatus;
  }

  snapshot(): TransferStatus {
    return {
      transferFilename: this.transferFilename,
      progressCurrent: this.progressCurrent,
      progressTotal: this.progressTotal
    };
  }

  destroy(): void {
    this.removeAllListeners();
    this.lastStatus = null;
  }
}
