import * as fs from 'fs/promises';
import { constants as fsConstants } from 'fs';
import { ContractViolationError, CopyResult } from '../../types/sync';
import SecureLogger from '../secure-logger';
import { ErrorHandler } from './ErrorHandler';
import { IFileCopier } from './interfaces';

type CopyOperation = 'upload' | 'download';

/**
 * Whole-file copies between the local store and the container. I/O errors
 * come back as a failed CopyResult; a missing upload source rejects with a
 * ContractViolationError.
 */
export class FileCopier implements IFileCopier {
  constructor(private errorHandler: ErrorHandler = new ErrorHandler()) {}

  /**
   * Upload the file into the container.
   * @param from - local source; must exist and be readable
   * @param to - destination inside the container
   */
  async upload(from: string, to: string): Promise<CopyResult> {
    await this.assertReadableSource(from);
    return this.copy('upload', from, to);
  }

  /**
   * Download the file from the container.
   * @param from - source inside the container
   * @param to - local destination
   */
  async download(from: string, to: string): Promise<CopyResult> {
    return this.copy('download', from, to);
  }

  private async assertReadableSource(from: string): Promise<void> {
    try {
      await fs.access(from, fsConstants.R_OK);
    } catch (error) {
      throw new ContractViolationError(`Upload source is missing or unreadable: ${from}`, { cause: error });
    }
  }

  private async copy(operation: CopyOperation, from: string, to: string): Promise<CopyResult> {
    try {
      // Replace, never merge into, an existing destination
      await fs.rm(to, { force: true });
      await fs.copyFile(from, to);
      SecureLogger.debug(`[FileCopier] ${operation} complete: ${from} -> ${to}`);
      return { ok: true };
    } catch (error) {
      const syncError = this.errorHandler.classifyError(error);
      this.errorHandler.logError(syncError, { operation, from, to });
      return { ok: false, error: syncError };
    }
  }
}
