import * as path from 'path';
import * as fs from 'fs/promises';
import { ICloudStore } from '../sync/interfaces';
import { isErrnoException } from '../sync/ErrorHandler';
import SecureLogger from '../secure-logger';

export interface FolderCloudStoreOptions {
  cloudRoot: string | null;
  accountIdentity: string | null;
}

/**
 * Cloud store backed by a folder that a desktop sync client keeps mirrored,
 * such as a mounted cloud drive. Containers are subdirectories of the root.
 */
export class FolderCloudStore implements ICloudStore {
  constructor(private options: FolderCloudStoreOptions) {}

  async containerUrl(identifier: string | null): Promise<string | null> {
    const { cloudRoot } = this.options;
    if (!cloudRoot) {
      return null;
    }

    const containerPath = identifier ? path.join(cloudRoot, identifier) : cloudRoot;
    try {
      const stats = await fs.stat(containerPath);
      return stats.isDirectory() ? containerPath : null;
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return null;
      }
      throw error;
    }
  }

  identityToken(): string | null {
    if (!this.options.cloudRoot) {
      return null;
    }
    return this.options.accountIdentity;
  }

  // Listing the directory makes on-demand providers fetch its entries
  async startSynchronizing(targetPath: string): Promise<void> {
    const entries = await fs.readdir(targetPath);
    SecureLogger.debug(`[FolderCloudStore] Synchronizing ${targetPath} (${entries.length} entries)`);
  }
}
