import * as path from 'path';
import * as fs from 'fs/promises';
import {
  DEFAULT_INDEX_FILENAME,
  DOCUMENTS_DIRECTORY,
  ResolutionOutcome,
  SyncError,
  SyncErrorCode
} from '../../types/sync';
import SecureLogger from '../secure-logger';
import { describeError, isErrnoException } from './ErrorHandler';
import { ICloudStore, IContainerState } from './interfaces';

export interface ContainerResolverOptions {
  containerIdentifier?: string | null;
  indexFilename?: string;
}

/**
 * Resolves the Documents directory inside the cloud store's container and
 * creates it when missing. The resolved path is published once; a failed
 * resolution leaves the container unresolved and is not retried here.
 */
export class ContainerResolver implements IContainerState {
  private containerPath: string | null = null;
  private inflight: Promise<ResolutionOutcome> | null = null;

  constructor(
    private cloudStore: ICloudStore,
    private options: ContainerResolverOptions = {}
  ) {}

  get documentsPath(): string | null {
    return this.containerPath;
  }

  get isResolved(): boolean {
    return this.containerPath !== null;
  }

  // Reflects the current state of the store's account
  get isAvailable(): boolean {
    return this.cloudStore.identityToken() !== null;
  }

  get indexFilename(): string {
    return this.options.indexFilename ?? DEFAULT_INDEX_FILENAME;
  }

  get indexPath(): string | null {
    return this.containerPath === null ? null : path.join(this.containerPath, this.indexFilename);
  }

  resolve(): Promise<ResolutionOutcome> {
    if (this.containerPath !== null) {
      return Promise.resolve({ kind: 'already_resolved' });
    }

    // Concurrent callers share the resolution in flight
    if (!this.inflight) {
      this.inflight = this.performResolution().finally(() => {
        this.inflight = null;
      });
    }
    return this.inflight;
  }

  private async performResolution(): Promise<ResolutionOutcome> {
    const identifier = this.options.containerIdentifier ?? null;

    let rootPath: string | null;
    try {
      rootPath = await this.cloudStore.containerUrl(identifier);
    } catch (error) {
      SecureLogger.error('[ContainerResolver] Cloud store failed to locate container:', error);
      return {
        kind: 'failed',
        error: new SyncError(
          describeError(error),
          SyncErrorCode.SERVICE_UNAVAILABLE,
          true,
          'Cloud storage could not locate its container.',
          { originalError: error }
        )
      };
    }

    if (!rootPath) {
      SecureLogger.warn(`[ContainerResolver] No container available for ${identifier ?? 'default identifier'}`);
      return { kind: 'unavailable' };
    }

    const documentsPath = path.join(rootPath, DOCUMENTS_DIRECTORY);
    try {
      if (!(await this.pathExists(documentsPath))) {
        await fs.mkdir(documentsPath, { recursive: true });
        SecureLogger.log(`[ContainerResolver] Created documents directory: ${documentsPath}`);
      }
    } catch (error) {
      SecureLogger.error(`[ContainerResolver] Failed to create ${documentsPath}:`, error);
      return {
        kind: 'failed',
        error: new SyncError(
          describeError(error),
          SyncErrorCode.CONTAINER_CREATION_FAILED,
          true,
          'The Documents folder could not be created in cloud storage.',
          { path: documentsPath, errno: isErrnoException(error) ? error.code : undefined }
        )
      };
    }

    this.containerPath = documentsPath;
    SecureLogger.log(`[ContainerResolver] Container resolved: ${documentsPath}`);
    return { kind: 'resolved', path: documentsPath };
  }

  private async pathExists(targetPath: string): Promise<boolean> {
    try {
      await fs.stat(targetPath);
      return true;
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return false;
      }
      throw error;
    }
  }
}
