import { CopyResult } from '../../types/sync';

/**
 * Receives the name and progress of the active transfer. The queue assigns
 * the fields first and then calls updateStatus().
 */
export interface IStatusObserver {
  transferFilename: string;
  progressTotal: number;
  progressCurrent: number;
  updateStatus(): void;
  showStatus(): void;
}

export interface ICloudStore {
  // null identifier selects the default container
  containerUrl(identifier: string | null): Promise<string | null>;
  identityToken(): string | null;
  startSynchronizing(targetPath: string): Promise<void>;
}

export interface IAlertPresenter {
  show(title: string, message: string): void;
}

export interface IFileCopier {
  upload(from: string, to: string): Promise<CopyResult>;
  download(from: string, to: string): Promise<CopyResult>;
}

export interface IContainerState {
  readonly documentsPath: string | null;
}
