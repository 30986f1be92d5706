export * from './types';
export { ConfigManager, DEFAULT_CONFIG } from './main/config-manager';
export { InputValidator, ValidationError } from './main/input-validator';
export { default as SecureLogger } from './main/secure-logger';
export { createTransferManager } from './main/main';
export type { CreateTransferManagerOptions } from './main/main';
export {
  TransferManager,
  LoggingAlertPresenter,
  ACTIVATED_EVENT
} from './main/transfer-manager';
export type { TransferManagerOptions } from './main/transfer-manager';
export { FolderCloudStore } from './main/cloud/FolderCloudStore';
export type { FolderCloudStoreOptions } from './main/cloud/FolderCloudStore';
export { ContainerResolver } from './main/sync/ContainerResolver';
export { ContainerWatcher } from './main/sync/ContainerWatcher';
export { ErrorHandler } from './main/sync/ErrorHandler';
export { FileCopier } from './main/sync/FileCopier';
export { SyncStatusTracker } from './main/sync/SyncStatusTracker';
export { TransferQueue, SERVICE_UNAVAILABLE_TEXT } from './main/sync/TransferQueue';
export type { TransferQueueOptions } from './main/sync/TransferQueue';
export type {
  IAlertPresenter,
  ICloudStore,
  IContainerState,
  IFileCopier,
  IStatusObserver
} from './main/sync/interfaces';
