import { EventEmitter } from 'events';
import { ConfigManager } from './config-manager';
import { FolderCloudStore } from './cloud/FolderCloudStore';
import { IAlertPresenter, IStatusObserver } from './sync/interfaces';
import { TransferManager } from './transfer-manager';
import SecureLogger from './secure-logger';

export interface CreateTransferManagerOptions {
  configManager?: ConfigManager;
  lifecycle?: EventEmitter;
  statusObserver?: IStatusObserver;
  alertPresenter?: IAlertPresenter;
}

/**
 * Load the configuration and build a TransferManager over the configured
 * cloud folder. Container resolution is already under way when this returns.
 */
export async function createTransferManager(
  options: CreateTransferManagerOptions = {}
): Promise<TransferManager> {
  const configManager = options.configManager ?? new ConfigManager();
  const config = await configManager.initialize();
  SecureLogger.setDebug(config.debug);
  SecureLogger.log(`[Main] Loaded config from ${configManager.getConfigPath()}`);

  const cloudStore = new FolderCloudStore({
    cloudRoot: config.cloudRoot,
    accountIdentity: config.accountIdentity
  });

  return new TransferManager({
    cloudStore,
    config,
    lifecycle: options.lifecycle,
    statusObserver: options.statusObserver,
    alertPresenter: options.alertPresenter
  });
}
