import { EventEmitter } from 'events';
import { TransferConfig } from '../types';
import { ResolutionOutcome, TransferRequest } from '../types/sync';
import { ContainerResolver } from './sync/ContainerResolver';
import { ContainerWatcher } from './sync/ContainerWatcher';
import { ErrorHandler, describeError } from './sync/ErrorHandler';
import { FileCopier } from './sync/FileCopier';
import { IAlertPresenter, ICloudStore, IFileCopier, IStatusObserver } from './sync/interfaces';
import { SyncStatusTracker } from './sync/SyncStatusTracker';
import { TransferQueue } from './sync/TransferQueue';
import { DEFAULT_CONFIG } from './config-manager';
import SecureLogger from './secure-logger';

export const ACTIVATED_EVENT = 'activated';

// Alerts go to the error log when no UI layer is attached
export class LoggingAlertPresenter implements IAlertPresenter {
  show(title: string, message: string): void {
    SecureLogger.error(`[Alert] ${title}: ${message}`);
  }
}

export interface TransferManagerOptions {
  cloudStore: ICloudStore;
  config?: Partial<TransferConfig>;
  statusObserver?: IStatusObserver;
  alertPresenter?: IAlertPresenter;
  fileCopier?: IFileCopier;
  // Emits ACTIVATED_EVENT when the application returns to the foreground
  lifecycle?: EventEmitter;
  containerWatcher?: ContainerWatcher;
  onFatalError?: (error: Error) => void;
}

/**
 * Owns the container resolver and the transfer queue for the lifetime of
 * the process. Resolution starts on construction; ready() awaits it.
 */
export class TransferManager {
  readonly resolver: ContainerResolver;
  readonly queue: TransferQueue;
  readonly statusObserver: IStatusObserver;
  readonly containerWatcher: ContainerWatcher | null;

  private readonly config: TransferConfig;
  private readonly cloudStore: ICloudStore;
  private readonly alertPresenter: IAlertPresenter;
  private readonly lifecycle: EventEmitter | null;
  private readonly initialResolution: Promise<ResolutionOutcome>;
  private readonly errorHandler = new ErrorHandler();
  // Set when the manager created the tracker and so tears it down on dispose
  private readonly ownedTracker: SyncStatusTracker | null;
  private subscribedToLifecycle = false;
  private disposed = false;

  private readonly handleActivation = (): void => {
    void this.requestSynchronization();
  };

  constructor(options: TransferManagerOptions) {
    this.config = { ...DEFAULT_CONFIG, ...options.config };
    this.cloudStore = options.cloudStore;
    this.alertPresenter = options.alertPresenter ?? new LoggingAlertPresenter();
    if (options.statusObserver) {
      this.statusObserver = options.statusObserver;
      this.ownedTracker = null;
    } else {
      const tracker = new SyncStatusTracker();
      this.statusObserver = tracker;
      this.ownedTracker = tracker;
    }
    this.lifecycle = options.lifecycle ?? null;
    this.containerWatcher = options.containerWatcher
      ?? (this.config.watchContainer ? new ContainerWatcher(this.config.indexFilename) : null);

    this.resolver = new ContainerResolver(this.cloudStore, {
      containerIdentifier: this.config.containerIdentifier,
      indexFilename: this.config.indexFilename
    });
    this.queue = new TransferQueue(
      this.resolver,
      this.statusObserver,
      options.fileCopier ?? new FileCopier(),
      { onFatalError: options.onFatalError }
    );

    this.initialResolution = this.ensureContainer();
  }

  get isAvailable(): boolean {
    return this.resolver.isAvailable;
  }

  get documentsPath(): string | null {
    return this.resolver.documentsPath;
  }

  get indexFilename(): string {
    return this.resolver.indexFilename;
  }

  get indexPath(): string | null {
    return this.resolver.indexPath;
  }

  // Outcome of the resolution started by the constructor
  ready(): Promise<ResolutionOutcome> {
    return this.initialResolution;
  }

  /**
   * Resolve the container if it is not resolved yet. Failures are shown
   * through the alert presenter; nothing retries them automatically.
   */
  async ensureContainer(): Promise<ResolutionOutcome> {
    const outcome = await this.resolver.resolve();

    switch (outcome.kind) {
      case 'resolved':
        await this.onContainerResolved(outcome.path);
        break;
      case 'failed':
        this.alertPresenter.show(
          'Cloud Error',
          `${this.errorHandler.getUserMessage(outcome.error)} (${outcome.error.message})`
        );
        break;
      case 'unavailable':
        SecureLogger.warn('[TransferManager] Cloud storage is unavailable; transfers will report 503');
        break;
      case 'already_resolved':
        break;
    }

    return outcome;
  }

  /**
   * Ask the cloud store to bring the Documents directory up to date.
   * Best effort: errors go to the alert presenter.
   */
  async requestSynchronization(): Promise<void> {
    const documentsPath = this.resolver.documentsPath;
    if (documentsPath === null) {
      return;
    }

    // Leave the current turn of the event loop before touching the store
    await new Promise<void>(resolve => setImmediate(resolve));
    try {
      await this.cloudStore.startSynchronizing(documentsPath);
    } catch (error) {
      this.alertPresenter.show('Cloud Synchronisation Error', describeError(error));
    }
  }

  enqueue(request: TransferRequest): void {
    this.queue.enqueue(request);
  }

  pause(): void {
    this.queue.pause();
  }

  resume(): void {
    this.queue.resume();
  }

  abort(): void {
    this.queue.abort();
  }

  busy(): boolean {
    return this.queue.busy();
  }

  queueSize(): number {
    return this.queue.queueSize();
  }

  async dispose(): Promise<void> {
    this.disposed = true;
    if (this.lifecycle && this.subscribedToLifecycle) {
      this.lifecycle.off(ACTIVATED_EVENT, this.handleActivation);
      this.subscribedToLifecycle = false;
    }
    this.ownedTracker?.destroy();
    if (this.containerWatcher) {
      await this.containerWatcher.stop();
    }
  }

  private async onContainerResolved(documentsPath: string): Promise<void> {
    if (this.disposed) {
      return;
    }

    if (this.lifecycle && !this.subscribedToLifecycle) {
      this.lifecycle.on(ACTIVATED_EVENT, this.handleActivation);
      this.subscribedToLifecycle = true;
    }

    if (this.containerWatcher) {
      try {
        await this.containerWatcher.start(documentsPath);
      } catch (error) {
        this.alertPresenter.show('Cloud Error', describeError(error));
      }
    }
  }
}
