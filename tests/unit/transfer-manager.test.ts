import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { EventEmitter } from 'events';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { ACTIVATED_EVENT, TransferManager, TransferManagerOptions } from '@/main/transfer-manager';
import { createTransferManager } from '@/main/main';
import { ConfigManager } from '@/main/config-manager';
import { FolderCloudStore } from '@/main/cloud/FolderCloudStore';
import { ContainerWatcher } from '@/main/sync/ContainerWatcher';
import { SyncStatusTracker } from '@/main/sync/SyncStatusTracker';
import {
  ContractViolationError,
  TransferDirection,
  TransferRequest,
  TransferRequestInit,
  createTransferRequest
} from '@/types/sync';
import { MockCloudStore, RecordingAlertPresenter } from '../helpers/mock-cloud';

// Enqueue a request and wait for whichever delegate method fires
function runTransfer(
  manager: TransferManager,
  init: Omit<TransferRequestInit, 'delegate'>
): Promise<{ kind: 'complete' | 'failed'; request: TransferRequest }> {
  return new Promise(resolve => {
    manager.enqueue(createTransferRequest({
      ...init,
      delegate: {
        onComplete: request => resolve({ kind: 'complete', request }),
        onFailed: request => resolve({ kind: 'failed', request })
      }
    }));
  });
}

describe('TransferManager', () => {
  let tempRoot: string;
  let cloudRoot: string;
  let localDir: string;
  let alertPresenter: RecordingAlertPresenter;
  const managers: TransferManager[] = [];

  function createManager(options: Partial<TransferManagerOptions> = {}): TransferManager {
    const manager = new TransferManager({
      cloudStore: new FolderCloudStore({ cloudRoot, accountIdentity: 'test-account' }),
      alertPresenter,
      ...options
    });
    managers.push(manager);
    return manager;
  }

  beforeEach(async () => {
    tempRoot = await fs.mkdtemp(path.join(os.tmpdir(), 'transfer-manager-test-'));
    cloudRoot = path.join(tempRoot, 'cloud');
    localDir = path.join(tempRoot, 'local');
    await fs.mkdir(cloudRoot);
    await fs.mkdir(localDir);
    alertPresenter = new RecordingAlertPresenter();
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    await Promise.all(managers.splice(0).map(manager => manager.dispose()));
    await fs.rm(tempRoot, { recursive: true, force: true });
  });

  describe('transfers', () => {
    it('should download the index document once the container is ready', async () => {
      const statusObserver = new SyncStatusTracker();
      const manager = createManager({ statusObserver });
      await manager.ready();
      await fs.writeFile(path.join(cloudRoot, 'Documents', 'index.org'), '#+TITLE: Index\n');
      const localPath = path.join(localDir, 'index.org');

      const { kind, request } = await runTransfer(manager, {
        remoteLocator: 'index.org',
        localPath,
        direction: TransferDirection.Download
      });

      expect(kind).toBe('complete');
      expect(request.success).toBe(true);
      expect(await fs.readFile(localPath, 'utf8')).toBe('#+TITLE: Index\n');
      expect(statusObserver.getLastStatus()).toEqual({
        transferFilename: 'index.org',
        progressCurrent: 100,
        progressTotal: 100
      });
      expect(manager.busy()).toBe(false);
    });

    it('should upload a local file into Documents', async () => {
      const manager = createManager();
      await manager.ready();
      const localPath = path.join(localDir, 'mobileorg.org');
      await fs.writeFile(localPath, '* Captured\n');

      const { kind } = await runTransfer(manager, {
        remoteLocator: 'mobileorg.org',
        localPath,
        direction: TransferDirection.Upload
      });

      expect(kind).toBe('complete');
      expect(await fs.readFile(path.join(cloudRoot, 'Documents', 'mobileorg.org'), 'utf8')).toBe('* Captured\n');
    });

    it('should report a missing remote file as a 404 failure', async () => {
      const manager = createManager();
      await manager.ready();

      const { kind, request } = await runTransfer(manager, {
        remoteLocator: 'absent.org',
        localPath: path.join(localDir, 'absent.org'),
        direction: TransferDirection.Download
      });

      expect(kind).toBe('failed');
      expect(request.statusCode).toBe(404);
      expect(request.errorText).toContain('ENOENT');
    });

    it('should treat a missing upload source as fatal', async () => {
      const fatalErrors: Error[] = [];
      const fatal = new Promise<void>(resolve => {
        const manager = createManager({
          onFatalError: error => {
            fatalErrors.push(error);
            resolve();
          }
        });
        void manager.ready().then(() => {
          manager.enqueue(createTransferRequest({
            remoteLocator: 'ghost.org',
            localPath: path.join(localDir, 'ghost.org'),
            direction: TransferDirection.Upload,
            delegate: { onComplete: vi.fn(), onFailed: vi.fn() }
          }));
        });
      });

      await fatal;

      expect(fatalErrors).toHaveLength(1);
      expect(fatalErrors[0]).toBeInstanceOf(ContractViolationError);
    });

    it('should answer 503 while cloud storage is unavailable', async () => {
      const manager = createManager({
        cloudStore: new FolderCloudStore({ cloudRoot: null, accountIdentity: null })
      });

      expect(await manager.ready()).toEqual({ kind: 'unavailable' });
      expect(manager.isAvailable).toBe(false);

      const { kind, request } = await runTransfer(manager, {
        remoteLocator: 'index.org',
        localPath: path.join(localDir, 'index.org'),
        direction: TransferDirection.Download
      });

      expect(kind).toBe('failed');
      expect(request.statusCode).toBe(503);
      await expect(fs.stat(path.join(localDir, 'index.org'))).rejects.toThrow('ENOENT');
    });
  });

  describe('container', () => {
    it('should expose the resolved Documents and index paths', async () => {
      const manager = createManager();

      const outcome = await manager.ready();

      expect(outcome).toEqual({ kind: 'resolved', path: path.join(cloudRoot, 'Documents') });
      expect(manager.documentsPath).toBe(path.join(cloudRoot, 'Documents'));
      expect(manager.indexFilename).toBe('index.org');
      expect(manager.indexPath).toBe(path.join(cloudRoot, 'Documents', 'index.org'));
      expect(manager.isAvailable).toBe(true);
      expect(await manager.ensureContainer()).toEqual({ kind: 'already_resolved' });
    });

    it('should alert when the Documents directory cannot be created', async () => {
      const blocker = path.join(tempRoot, 'blocker');
      await fs.writeFile(blocker, 'not a directory');
      const manager = createManager({ cloudStore: new MockCloudStore(blocker) });

      const outcome = await manager.ready();

      expect(outcome.kind).toBe('failed');
      expect(alertPresenter.alerts).toHaveLength(1);
      expect(alertPresenter.alerts[0].title).toBe('Cloud Error');
      expect(alertPresenter.alerts[0].message).toMatch(
        /^The Documents folder could not be created in cloud storage\. Try again later\. \(ENOTDIR: .*\)$/
      );
      expect(manager.documentsPath).toBeNull();
    });
  });

  describe('synchronization', () => {
    it('should ask the store to synchronize Documents when the app is activated', async () => {
      const lifecycle = new EventEmitter();
      const store = new MockCloudStore(cloudRoot);
      const manager = createManager({ cloudStore: store, lifecycle });
      await manager.ready();

      lifecycle.emit(ACTIVATED_EVENT);

      await vi.waitFor(() => {
        expect(store.startSynchronizing).toHaveBeenCalledWith(path.join(cloudRoot, 'Documents'));
      });
    });

    it('should not listen for activation until the container resolves', async () => {
      const lifecycle = new EventEmitter();
      const manager = createManager({ cloudStore: new MockCloudStore(null), lifecycle });

      await manager.ready();

      expect(lifecycle.listenerCount(ACTIVATED_EVENT)).toBe(0);
    });

    it('should alert when synchronization fails', async () => {
      const store = new MockCloudStore(cloudRoot);
      store.startSynchronizing.mockRejectedValue(new Error('quota exceeded'));
      const manager = createManager({ cloudStore: store });
      await manager.ready();

      await manager.requestSynchronization();

      expect(alertPresenter.alerts).toEqual([
        { title: 'Cloud Synchronisation Error', message: 'quota exceeded' }
      ]);
    });

    it('should stop listening on dispose', async () => {
      const lifecycle = new EventEmitter();
      const manager = createManager({ cloudStore: new MockCloudStore(cloudRoot), lifecycle });
      await manager.ready();
      expect(lifecycle.listenerCount(ACTIVATED_EVENT)).toBe(1);

      await manager.dispose();

      expect(lifecycle.listenerCount(ACTIVATED_EVENT)).toBe(0);
    });

    it('should tear down the status tracker it created on dispose', async () => {
      const manager = createManager();
      const tracker = manager.statusObserver;
      expect(tracker).toBeInstanceOf(SyncStatusTracker);
      if (!(tracker instanceof SyncStatusTracker)) return;
      tracker.on('status', vi.fn());
      tracker.updateStatus();
      expect(tracker.getLastStatus()).not.toBeNull();

      await manager.dispose();

      expect(tracker.listenerCount('status')).toBe(0);
      expect(tracker.getLastStatus()).toBeNull();
    });

    it('should leave a status observer supplied by the caller untouched on dispose', async () => {
      const statusObserver = new SyncStatusTracker();
      const listener = vi.fn();
      statusObserver.on('status', listener);
      const manager = createManager({ statusObserver });

      await manager.dispose();

      expect(statusObserver.listenerCount('status')).toBe(1);
    });

    it('should start and stop the container watcher', async () => {
      const containerWatcher = new ContainerWatcher('index.org');
      const startSpy = vi.spyOn(containerWatcher, 'start').mockResolvedValue(undefined);
      const stopSpy = vi.spyOn(containerWatcher, 'stop').mockResolvedValue(undefined);
      const manager = createManager({ containerWatcher });

      await manager.ready();
      expect(startSpy).toHaveBeenCalledWith(path.join(cloudRoot, 'Documents'));

      await manager.dispose();
      expect(stopSpy).toHaveBeenCalled();
    });
  });

  describe('queue control', () => {
    it('should hold transfers while paused and drop them on abort', async () => {
      const manager = createManager();
      await manager.ready();
      const delegate = { onComplete: vi.fn(), onFailed: vi.fn() };

      manager.pause();
      manager.enqueue(createTransferRequest({
        remoteLocator: 'index.org',
        localPath: path.join(localDir, 'index.org'),
        direction: TransferDirection.Download,
        delegate
      }));

      expect(manager.queueSize()).toBe(1);
      expect(manager.busy()).toBe(true);

      manager.abort();
      manager.resume();

      expect(manager.queueSize()).toBe(0);
      expect(manager.busy()).toBe(false);
      expect(delegate.onComplete).not.toHaveBeenCalled();
      expect(delegate.onFailed).not.toHaveBeenCalled();
    });
  });
});

describe('createTransferManager', () => {
  let tempRoot: string;

  beforeEach(async () => {
    tempRoot = await fs.mkdtemp(path.join(os.tmpdir(), 'create-manager-test-'));
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    await fs.rm(tempRoot, { recursive: true, force: true });
  });

  it('should build a manager over the configured cloud folder', async () => {
    const configPath = path.join(tempRoot, 'config.json');
    const cloudRoot = path.join(tempRoot, 'cloud');
    await fs.mkdir(cloudRoot);
    await fs.writeFile(configPath, JSON.stringify({ cloudRoot, accountIdentity: 'test-account', indexFilename: 'agenda.org' }));

    const manager = await createTransferManager({ configManager: new ConfigManager(configPath) });

    expect(await manager.ready()).toEqual({ kind: 'resolved', path: path.join(cloudRoot, 'Documents') });
    expect(manager.indexPath).toBe(path.join(cloudRoot, 'Documents', 'agenda.org'));
    expect(manager.isAvailable).toBe(true);
    await manager.dispose();
  });
});
