import * as chokidar from 'chokidar';
import * as path from 'path';
import { EventEmitter } from 'events';
import SecureLogger from '../secure-logger';

/**
 * Watches the container's Documents directory for files the cloud provider
 * brings in. Emits 'remoteChange' with the file path, and 'indexChange' when
 * the changed file is the index document.
 */
export class ContainerWatcher extends EventEmitter {
  private watcher: chokidar.FSWatcher | null = null;

  constructor(private indexFilename: string) {
    super();
  }

  async start(documentsPath: string): Promise<void> {
    if (this.watcher) {
      return;
    }

    SecureLogger.log(`[ContainerWatcher] Watching ${documentsPath}`);

    this.watcher = chokidar.watch(documentsPath, {
      ignored: /(^|[/\\])\../, // dotfiles, including provider placeholders
      persistent: true,
      ignoreInitial: true,
      awaitWriteFinish: {
        stabilityThreshold: 500,
        pollInterval: 100
      }
    });

    this.watcher.on('add', filePath => this.handleChange(filePath));
    this.watcher.on('change', filePath => this.handleChange(filePath));

    this.watcher.on('ready', () => {
      SecureLogger.debug('[ContainerWatcher] Watcher ready');
    });

    this.watcher.on('error', error => {
      SecureLogger.error('[ContainerWatcher] Watcher error:', error);
    });
  }

  async stop(): Promise<void> {
    if (this.watcher) {
      await this.watcher.close();
      this.watcher = null;
      SecureLogger.log('[ContainerWatcher] Stopped');
    }
  }

  isActive(): boolean {
    return this.watcher !== null;
  }

  private handleChange(filePath: string): void {
    this.emit('remoteChange', filePath);
    if (path.basename(filePath) === this.indexFilename) {
      this.emit('indexChange', filePath);
    }
  }
}
