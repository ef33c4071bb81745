/**
 * @fileoverview Application-level owner of the history store and open documents
 * @description One workspace per data directory. It holds the only storage
 * handle, hands out undo managers per document and flushes them together.
 */

import { PersistenceLayer } from './persistence-layer';
import { SessionStore } from './session-store';
import { UndoManager } from './undo-manager';
import { HistoryStorage } from './storage/history-storage';
import { LevelHistoryStorage } from './storage/level-history-storage';
import { describeError } from './types/errors';
import { DocumentIdAllocator, docIdForPath } from './utils/document-identity';
import { logger } from './utils/logger';
import { NotificationHub } from './utils/notifications';
import {
  NotificationType,
  type HistoryConfig,
  type NotificationCallback
} from './types/common';

interface WorkspaceOptions {
  /** Use this backend instead of opening the LevelDB store in config.dataDir */
  storage?: HistoryStorage;
  allocator?: DocumentIdAllocator;
}

interface CloseOptions {
  /** Remove the stored history instead of flushing it */
  deleteHistory?: boolean;
}

const log = logger.scope('workspace');

class HistoryWorkspace {
  readonly config: HistoryConfig;
  readonly sessions: SessionStore;
  readonly allocator: DocumentIdAllocator;

  private readonly storage: HistoryStorage;
  private readonly persistence: PersistenceLayer;
  private readonly notifications = new NotificationHub();
  private managers: Map<string, UndoManager> = new Map();
  private opening: Map<string, Promise<UndoManager>> = new Map();
  private closed: boolean = false;

  private constructor(config: HistoryConfig, storage: HistoryStorage, allocator: DocumentIdAllocator) {
    this.config = config;
    this.storage = storage;
    this.persistence = new PersistenceLayer(storage);
    this.sessions = new SessionStore(storage);
    this.allocator = allocator;
  }

  /**
   * Open the workspace. Rejects with HistoryStorageError when the store is
   * unavailable, including when another workspace holds it.
   */
  static async open(config: HistoryConfig, options: WorkspaceOptions = {}): Promise<HistoryWorkspace> {
    const storage = options.storage ?? await LevelHistoryStorage.open(config.dataDir);
    log.info(`History workspace opened (${config.dataDir})`);
    return new HistoryWorkspace(config, storage, options.allocator ?? new DocumentIdAllocator());
  }

  onNotification(callback: NotificationCallback): void {
    this.notifications.subscribe(callback);
  }

  /**
   * Open (or return the already open) history of a file. Stored history is
   * restored; a failed restore yields an empty history.
   */
  async openFile(filePath: string): Promise<UndoManager> {
    this._assertOpen();
    const docId = await docIdForPath(filePath);
    const existing = this.managers.get(docId);
    if (existing) return existing;
    const pending = this.opening.get(docId);
    if (pending) return pending;

    const load = this._loadFile(docId, filePath);
    this.opening.set(docId, load);
    try {
      const manager = await load;
      this.managers.set(docId, manager);
      return manager;
    } finally {
      this.opening.delete(docId);
    }
  }

  private _loadFile(docId: string, filePath: string): Promise<UndoManager> {
    return UndoManager.loadOrNew(docId, this.config, this.persistence, {
      onNotification: notification => {
        this.notifications.emit(notification.type, notification.severity, notification.message, {
          ...notification.metadata,
          path: filePath
        });
      }
    });
  }

  /**
   * Open a memory-only history for a buffer without a file. Its id is fresh
   * for this run, so nothing is restored or stored.
   */
  openUnsaved(): UndoManager {
    this._assertOpen();
    const manager = new UndoManager(this.allocator.generateUnsavedId(), this.config);
    manager.onNotification(notification => {
      this.notifications.emit(notification.type, notification.severity, notification.message, notification.metadata);
    });
    this.managers.set(manager.docId, manager);
    return manager;
  }

  get(docId: string): UndoManager | null {
    return this.managers.get(docId) ?? null;
  }

  openDocuments(): string[] {
    return Array.from(this.managers.keys());
  }

  /**
   * Flush (or delete) a document's history and stop tracking it. The
   * document is released even when the store write fails; the error then
   * propagates.
   */
  async closeDocument(docId: string, options: CloseOptions = {}): Promise<void> {
    const manager = this.managers.get(docId);
    if (!manager) return;
    try {
      if (options.deleteHistory) {
        await manager.deleteHistory();
      } else {
        await manager.flush();
      }
    } finally {
      this.managers.delete(docId);
    }
  }

  /**
   * Flush every open document. Failures are logged and reported, never
   * thrown.
   * @returns Ids of documents whose flush failed
   */
  async flushAll(): Promise<string[]> {
    const failed: string[] = [];
    for (const [docId, manager] of this.managers) {
      try {
        await manager.flush();
      } catch (error) {
        failed.push(docId);
        log.error(`Failed to flush history for ${docId}: ${describeError(error)}`);
        this.notifications.emit(
          NotificationType.FLUSH_FAILED,
          'error',
          `History for ${docId} could not be saved`,
          { docId, error: describeError(error) }
        );
      }
    }
    return failed;
  }

  /**
   * Flush everything and release the store
   * @returns Ids of documents whose flush failed
   */
  async shutdown(): Promise<string[]> {
    if (this.closed) return [];
    await Promise.allSettled(this.opening.values());
    const failed = await this.flushAll();
    this.managers.clear();
    this.closed = true;
    await this.storage.close();
    log.info('History workspace closed');
    return failed;
  }

  isClosed(): boolean {
    return this.closed;
  }

  private _assertOpen(): void {
    if (this.closed) {
      throw new Error('History workspace is shut down');
    }
  }
}

export {
  HistoryWorkspace,
  type WorkspaceOptions,
  type CloseOptions
};
