/**
 * @fileoverview Tiered undo/redo history for one document
 * @description Sealed groups live in a bounded in-memory window ("hot").
 * Older groups spill to the persistence layer ("cold") and are read back on
 * demand. Undo and redo walk one cursor over cold ++ hot.
 */

import { EditGroup } from './edit-group';
import { estimateOperationMemory } from './edit-operation';
import { PersistenceLayer } from './persistence-layer';
import { HistoryStorageError, describeError } from './types/errors';
import { GroupingCalculator } from './utils/grouping-policy';
import { logger } from './utils/logger';
import { NotificationHub } from './utils/notifications';
import {
  NotificationType,
  type DocumentMeta,
  type EditOperation,
  type HistoryConfig,
  type HistoryDebugInfo,
  type HistoryStats,
  type NotificationCallback,
  type UndoStep
} from './types/common';

interface LoadOptions {
  /** Subscribed before restore runs, so load-time reports are delivered */
  onNotification?: NotificationCallback;
}

const log = logger.scope('undo');

class UndoManager {
  private readonly _docId: string;
  private readonly config: HistoryConfig;
  private readonly persistence: PersistenceLayer | null;
  private readonly notifications = new NotificationHub();

  // Sealed groups in memory, oldest first; every cold seq is older
  private hot: EditGroup[] = [];
  private coldSeqs: number[] = [];
  private currentGroup: EditOperation[] = [];

  // Index into cold ++ hot, one past the last applied group
  private undoCursor: number = 0;
  private nextSeq: number = 0;
  private lastEditTime: number | null = null;
  private recording: boolean = true;

  // Write-back bookkeeping for the store
  private dirtySeqs: Set<number> = new Set();
  private pendingDeletes: Set<number> = new Set();
  private metaDirty: boolean = false;

  private queue: Promise<void> = Promise.resolve();

  // Clock function (can be mocked for testing)
  private clockFunction: () => number = () => Date.now();

  constructor(docId: string, config: HistoryConfig, persistence: PersistenceLayer | null = null) {
    this._docId = docId;
    this.config = config;
    this.persistence = persistence;
  }

  /**
   * Restore a document's history from the store, or start empty.
   * Never rejects: restore failures are logged, reported as HISTORY_RESET
   * and leave an empty history.
   */
  static async loadOrNew(
    docId: string,
    config: HistoryConfig,
    persistence: PersistenceLayer | null = null,
    options: LoadOptions = {}
  ): Promise<UndoManager> {
    const manager = new UndoManager(docId, config, persistence);
    if (options.onNotification) {
      manager.onNotification(options.onNotification);
    }
    if (persistence) {
      await manager._serialize(() => manager._restore(persistence));
    }
    return manager;
  }

  get docId(): string {
    return this._docId;
  }

  /**
   * Set custom clock function (for testing)
   */
  setClock(clockFn: () => number): void {
    this.clockFunction = clockFn;
  }

  getClock(): number {
    return this.clockFunction();
  }

  onNotification(callback: NotificationCallback): void {
    this.notifications.subscribe(callback);
  }

  // =================== RECORDING ===================

  /**
   * Record one edit. The edit joins the open group when it arrives within
   * the group timeout and the grouping policy accepts it; otherwise the open
   * group is sealed first. Rejects with HistoryStorageError when spilling
   * fails, after the edit itself has been recorded.
   */
  async record(op: EditOperation, now: number = this.getClock()): Promise<void> {
    return this._serialize(async () => {
      if (!this.recording) return;

      if (this.currentGroup.length === 0) {
        this._discardRedoHistory();
        this.currentGroup = [op];
        this.lastEditTime = now;
        return;
      }

      if (this._continuesCurrentGroup(op, now)) {
        this.currentGroup.push(op);
        this.lastEditTime = now;
        return;
      }

      this._sealCurrentGroup();
      this.currentGroup = [op];
      this.lastEditTime = now;
      await this._spillOverflow();
    });
  }

  /**
   * Record a bulk edit (paste, replace-all) as a group of its own
   */
  async recordIsolated(op: EditOperation, now: number = this.getClock()): Promise<void> {
    return this._serialize(async () => {
      if (!this.recording) return;
      this._sealCurrentGroup();
      this._discardRedoHistory();
      this._seal([op]);
      this.lastEditTime = now;
      await this._spillOverflow();
    });
  }

  /**
   * Close the open group so the next edit starts a new one
   */
  async breakGroup(): Promise<void> {
    return this._serialize(async () => {
      if (this._sealCurrentGroup()) {
        await this._spillOverflow();
      }
    });
  }

  /**
   * Ignore edits until resumeRecording(), e.g. while loading content
   */
  pauseRecording(): void {
    this.recording = false;
  }

  resumeRecording(): void {
    this.recording = true;
  }

  isRecording(): boolean {
    return this.recording;
  }

  // =================== UNDO / REDO ===================

  /**
   * Step back one group
   * @returns Inverted operations to apply in order, or null when there is
   * nothing to undo
   */
  async undo(): Promise<UndoStep | null> {
    return this._serialize(async () => {
      if (this._sealCurrentGroup()) {
        await this._spillQuietly();
      }
      if (this.undoCursor === 0) return null;

      const index = this.undoCursor - 1;
      const group = await this._groupAt(index);
      if (!group) {
        const seq = this._seqAt(index);
        this._dropOldest(index + 1);
        this._reportUnavailable(seq, 'undo', 'it and every older group were dropped');
        return null;
      }

      this.undoCursor = index;
      this._markMetaDirty();
      return {
        seq: group.seq,
        operations: group.invertedOperations(),
        cursor: group.cursorBefore
      };
    });
  }

  /**
   * Step forward one group
   * @returns Operations to re-apply in order, or null when there is nothing
   * to redo
   */
  async redo(): Promise<UndoStep | null> {
    return this._serialize(async () => {
      if (this.undoCursor >= this._totalGroups()) return null;

      const index = this.undoCursor;
      const group = await this._groupAt(index);
      if (!group) {
        const seq = this._seqAt(index);
        this._dropGroupsFrom(index);
        this._reportUnavailable(seq, 'redo', 'it and every newer group were dropped');
        return null;
      }

      this.undoCursor = index + 1;
      this._markMetaDirty();
      return {
        seq: group.seq,
        operations: [...group.operations],
        cursor: group.cursorAfter
      };
    });
  }

  canUndo(): boolean {
    return this.currentGroup.length > 0 || this.undoCursor > 0;
  }

  canRedo(): boolean {
    return this.currentGroup.length === 0 && this.undoCursor < this._totalGroups();
  }

  // =================== PERSISTENCE ===================

  /**
   * Seal the open group, write every unwritten group together with pending
   * deletions and metadata, then wait for the store's durability barrier.
   * Resolves immediately for memory-only managers.
   */
  async flush(): Promise<void> {
    return this._serialize(async () => {
      this._sealCurrentGroup();
      const persistence = this.persistence;
      if (!persistence) return;

      const puts = this.hot.filter(group => this.dirtySeqs.has(group.seq));
      await this._commit(persistence, puts);
      this._moveOverflowToCold();
      await persistence.flush();
      log.debug(`Flushed history for ${this._docId}`);
    });
  }

  /**
   * Forget all history, in memory and in the store. Sequence numbers keep
   * counting up so a failed store delete cannot collide with new groups.
   */
  async deleteHistory(): Promise<void> {
    return this._serialize(async () => {
      const stored = [
        ...this.coldSeqs,
        ...this.hot.filter(group => !this.dirtySeqs.has(group.seq)).map(group => group.seq),
        ...this.pendingDeletes
      ];

      this.hot = [];
      this.coldSeqs = [];
      this.currentGroup = [];
      this.undoCursor = 0;
      this.lastEditTime = null;
      this.dirtySeqs.clear();
      this.pendingDeletes.clear();
      this.metaDirty = false;

      if (!this.persistence) return;
      try {
        await this.persistence.deleteDocument(this._docId);
      } catch (error) {
        for (const seq of stored) this.pendingDeletes.add(seq);
        this.metaDirty = true;
        this.notifications.emit(
          NotificationType.DELETE_FAILED,
          'error',
          `Failed to delete stored history for ${this._docId}`,
          { docId: this._docId, error: describeError(error) }
        );
        throw error;
      }
    });
  }

  // =================== STATS ===================

  getStats(): HistoryStats {
    let memoryUsage = 0;
    for (const group of this.hot) {
      memoryUsage += group.getMemoryUsage();
    }
    for (const op of this.currentGroup) {
      memoryUsage += estimateOperationMemory(op);
    }

    return {
      docId: this._docId,
      hotGroups: this.hot.length,
      coldGroups: this.coldSeqs.length,
      totalGroups: this._totalGroups(),
      undoCursor: this.undoCursor,
      nextSeq: this.nextSeq,
      currentGroupOperations: this.currentGroup.length,
      memoryUsage,
      persistent: this.persistence !== null
    };
  }

  getDebugInfo(): HistoryDebugInfo {
    return {
      hotSeqs: this.hot.map(group => group.seq),
      coldSeqs: [...this.coldSeqs],
      pendingDeletes: Array.from(this.pendingDeletes).sort((a, b) => a - b),
      unwrittenSeqs: Array.from(this.dirtySeqs).sort((a, b) => a - b),
      stats: this.getStats()
    };
  }

  // =================== INTERNALS ===================

  private _serialize<T>(task: () => Promise<T>): Promise<T> {
    const result = this.queue.then(task);
    this.queue = result.then(() => undefined, () => undefined);
    return result;
  }

  private _continuesCurrentGroup(op: EditOperation, now: number): boolean {
    if (this.lastEditTime === null || now - this.lastEditTime > this.config.groupTimeout) {
      return false;
    }
    const previous = this.currentGroup[this.currentGroup.length - 1];
    return previous !== undefined && GroupingCalculator.canExtend(previous, op, this.config.grouping);
  }

  private _totalGroups(): number {
    return this.coldSeqs.length + this.hot.length;
  }

  private _seqAt(index: number): number {
    if (index < this.coldSeqs.length) {
      return this.coldSeqs[index];
    }
    return this.hot[index - this.coldSeqs.length].seq;
  }

  private async _groupAt(index: number): Promise<EditGroup | null> {
    if (index >= this.coldSeqs.length) {
      return this.hot[index - this.coldSeqs.length];
    }
    if (!this.persistence) return null;
    return this.persistence.readGroup(this._docId, this.coldSeqs[index]);
  }

  private _meta(): DocumentMeta {
    return {
      nextSeq: this.nextSeq,
      cursorSeq: this.undoCursor < this._totalGroups() ? this._seqAt(this.undoCursor) : null
    };
  }

  private _markMetaDirty(): void {
    if (this.persistence) this.metaDirty = true;
  }

  /**
   * @returns Whether a group was sealed
   */
  private _sealCurrentGroup(): boolean {
    if (this.currentGroup.length === 0) return false;
    const operations = this.currentGroup;
    this.currentGroup = [];
    this._seal(operations);
    return true;
  }

  private _seal(operations: readonly EditOperation[]): void {
    const group = new EditGroup(this.nextSeq++, operations);
    this.hot.push(group);
    this.undoCursor = this._totalGroups();
    if (this.persistence) {
      this.dirtySeqs.add(group.seq);
    }
    this._markMetaDirty();
    this._evictOverflow();
  }

  private _evictOverflow(): void {
    const excess = this._totalGroups() - this.config.maxHistoryDepth;
    if (excess > 0) {
      this._dropOldest(excess);
      log.debug(`Evicted ${excess} oldest group(s) of ${this._docId}`);
    }
  }

  /**
   * Linear history: a new edit after undo invalidates the undone groups
   */
  private _discardRedoHistory(): void {
    this._dropGroupsFrom(this.undoCursor);
  }

  private _dropOldest(count: number): void {
    for (let i = 0; i < count; i++) {
      const coldSeq = this.coldSeqs.shift();
      if (coldSeq !== undefined) {
        this._forgetSeq(coldSeq);
        continue;
      }
      const group = this.hot.shift();
      if (!group) break;
      this._forgetSeq(group.seq);
    }
    this.undoCursor = Math.max(0, this.undoCursor - count);
    this._markMetaDirty();
  }

  private _dropGroupsFrom(index: number): void {
    const coldLength = this.coldSeqs.length;
    const droppedCold = this.coldSeqs.splice(Math.min(index, coldLength));
    const droppedHot = this.hot.splice(Math.max(0, index - coldLength));
    if (droppedCold.length === 0 && droppedHot.length === 0) return;

    for (const seq of droppedCold) this._forgetSeq(seq);
    for (const group of droppedHot) this._forgetSeq(group.seq);
    this.undoCursor = Math.min(this.undoCursor, this._totalGroups());
    this._markMetaDirty();
  }

  /**
   * Drop a seq from the write-back sets, queueing a store delete when the
   * group may already be on disk
   */
  private _forgetSeq(seq: number): void {
    if (this.dirtySeqs.delete(seq)) return;
    if (this.persistence) this.pendingDeletes.add(seq);
  }

  /**
   * Write the hot overflow, then move it to the cold tier. On failure the
   * groups stay in memory and the error propagates.
   */
  private async _spillOverflow(): Promise<void> {
    const persistence = this.persistence;
    if (!persistence) return;
    const overflow = this.hot.length - this.config.hotCapacity;
    if (overflow <= 0) return;

    const puts = this.hot.slice(0, overflow).filter(group => this.dirtySeqs.has(group.seq));
    try {
      await this._commit(persistence, puts);
    } catch (error) {
      this.notifications.emit(
        NotificationType.SPILL_FAILED,
        'error',
        `Failed to spill ${overflow} group(s) of ${this._docId}; they stay in memory`,
        { docId: this._docId, groups: overflow, error: describeError(error) }
      );
      throw error;
    }
    this._moveOverflowToCold();
  }

  private async _spillQuietly(): Promise<void> {
    try {
      await this._spillOverflow();
    } catch (error) {
      log.warn(`Spill deferred for ${this._docId}: ${describeError(error)}`);
    }
  }

  private async _commit(persistence: PersistenceLayer, puts: readonly EditGroup[]): Promise<void> {
    if (puts.length === 0 && this.pendingDeletes.size === 0 && !this.metaDirty) return;

    const deletes = Array.from(this.pendingDeletes);
    await persistence.commit(this._docId, { puts, deletes, meta: this._meta() });

    for (const group of puts) this.dirtySeqs.delete(group.seq);
    for (const seq of deletes) this.pendingDeletes.delete(seq);
    this.metaDirty = false;
  }

  /**
   * Move written groups beyond the hot capacity to the cold tier
   */
  private _moveOverflowToCold(): void {
    let moved = 0;
    while (this.hot.length > this.config.hotCapacity) {
      const oldest = this.hot[0];
      if (this.dirtySeqs.has(oldest.seq)) break;
      this.hot.shift();
      this.coldSeqs.push(oldest.seq);
      moved++;
    }
    if (moved > 0) {
      log.debug(`Spilled ${moved} group(s) of ${this._docId}`);
    }
  }

  private _reportUnavailable(seq: number, during: 'load' | 'undo' | 'redo', outcome: string): void {
    log.warn(`Group ${seq} of ${this._docId} is unavailable during ${during}; ${outcome}`);
    this.notifications.emit(
      NotificationType.GROUP_UNAVAILABLE,
      'warning',
      `History group ${seq} could not be read; ${outcome}`,
      { docId: this._docId, seq, during }
    );
  }

  private async _restore(persistence: PersistenceLayer): Promise<void> {
    try {
      const meta = await persistence.loadMeta(this._docId);
      const stored = await persistence.listGroupSeqs(this._docId);
      const lastStored = stored.length > 0 ? stored[stored.length - 1] : -1;

      if (!meta) {
        // Groups without metadata were never committed as a whole
        for (const seq of stored) this.pendingDeletes.add(seq);
        this.nextSeq = lastStored + 1;
        this.metaDirty = stored.length > 0;
        return;
      }

      const live: number[] = [];
      for (const seq of stored) {
        if (seq < meta.nextSeq) {
          live.push(seq);
        } else {
          this.pendingDeletes.add(seq);
        }
      }
      const excess = live.length - this.config.maxHistoryDepth;
      if (excess > 0) {
        for (const seq of live.splice(0, excess)) this.pendingDeletes.add(seq);
      }

      const hotStart = Math.max(0, live.length - this.config.hotCapacity);
      this.coldSeqs = live.slice(0, hotStart);
      for (const seq of live.slice(hotStart)) {
        const group = await persistence.readGroup(this._docId, seq);
        if (group) {
          this.hot.push(group);
        } else {
          this.pendingDeletes.add(seq);
          this._reportUnavailable(seq, 'load', 'it was skipped');
        }
      }

      this.nextSeq = Math.max(meta.nextSeq, lastStored + 1);
      this.undoCursor = this._restoreCursor(meta.cursorSeq);
      this.metaDirty = this.pendingDeletes.size > 0;
      log.debug(`Restored ${this._totalGroups()} group(s) of ${this._docId}`);
    } catch (error) {
      this._resetAfterFailedLoad(error);
    }
  }

  private _restoreCursor(cursorSeq: number | null): number {
    const total = this._totalGroups();
    if (cursorSeq === null) return total;
    for (let i = 0; i < total; i++) {
      if (this._seqAt(i) >= cursorSeq) return i;
    }
    return total;
  }

  private _resetAfterFailedLoad(error: unknown): void {
    this.hot = [];
    this.coldSeqs = [];
    this.undoCursor = 0;
    this.nextSeq = 0;
    this.dirtySeqs.clear();
    this.pendingDeletes.clear();
    this.metaDirty = false;

    const storageFailure = error instanceof HistoryStorageError;
    log.warn(`Starting with empty history for ${this._docId}: ${describeError(error)}`);
    this.notifications.emit(
      NotificationType.HISTORY_RESET,
      'warning',
      `Stored history for ${this._docId} could not be loaded; starting empty`,
      { docId: this._docId, storageFailure, error: describeError(error) }
    );
  }
}

export { UndoManager, type LoadOptions };
