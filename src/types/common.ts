/**
 * @fileoverview Common types shared across the history engine
 * @description Centralized type definitions to avoid duplication
 */

// =================== EDIT MODEL ===================

/**
 * Cursor position: 0-indexed line and character offset within the line
 */
export interface CursorSnapshot {
  readonly line: number;
  readonly col: number;
}

/**
 * One atomic change to a document's character sequence.
 *
 * `deleted` is removed at `position`, then `inserted` is added there.
 * Positions count Unicode code points, not UTF-16 units.
 */
export interface EditOperation {
  readonly position: number;
  readonly inserted: string;
  readonly deleted: string;
  readonly cursorBefore: CursorSnapshot;
  readonly cursorAfter: CursorSnapshot;
}

/**
 * Result of an undo or redo: operations to apply in order, and where the
 * cursor lands afterwards
 */
export interface UndoStep {
  seq: number;
  operations: EditOperation[];
  cursor: CursorSnapshot;
}

// =================== GROUPING ===================

/**
 * Edit direction classes used to decide whether an edit continues a group
 */
export enum EditKind {
  TYPING = 'typing',
  DELETION = 'deletion',
  COMPOUND = 'compound'
}

/**
 * Which kinds may follow which inside one group
 */
export type GroupingRules = Record<EditKind, readonly EditKind[]>;

export interface GroupingPolicy {
  rules: GroupingRules;
  /** Only merge edits that touch the previous edit's position */
  requireContiguous: boolean;
}

// =================== CONFIGURATION ===================

export interface HistoryConfig {
  /** Max sealed groups kept in memory per document */
  hotCapacity: number;
  /** Max sealed groups per document, memory and disk together */
  maxHistoryDepth: number;
  /** Max gap in milliseconds between two edits of one group */
  groupTimeout: number;
  /** Directory holding the history store */
  dataDir: string;
  grouping: GroupingPolicy;
}

// =================== STORAGE ===================

export type StorageBatchOperation =
  | { type: 'put'; key: string; value: Buffer }
  | { type: 'del'; key: string };

/**
 * Per-document metadata persisted next to the groups
 */
export interface DocumentMeta {
  nextSeq: number;
  /** Seq of the first redo-able group, null when the cursor is at the end */
  cursorSeq: number | null;
}

// =================== SESSION ===================

export type TabEntry =
  | { kind: 'file'; path: string }
  | { kind: 'unsaved'; sessionId: string; title: string };

export interface SessionData {
  tabs: TabEntry[];
  activeTabIndex: number;
}

// =================== NOTIFICATIONS ===================

export enum NotificationType {
  HISTORY_RESET = 'history_reset',
  SPILL_FAILED = 'spill_failed',
  GROUP_UNAVAILABLE = 'group_unavailable',
  FLUSH_FAILED = 'flush_failed',
  DELETE_FAILED = 'delete_failed'
}

export type NotificationSeverity = 'info' | 'warning' | 'error';

export interface HistoryNotification {
  type: NotificationType;
  severity: NotificationSeverity;
  message: string;
  metadata: Record<string, unknown>;
  timestamp: Date;
}

export type NotificationCallback = (notification: HistoryNotification) => void;

// =================== STATS ===================

export interface HistoryStats {
  docId: string;
  hotGroups: number;
  coldGroups: number;
  totalGroups: number;
  undoCursor: number;
  nextSeq: number;
  currentGroupOperations: number;
  memoryUsage: number;
  persistent: boolean;
}

export interface HistoryDebugInfo {
  hotSeqs: number[];
  coldSeqs: number[];
  pendingDeletes: number[];
  unwrittenSeqs: number[];
  stats: HistoryStats;
}
