/**
 * @fileoverview Tiered undo/redo history for text editors
 * @description Per-document undo history with a bounded in-memory window,
 * older groups spilled to an embedded store, eviction at a depth cap and
 * restore across restarts, plus a session store for open tabs and unsaved
 * buffer contents.
 *
 * @example
 * import { HistoryWorkspace, createHistoryConfig, createEditOperation } from 'tiered-undo';
 *
 * const workspace = await HistoryWorkspace.open(createHistoryConfig());
 * const history = await workspace.openFile('/home/me/notes.txt');
 *
 * await history.record(createEditOperation({ position: 0, inserted: 'a' }));
 * const step = await history.undo(); // inverted operations + cursor
 *
 * await workspace.shutdown();
 */

import { EditGroup } from './edit-group';
import { HistoryWorkspace, type CloseOptions, type WorkspaceOptions } from './history-workspace';
import { PersistenceLayer, type CommitRequest } from './persistence-layer';
import { SessionStore } from './session-store';
import { UndoManager, type LoadOptions } from './undo-manager';
import { HistoryStorage } from './storage/history-storage';
import { MemoryHistoryStorage } from './storage/memory-history-storage';
import { LevelHistoryStorage, type LevelStorageOptions } from './storage/level-history-storage';
import { HistoryFormatError, HistoryStorageError } from './types/errors';
import { DocumentIdAllocator, docIdForPath, resolveDataDir, DATA_DIR_ENV } from './utils/document-identity';
import { DEFAULT_GROUPING_POLICY, GroupingCalculator } from './utils/grouping-policy';
import { logger, type Logger } from './utils/logger';
import {
  applyOperationToText,
  applyOperationsToText,
  createCursor,
  createEditOperation,
  invertOperation,
  type EditOperationInit
} from './edit-operation';
import {
  createHistoryConfig,
  DEFAULT_GROUP_TIMEOUT_MS,
  DEFAULT_HOT_CAPACITY,
  DEFAULT_MAX_HISTORY_DEPTH,
  type HistoryConfigOverrides
} from './history-config';
import {
  EditKind,
  NotificationType,
  type CursorSnapshot,
  type EditOperation,
  type GroupingPolicy,
  type HistoryConfig,
  type HistoryDebugInfo,
  type HistoryNotification,
  type HistoryStats,
  type SessionData,
  type TabEntry,
  type UndoStep
} from './types/common';

export {
  // Core classes
  HistoryWorkspace,
  UndoManager,
  SessionStore,
  PersistenceLayer,
  EditGroup,

  // Storage implementations
  HistoryStorage,
  LevelHistoryStorage,
  MemoryHistoryStorage,

  // Edits and grouping
  createEditOperation,
  createCursor,
  invertOperation,
  applyOperationToText,
  applyOperationsToText,
  GroupingCalculator,
  DEFAULT_GROUPING_POLICY,
  EditKind,

  // Configuration and identity
  createHistoryConfig,
  DEFAULT_HOT_CAPACITY,
  DEFAULT_MAX_HISTORY_DEPTH,
  DEFAULT_GROUP_TIMEOUT_MS,
  docIdForPath,
  resolveDataDir,
  DocumentIdAllocator,
  DATA_DIR_ENV,

  // Errors, logging and notifications
  HistoryStorageError,
  HistoryFormatError,
  NotificationType,
  logger
};

export type {
  CursorSnapshot,
  EditOperation,
  EditOperationInit,
  UndoStep,
  GroupingPolicy,
  HistoryConfig,
  HistoryConfigOverrides,
  HistoryStats,
  HistoryDebugInfo,
  HistoryNotification,
  SessionData,
  TabEntry,
  CommitRequest,
  LoadOptions,
  WorkspaceOptions,
  CloseOptions,
  LevelStorageOptions,
  Logger
};
