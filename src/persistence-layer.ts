/**
 * @fileoverview Per-document history keyspaces over a storage backend
 * @description Each document owns the namespace `history/<docId>` holding
 * its spilled groups under fixed-width keys plus two metadata records.
 */

import { EditGroup } from './edit-group';
import { HistoryStorage } from './storage/history-storage';
import { HistoryStorageError, describeError } from './types/errors';
import { logger } from './utils/logger';
import {
  GROUP_KEY_PREFIX,
  META_CURSOR_KEY,
  META_NEXT_SEQ_KEY,
  decodeGroup,
  decodeMeta,
  encodeCursor,
  encodeGroup,
  encodeNextSeq,
  groupKey,
  parseGroupKey
} from './utils/group-codec';
import {
  type DocumentMeta,
  type StorageBatchOperation
} from './types/common';

const HISTORY_NAMESPACE_PREFIX = 'history/';

interface CommitRequest {
  puts?: readonly EditGroup[];
  deletes?: readonly number[];
  meta?: DocumentMeta;
}

const log = logger.scope('persistence');

function historyNamespace(docId: string): string {
  return HISTORY_NAMESPACE_PREFIX + docId;
}

class PersistenceLayer {
  private readonly storage: HistoryStorage;

  constructor(storage: HistoryStorage) {
    this.storage = storage;
  }

  /**
   * Write sealed groups in one transaction
   */
  async writeGroups(docId: string, groups: readonly EditGroup[]): Promise<void> {
    await this.commit(docId, { puts: groups });
  }

  /**
   * Read one group. Missing and undecodable groups both come back as null;
   * storage failures reject.
   */
  async readGroup(docId: string, seq: number): Promise<EditGroup | null> {
    const bytes = await this._wrap(docId, `read group ${seq}`, () =>
      this.storage.get(historyNamespace(docId), groupKey(seq))
    );
    if (!bytes) return null;

    try {
      const group = decodeGroup(bytes);
      if (group.seq !== seq) {
        log.warn(`Group stored under seq ${seq} of ${docId} claims seq ${group.seq}`);
        return null;
      }
      return group;
    } catch (error) {
      log.warn(`Group ${seq} of ${docId} is unreadable: ${describeError(error)}`);
      return null;
    }
  }

  /**
   * Stored group seqs, ascending
   */
  async listGroupSeqs(docId: string): Promise<number[]> {
    const keys = await this._wrap(docId, 'list groups', () =>
      this.storage.keys(historyNamespace(docId), GROUP_KEY_PREFIX)
    );
    const seqs: number[] = [];
    for (const key of keys) {
      const seq = parseGroupKey(key);
      if (seq === null) {
        log.warn(`Ignoring malformed group key ${key} in ${docId}`);
        continue;
      }
      seqs.push(seq);
    }
    return seqs;
  }

  async countGroups(docId: string): Promise<number> {
    return (await this.listGroupSeqs(docId)).length;
  }

  /**
   * Delete the `count` oldest stored groups
   * @returns The seqs removed
   */
  async evictOldest(docId: string, count: number): Promise<number[]> {
    if (count <= 0) return [];
    const victims = (await this.listGroupSeqs(docId)).slice(0, count);
    await this.commit(docId, { deletes: victims });
    return victims;
  }

  /**
   * Apply group writes, group deletions and metadata in one transaction
   */
  async commit(docId: string, request: CommitRequest): Promise<void> {
    const operations: StorageBatchOperation[] = [];
    for (const seq of request.deletes ?? []) {
      operations.push({ type: 'del', key: groupKey(seq) });
    }
    for (const group of request.puts ?? []) {
      operations.push({ type: 'put', key: groupKey(group.seq), value: encodeGroup(group) });
    }
    if (request.meta) {
      operations.push(...metaOperations(request.meta));
    }
    if (operations.length === 0) return;

    await this._wrap(docId, 'commit history', () =>
      this.storage.batch(historyNamespace(docId), operations)
    );
    log.debug(`Committed ${operations.length} history writes for ${docId}`);
  }

  /**
   * @returns Stored metadata, or null when none was ever written.
   * Undecodable metadata rejects with the decode error.
   */
  async loadMeta(docId: string): Promise<DocumentMeta | null> {
    const namespace = historyNamespace(docId);
    const [nextSeqBytes, cursorBytes] = await this._wrap(docId, 'read metadata', () =>
      Promise.all([
        this.storage.get(namespace, META_NEXT_SEQ_KEY),
        this.storage.get(namespace, META_CURSOR_KEY)
      ])
    );
    if (!nextSeqBytes) return null;
    return decodeMeta(nextSeqBytes, cursorBytes);
  }

  async saveMeta(docId: string, meta: DocumentMeta): Promise<void> {
    await this.commit(docId, { meta });
  }

  /**
   * Remove every group and metadata record of a document
   */
  async deleteDocument(docId: string): Promise<void> {
    await this._wrap(docId, 'delete history', () =>
      this.storage.deleteAll(historyNamespace(docId))
    );
    log.debug(`Deleted stored history for ${docId}`);
  }

  /**
   * Ids of documents with anything stored
   */
  async listDocuments(): Promise<string[]> {
    const namespaces = await this._wrap(null, 'list documents', () => this.storage.namespaces());
    return namespaces
      .filter(namespace => namespace.startsWith(HISTORY_NAMESPACE_PREFIX))
      .map(namespace => namespace.slice(HISTORY_NAMESPACE_PREFIX.length));
  }

  async flush(): Promise<void> {
    await this._wrap(null, 'flush', () => this.storage.flush());
  }

  private async _wrap<T>(docId: string | null, action: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      const target = docId ? ` for ${docId}` : '';
      throw new HistoryStorageError(`Failed to ${action}${target}: ${describeError(error)}`, {
        cause: error,
        ...(docId ? { docId } : {})
      });
    }
  }
}

function metaOperations(meta: DocumentMeta): StorageBatchOperation[] {
  return [
    { type: 'put', key: META_NEXT_SEQ_KEY, value: encodeNextSeq(meta.nextSeq) },
    { type: 'put', key: META_CURSOR_KEY, value: encodeCursor(meta.cursorSeq) }
  ];
}

export {
  PersistenceLayer,
  historyNamespace,
  HISTORY_NAMESPACE_PREFIX,
  type CommitRequest
};
