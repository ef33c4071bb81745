/**
 * LevelDB-backed history storage
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { ClassicLevel } from 'classic-level';
import { HistoryStorage } from './history-storage';
import { HistoryStorageError, describeError } from '../types/errors';
import { logger } from '../utils/logger';
import { type StorageBatchOperation } from '../types/common';

const STORE_DIRECTORY = 'history-db';

// Entry keys are `<namespace>\x00<key>`; bytewise order then groups each
// namespace and sorts its keys.
const SEPARATOR = '\x00';
const AFTER_SEPARATOR = '\x01';

interface LevelStorageOptions {
  /** Database directory name inside the data directory */
  directoryName?: string;
}

type LevelBatchOperation =
  | { type: 'put'; key: string; value: Buffer }
  | { type: 'del'; key: string };

const log = logger.scope('level-storage');

/**
 * Storage in one LevelDB database under the data directory.
 *
 * LevelDB holds a LOCK file for as long as the database is open, so a second
 * handle on the same directory, from this process or another, fails to open.
 * Writes are synced before they resolve.
 */
class LevelHistoryStorage extends HistoryStorage {
  private readonly db: ClassicLevel<string, Buffer>;
  private readonly location: string;
  private closed: boolean = false;

  private constructor(db: ClassicLevel<string, Buffer>, location: string) {
    super();
    this.db = db;
    this.location = location;
  }

  /**
   * Open or create the store in `dataDir`, creating the directory as needed
   */
  static async open(dataDir: string, options: LevelStorageOptions = {}): Promise<LevelHistoryStorage> {
    try {
      await fs.mkdir(dataDir, { recursive: true });
    } catch (error) {
      throw new HistoryStorageError(`Failed to create data directory ${dataDir}: ${describeError(error)}`, { cause: error });
    }

    const location = path.join(dataDir, options.directoryName ?? STORE_DIRECTORY);
    const db = new ClassicLevel<string, Buffer>(location, { keyEncoding: 'utf8', valueEncoding: 'buffer' });
    try {
      await db.open();
    } catch (error) {
      throw new HistoryStorageError(
        `History store ${location} is unavailable (already open by another writer?): ${describeError(causeOf(error))}`,
        { cause: error }
      );
    }

    log.debug(`Opened history store ${location}`);
    return new LevelHistoryStorage(db, location);
  }

  async put(namespace: string, key: string, value: Buffer): Promise<void> {
    await this._run(`put ${namespace}/${key}`, () =>
      this.db.put(entryKey(namespace, key), value, { sync: true })
    );
  }

  async get(namespace: string, key: string): Promise<Buffer | null> {
    return this._run(`get ${namespace}/${key}`, async () => {
      const [value] = await this.db.getMany([entryKey(namespace, key)]);
      return value ?? null;
    });
  }

  async delete(namespace: string, key: string): Promise<void> {
    await this._run(`delete ${namespace}/${key}`, () =>
      this.db.del(entryKey(namespace, key), { sync: true })
    );
  }

  async deleteAll(namespace: string): Promise<void> {
    await this._run(`delete namespace ${namespace}`, async () => {
      const keys: string[] = await this.db.keys(namespaceRange(namespace)).all();
      if (keys.length === 0) return;
      const operations: LevelBatchOperation[] = keys.map(key => ({ type: 'del', key }));
      await this.db.batch(operations, { sync: true });
    });
  }

  async keys(namespace: string, prefix: string = ''): Promise<string[]> {
    return this._run(`list keys in ${namespace}`, async () => {
      const start = entryKey(namespace, prefix);
      const found: string[] = [];
      for await (const key of this.db.keys({ gte: start, lt: namespace + AFTER_SEPARATOR })) {
        if (!key.startsWith(start)) break;
        found.push(key.slice(namespace.length + SEPARATOR.length));
      }
      return found;
    });
  }

  async batch(namespace: string, operations: readonly StorageBatchOperation[]): Promise<void> {
    if (operations.length === 0) {
      this._assertOpen();
      return;
    }
    await this._run(`batch write to ${namespace}`, () => {
      const levelOperations: LevelBatchOperation[] = operations.map(operation =>
        operation.type === 'put'
          ? { type: 'put', key: entryKey(namespace, operation.key), value: operation.value }
          : { type: 'del', key: entryKey(namespace, operation.key) }
      );
      return this.db.batch(levelOperations, { sync: true });
    });
  }

  /**
   * Seeks from one namespace to the next instead of reading every key
   */
  async namespaces(): Promise<string[]> {
    return this._run('list namespaces', async () => {
      const found: string[] = [];
      let lower: string | null = null;
      for (;;) {
        const range: { gte?: string; limit: number } = lower === null ? { limit: 1 } : { gte: lower, limit: 1 };
        const [next] = await this.db.keys(range).all();
        if (next === undefined) break;
        const namespace = next.slice(0, next.indexOf(SEPARATOR));
        found.push(namespace);
        lower = namespace + AFTER_SEPARATOR;
      }
      return found;
    });
  }

  /**
   * Every write is synced before it resolves, so the barrier only checks the
   * store is still open.
   */
  async flush(): Promise<void> {
    this._assertOpen();
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    try {
      await this.db.close();
    } catch (error) {
      throw new HistoryStorageError(`Failed to close history store ${this.location}: ${describeError(error)}`, { cause: error });
    }
    log.debug(`Closed history store ${this.location}`);
  }

  isClosed(): boolean {
    return this.closed;
  }

  /**
   * Get the database directory
   */
  getLocation(): string {
    return this.location;
  }

  /**
   * Get storage statistics
   */
  async getStorageStats(): Promise<{ entryCount: number; totalBytes: number; location: string }> {
    return this._run('read stats', async () => {
      let entryCount = 0;
      let totalBytes = 0;
      for await (const value of this.db.values()) {
        entryCount++;
        totalBytes += value.length;
      }
      return { entryCount, totalBytes, location: this.location };
    });
  }

  private async _run<T>(description: string, fn: () => Promise<T>): Promise<T> {
    this._assertOpen();
    try {
      return await fn();
    } catch (error) {
      throw new HistoryStorageError(`History store failed to ${description}: ${describeError(error)}`, { cause: error });
    }
  }

  private _assertOpen(): void {
    if (this.closed) {
      throw new HistoryStorageError(`History store ${this.location} is closed`);
    }
  }
}

function entryKey(namespace: string, key: string): string {
  if (namespace.includes(SEPARATOR)) {
    throw new RangeError(`Namespace ${JSON.stringify(namespace)} contains a NUL character`);
  }
  return namespace + SEPARATOR + key;
}

function namespaceRange(namespace: string): { gte: string; lt: string } {
  return { gte: entryKey(namespace, ''), lt: namespace + AFTER_SEPARATOR };
}

/**
 * Open failures wrap the LevelDB error (LEVEL_LOCKED and the like) in `cause`
 */
function causeOf(error: unknown): unknown {
  return error instanceof Error && error.cause !== undefined ? error.cause : error;
}

export { LevelHistoryStorage, type LevelStorageOptions };
