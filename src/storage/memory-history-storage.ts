/**
 * In-memory history storage
 */

import { HistoryStorageError } from '../types/errors';
import { type StorageBatchOperation } from '../types/common';
import { HistoryStorage } from './history-storage';

/**
 * In-memory storage for tests and scratch documents. Values are copied on
 * the way in and out so callers cannot alias stored bytes.
 */
class MemoryHistoryStorage extends HistoryStorage {
  private spaces: Map<string, Map<string, Buffer>> = new Map();
  private closed: boolean = false;

  constructor() {
    super();
  }

  async put(namespace: string, key: string, value: Buffer): Promise<void> {
    this._assertOpen();
    this._space(namespace).set(key, Buffer.from(value));
  }

  async get(namespace: string, key: string): Promise<Buffer | null> {
    this._assertOpen();
    const value = this.spaces.get(namespace)?.get(key);
    return value ? Buffer.from(value) : null;
  }

  async delete(namespace: string, key: string): Promise<void> {
    this._assertOpen();
    const space = this.spaces.get(namespace);
    if (!space) return;
    space.delete(key);
    if (space.size === 0) this.spaces.delete(namespace);
  }

  async deleteAll(namespace: string): Promise<void> {
    this._assertOpen();
    this.spaces.delete(namespace);
  }

  async keys(namespace: string, prefix: string = ''): Promise<string[]> {
    this._assertOpen();
    const space = this.spaces.get(namespace);
    if (!space) return [];
    return Array.from(space.keys())
      .filter(key => key.startsWith(prefix))
      .sort(compareKeys);
  }

  async batch(namespace: string, operations: readonly StorageBatchOperation[]): Promise<void> {
    this._assertOpen();
    // All-or-nothing: the copy replaces the namespace at the end
    const next = new Map<string, Buffer>(this.spaces.get(namespace) ?? []);
    for (const operation of operations) {
      if (operation.type === 'put') {
        next.set(operation.key, Buffer.from(operation.value));
      } else {
        next.delete(operation.key);
      }
    }
    if (next.size === 0) {
      this.spaces.delete(namespace);
    } else {
      this.spaces.set(namespace, next);
    }
  }

  async namespaces(): Promise<string[]> {
    this._assertOpen();
    return Array.from(this.spaces.keys()).sort(compareKeys);
  }

  async flush(): Promise<void> {
    this._assertOpen();
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  isClosed(): boolean {
    return this.closed;
  }

  /**
   * Get memory usage statistics
   */
  getMemoryStats(): { namespaceCount: number; entryCount: number; totalBytes: number } {
    let entryCount = 0;
    let totalBytes = 0;
    for (const space of this.spaces.values()) {
      for (const value of space.values()) {
        entryCount++;
        totalBytes += value.length;
      }
    }
    return { namespaceCount: this.spaces.size, entryCount, totalBytes };
  }

  private _space(namespace: string): Map<string, Buffer> {
    let space = this.spaces.get(namespace);
    if (!space) {
      space = new Map();
      this.spaces.set(namespace, space);
    }
    return space;
  }

  private _assertOpen(): void {
    if (this.closed) {
      throw new HistoryStorageError('Memory history storage is closed');
    }
  }
}

function compareKeys(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

export { MemoryHistoryStorage };
