import { type StorageBatchOperation } from '../types/common';

/**
 * Base storage interface - an ordered, namespaced byte store with atomic
 * batches. Keys sort by code unit order within a namespace.
 */
abstract class HistoryStorage {
  /**
   * Store a value, replacing any existing one
   */
  abstract put(namespace: string, key: string, value: Buffer): Promise<void>;

  /**
   * Read a value
   * @returns The stored bytes, or null when the key is absent
   */
  abstract get(namespace: string, key: string): Promise<Buffer | null>;

  /**
   * Remove a key. Removing an absent key succeeds.
   */
  abstract delete(namespace: string, key: string): Promise<void>;

  /**
   * Remove every key in a namespace
   */
  abstract deleteAll(namespace: string): Promise<void>;

  /**
   * Keys in a namespace starting with `prefix`, ascending
   */
  abstract keys(namespace: string, prefix?: string): Promise<string[]>;

  /**
   * Apply puts and deletes to one namespace atomically
   */
  abstract batch(namespace: string, operations: readonly StorageBatchOperation[]): Promise<void>;

  /**
   * Namespaces that hold at least one key, ascending
   */
  abstract namespaces(): Promise<string[]>;

  /**
   * Durability barrier: resolves once every committed write is on stable storage
   */
  abstract flush(): Promise<void>;

  /**
   * Release the store. Every later call rejects.
   */
  abstract close(): Promise<void>;

  abstract isClosed(): boolean;
}

export { HistoryStorage };
