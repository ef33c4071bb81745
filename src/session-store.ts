/**
 * @fileoverview Open tabs and unsaved buffer contents across restarts
 */

import { HistoryStorage } from './storage/history-storage';
import { HistoryStorageError, describeError } from './types/errors';
import { decodeSession, encodeSession } from './utils/group-codec';
import { logger } from './utils/logger';
import { type SessionData } from './types/common';

const SESSION_META_NAMESPACE = 'session/meta';
const SESSION_CONTENT_NAMESPACE = 'session/content';
const SESSION_DATA_KEY = 'data';

const log = logger.scope('session');

/**
 * Session metadata is one record, replaced whole on every save. Unsaved
 * contents are stored as raw UTF-8 keyed by session id.
 */
class SessionStore {
  private readonly storage: HistoryStorage;

  constructor(storage: HistoryStorage) {
    this.storage = storage;
  }

  async saveSession(data: SessionData): Promise<void> {
    if (!Number.isSafeInteger(data.activeTabIndex) || data.activeTabIndex < 0) {
      throw new RangeError(`activeTabIndex ${data.activeTabIndex} must be a non-negative integer`);
    }
    if (data.tabs.length > 0 && data.activeTabIndex >= data.tabs.length) {
      throw new RangeError(`activeTabIndex ${data.activeTabIndex} is outside ${data.tabs.length} tab(s)`);
    }
    await this._wrap('save session', () =>
      this.storage.put(SESSION_META_NAMESPACE, SESSION_DATA_KEY, encodeSession(data))
    );
    log.debug(`Saved session with ${data.tabs.length} tab(s)`);
  }

  /**
   * @returns The last saved session, or null when none was ever saved.
   * A record that fails to decode rejects with HistoryFormatError.
   */
  async loadSession(): Promise<SessionData | null> {
    const bytes = await this._wrap('load session', () =>
      this.storage.get(SESSION_META_NAMESPACE, SESSION_DATA_KEY)
    );
    return bytes ? decodeSession(bytes) : null;
  }

  async saveContent(sessionId: string, text: string): Promise<void> {
    await this._wrap(`save content ${sessionId}`, () =>
      this.storage.put(SESSION_CONTENT_NAMESPACE, sessionId, Buffer.from(text, 'utf8'))
    );
  }

  async loadContent(sessionId: string): Promise<string | null> {
    const bytes = await this._wrap(`load content ${sessionId}`, () =>
      this.storage.get(SESSION_CONTENT_NAMESPACE, sessionId)
    );
    return bytes ? bytes.toString('utf8') : null;
  }

  async deleteContent(sessionId: string): Promise<void> {
    await this._wrap(`delete content ${sessionId}`, () =>
      this.storage.delete(SESSION_CONTENT_NAMESPACE, sessionId)
    );
  }

  /**
   * Remove every stored content entry; session metadata is kept
   */
  async clearAllContent(): Promise<void> {
    await this._wrap('clear content', () => this.storage.deleteAll(SESSION_CONTENT_NAMESPACE));
  }

  async listContentIds(): Promise<string[]> {
    return this._wrap('list content', () => this.storage.keys(SESSION_CONTENT_NAMESPACE));
  }

  private async _wrap<T>(action: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw new HistoryStorageError(`Failed to ${action}: ${describeError(error)}`, { cause: error });
    }
  }
}

export {
  SessionStore,
  SESSION_META_NAMESPACE,
  SESSION_CONTENT_NAMESPACE
};
