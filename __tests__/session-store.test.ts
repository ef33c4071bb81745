/**
 * Session store tests
 */

import { SessionStore } from '../src/session-store';
import { LevelHistoryStorage } from '../src/storage/level-history-storage';
import { HistoryFormatError, HistoryStorageError } from '../src/types/errors';
import { type SessionData } from '../src/types/common';
import { FlakyStorage, testUtils } from './setup';

const sampleSession: SessionData = {
  tabs: [
    { kind: 'file', path: '/home/user/notes.txt' },
    { kind: 'unsaved', sessionId: 'sess-0', title: 'Untitled 1' }
  ],
  activeTabIndex: 1
};

describe('SessionStore', () => {
  let storage: FlakyStorage;
  let sessions: SessionStore;

  beforeEach(() => {
    storage = new FlakyStorage();
    sessions = new SessionStore(storage);
  });

  test('should return null before any session is saved', async () => {
    expect(await sessions.loadSession()).toBeNull();
  });

  test('should round-trip session data', async () => {
    await sessions.saveSession(sampleSession);
    expect(await sessions.loadSession()).toEqual(sampleSession);
  });

  test('should replace the previous session on save', async () => {
    await sessions.saveSession(sampleSession);
    await sessions.saveSession({ tabs: [], activeTabIndex: 0 });

    expect(await sessions.loadSession()).toEqual({ tabs: [], activeTabIndex: 0 });
  });

  test('should reject an active index outside the tabs', async () => {
    await expect(sessions.saveSession({ ...sampleSession, activeTabIndex: 2 })).rejects.toThrow(RangeError);
  });

  test('should reject a negative active index with no tabs', async () => {
    await sessions.saveSession(sampleSession);

    await expect(sessions.saveSession({ tabs: [], activeTabIndex: -1 })).rejects.toThrow(RangeError);
    expect(await sessions.loadSession()).toEqual(sampleSession);
  });

  test('should reject a fractional active index', async () => {
    await expect(sessions.saveSession({ ...sampleSession, activeTabIndex: 0.5 }))
      .rejects.toThrow('activeTabIndex 0.5 must be a non-negative integer');
    expect(await sessions.loadSession()).toBeNull();
  });

  test('should reject a corrupt session record', async () => {
    await storage.put('session/meta', 'data', Buffer.from('{"v":1,"tabs":"nope","activeTabIndex":0}'));
    await expect(sessions.loadSession()).rejects.toThrow(HistoryFormatError);
  });

  test('should round-trip empty and non-ASCII content exactly', async () => {
    await sessions.saveContent('sess-0', '');
    await sessions.saveContent('sess-1', 'naïve 日本語 😀\r\n');

    expect(await sessions.loadContent('sess-0')).toBe('');
    expect(await sessions.loadContent('sess-1')).toBe('naïve 日本語 😀\r\n');
  });

  test('should return null for unknown content', async () => {
    expect(await sessions.loadContent('sess-9')).toBeNull();
  });

  test('should delete one content entry', async () => {
    await sessions.saveContent('sess-0', 'a');
    await sessions.saveContent('sess-1', 'b');

    await sessions.deleteContent('sess-0');

    expect(await sessions.listContentIds()).toEqual(['sess-1']);
  });

  test('should clear all content but keep the session', async () => {
    await sessions.saveSession(sampleSession);
    await sessions.saveContent('sess-0', 'a');

    await sessions.clearAllContent();

    expect(await sessions.listContentIds()).toEqual([]);
    expect(await sessions.loadSession()).toEqual(sampleSession);
  });

  test('should wrap store failures', async () => {
    storage.failWrites = true;
    await expect(sessions.saveContent('sess-0', 'a')).rejects.toThrow(HistoryStorageError);
    await expect(sessions.saveSession(sampleSession)).rejects.toThrow('Failed to save session: disk full');
  });
});

describe('SessionStore on LevelDB', () => {
  afterEach(async () => {
    await testUtils.cleanup();
  });

  test('should keep sessions and content across reopen', async () => {
    const dataDir = await testUtils.createTempDir();
    const first = await LevelHistoryStorage.open(dataDir);
    const writer = new SessionStore(first);
    await writer.saveSession(sampleSession);
    await writer.saveContent('sess-0', 'draft ✓');
    await first.close();

    const second = await LevelHistoryStorage.open(dataDir);
    const reader = new SessionStore(second);
    const session = await reader.loadSession();
    const content = await reader.loadContent('sess-0');
    await second.close();

    expect(session).toEqual(sampleSession);
    expect(content).toBe('draft ✓');
  });
});
