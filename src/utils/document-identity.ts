/**
 * @fileoverview Document identifiers and data directory resolution
 */

import { promises as fs } from 'fs';
import * as crypto from 'crypto';
import * as path from 'path';

const DATA_DIR_ENV = 'TIERED_UNDO_DATA_DIR';
const UNSAVED_PREFIX = 'unsaved-';
const SESSION_PREFIX = 'sess-';

/**
 * Stable id for a file-backed document: `file-` plus 16 hex digits of the
 * SHA-256 of its canonical path. Falls back to the path as given when it
 * cannot be canonicalized (the file does not exist yet).
 */
async function docIdForPath(filePath: string): Promise<string> {
  let canonical: string;
  try {
    canonical = await fs.realpath(filePath);
  } catch {
    canonical = filePath;
  }
  const digest = crypto.createHash('sha256').update(canonical, 'utf8').digest('hex');
  return `file-${digest.slice(0, 16)}`;
}

/**
 * Directory for the history store: the env override when set, otherwise
 * `.data` beside the running executable
 */
function resolveDataDir(
  env: NodeJS.ProcessEnv = process.env,
  execPath: string = process.execPath
): string {
  const override = env[DATA_DIR_ENV];
  if (override) {
    return override;
  }
  return path.join(path.dirname(execPath), '.data');
}

/**
 * Hands out ids for documents and tabs that have no file yet.
 * Ids are unique per allocator; an application keeps one and passes it
 * to whatever opens documents.
 */
class DocumentIdAllocator {
  private unsavedCounter: number;
  private sessionCounter: number;

  constructor(start: { unsaved?: number; session?: number } = {}) {
    this.unsavedCounter = start.unsaved ?? 0;
    this.sessionCounter = start.session ?? 0;
  }

  generateUnsavedId(): string {
    return `${UNSAVED_PREFIX}${this.unsavedCounter++}`;
  }

  generateSessionId(): string {
    return `${SESSION_PREFIX}${this.sessionCounter++}`;
  }

  /**
   * Move the matching counter past an id restored from an earlier run
   */
  reserve(id: string): void {
    const unsaved = DocumentIdAllocator._parseCounter(id, UNSAVED_PREFIX);
    if (unsaved !== null) {
      this.unsavedCounter = Math.max(this.unsavedCounter, unsaved + 1);
      return;
    }
    const session = DocumentIdAllocator._parseCounter(id, SESSION_PREFIX);
    if (session !== null) {
      this.sessionCounter = Math.max(this.sessionCounter, session + 1);
    }
  }

  private static _parseCounter(id: string, prefix: string): number | null {
    if (!id.startsWith(prefix)) {
      return null;
    }
    const digits = id.slice(prefix.length);
    return /^\d+$/.test(digits) ? Number(digits) : null;
  }
}

export {
  docIdForPath,
  resolveDataDir,
  DocumentIdAllocator,
  DATA_DIR_ENV
};
