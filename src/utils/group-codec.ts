/**
 * @fileoverview Key layout and record encoding for persisted history
 * @description Records are versioned JSON in UTF-8. Decoding checks every
 * field and throws HistoryFormatError on anything unexpected.
 */

import { EditGroup } from '../edit-group';
import { HistoryFormatError } from '../types/errors';
import {
  type CursorSnapshot,
  type DocumentMeta,
  type EditOperation,
  type SessionData,
  type TabEntry
} from '../types/common';

const FORMAT_VERSION = 1;
const SEQ_WIDTH = 20;

const GROUP_KEY_PREFIX = 'group/';
const META_NEXT_SEQ_KEY = 'meta/next_seq';
const META_CURSOR_KEY = 'meta/cursor';

// =================== KEYS ===================

/**
 * Fixed-width key so lexical order matches seq order
 */
function groupKey(seq: number): string {
  return GROUP_KEY_PREFIX + String(seq).padStart(SEQ_WIDTH, '0');
}

function parseGroupKey(key: string): number | null {
  if (!key.startsWith(GROUP_KEY_PREFIX)) return null;
  const digits = key.slice(GROUP_KEY_PREFIX.length);
  if (digits.length !== SEQ_WIDTH || !/^\d+$/.test(digits)) return null;
  const seq = Number(digits);
  return Number.isSafeInteger(seq) ? seq : null;
}

// =================== FIELD CHECKS ===================

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readIndex(source: JsonRecord, field: string, what: string): number {
  const value = source[field];
  if (typeof value !== 'number' || !Number.isSafeInteger(value) || value < 0) {
    throw new HistoryFormatError(`${what}: "${field}" must be a non-negative integer`);
  }
  return value;
}

function readString(source: JsonRecord, field: string, what: string): string {
  const value = source[field];
  if (typeof value !== 'string') {
    throw new HistoryFormatError(`${what}: "${field}" must be a string`);
  }
  return value;
}

function parseJson(bytes: Buffer, what: string): JsonRecord {
  let parsed: unknown;
  try {
    parsed = JSON.parse(bytes.toString('utf8'));
  } catch {
    throw new HistoryFormatError(`${what}: not valid JSON`);
  }
  if (!isRecord(parsed)) {
    throw new HistoryFormatError(`${what}: expected an object`);
  }
  if (parsed.v !== FORMAT_VERSION) {
    throw new HistoryFormatError(`${what}: unsupported format version ${String(parsed.v)}`);
  }
  return parsed;
}

function toBytes(value: JsonRecord): Buffer {
  return Buffer.from(JSON.stringify({ v: FORMAT_VERSION, ...value }), 'utf8');
}

// =================== GROUPS ===================

function decodeCursor(value: unknown, what: string): CursorSnapshot {
  if (!isRecord(value)) {
    throw new HistoryFormatError(`${what}: cursor must be an object`);
  }
  return Object.freeze({
    line: readIndex(value, 'line', what),
    col: readIndex(value, 'col', what)
  });
}

function decodeOperation(value: unknown, what: string): EditOperation {
  if (!isRecord(value)) {
    throw new HistoryFormatError(`${what}: operation must be an object`);
  }
  return Object.freeze({
    position: readIndex(value, 'position', what),
    inserted: readString(value, 'inserted', what),
    deleted: readString(value, 'deleted', what),
    cursorBefore: decodeCursor(value.cursorBefore, what),
    cursorAfter: decodeCursor(value.cursorAfter, what)
  });
}

function encodeGroup(group: EditGroup): Buffer {
  return toBytes({
    seq: group.seq,
    operations: group.operations.map(op => ({
      position: op.position,
      inserted: op.inserted,
      deleted: op.deleted,
      cursorBefore: { line: op.cursorBefore.line, col: op.cursorBefore.col },
      cursorAfter: { line: op.cursorAfter.line, col: op.cursorAfter.col }
    }))
  });
}

function decodeGroup(bytes: Buffer): EditGroup {
  const record = parseJson(bytes, 'edit group');
  const seq = readIndex(record, 'seq', 'edit group');
  const what = `edit group ${seq}`;
  const operations = record.operations;
  if (!Array.isArray(operations) || operations.length === 0) {
    throw new HistoryFormatError(`${what}: "operations" must be a non-empty array`);
  }
  return new EditGroup(seq, operations.map(op => decodeOperation(op, what)));
}

// =================== METADATA ===================

function encodeNextSeq(nextSeq: number): Buffer {
  return toBytes({ nextSeq });
}

function encodeCursor(cursorSeq: number | null): Buffer {
  return toBytes({ cursorSeq });
}

function decodeMeta(nextSeqBytes: Buffer, cursorBytes: Buffer | null): DocumentMeta {
  const nextSeq = readIndex(parseJson(nextSeqBytes, 'next_seq'), 'nextSeq', 'next_seq');
  if (!cursorBytes) {
    return { nextSeq, cursorSeq: null };
  }
  const cursor = parseJson(cursorBytes, 'cursor');
  const cursorSeq = cursor.cursorSeq === null ? null : readIndex(cursor, 'cursorSeq', 'cursor');
  return { nextSeq, cursorSeq };
}

// =================== SESSION ===================

function decodeTab(value: unknown, index: number): TabEntry {
  const what = `session tab ${index}`;
  if (!isRecord(value)) {
    throw new HistoryFormatError(`${what}: expected an object`);
  }
  switch (value.kind) {
    case 'file':
      return { kind: 'file', path: readString(value, 'path', what) };
    case 'unsaved':
      return {
        kind: 'unsaved',
        sessionId: readString(value, 'sessionId', what),
        title: readString(value, 'title', what)
      };
    default:
      throw new HistoryFormatError(`${what}: unknown tab kind ${String(value.kind)}`);
  }
}

function encodeSession(data: SessionData): Buffer {
  return toBytes({
    tabs: data.tabs.map(tab => ({ ...tab })),
    activeTabIndex: data.activeTabIndex
  });
}

function decodeSession(bytes: Buffer): SessionData {
  const record = parseJson(bytes, 'session');
  const tabs = record.tabs;
  if (!Array.isArray(tabs)) {
    throw new HistoryFormatError('session: "tabs" must be an array');
  }
  return {
    tabs: tabs.map((tab, index) => decodeTab(tab, index)),
    activeTabIndex: readIndex(record, 'activeTabIndex', 'session')
  };
}

export {
  groupKey,
  parseGroupKey,
  encodeGroup,
  decodeGroup,
  encodeNextSeq,
  encodeCursor,
  decodeMeta,
  encodeSession,
  decodeSession,
  GROUP_KEY_PREFIX,
  META_NEXT_SEQ_KEY,
  META_CURSOR_KEY,
  FORMAT_VERSION
};
