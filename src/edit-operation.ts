/**
 * @fileoverview Edit operations: construction, inversion and application
 * @description Operations are plain frozen values. Positions and lengths are
 * measured in code points so astral characters count as one.
 */

import {
  type CursorSnapshot,
  type EditOperation
} from './types/common';

interface EditOperationInit {
  position: number;
  inserted?: string;
  deleted?: string;
  cursorBefore?: CursorSnapshot;
  cursorAfter?: CursorSnapshot;
}

const ORIGIN: CursorSnapshot = Object.freeze({ line: 0, col: 0 });

function assertIndex(value: number, name: string): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new RangeError(`${name} must be a non-negative integer, got ${value}`);
  }
}

/**
 * Create a validated cursor snapshot
 */
function createCursor(line: number, col: number): CursorSnapshot {
  assertIndex(line, 'line');
  assertIndex(col, 'col');
  return Object.freeze({ line, col });
}

/**
 * Create a validated, frozen edit operation
 */
function createEditOperation(init: EditOperationInit): EditOperation {
  assertIndex(init.position, 'position');
  const before = init.cursorBefore ?? ORIGIN;
  const after = init.cursorAfter ?? ORIGIN;

  return Object.freeze({
    position: init.position,
    inserted: init.inserted ?? '',
    deleted: init.deleted ?? '',
    cursorBefore: createCursor(before.line, before.col),
    cursorAfter: createCursor(after.line, after.col)
  });
}

/**
 * Number of code points in a string
 */
function charLength(text: string): number {
  let count = 0;
  for (const _char of text) {
    count++;
  }
  return count;
}

/**
 * Swap inserted/deleted text and cursors so the result undoes `op`
 */
function invertOperation(op: EditOperation): EditOperation {
  return Object.freeze({
    position: op.position,
    inserted: op.deleted,
    deleted: op.inserted,
    cursorBefore: op.cursorAfter,
    cursorAfter: op.cursorBefore
  });
}

/**
 * Apply an operation to a plain string. Throws when the text at `position`
 * is not the operation's `deleted` text.
 */
function applyOperationToText(text: string, op: EditOperation): string {
  const chars = Array.from(text);
  const deletedLength = charLength(op.deleted);

  if (op.position > chars.length) {
    throw new RangeError(`Edit position ${op.position} is past the end of the text (${chars.length})`);
  }

  const removed = chars.slice(op.position, op.position + deletedLength).join('');
  if (removed !== op.deleted) {
    throw new Error(`Edit at ${op.position} expected to remove ${JSON.stringify(op.deleted)}, found ${JSON.stringify(removed)}`);
  }

  return chars.slice(0, op.position).join('') + op.inserted + chars.slice(op.position + deletedLength).join('');
}

/**
 * Apply a sequence of operations in order
 */
function applyOperationsToText(text: string, operations: readonly EditOperation[]): string {
  return operations.reduce(applyOperationToText, text);
}

/**
 * Rough memory footprint of one operation: UTF-16 text plus a fixed overhead
 */
function estimateOperationMemory(op: EditOperation): number {
  return (op.inserted.length + op.deleted.length) * 2 + 64;
}

export {
  createCursor,
  createEditOperation,
  charLength,
  invertOperation,
  applyOperationToText,
  applyOperationsToText,
  estimateOperationMemory,
  type EditOperationInit
};
