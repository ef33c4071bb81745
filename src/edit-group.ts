/**
 * @fileoverview Sealed undo groups
 */

import { estimateOperationMemory, invertOperation } from './edit-operation';
import {
  type CursorSnapshot,
  type EditOperation
} from './types/common';

/**
 * One undo step: the operations recorded between two group boundaries,
 * in chronological order. Immutable once constructed.
 */
class EditGroup {
  public readonly seq: number;
  public readonly operations: readonly EditOperation[];

  constructor(seq: number, operations: readonly EditOperation[]) {
    if (operations.length === 0) {
      throw new RangeError(`Edit group ${seq} has no operations`);
    }
    this.seq = seq;
    this.operations = Object.freeze([...operations]);
  }

  /**
   * Cursor to restore after undoing the whole group
   */
  get cursorBefore(): CursorSnapshot {
    return this.operations[0].cursorBefore;
  }

  /**
   * Cursor to restore after redoing the whole group
   */
  get cursorAfter(): CursorSnapshot {
    return this.operations[this.operations.length - 1].cursorAfter;
  }

  /**
   * Operations that undo this group, newest first, each inverted
   */
  invertedOperations(): EditOperation[] {
    const inverted: EditOperation[] = [];
    for (let i = this.operations.length - 1; i >= 0; i--) {
      inverted.push(invertOperation(this.operations[i]));
    }
    return inverted;
  }

  getMemoryUsage(): number {
    let total = 0;
    for (const op of this.operations) {
      total += estimateOperationMemory(op);
    }
    return total;
  }
}

export { EditGroup };
