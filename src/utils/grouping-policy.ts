/**
 * @fileoverview Group continuation rules
 * Classifies edits by direction and decides whether an edit may extend the
 * open undo group. The rule table is configuration, not a fixed contract.
 */

import { charLength } from '../edit-operation';
import {
  EditKind,
  type EditOperation,
  type GroupingPolicy,
  type GroupingRules
} from '../types/common';

/**
 * Typing continues typing, deleting continues deleting; anything else
 * (paste, replace, multi-character delete) stands alone.
 */
const DEFAULT_GROUPING_RULES: GroupingRules = Object.freeze({
  [EditKind.TYPING]: [EditKind.TYPING],
  [EditKind.DELETION]: [EditKind.DELETION],
  [EditKind.COMPOUND]: []
});

const DEFAULT_GROUPING_POLICY: GroupingPolicy = Object.freeze({
  rules: DEFAULT_GROUPING_RULES,
  requireContiguous: true
});

/**
 * Span of an edit in the text it was applied to
 */
class EditSpan {
  constructor(
    public readonly start: number,
    public readonly insertedLength: number,
    public readonly deletedLength: number
  ) {}

  static fromOperation(op: EditOperation): EditSpan {
    return new EditSpan(op.position, charLength(op.inserted), charLength(op.deleted));
  }

  /**
   * Position just past this edit's inserted text
   */
  get end(): number {
    return this.start + this.insertedLength;
  }
}

class GroupingCalculator {
  /**
   * Classify an edit by direction
   */
  static classify(op: EditOperation): EditKind {
    const span = EditSpan.fromOperation(op);

    if (span.deletedLength === 0 && span.insertedLength === 1) {
      return EditKind.TYPING;
    }
    if (span.insertedLength === 0 && span.deletedLength === 1) {
      return EditKind.DELETION;
    }
    return EditKind.COMPOUND;
  }

  /**
   * Whether `next` starts where `previous` left the text: after its inserted
   * text (typing on), at its position (forward delete), or ending at its
   * position (backspace)
   */
  static isContiguous(previous: EditOperation, next: EditOperation): boolean {
    const prev = EditSpan.fromOperation(previous);
    const cur = EditSpan.fromOperation(next);

    return cur.start === prev.end ||
      cur.start === prev.start ||
      cur.start + cur.deletedLength === prev.start;
  }

  /**
   * Whether `next` may join the group whose last operation is `previous`.
   * Timing is checked by the caller.
   */
  static canExtend(
    previous: EditOperation,
    next: EditOperation,
    policy: GroupingPolicy = DEFAULT_GROUPING_POLICY
  ): boolean {
    const allowed = policy.rules[GroupingCalculator.classify(previous)];
    if (!allowed.includes(GroupingCalculator.classify(next))) {
      return false;
    }
    return !policy.requireContiguous || GroupingCalculator.isContiguous(previous, next);
  }
}

export {
  EditSpan,
  GroupingCalculator,
  DEFAULT_GROUPING_RULES,
  DEFAULT_GROUPING_POLICY
};
