/**
 * Group continuation rules
 * Tests for GroupingCalculator.classify(), isContiguous() and canExtend()
 */

import { createEditOperation } from '../src/edit-operation';
import { DEFAULT_GROUPING_POLICY, EditSpan, GroupingCalculator } from '../src/utils/grouping-policy';
import { EditKind, type GroupingPolicy } from '../src/types/common';
import { testUtils } from './setup';

describe('Grouping Policy', () => {
  describe('classify', () => {
    test('should treat a single inserted character as typing', () => {
      expect(GroupingCalculator.classify(testUtils.typed(0, 'a'))).toBe(EditKind.TYPING);
      expect(GroupingCalculator.classify(testUtils.typed(0, '😀'))).toBe(EditKind.TYPING);
    });

    test('should treat a single removed character as deletion', () => {
      expect(GroupingCalculator.classify(testUtils.deleted(4, 'x'))).toBe(EditKind.DELETION);
    });

    test('should treat pastes and replacements as compound', () => {
      expect(GroupingCalculator.classify(testUtils.typed(0, 'pasted'))).toBe(EditKind.COMPOUND);
      expect(GroupingCalculator.classify(createEditOperation({ position: 0, inserted: 'a', deleted: 'b' })))
        .toBe(EditKind.COMPOUND);
      expect(GroupingCalculator.classify(testUtils.deleted(0, 'word'))).toBe(EditKind.COMPOUND);
    });
  });

  describe('EditSpan', () => {
    test('should end after the inserted text', () => {
      const span = EditSpan.fromOperation(createEditOperation({ position: 5, inserted: 'ab', deleted: 'xyz' }));
      expect(span.start).toBe(5);
      expect(span.end).toBe(7);
      expect(span.deletedLength).toBe(3);
    });
  });

  describe('isContiguous', () => {
    test('should accept typing that continues after the previous character', () => {
      expect(GroupingCalculator.isContiguous(testUtils.typed(3, 'a'), testUtils.typed(4, 'b'))).toBe(true);
    });

    test('should accept backspacing towards the start', () => {
      expect(GroupingCalculator.isContiguous(testUtils.deleted(5, 'c'), testUtils.deleted(4, 'b'))).toBe(true);
    });

    test('should accept forward deletes at the same position', () => {
      expect(GroupingCalculator.isContiguous(testUtils.deleted(5, 'c'), testUtils.deleted(5, 'd'))).toBe(true);
    });

    test('should reject an edit elsewhere in the text', () => {
      expect(GroupingCalculator.isContiguous(testUtils.typed(3, 'a'), testUtils.typed(10, 'b'))).toBe(false);
    });
  });

  describe('canExtend', () => {
    test('should extend typing with typing', () => {
      expect(GroupingCalculator.canExtend(testUtils.typed(0, 'a'), testUtils.typed(1, 'b'))).toBe(true);
    });

    test('should not mix typing and deletion under the default rules', () => {
      expect(GroupingCalculator.canExtend(testUtils.typed(0, 'a'), testUtils.deleted(0, 'a'))).toBe(false);
      expect(GroupingCalculator.canExtend(testUtils.deleted(1, 'a'), testUtils.typed(0, 'b'))).toBe(false);
    });

    test('should never extend a compound edit', () => {
      expect(GroupingCalculator.canExtend(testUtils.typed(0, 'abc'), testUtils.typed(3, 'd'))).toBe(false);
      expect(GroupingCalculator.canExtend(testUtils.typed(0, 'a'), testUtils.typed(1, 'bc'))).toBe(false);
    });

    test('should follow a custom rule table', () => {
      const policy: GroupingPolicy = {
        rules: {
          [EditKind.TYPING]: [EditKind.TYPING, EditKind.DELETION],
          [EditKind.DELETION]: [EditKind.DELETION],
          [EditKind.COMPOUND]: []
        },
        requireContiguous: true
      };
      // Backspace over the character just typed
      expect(GroupingCalculator.canExtend(testUtils.typed(0, 'a'), testUtils.deleted(0, 'a'), policy)).toBe(true);
    });

    test('should skip the position check when contiguity is not required', () => {
      const policy: GroupingPolicy = { ...DEFAULT_GROUPING_POLICY, requireContiguous: false };
      expect(GroupingCalculator.canExtend(testUtils.typed(0, 'a'), testUtils.typed(50, 'b'), policy)).toBe(true);
    });
  });
});
