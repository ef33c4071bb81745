/**
 * Undo manager tests (memory-only)
 * Grouping, linear history, eviction and the recording controls
 */

import { UndoManager } from '../src/undo-manager';
import { applyOperationsToText } from '../src/edit-operation';
import { type EditOperation, type HistoryConfig, type UndoStep } from '../src/types/common';
import { testUtils } from './setup';

describe('UndoManager', () => {
  let config: HistoryConfig;
  let manager: UndoManager;
  let mockTime: number;

  beforeEach(() => {
    config = testUtils.config({ hotCapacity: 10, maxHistoryDepth: 100, groupTimeout: 500 });
    manager = new UndoManager('unsaved-0', config);
    mockTime = 1000;
    manager.setClock(() => mockTime);
  });

  const typeText = async (start: number, text: string, gap: number = 100): Promise<void> => {
    let position = start;
    for (const char of Array.from(text)) {
      await manager.record(testUtils.typed(position, char));
      position++;
      mockTime += gap;
    }
  };

  const apply = (text: string, step: UndoStep | null): string => {
    if (!step) throw new Error('expected an undo step');
    return applyOperationsToText(text, step.operations);
  };

  describe('empty history', () => {
    test('should have nothing to undo or redo', async () => {
      expect(manager.canUndo()).toBe(false);
      expect(manager.canRedo()).toBe(false);
      expect(await manager.undo()).toBeNull();
      expect(await manager.redo()).toBeNull();
    });

    test('should report the document id', () => {
      expect(manager.docId).toBe('unsaved-0');
      expect(manager.getStats().persistent).toBe(false);
    });
  });

  describe('grouping', () => {
    test('should merge rapid contiguous typing into one group', async () => {
      await typeText(0, 'abc');

      const step = await manager.undo();

      expect(step?.seq).toBe(0);
      expect(step?.operations.map(op => [op.position, op.deleted])).toEqual([[2, 'c'], [1, 'b'], [0, 'a']]);
      expect(step?.cursor).toEqual({ line: 0, col: 0 });
      expect(apply('abc', step)).toBe('');
      expect(await manager.undo()).toBeNull();
    });

    test('should split groups after the timeout', async () => {
      await typeText(0, 'ab');
      mockTime += 1000;
      await typeText(2, 'cd');

      expect(apply('abcd', await manager.undo())).toBe('ab');
      expect(apply('ab', await manager.undo())).toBe('');
    });

    test('should merge an edit exactly at the timeout', async () => {
      await manager.record(testUtils.typed(0, 'a'), 0);
      await manager.record(testUtils.typed(1, 'b'), 500);
      await manager.breakGroup();

      expect(manager.getStats().totalGroups).toBe(1);
    });

    test('should split when typing turns into deleting', async () => {
      await typeText(0, 'ab');
      await manager.record(testUtils.deleted(1, 'b'));

      expect(apply('a', await manager.undo())).toBe('ab');
      expect(apply('ab', await manager.undo())).toBe('');
    });

    test('should split when the cursor jumps', async () => {
      await manager.record(testUtils.typed(0, 'a'));
      await manager.record(testUtils.typed(0, 'b'));
      await manager.record(testUtils.typed(5, 'c'));
      await manager.breakGroup();

      expect(manager.getDebugInfo().hotSeqs).toEqual([0, 1]);
    });

    test('should seal on breakGroup', async () => {
      await manager.record(testUtils.typed(0, 'a'));
      await manager.breakGroup();
      await manager.record(testUtils.typed(1, 'b'));
      await manager.breakGroup();

      expect(manager.getStats().totalGroups).toBe(2);
      expect(manager.getStats().currentGroupOperations).toBe(0);
    });

    test('should keep isolated edits in their own group', async () => {
      await manager.record(testUtils.typed(0, 'a'));
      await manager.recordIsolated(testUtils.typed(1, 'pasted'));
      await manager.record(testUtils.typed(7, 'b'));

      expect(apply('apastedb', await manager.undo())).toBe('apasted');
      expect(apply('apasted', await manager.undo())).toBe('a');
      expect(apply('a', await manager.undo())).toBe('');
    });

    test('should use the clock when no timestamp is given', async () => {
      await manager.record(testUtils.typed(0, 'a'));
      mockTime += 501;
      await manager.record(testUtils.typed(1, 'b'));

      expect(manager.getStats().totalGroups).toBe(1);
      expect(manager.getStats().currentGroupOperations).toBe(1);
    });
  });

  describe('undo and redo', () => {
    test('should restore cursors', async () => {
      await typeText(0, 'ab');

      const undo = await manager.undo();
      const redo = await manager.redo();

      expect(undo?.cursor).toEqual({ line: 0, col: 0 });
      expect(redo?.cursor).toEqual({ line: 0, col: 2 });
      expect(redo?.operations.map(op => op.inserted)).toEqual(['a', 'b']);
    });

    test('should walk back and forth through the history', async () => {
      await typeText(0, 'ab');
      mockTime += 1000;
      await typeText(2, 'cd');

      let text = 'abcd';
      text = apply(text, await manager.undo());
      text = apply(text, await manager.undo());
      expect(text).toBe('');
      expect(manager.canUndo()).toBe(false);
      expect(manager.canRedo()).toBe(true);

      text = apply(text, await manager.redo());
      text = apply(text, await manager.redo());
      expect(text).toBe('abcd');
      expect(await manager.redo()).toBeNull();
    });

    test('should seal the open group before undoing', async () => {
      await manager.record(testUtils.typed(0, 'a'));
      expect(manager.canUndo()).toBe(true);

      const step = await manager.undo();

      expect(step?.seq).toBe(0);
      expect(manager.getStats().currentGroupOperations).toBe(0);
    });

    test('should discard redo history on a new edit', async () => {
      await manager.record(testUtils.typed(0, 'a'));
      await manager.breakGroup();
      await manager.record(testUtils.typed(1, 'b'));
      await manager.undo();

      await manager.record(testUtils.typed(1, 'c'));

      expect(manager.canRedo()).toBe(false);
      expect(await manager.redo()).toBeNull();
      await manager.breakGroup();
      expect(manager.getDebugInfo().hotSeqs).toEqual([0, 2]);
    });

    test('should apply calls in the order they were issued', async () => {
      const recorded = manager.record(testUtils.typed(0, 'a'));
      const undone = manager.undo();

      await recorded;
      const step = await undone;
      expect(step?.seq).toBe(0);
    });
  });

  describe('eviction', () => {
    test('should keep at most maxHistoryDepth groups in memory', async () => {
      manager = new UndoManager('unsaved-1', testUtils.config({ hotCapacity: 2, maxHistoryDepth: 3 }));

      for (let i = 0; i < 5; i++) {
        await manager.recordIsolated(testUtils.typed(i, String(i)));
      }

      expect(manager.getDebugInfo().hotSeqs).toEqual([2, 3, 4]);
      expect(manager.getDebugInfo().pendingDeletes).toEqual([]);
      expect(manager.getStats().nextSeq).toBe(5);

      const undone: number[] = [];
      let step = await manager.undo();
      while (step) {
        undone.push(step.seq);
        step = await manager.undo();
      }
      expect(undone).toEqual([4, 3, 2]);
    });

    test('should shift the cursor down with evicted groups', async () => {
      manager = new UndoManager('unsaved-1', testUtils.config({ maxHistoryDepth: 2 }));
      await manager.recordIsolated(testUtils.typed(0, 'a'));
      await manager.recordIsolated(testUtils.typed(1, 'b'));
      await manager.undo();
      expect(manager.getStats().undoCursor).toBe(1);

      // A new edit drops the redo group; the cursor stays at the end
      await manager.recordIsolated(testUtils.typed(1, 'c'));
      await manager.recordIsolated(testUtils.typed(2, 'd'));

      expect(manager.getDebugInfo().hotSeqs).toEqual([2, 3]);
      expect(manager.getStats().undoCursor).toBe(2);
    });
  });

  describe('recording controls', () => {
    test('should ignore edits while paused', async () => {
      manager.pauseRecording();
      await manager.record(testUtils.typed(0, 'a'));
      await manager.recordIsolated(testUtils.typed(0, 'loaded'));
      expect(manager.isRecording()).toBe(false);
      expect(manager.canUndo()).toBe(false);

      manager.resumeRecording();
      await manager.record(testUtils.typed(0, 'a'));
      expect(manager.canUndo()).toBe(true);
    });
  });

  describe('flush and deleteHistory', () => {
    test('should seal the open group on flush without a store', async () => {
      await manager.record(testUtils.typed(0, 'a'));
      await manager.flush();

      expect(manager.getStats().totalGroups).toBe(1);
      expect(manager.getDebugInfo().unwrittenSeqs).toEqual([]);
    });

    test('should forget everything but keep counting seqs', async () => {
      await manager.recordIsolated(testUtils.typed(0, 'a'));
      await manager.recordIsolated(testUtils.typed(1, 'b'));

      await manager.deleteHistory();
      expect(manager.canUndo()).toBe(false);
      expect(manager.getStats().totalGroups).toBe(0);

      await manager.recordIsolated(testUtils.typed(0, 'c'));
      expect(manager.getDebugInfo().hotSeqs).toEqual([2]);
    });
  });

  describe('stats', () => {
    test('should count memory for sealed and open operations', async () => {
      const op: EditOperation = testUtils.typed(0, 'a');
      await manager.recordIsolated(op);
      await manager.record(testUtils.typed(1, 'b'));

      const stats = manager.getStats();
      expect(stats.memoryUsage).toBe(66 * 2);
      expect(stats).toMatchObject({
        docId: 'unsaved-0',
        hotGroups: 1,
        coldGroups: 0,
        totalGroups: 1,
        undoCursor: 1,
        nextSeq: 1,
        currentGroupOperations: 1
      });
    });
  });
});
