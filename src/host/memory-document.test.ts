/**
 * Memory Document Tests
 */

import { describe, it, expect, jest } from '@jest/globals';
import { MAX_NOTICES, MemoryDocument, NO_FURTHER_UNDO_IN_REGION } from './memory-document.js';
import { CommandToken } from '../core/history/types.js';

describe('MemoryDocument', () => {
  describe('construction', () => {
    it('should not record the initial text', () => {
      const doc = new MemoryDocument({ text: 'seed' });

      expect(doc.text()).toBe('seed');
      expect(doc.head()).toBeNull();
    });

    it('should generate an id when none is given', () => {
      expect(new MemoryDocument().id).toMatch(/^doc-\d+-[a-z0-9]+$/);
      expect(new MemoryDocument({ id: 'scratch' }).id).toBe('scratch');
    });
  });

  describe('editing', () => {
    it('should record each command as its own group', () => {
      const doc = new MemoryDocument();
      doc.append('ab');
      doc.insert(1, 'X');
      doc.delete(0, 1);

      expect(doc.text()).toBe('Xb');
      expect(doc.historyGroups()).toEqual([
        [{ kind: 'delete', position: 0, text: 'a' }],
        [{ kind: 'insert', start: 1, end: 2 }],
        [{ kind: 'insert', start: 0, end: 2 }],
      ]);
    });

    it('should record a replacement as one group', () => {
      const doc = new MemoryDocument({ text: 'cat' });
      doc.replace(0, 1, 'b');

      expect(doc.text()).toBe('bat');
      expect(doc.historyGroups()).toEqual([
        [
          { kind: 'insert', start: 0, end: 1 },
          { kind: 'delete', position: 0, text: 'c' },
        ],
      ]);
    });

    it('should ignore empty edits', () => {
      const doc = new MemoryDocument({ text: 'x' });
      doc.insert(0, '');
      doc.delete(1, 1);

      expect(doc.head()).toBeNull();
    });

    it('should reject ranges outside the buffer', () => {
      const doc = new MemoryDocument({ text: 'abc' });

      expect(() => doc.insert(4, 'x')).toThrow(RangeError);
      expect(() => doc.delete(2, 1)).toThrow('Range [2, 1) is outside the buffer (length 3)');
      expect(() => doc.select(-1, 2)).toThrow(RangeError);
    });
  });

  describe('selection', () => {
    it('should grow when text is inserted inside it', () => {
      const doc = new MemoryDocument({ text: 'abcdef' });
      doc.select(1, 4);
      doc.insert(2, 'XX');

      expect(doc.getSelection()).toEqual({ start: 1, end: 6 });
    });

    it('should shift when text is inserted before it', () => {
      const doc = new MemoryDocument({ text: 'abcdef' });
      doc.select(2, 4);
      doc.insert(0, 'X');

      expect(doc.getSelection()).toEqual({ start: 3, end: 5 });
    });

    it('should stay put when text is inserted after it', () => {
      const doc = new MemoryDocument({ text: 'abcdef' });
      doc.select(1, 3);
      doc.insert(5, 'X');

      expect(doc.getSelection()).toEqual({ start: 1, end: 3 });
    });

    it('should collapse over deleted text', () => {
      const doc = new MemoryDocument({ text: 'abcdef' });
      doc.select(2, 5);
      doc.delete(1, 4);

      expect(doc.getSelection()).toEqual({ start: 1, end: 2 });
    });

    it('should be cleared by deselect', () => {
      const doc = new MemoryDocument({ text: 'abc' });
      doc.select(0, 2);
      doc.deselect();

      expect(doc.hasActiveSelection()).toBe(false);
    });
  });

  describe('command loop', () => {
    it('should make each command the previous one once it returns', () => {
      const doc = new MemoryDocument();
      doc.cancel();
      expect(doc.previousCommand()).toBe(CommandToken.Cancel);

      doc.move();
      expect(doc.previousCommand()).toBe(CommandToken.Other);
    });

    it('should let a command replace its own identity', () => {
      const doc = new MemoryDocument();
      doc.runCommand(CommandToken.Other, () => doc.setCommandIdentity(CommandToken.ConstrainedRedo));

      expect(doc.previousCommand()).toBe(CommandToken.ConstrainedRedo);
    });

    it('should expose the previous command while the next one runs', () => {
      const doc = new MemoryDocument();
      doc.cancel();

      const seen = doc.runCommand(CommandToken.Other, () => doc.previousCommand());

      expect(seen).toBe(CommandToken.Cancel);
    });

    it('should forward notices to the listener', () => {
      const onNotify = jest.fn();
      const doc = new MemoryDocument({ onNotify });

      doc.notify('hello');

      expect(onNotify).toHaveBeenCalledWith('hello');
      expect(doc.getNotices()).toEqual(['hello']);
      expect(doc.lastNotice()).toBe('hello');
    });

    it('should hand out a copy of the notices', () => {
      const doc = new MemoryDocument();
      doc.notify('hello');

      doc.getNotices().push('injected');

      expect(doc.getNotices()).toEqual(['hello']);
    });

    it('should keep only the most recent notices', () => {
      const doc = new MemoryDocument();
      for (let i = 0; i < MAX_NOTICES + 5; i++) {
        doc.notify(`notice ${i}`);
      }

      const notices = doc.getNotices();
      expect(notices).toHaveLength(MAX_NOTICES);
      expect(notices[0]).toBe('notice 5');
      expect(doc.lastNotice()).toBe(`notice ${MAX_NOTICES + 4}`);
    });
  });

  describe('plainUndo', () => {
    it('should continue the chain across consecutive calls', () => {
      const doc = new MemoryDocument();
      doc.append('A');
      doc.append('B');

      doc.plainUndo();
      doc.plainUndo();

      expect(doc.text()).toBe('');
      expect(doc.getNotices()).toEqual(['Undo', 'Undo']);
    });

    it('should undo its own undo after an unrelated command', () => {
      const doc = new MemoryDocument();
      doc.append('A');
      doc.plainUndo();
      doc.move();

      doc.plainUndo();

      expect(doc.text()).toBe('A');
    });

    it('should start over at the head after an edit', () => {
      const doc = new MemoryDocument();
      doc.append('A');
      doc.append('B');
      doc.plainUndo();
      doc.append('C');

      doc.plainUndo();

      expect(doc.text()).toBe('A');
    });

    it('should report running out of history', () => {
      const doc = new MemoryDocument();

      const result = doc.plainUndo();

      expect(result).toEqual({
        ok: false,
        failure: 'no-further-undo',
        message: 'No further undo information',
        applied: 0,
        remaining: null,
      });
      expect(doc.lastNotice()).toBe('No further undo information');
    });
  });

  describe('applyInverseEdits', () => {
    function threeEdits() {
      const doc = new MemoryDocument();
      doc.append('A');
      const afterA = doc.head();
      doc.append('B');
      const afterB = doc.head();
      doc.append('C');
      const afterC = doc.head();
      return { doc, afterA, afterB, afterC };
    }

    it('should record the equivalence of an appended inverse group', () => {
      const { doc, afterC, afterB } = threeEdits();

      const result = doc.runCommand(CommandToken.Other, () =>
        doc.applyInverseEdits({ from: afterC, count: 1, mode: 'linear', undoOnly: false, recording: 'append' })
      );

      const head = doc.head();
      expect(result).toEqual({ ok: true, applied: 1, remaining: afterB });
      expect(head === null ? undefined : doc.lookupEquivalent(head)).toEqual({ pending: afterB, region: false });
    });

    it('should discard the inverse group when rewinding', () => {
      const { doc, afterC } = threeEdits();
      doc.plainUndo();

      const result = doc.runCommand(CommandToken.Other, () =>
        doc.applyInverseEdits({ from: doc.head(), count: 1, mode: 'linear', undoOnly: false, recording: 'rewind' })
      );

      expect(result).toEqual({ ok: true, applied: 1, remaining: afterC });
      expect(doc.head()).toBe(afterC);
      expect(doc.text()).toBe('ABC');
      expect(afterC === null ? undefined : doc.lookupEquivalent(afterC)).toBeUndefined();
    });

    it('should mark an appended redo group and ignore the selection for it', () => {
      const { doc, afterC } = threeEdits();
      doc.plainUndo();
      doc.select(0, 1);

      const result = doc.runCommand(CommandToken.Other, () =>
        doc.applyInverseEdits({
          from: doc.head(),
          count: 1,
          mode: 'selection',
          undoOnly: false,
          recording: 'append',
          step: 'redo',
        })
      );

      const head = doc.head();
      expect(result).toEqual({ ok: true, applied: 1, remaining: afterC });
      expect(doc.text()).toBe('ABC');
      expect(head).not.toBe(afterC);
      expect(head === null ? undefined : doc.lookupEquivalent(head)).toEqual({
        pending: afterC,
        region: false,
        redo: true,
      });
    });

    it('should follow equivalence entries past reverted groups', () => {
      const { doc } = threeEdits();
      doc.plainUndo();
      doc.plainUndo();
      doc.move();

      doc.runCommand(CommandToken.Other, () =>
        doc.applyInverseEdits({ from: doc.head(), count: 1, mode: 'linear', undoOnly: true, recording: 'append' })
      );

      expect(doc.text()).toBe('');
    });

    it('should undo only groups inside the selection, passing over later ones', () => {
      const doc = new MemoryDocument({ text: 'abc def' });
      doc.insert(0, 'X');
      doc.insert(8, '!');
      doc.select(0, 4);

      const result = doc.runCommand(CommandToken.Other, () =>
        doc.applyInverseEdits({ from: doc.head(), count: 1, mode: 'selection', undoOnly: false, recording: 'append' })
      );

      expect(result).toEqual({ ok: true, applied: 1, remaining: null });
      expect(doc.text()).toBe('abc def!');
      expect(doc.getSelection()).toEqual({ start: 0, end: 3 });
      const head = doc.head();
      expect(head === null ? undefined : doc.lookupEquivalent(head)).toEqual({ pending: null, region: true });
    });

    it('should stop at a group before the selection', () => {
      const doc = new MemoryDocument({ text: 'abc def' });
      doc.insert(0, 'X');
      const afterInsert = doc.head();
      doc.select(4, 8);

      const result = doc.runCommand(CommandToken.Other, () =>
        doc.applyInverseEdits({ from: doc.head(), count: 1, mode: 'selection', undoOnly: false, recording: 'append' })
      );

      expect(result).toEqual({
        ok: false,
        failure: 'no-further-undo',
        message: NO_FURTHER_UNDO_IN_REGION,
        applied: 0,
        remaining: afterInsert,
      });
      expect(doc.head()).toBe(afterInsert);
    });

    it('should treat selection mode without a selection as linear', () => {
      const { doc } = threeEdits();

      doc.runCommand(CommandToken.Other, () =>
        doc.applyInverseEdits({ from: doc.head(), count: 2, mode: 'selection', undoOnly: false, recording: 'append' })
      );

      expect(doc.text()).toBe('A');
    });
  });
});
