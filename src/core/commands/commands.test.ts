/**
 * Undo/Redo Commands Tests
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import { UndoRedoCommands, DEFAULT_COMMANDS_OPTIONS } from './commands.js';
import { CommandToken, type LogPosition } from '../history/types.js';
import { MemoryDocument } from '../../host/memory-document.js';

describe('UndoRedoCommands', () => {
  let commands: UndoRedoCommands;
  let doc: MemoryDocument;

  const undo = (steps?: number) => doc.runCommand(CommandToken.Other, () => commands.undo(doc, steps));
  const redo = (steps?: number) => doc.runCommand(CommandToken.Other, () => commands.redo(doc, steps));

  beforeEach(() => {
    commands = new UndoRedoCommands();
    doc = new MemoryDocument({ id: 'doc-1' });
    doc.append('A');
    doc.append('B');
  });

  describe('options', () => {
    it('should fill unset options with defaults', () => {
      expect(new UndoRedoCommands({ redoAllLimit: 4 }).getOptions()).toEqual({
        ...DEFAULT_COMMANDS_OPTIONS,
        redoAllLimit: 4,
      });
    });
  });

  describe('command identity', () => {
    it('should record undo as the previous command', () => {
      undo();
      expect(doc.previousCommand()).toBe(CommandToken.ConstrainedUndo);
    });

    it('should record redo as the previous command', () => {
      undo();
      redo();
      expect(doc.previousCommand()).toBe(CommandToken.ConstrainedRedo);
    });

    it('should record its identity even when refused', () => {
      redo();
      expect(doc.previousCommand()).toBe(CommandToken.ConstrainedRedo);
      expect(doc.lastNotice()).toBe('No undo to redo');
    });
  });

  describe('notices', () => {
    it('should confirm successful steps', () => {
      undo();
      redo();
      expect(doc.getNotices()).toEqual(['Undo', 'Redo']);
    });

    it('should only report failures when confirmations are off', () => {
      commands = new UndoRedoCommands({ confirmSteps: false });
      undo();
      redo();
      redo();
      expect(doc.getNotices()).toEqual(['No undo to redo']);
    });
  });

  describe('step counts', () => {
    it.each([0, -1, 1.5, Number.NaN])('should reject %p before touching the log', (steps) => {
      const head = doc.head();

      const outcome = undo(steps);

      expect(outcome).toEqual({ ok: false, failure: 'invalid-step-count', detail: String(steps), applied: 0 });
      expect(doc.head()).toBe(head);
      expect(doc.lastNotice()).toBe(`Undo: invalid step count ${String(steps)}`);
    });

    it('should leave a running undo chain intact after a rejected count', () => {
      undo();
      redo(0);
      undo();

      expect(doc.text()).toBe('');
      expect(doc.previousCommand()).toBe(CommandToken.ConstrainedUndo);
    });
  });

  describe('redoAll', () => {
    it('should redo everything up to the checkpoint', () => {
      const headBeforeUndo = doc.head();
      undo();
      undo();

      const outcome = doc.runCommand(CommandToken.Other, () => commands.redoAll(doc));

      expect(outcome).toEqual({ ok: true, steps: 2, inRegion: false });
      expect(doc.head()).toBe(headBeforeUndo);
      expect(doc.lastNotice()).toBe('Redo (2 steps)');
    });

    it('should honor the configured limit', () => {
      commands = new UndoRedoCommands({ redoAllLimit: 1 });
      undo();
      undo();

      doc.runCommand(CommandToken.Other, () => commands.redoAll(doc));

      expect(doc.text()).toBe('A');
    });
  });

  describe('unexpected host errors', () => {
    class BrokenDocument extends MemoryDocument {
      override head(): LogPosition {
        throw new Error('log unavailable');
      }
    }

    it('should report the error and end the run', () => {
      const broken = new BrokenDocument({ id: 'broken' });

      const outcome = broken.runCommand(CommandToken.Other, () => commands.undo(broken));

      expect(outcome).toEqual({ ok: false, failure: 'host-error', detail: 'log unavailable', applied: 0 });
      expect(broken.getNotices()).toEqual(['Undo failed: log unavailable']);
      expect(broken.previousCommand()).toBe(CommandToken.Other);
    });
  });

  describe('document lifecycle', () => {
    it('should expose the per-document state', () => {
      undo();
      expect(commands.stateOf('doc-1')).toEqual({ respect: true, inRegion: false, hasCheckpoint: true });
    });

    it('should reset the state when the document closes', () => {
      doc.cancel();
      undo();
      commands.documentClosed('doc-1');

      expect(commands.stateOf('doc-1')).toEqual({ respect: true, inRegion: false, hasCheckpoint: false });
      expect(commands.trackedDocuments()).toBe(0);
    });

    it('should not create state when reading an unknown document', () => {
      expect(commands.stateOf('missing')).toEqual({ respect: true, inRegion: false, hasCheckpoint: false });
      expect(commands.trackedDocuments()).toBe(0);
    });

    it('should keep documents apart', () => {
      const other = new MemoryDocument({ id: 'doc-2' });
      doc.cancel();
      undo();

      expect(commands.stateOf(other.id).respect).toBe(true);
      expect(commands.stateOf('doc-1').respect).toBe(false);
    });
  });
});
