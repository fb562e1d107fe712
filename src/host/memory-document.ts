/**
 * Memory Document - In-memory text document implementing the host contract
 *
 * Holds a text buffer, an append-only edit log, the equivalence map written
 * by undo steps, a selection and the command loop bookkeeping. Every public
 * editing method runs as one command and forms one change group.
 *
 * Usage:
 *   const doc = new MemoryDocument({ text: 'hello' });
 *   doc.append(' world');
 *   doc.runCommand(CommandToken.Other, () => commands.undo(doc));
 */

import { skipBoundaries, nextGroupBoundary } from '../core/history/cursor.js';
import {
  BOUNDARY,
  CommandToken,
  type EditEntry,
  type Equivalent,
  type InverseEditRequest,
  type InverseEditResult,
  type LogNode,
  type LogPosition,
  type UndoHost,
} from '../core/history/types.js';
import { DEFAULT_NO_FURTHER_UNDO } from '../core/commands/messages.js';
import { EditLog, groupEntries } from './edit-log.js';
import { logger } from '../base/utils/logger.js';

export interface Selection {
  start: number;
  end: number;
}

export interface MemoryDocumentOptions {
  id?: string;
  /** Initial text; not recorded in the history */
  text?: string;
  onNotify?: (message: string) => void;
}

export const NO_FURTHER_UNDO_IN_REGION = 'No further undo information in region';

/** Notices kept for inspection; older ones are dropped */
export const MAX_NOTICES = 100;

/**
 * Generates a unique ID for documents
 */
function generateId(): string {
  return `doc-${Date.now()}-${Math.random().toString(36).slice(2, 8)}`;
}

function insideRegion(entry: EditEntry, region: Selection): boolean {
  if (entry.kind === 'insert') {
    return entry.start >= region.start && entry.end <= region.end;
  }
  return entry.position >= region.start && entry.position <= region.end;
}

function afterRegion(entry: EditEntry, region: Selection): boolean {
  return (entry.kind === 'insert' ? entry.start : entry.position) >= region.end;
}

export class MemoryDocument implements UndoHost {
  readonly id: string;

  private buffer: string;
  private selection: Selection | null = null;
  private readonly log = new EditLog();
  private readonly equivalence = new WeakMap<LogNode, Equivalent>();
  private pending: LogPosition | undefined = undefined;
  private lastCommand: CommandToken = CommandToken.Other;
  private currentCommand: CommandToken = CommandToken.Other;
  private readonly notices: string[] = [];
  private readonly onNotify?: (message: string) => void;

  constructor(options: MemoryDocumentOptions = {}) {
    this.id = options.id ?? generateId();
    this.buffer = options.text ?? '';
    this.onNotify = options.onNotify;
  }

  // ===========================================================================
  // Command loop
  // ===========================================================================

  /**
   * Run one command: closes the previous change group, sets the command's
   * identity, and makes it the previous command once it returns.
   */
  runCommand<T>(token: CommandToken, action: () => T): T {
    this.log.closeGroup();
    this.currentCommand = token;
    try {
      return action();
    } finally {
      this.lastCommand = this.currentCommand;
    }
  }

  insert(position: number, text: string): void {
    this.runCommand(CommandToken.Other, () => {
      this.insertText(position, text, true);
      this.pending = undefined;
    });
  }

  append(text: string): void {
    this.insert(this.buffer.length, text);
  }

  delete(start: number, end: number): void {
    this.runCommand(CommandToken.Other, () => {
      this.deleteText(start, end, true);
      this.pending = undefined;
    });
  }

  /**
   * Replace [start, end) with text as a single change group
   */
  replace(start: number, end: number, text: string): void {
    this.runCommand(CommandToken.Other, () => {
      this.deleteText(start, end, true);
      this.insertText(start, text, true);
      this.pending = undefined;
    });
  }

  select(start: number, end: number): void {
    this.runCommand(CommandToken.Other, () => {
      this.assertRange(start, end);
      this.selection = { start, end };
    });
  }

  deselect(): void {
    this.runCommand(CommandToken.Other, () => this.clearSelection());
  }

  /**
   * A command unrelated to undo, such as moving point
   */
  move(): void {
    this.runCommand(CommandToken.Other, () => undefined);
  }

  /**
   * The explicit cancel gesture
   */
  cancel(): void {
    this.runCommand(CommandToken.Cancel, () => undefined);
  }

  /**
   * The editor's own unconstrained undo. Continues the pending chain after
   * any undo or redo.
   */
  plainUndo(count = 1): InverseEditResult {
    return this.runCommand(CommandToken.PlainUndo, () => {
      const continuing =
        this.lastCommand === CommandToken.PlainUndo ||
        this.lastCommand === CommandToken.ConstrainedUndo ||
        this.lastCommand === CommandToken.ConstrainedRedo;
      const from = continuing && this.pending !== undefined ? this.pending : this.log.head();

      const result = this.applyInverseEdits({
        from,
        count,
        mode: 'linear',
        undoOnly: false,
        recording: 'append',
      });

      this.pending = result.remaining;
      this.notify(result.ok ? 'Undo' : result.message);
      return result;
    });
  }

  // ===========================================================================
  // Inspection
  // ===========================================================================

  text(): string {
    return this.buffer;
  }

  getSelection(): Selection | null {
    return this.selection ? { ...this.selection } : null;
  }

  getNotices(): string[] {
    return [...this.notices];
  }

  lastNotice(): string | undefined {
    return this.notices[this.notices.length - 1];
  }

  historyGroups(): EditEntry[][] {
    return this.log.groups();
  }

  // ===========================================================================
  // UndoHost
  // ===========================================================================

  head(): LogPosition {
    return this.log.head();
  }

  lookupEquivalent(node: LogNode): Equivalent | undefined {
    return this.equivalence.get(node);
  }

  applyInverseEdits(request: InverseEditRequest): InverseEditResult {
    const record = request.recording === 'append';
    const redo = request.step === 'redo';
    const headBefore = this.log.head();
    const region = request.mode === 'selection' && record && !redo ? this.selection : null;

    let position = skipBoundaries(request.from);
    let applied = 0;
    let failureMessage: string | undefined;

    while (applied < request.count) {
      if (request.undoOnly && request.mode === 'linear') {
        position = this.skipReverted(position);
      }

      if (region) {
        const found = this.findRegionGroup(position, region);
        if (found === 'blocked') {
          failureMessage = NO_FURTHER_UNDO_IN_REGION;
          break;
        }
        position = found;
      }

      if (!position) {
        failureMessage = DEFAULT_NO_FURTHER_UNDO;
        break;
      }

      position = this.revertGroup(position, record);
      applied++;
    }

    if (record) {
      const headAfter = this.log.head();
      if (headAfter && headAfter !== headBefore) {
        this.equivalence.set(
          headAfter,
          redo ? { pending: position, region: false, redo: true } : { pending: position, region: region !== null }
        );
      }
    } else {
      this.log.rewindTo(position);
    }

    logger.debug('MemoryDocument', 'Reverted groups', {
      document: this.id,
      requested: request.count,
      applied,
      mode: request.mode,
      recording: request.recording,
    });

    if (failureMessage !== undefined) {
      return { ok: false, failure: 'no-further-undo', message: failureMessage, applied, remaining: position };
    }
    return { ok: true, applied, remaining: position };
  }

  pendingPosition(): LogPosition | undefined {
    return this.pending;
  }

  setPendingPosition(position: LogPosition | undefined): void {
    this.pending = position;
  }

  hasActiveSelection(): boolean {
    return this.selection !== null;
  }

  clearSelection(): void {
    this.selection = null;
  }

  notify(message: string): void {
    this.notices.push(message);
    if (this.notices.length > MAX_NOTICES) {
      this.notices.shift();
    }
    this.onNotify?.(message);
  }

  previousCommand(): CommandToken {
    return this.lastCommand;
  }

  setCommandIdentity(token: CommandToken): void {
    this.currentCommand = token;
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  /**
   * Follow equivalence entries (to the last one in a chain) past groups that
   * an earlier undo already reverted. Region entries end the chain.
   */
  private skipReverted(position: LogPosition): LogPosition {
    let current = skipBoundaries(position);
    while (current) {
      const equivalent = this.equivalence.get(current);
      if (!equivalent || equivalent.region) break;
      current = skipBoundaries(equivalent.pending);
    }
    return current;
  }

  /**
   * First group at or after `position` lying inside the region. Groups
   * entirely after the region are passed over; anything else blocks.
   */
  private findRegionGroup(position: LogPosition, region: Selection): LogPosition | 'blocked' {
    let current = skipBoundaries(position);
    while (current) {
      const entries = groupEntries(current);
      if (entries.every((entry) => insideRegion(entry, region))) {
        return current;
      }
      if (!entries.every((entry) => afterRegion(entry, region))) {
        return 'blocked';
      }
      current = nextGroupBoundary(current);
    }
    return null;
  }

  private revertGroup(position: LogNode, record: boolean): LogPosition {
    let current: LogPosition = position;
    while (current && current.item !== BOUNDARY) {
      this.revertEntry(current.item, record);
      current = current.next;
    }
    return skipBoundaries(current);
  }

  private revertEntry(entry: EditEntry, record: boolean): void {
    if (entry.kind === 'insert') {
      this.deleteText(entry.start, entry.end, record);
    } else {
      this.insertText(entry.position, entry.text, record);
    }
  }

  private insertText(position: number, text: string, record: boolean): void {
    this.assertRange(position, position);
    if (text.length === 0) return;

    this.buffer = this.buffer.slice(0, position) + text + this.buffer.slice(position);

    if (this.selection) {
      const { start, end } = this.selection;
      this.selection = {
        start: position < start ? start + text.length : start,
        end: position <= end ? end + text.length : end,
      };
    }

    if (record) {
      this.log.record({ kind: 'insert', start: position, end: position + text.length });
    }
  }

  private deleteText(start: number, end: number, record: boolean): void {
    this.assertRange(start, end);
    if (start === end) return;

    const removed = this.buffer.slice(start, end);
    this.buffer = this.buffer.slice(0, start) + this.buffer.slice(end);

    if (this.selection) {
      const shift = (offset: number): number => {
        if (offset >= end) return offset - removed.length;
        if (offset > start) return start;
        return offset;
      };
      this.selection = { start: shift(this.selection.start), end: shift(this.selection.end) };
    }

    if (record) {
      this.log.record({ kind: 'delete', position: start, text: removed });
    }
  }

  private assertRange(start: number, end: number): void {
    if (!Number.isInteger(start) || !Number.isInteger(end) || start < 0 || end < start || end > this.buffer.length) {
      throw new RangeError(`Range [${start}, ${end}) is outside the buffer (length ${this.buffer.length})`);
    }
  }
}
