/**
 * History Types - Contract between the controller and the host editor
 *
 * The host owns the edit log, the equivalence map, the selection and the
 * primitive that reverts change groups. The controller only reads positions
 * and asks the primitive to move.
 */

// =============================================================================
// Edit Log
// =============================================================================

/**
 * Text now occupies [start, end)
 */
export interface InsertEntry {
  kind: 'insert';
  start: number;
  end: number;
}

/**
 * Text was removed at position
 */
export interface DeleteEntry {
  kind: 'delete';
  position: number;
  text: string;
}

export type EditEntry = InsertEntry | DeleteEntry;

/**
 * Sentinel separating change groups in the log
 */
export const BOUNDARY = Symbol('boundary');
export type Boundary = typeof BOUNDARY;

/**
 * One node of the newest-first log. Nodes are never mutated, so a position
 * obtained earlier stays comparable with `===`.
 */
export interface LogNode {
  readonly item: EditEntry | Boundary;
  readonly next: LogPosition;
}

/**
 * A position in the log; null is the empty tail
 */
export type LogPosition = LogNode | null;

/**
 * Equivalence map value: where the undo (or redo) step that produced a group
 * left the pending cursor.
 */
export interface Equivalent {
  pending: LogPosition;
  /** The step was scoped to a selection, so `pending` is not a linear cursor */
  region: boolean;
  /**
   * The group re-applies undone changes; `pending` is the next undo group
   * the redo run would restore
   */
  redo?: boolean;
}

// =============================================================================
// Inverse Edit Primitive
// =============================================================================

export type UndoMode = 'linear' | 'selection';

/**
 * append: the reverting edits are kept on the log as a new group.
 * rewind: the reverting edits are dropped and the head moves to the remaining
 * position, restoring the log as it was before the reverted group.
 */
export type InverseRecording = 'append' | 'rewind';

export interface InverseEditRequest {
  /** Position to start reverting from; leading boundaries are skipped */
  from: LogPosition;
  /** Number of change groups to revert */
  count: number;
  mode: UndoMode;
  /** Follow equivalence entries past groups an earlier undo already reverted */
  undoOnly: boolean;
  recording: InverseRecording;
  /** Appended redo groups are marked as such in the equivalence map (default undo) */
  step?: 'undo' | 'redo';
}

export type InverseEditResult =
  | {
      ok: true;
      applied: number;
      /** Position after the last reverted group */
      remaining: LogPosition;
    }
  | {
      ok: false;
      failure: 'no-further-undo';
      message: string;
      applied: number;
      remaining: LogPosition;
    };

// =============================================================================
// Command Identity
// =============================================================================

export enum CommandToken {
  /** The host's own undo command */
  PlainUndo = 'plain-undo',
  ConstrainedUndo = 'constrained-undo',
  ConstrainedRedo = 'constrained-redo',
  /** The explicit cancel gesture */
  Cancel = 'cancel',
  Other = 'other',
}

// =============================================================================
// Host
// =============================================================================

/**
 * Everything the controller consumes from one open document
 */
export interface UndoHost {
  /** Stable document identity, used to key per-document state */
  readonly id: string;

  head(): LogPosition;
  lookupEquivalent(node: LogNode): Equivalent | undefined;

  applyInverseEdits(request: InverseEditRequest): InverseEditResult;

  /** Where a continuing undo resumes; undefined when no chain is pending */
  pendingPosition(): LogPosition | undefined;
  setPendingPosition(position: LogPosition | undefined): void;

  hasActiveSelection(): boolean;
  clearSelection(): void;

  notify(message: string): void;

  previousCommand(): CommandToken;
  setCommandIdentity(token: CommandToken): void;
}
