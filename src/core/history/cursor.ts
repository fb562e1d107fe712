/**
 * History Cursor - Read-only queries over the host's edit log
 */

import { BOUNDARY, type Equivalent, type LogPosition, type UndoHost } from './types.js';

/**
 * Skip leading boundary sentinels
 */
export function skipBoundaries(position: LogPosition): LogPosition {
  let current = position;
  while (current && current.item === BOUNDARY) {
    current = current.next;
  }
  return current;
}

/**
 * Skip the current group's entries, then any boundaries that follow it.
 * Expects a position at the start of a group.
 */
export function nextGroupBoundary(position: LogPosition): LogPosition {
  let current = position;
  while (current && current.item !== BOUNDARY) {
    current = current.next;
  }
  return skipBoundaries(current);
}

/**
 * Two positions name the same place once leading boundaries are ignored
 */
export function samePosition(a: LogPosition | undefined, b: LogPosition | undefined): boolean {
  if (a === undefined || b === undefined) {
    return false;
  }
  return skipBoundaries(a) === skipBoundaries(b);
}

export class HistoryCursor {
  constructor(private readonly host: UndoHost) {}

  head(): LogPosition {
    return this.host.head();
  }

  lookupEquivalent(position: LogPosition): Equivalent | undefined {
    const node = skipBoundaries(position);
    return node ? this.host.lookupEquivalent(node) : undefined;
  }

  /**
   * True when the group at this position was produced by an undo or redo
   */
  isAtRedoEquivalent(position: LogPosition): boolean {
    return this.lookupEquivalent(position) !== undefined;
  }

  /**
   * Where a redo starting at `position` picks up: groups a redo already
   * re-applied are followed to the undo group their run restores next.
   */
  redoPosition(position: LogPosition): LogPosition {
    let current = skipBoundaries(position);
    let entry = this.lookupEquivalent(current);

    while (entry?.redo) {
      current = skipBoundaries(entry.pending);
      entry = this.lookupEquivalent(current);
    }

    return current;
  }

  /**
   * Count consecutive undo-produced groups starting at `position`.
   * The walk stops before `stopAt` (the checkpoint), at a redo group, and
   * never exceeds `limit`.
   */
  countRedoAvailable(position: LogPosition, stopAt: LogPosition | undefined, limit: number): number {
    let current = skipBoundaries(position);
    let count = 0;

    while (count < limit && current) {
      if (samePosition(current, stopAt)) break;
      const entry = this.lookupEquivalent(current);
      if (!entry || entry.redo) break;
      current = nextGroupBoundary(current);
      count++;
    }

    return count;
  }
}
