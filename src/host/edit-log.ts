/**
 * Edit Log - Append-only, newest-first change history
 */

import { BOUNDARY, type EditEntry, type LogNode, type LogPosition } from '../core/history/types.js';

export class EditLog {
  private headNode: LogPosition = null;
  private groupOpen = false;

  head(): LogPosition {
    return this.headNode;
  }

  /**
   * Close the current change group; the next entry starts a new one
   */
  closeGroup(): void {
    this.groupOpen = false;
  }

  record(entry: EditEntry): LogNode {
    if (!this.groupOpen && this.headNode) {
      this.headNode = { item: BOUNDARY, next: this.headNode };
    }
    const node: LogNode = { item: entry, next: this.headNode };
    this.headNode = node;
    this.groupOpen = true;
    return node;
  }

  /**
   * Move the head back to an earlier position, dropping everything above it
   */
  rewindTo(position: LogPosition): void {
    this.headNode = position;
    this.groupOpen = false;
  }

  /**
   * Change groups, newest first, each listing its entries newest first
   */
  groups(): EditEntry[][] {
    const groups: EditEntry[][] = [];
    let current: EditEntry[] = [];

    for (let node = this.headNode; node; node = node.next) {
      if (node.item === BOUNDARY) {
        if (current.length > 0) groups.push(current);
        current = [];
      } else {
        current.push(node.item);
      }
    }
    if (current.length > 0) groups.push(current);

    return groups;
  }
}

/**
 * Entries of the group starting at `position`
 */
export function groupEntries(position: LogPosition): EditEntry[] {
  const entries: EditEntry[] = [];
  let current = position;
  while (current && current.item !== BOUNDARY) {
    entries.push(current.item);
    current = current.next;
  }
  return entries;
}

export function describeEntry(entry: EditEntry): string {
  if (entry.kind === 'insert') {
    return `insert [${entry.start}, ${entry.end})`;
  }
  return `delete ${JSON.stringify(entry.text)} at ${entry.position}`;
}
