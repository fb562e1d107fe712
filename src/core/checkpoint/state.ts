/**
 * Checkpoint State - Per-document flags for the constrained undo/redo run
 */

import type { LogPosition } from '../history/types.js';
import { logger } from '../../base/utils/logger.js';

export class CheckpointState {
  /** Checkpoint boundary is enforced */
  respect = true;

  /** The active undo run is scoped to a selection */
  inRegion = false;

  /** Log head when the current constrained undo run started */
  checkpoint: LogPosition | undefined = undefined;

  /**
   * Disable enforcement for the rest of the continuous run
   */
  disable(): void {
    this.respect = false;
    this.inRegion = false;
  }

  reset(): void {
    this.respect = true;
    this.inRegion = false;
    this.checkpoint = undefined;
  }

  snapshot(): { respect: boolean; inRegion: boolean; hasCheckpoint: boolean } {
    return {
      respect: this.respect,
      inRegion: this.inRegion,
      hasCheckpoint: this.checkpoint !== undefined,
    };
  }
}

/**
 * Owns one CheckpointState per open document.
 * State is created on first use and dropped when the document closes.
 */
export class CheckpointStore {
  private states = new Map<string, CheckpointState>();

  get(documentId: string): CheckpointState {
    let state = this.states.get(documentId);
    if (!state) {
      state = new CheckpointState();
      this.states.set(documentId, state);
      logger.debug('Checkpoint', 'Created state', { documentId });
    }
    return state;
  }

  /**
   * Existing state only; never creates one
   */
  find(documentId: string): CheckpointState | undefined {
    return this.states.get(documentId);
  }

  has(documentId: string): boolean {
    return this.states.has(documentId);
  }

  release(documentId: string): void {
    if (this.states.delete(documentId)) {
      logger.debug('Checkpoint', 'Released state', { documentId });
    }
  }

  size(): number {
    return this.states.size;
  }
}
