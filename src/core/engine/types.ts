/**
 * Engine Types - Outcomes shared by the undo and redo engines
 */

import type { CheckpointState } from '../checkpoint/state.js';
import type { HistoryCursor } from '../history/cursor.js';
import type { UndoHost } from '../history/types.js';

export type FailureKind =
  | 'no-undo-to-redo'
  | 'redo-step-not-found'
  | 'redo-end-point-hit'
  | 'no-further-undo'
  | 'invalid-step-count'
  | 'host-error';

export interface EngineFailure {
  ok: false;
  failure: FailureKind;
  /** Host-provided text, or the offending value */
  detail?: string;
  /** Groups reverted before the failure */
  applied: number;
}

export interface EngineSuccess {
  ok: true;
  steps: number;
  inRegion: boolean;
}

export type EngineOutcome = EngineSuccess | EngineFailure;

export interface EngineContext {
  host: UndoHost;
  state: CheckpointState;
  cursor: HistoryCursor;
}

export interface EngineOptions {
  selectionScopedUndo: boolean;
}

export function failure(kind: FailureKind, detail?: string, applied = 0): EngineFailure {
  return detail === undefined ? { ok: false, failure: kind, applied } : { ok: false, failure: kind, detail, applied };
}
