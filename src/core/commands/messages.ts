/**
 * User-facing notice text
 */

import type { EngineFailure, EngineSuccess } from '../engine/types.js';

export type CommandKind = 'undo' | 'redo';

export const NOTICES = {
  redoSteppedOver: 'Redo end-point stepped over!',
  undoSteppedOver: 'Undo end-point stepped over!',
  regionInUse: 'Undo in region in use. Undo end-point ignored!',
} as const;

export const DEFAULT_NO_FURTHER_UNDO = 'No further undo information';

function label(kind: CommandKind): string {
  return kind === 'undo' ? 'Undo' : 'Redo';
}

/**
 * "Undo", "Redo in region", "Undo (3 steps)"
 */
export function formatStep(kind: CommandKind, outcome: EngineSuccess): string {
  const region = outcome.inRegion ? ' in region' : '';
  const count = outcome.steps > 1 ? ` (${outcome.steps} steps)` : '';
  return `${label(kind)}${region}${count}`;
}

export function formatFailure(kind: CommandKind, outcome: EngineFailure): string {
  switch (outcome.failure) {
    case 'no-undo-to-redo':
      return 'No undo to redo';
    case 'redo-step-not-found':
      return 'Redo step not found';
    case 'redo-end-point-hit':
      return 'Redo end-point hit';
    case 'no-further-undo':
      return outcome.detail ?? DEFAULT_NO_FURTHER_UNDO;
    case 'invalid-step-count':
      return `${label(kind)}: invalid step count ${outcome.detail ?? ''}`.trimEnd();
    case 'host-error':
      return `${label(kind)} failed: ${outcome.detail ?? 'unknown error'}`;
  }
}
