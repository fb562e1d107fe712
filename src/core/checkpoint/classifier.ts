/**
 * Run Classifier - Decide whether a call continues the current undo/redo run
 */

import { CommandToken } from '../history/types.js';
import type { CheckpointState } from './state.js';
import { logger } from '../../base/utils/logger.js';

export interface RunClassification {
  wasUndo: boolean;
  wasRedo: boolean;
}

export function isUndoToken(token: CommandToken): boolean {
  return token === CommandToken.PlainUndo || token === CommandToken.ConstrainedUndo;
}

/**
 * Classify the call from the previous command's identity.
 *
 * An unrelated command between two calls re-enables enforcement, so an
 * override only lasts for one continuous run.
 */
export function classifyRun(
  previous: CommandToken,
  state: CheckpointState,
  selectionScopedUndo: boolean
): RunClassification {
  const wasUndo = isUndoToken(previous);
  const wasRedo = previous === CommandToken.ConstrainedRedo;

  if (!state.respect && !wasUndo && !wasRedo) {
    if (selectionScopedUndo) {
      state.inRegion = false;
    }
    state.respect = true;
    logger.debug('Classifier', 'Enforcement restored', { previous });
  }

  return { wasUndo, wasRedo };
}
