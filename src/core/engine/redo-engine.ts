/**
 * Redo Engine - Redo as a checkpoint-checked undo of the last undo
 *
 * A redo right after an undo reverts that undo's group and rewinds the log
 * past it, leaving the head where it was before the undo. Further redos in
 * the same run are recorded as new groups whose equivalence entries point at
 * the next undo group to restore. While the checkpoint is respected the walk
 * stops at the head recorded when the undo run began.
 */

import { nextGroupBoundary, samePosition, skipBoundaries } from '../history/cursor.js';
import { CommandToken, type InverseEditResult, type InverseRecording, type LogPosition } from '../history/types.js';
import type { RunClassification } from '../checkpoint/classifier.js';
import { NOTICES } from '../commands/messages.js';
import { failure, type EngineContext, type EngineOutcome } from './types.js';
import { logger } from '../../base/utils/logger.js';

export class RedoEngine {
  redo(context: EngineContext, run: RunClassification, steps: number): EngineOutcome {
    const { host, state, cursor } = context;

    // Allow crossing the checkpoint when the previous command was a cancel
    if (host.previousCommand() === CommandToken.Cancel) {
      state.disable();
      host.notify(NOTICES.redoSteppedOver);
    }

    const head = skipBoundaries(cursor.head());

    if (!cursor.isAtRedoEquivalent(head)) {
      return failure('no-undo-to-redo');
    }

    const from = cursor.redoPosition(head);
    const atCheckpoint = state.respect && samePosition(from, state.checkpoint);

    // Every undo group of the run has been restored already
    if (!atCheckpoint && !cursor.isAtRedoEquivalent(from)) {
      return failure('no-undo-to-redo');
    }

    if (state.respect) {
      if (atCheckpoint) {
        return failure('redo-end-point-hit');
      }

      const next = nextGroupBoundary(from);
      if (!cursor.isAtRedoEquivalent(next) && !samePosition(next, state.checkpoint)) {
        logger.debug('RedoEngine', 'Undo chain does not reach the checkpoint', {
          document: host.id,
          hasCheckpoint: state.checkpoint !== undefined,
        });
        return failure('redo-step-not-found');
      }
    }

    const available = cursor.countRedoAvailable(from, state.respect ? state.checkpoint : undefined, steps);
    const recording: InverseRecording = !run.wasRedo && from === head ? 'rewind' : 'append';

    logger.debug('RedoEngine', 'Redo permitted', {
      document: host.id,
      requested: steps,
      available,
      recording,
      continuing: run.wasRedo,
      ...state.snapshot(),
    });

    let result: InverseEditResult;
    try {
      result = host.applyInverseEdits({
        from,
        count: available,
        mode: state.inRegion ? 'selection' : 'linear',
        undoOnly: false,
        recording,
        step: 'redo',
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error('RedoEngine', 'Inverse edit primitive failed', { document: host.id, error: message });
      return failure('host-error', message);
    }

    host.setPendingPosition(this.resumeAfter(context, result.remaining));

    if (!result.ok) {
      return failure('no-further-undo', result.message, result.applied);
    }

    return { ok: true, steps: result.applied, inRegion: state.inRegion };
  }

  /**
   * Where a continuing undo resumes once the log has been restored to
   * `remaining`: an undo group there hands over its own pending chain.
   */
  private resumeAfter(context: EngineContext, remaining: LogPosition): LogPosition | undefined {
    const restored = context.cursor.lookupEquivalent(remaining);
    if (!restored || restored.redo) {
      return remaining;
    }
    return restored.region ? undefined : restored.pending;
  }
}
