/**
 * Undo Engine - Selection-aware undo that records the checkpoint
 */

import { skipBoundaries } from '../history/cursor.js';
import { CommandToken, type InverseEditResult, type LogPosition, type UndoMode } from '../history/types.js';
import type { RunClassification } from '../checkpoint/classifier.js';
import { NOTICES } from '../commands/messages.js';
import { failure, type EngineContext, type EngineOptions, type EngineOutcome } from './types.js';
import { logger } from '../../base/utils/logger.js';

export class UndoEngine {
  constructor(private readonly options: EngineOptions) {}

  undo(context: EngineContext, run: RunClassification, steps: number): EngineOutcome {
    const { host, state, cursor } = context;

    if (host.previousCommand() === CommandToken.Cancel) {
      state.disable();
      host.notify(NOTICES.undoSteppedOver);
    }

    if (host.hasActiveSelection()) {
      if (this.options.selectionScopedUndo) {
        host.notify(NOTICES.regionInUse);
        state.disable();
        state.inRegion = true;
      } else {
        host.clearSelection();
      }
    }

    const continuing = run.wasUndo || run.wasRedo;
    const head = cursor.head();

    if (!continuing) {
      state.checkpoint = skipBoundaries(head);
    }

    const from = continuing ? this.resumePosition(context, head) : head;
    const mode: UndoMode = state.inRegion ? 'selection' : 'linear';

    logger.debug('UndoEngine', 'Undo', {
      document: host.id,
      steps,
      mode,
      continuing,
      ...state.snapshot(),
    });

    let result: InverseEditResult;
    try {
      result = host.applyInverseEdits({
        from,
        count: steps,
        mode,
        undoOnly: mode === 'linear' && state.respect,
        recording: 'append',
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error('UndoEngine', 'Inverse edit primitive failed', { document: host.id, error: message });
      return failure('host-error', message);
    }

    host.setPendingPosition(result.remaining);

    if (!result.ok) {
      return failure('no-further-undo', result.message, result.applied);
    }

    return { ok: true, steps: result.applied, inRegion: state.inRegion };
  }

  /**
   * A continuing run picks up the host's pending chain; without one it
   * starts over at the head.
   */
  private resumePosition(context: EngineContext, head: LogPosition): LogPosition {
    const pending = context.host.pendingPosition();
    return pending === undefined ? head : pending;
  }
}
