/**
 * Undo/Redo Commands - The user-invocable entry points
 *
 * Usage:
 *   const commands = new UndoRedoCommands({ selectionScopedUndo: true });
 *   commands.undo(document);
 *   commands.redo(document, 2);
 *   commands.redoAll(document);
 */

import { CheckpointState, CheckpointStore } from '../checkpoint/state.js';
import { classifyRun } from '../checkpoint/classifier.js';
import { HistoryCursor } from '../history/cursor.js';
import { CommandToken, type UndoHost } from '../history/types.js';
import { RedoEngine } from '../engine/redo-engine.js';
import { UndoEngine } from '../engine/undo-engine.js';
import { failure, type EngineOutcome } from '../engine/types.js';
import { formatFailure, formatStep, type CommandKind } from './messages.js';
import { logger } from '../../base/utils/logger.js';

export interface CommandsOptions {
  /** Scope undo to an active selection instead of clearing it */
  selectionScopedUndo: boolean;
  /** Step count requested by redoAll */
  redoAllLimit: number;
  /** Confirm successful steps with a notice ("Undo", "Redo in region") */
  confirmSteps: boolean;
}

export const DEFAULT_COMMANDS_OPTIONS: CommandsOptions = {
  selectionScopedUndo: false,
  redoAllLimit: Number.MAX_SAFE_INTEGER,
  confirmSteps: true,
};

export class UndoRedoCommands {
  private readonly options: CommandsOptions;
  private readonly store = new CheckpointStore();
  private readonly undoEngine: UndoEngine;
  private readonly redoEngine = new RedoEngine();

  constructor(options: Partial<CommandsOptions> = {}) {
    this.options = { ...DEFAULT_COMMANDS_OPTIONS, ...options };
    this.undoEngine = new UndoEngine({ selectionScopedUndo: this.options.selectionScopedUndo });
  }

  undo(host: UndoHost, steps = 1): EngineOutcome {
    return this.invoke('undo', host, steps);
  }

  redo(host: UndoHost, steps = 1): EngineOutcome {
    return this.invoke('redo', host, steps);
  }

  /**
   * Redo as far as the checkpoint allows
   */
  redoAll(host: UndoHost): EngineOutcome {
    return this.invoke('redo', host, this.options.redoAllLimit);
  }

  /**
   * Drop the document's checkpoint state
   */
  documentClosed(documentId: string): void {
    this.store.release(documentId);
  }

  /**
   * Current flags for a document (for status display and tests). Unknown or
   * closed documents report the initial flags without gaining state.
   */
  stateOf(documentId: string): { respect: boolean; inRegion: boolean; hasCheckpoint: boolean } {
    return (this.store.find(documentId) ?? new CheckpointState()).snapshot();
  }

  /**
   * Number of documents holding checkpoint state
   */
  trackedDocuments(): number {
    return this.store.size();
  }

  getOptions(): Readonly<CommandsOptions> {
    return this.options;
  }

  private invoke(kind: CommandKind, host: UndoHost, steps: number): EngineOutcome {
    if (!Number.isInteger(steps) || steps < 1) {
      const outcome = failure('invalid-step-count', String(steps));
      host.notify(formatFailure(kind, outcome));
      // Nothing ran, so the run continues (or not) exactly as before
      host.setCommandIdentity(host.previousCommand());
      return outcome;
    }

    try {
      const state = this.store.get(host.id);
      const run = classifyRun(host.previousCommand(), state, this.options.selectionScopedUndo);
      const context = { host, state, cursor: new HistoryCursor(host) };

      const outcome =
        kind === 'undo'
          ? this.undoEngine.undo(context, run, steps)
          : this.redoEngine.redo(context, run, steps);

      this.report(kind, host, outcome);
      host.setCommandIdentity(kind === 'undo' ? CommandToken.ConstrainedUndo : CommandToken.ConstrainedRedo);
      return outcome;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error('Commands', `${kind} aborted`, { document: host.id, error: message });

      const outcome = failure('host-error', message);
      host.notify(formatFailure(kind, outcome));
      host.setCommandIdentity(CommandToken.Other);
      return outcome;
    }
  }

  private report(kind: CommandKind, host: UndoHost, outcome: EngineOutcome): void {
    if (outcome.ok) {
      if (this.options.confirmSteps) {
        host.notify(formatStep(kind, outcome));
      }
      return;
    }

    logger.debug('Commands', `${kind} refused`, { document: host.id, failure: outcome.failure });
    host.notify(formatFailure(kind, outcome));
  }
}
