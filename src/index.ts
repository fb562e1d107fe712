/**
 * checkpoint-redo - Checkpoint-constrained undo/redo over an append-only edit log
 */

// Commands
export { UndoRedoCommands, DEFAULT_COMMANDS_OPTIONS, type CommandsOptions } from './core/commands/commands.js';
export { NOTICES, DEFAULT_NO_FURTHER_UNDO, formatFailure, formatStep, type CommandKind } from './core/commands/messages.js';

// Engines
export { UndoEngine } from './core/engine/undo-engine.js';
export { RedoEngine } from './core/engine/redo-engine.js';
export type {
  EngineContext,
  EngineFailure,
  EngineOptions,
  EngineOutcome,
  EngineSuccess,
  FailureKind,
} from './core/engine/types.js';

// Checkpoint state
export { CheckpointState, CheckpointStore } from './core/checkpoint/state.js';
export { classifyRun, isUndoToken, type RunClassification } from './core/checkpoint/classifier.js';

// History
export { HistoryCursor, skipBoundaries, nextGroupBoundary, samePosition } from './core/history/cursor.js';
export {
  BOUNDARY,
  CommandToken,
  type Boundary,
  type DeleteEntry,
  type EditEntry,
  type Equivalent,
  type InsertEntry,
  type InverseEditRequest,
  type InverseEditResult,
  type InverseRecording,
  type LogNode,
  type LogPosition,
  type UndoHost,
  type UndoMode,
} from './core/history/types.js';

// Reference host
export { MemoryDocument, NO_FURTHER_UNDO_IN_REGION, type MemoryDocumentOptions, type Selection } from './host/memory-document.js';
export { EditLog, groupEntries, describeEntry } from './host/edit-log.js';

// Configuration
export { ConfigManager, toCommandsOptions, type ResolvedSettings, type Settings } from './config/index.js';

// Logging
export { logger, LogLevel } from './base/utils/logger.js';
