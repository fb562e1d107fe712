/**
 * Editor Session - Line commands driving one MemoryDocument
 *
 * Kept free of terminal I/O so the REPL and tests share it.
 */

import { CommandToken } from '../core/history/types.js';
import type { UndoRedoCommands } from '../core/commands/commands.js';
import type { EngineOutcome } from '../core/engine/types.js';
import { MemoryDocument } from '../host/memory-document.js';
import { describeEntry } from '../host/edit-log.js';

export interface SessionReply {
  /** Notices the command raised, in order */
  notices: string[];
  /** The undo/redo command was refused */
  refused: boolean;
  /** Informational output (show, log, help) */
  output: string[];
  error?: string;
  quit?: boolean;
}

export const HELP_LINES: ReadonlyArray<readonly [string, string]> = [
  ['insert <pos> <text>', 'Insert text at a position'],
  ['append <text>', 'Append text at the end'],
  ['delete <start> <end>', 'Delete the range [start, end)'],
  ['select <start> <end>', 'Select the range [start, end)'],
  ['deselect', 'Clear the selection'],
  ['undo [n]', 'Undo, recording the redo end-point'],
  ['redo [n]', 'Redo up to the end-point'],
  ['redo-all', 'Redo everything up to the end-point'],
  ['plain-undo [n]', 'Unconstrained undo'],
  ['cancel', 'Allow the next undo/redo run to cross the end-point'],
  ['move', 'An unrelated command; ends the undo/redo run'],
  ['show', 'Show text, selection and checkpoint state'],
  ['log', 'Show the change groups, newest first'],
  ['help', 'Show this help'],
  ['quit', 'Exit'],
];

function parseInteger(value: string | undefined): number | undefined {
  if (value === undefined || !/^-?\d+$/.test(value)) {
    return undefined;
  }
  return Number(value);
}

/**
 * Optional step count; anything unparsable is passed through as NaN so the
 * command reports it
 */
function parseSteps(args: string): number {
  return args === '' ? 1 : Number(args);
}

export class EditorSession {
  readonly document: MemoryDocument;
  private notices: string[] = [];

  constructor(private readonly commands: UndoRedoCommands, options: { text?: string; id?: string } = {}) {
    this.document = new MemoryDocument({
      id: options.id,
      text: options.text,
      onNotify: (message) => this.notices.push(message),
    });
  }

  execute(line: string): SessionReply {
    this.notices = [];
    const match = /^(\S+)(?:\s(.*))?$/.exec(line.trim());
    if (!match) {
      return this.reply();
    }

    const command = match[1].toLowerCase();
    const args = match[2] ?? '';

    try {
      return this.dispatch(command, args);
    } catch (error) {
      if (error instanceof RangeError) {
        return this.reply({ error: error.message });
      }
      throw error;
    }
  }

  close(): void {
    this.commands.documentClosed(this.document.id);
  }

  private dispatch(command: string, args: string): SessionReply {
    const doc = this.document;

    switch (command) {
      case 'insert': {
        const parts = /^(\S+)\s(.*)$/.exec(args);
        const position = parseInteger(parts?.[1]);
        if (!parts || position === undefined) {
          return this.reply({ error: 'Usage: insert <pos> <text>' });
        }
        doc.insert(position, parts[2]);
        return this.reply();
      }

      case 'append':
        doc.append(args);
        return this.reply();

      case 'delete':
      case 'select': {
        const [start, end] = args.split(/\s+/).map(parseInteger);
        if (start === undefined || end === undefined) {
          return this.reply({ error: `Usage: ${command} <start> <end>` });
        }
        if (command === 'delete') {
          doc.delete(start, end);
        } else {
          doc.select(start, end);
        }
        return this.reply();
      }

      case 'deselect':
        doc.deselect();
        return this.reply();

      case 'undo':
        return this.fromOutcome(doc.runCommand(CommandToken.Other, () => this.commands.undo(doc, parseSteps(args))));

      case 'redo':
        return this.fromOutcome(doc.runCommand(CommandToken.Other, () => this.commands.redo(doc, parseSteps(args))));

      case 'redo-all':
        return this.fromOutcome(doc.runCommand(CommandToken.Other, () => this.commands.redoAll(doc)));

      case 'plain-undo': {
        const steps = parseSteps(args);
        if (!Number.isInteger(steps) || steps < 1) {
          return this.reply({ error: `plain-undo: invalid step count ${args}` });
        }
        const result = doc.plainUndo(steps);
        return this.reply({ refused: !result.ok });
      }

      case 'cancel':
        doc.cancel();
        return this.reply();

      case 'move':
        doc.move();
        return this.reply();

      case 'show':
        return this.reply({ output: this.show() });

      case 'log':
        return this.reply({ output: this.log() });

      case 'help':
        return this.reply({ output: HELP_LINES.map(([usage, text]) => `${usage.padEnd(22)}${text}`) });

      case 'quit':
      case 'exit':
        return this.reply({ quit: true });

      default:
        return this.reply({ error: `Unknown command: ${command}. Type help for available commands.` });
    }
  }

  private show(): string[] {
    const selection = this.document.getSelection();
    const state = this.commands.stateOf(this.document.id);

    return [
      `text: ${JSON.stringify(this.document.text())}`,
      `selection: ${selection ? `[${selection.start}, ${selection.end})` : 'none'}`,
      `checkpoint: respect=${state.respect} inRegion=${state.inRegion} set=${state.hasCheckpoint}`,
    ];
  }

  private log(): string[] {
    const groups = this.document.historyGroups();
    if (groups.length === 0) {
      return ['(empty)'];
    }
    return groups.map((entries, index) => `${index + 1}. ${entries.map(describeEntry).join(', ')}`);
  }

  private fromOutcome(outcome: EngineOutcome): SessionReply {
    return this.reply({ refused: !outcome.ok });
  }

  private reply(fields: Partial<SessionReply> = {}): SessionReply {
    return { notices: this.notices, refused: false, output: [], ...fields };
  }
}
