#!/usr/bin/env node
/**
 * checkpoint-redo CLI - Interactive scratch editor for constrained undo/redo
 */

import * as readline from 'readline';
import { ConfigManager, toCommandsOptions } from '../config/index.js';
import { UndoRedoCommands } from '../core/commands/commands.js';
import { logger } from '../base/utils/logger.js';
import { EditorSession } from './session.js';
import { colors, printError, printHeader, printInfo, printNotice, printOutput, printSeparator } from './ui.js';

// ============================================================================
// Arguments
// ============================================================================

interface CliArgs {
  selectionUndo: boolean;
  text?: string;
}

function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { selectionUndo: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--selection-undo') {
      args.selectionUndo = true;
    } else if (arg === '--text' && i + 1 < argv.length) {
      args.text = argv[++i];
    }
  }

  return args;
}

// ============================================================================
// Main REPL
// ============================================================================

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));

  const config = new ConfigManager();
  if (args.selectionUndo) {
    config.setCliArgs({ selectionScopedUndo: true });
  }
  await config.load();
  logger.debug('CLI', config.getDebugSummary());

  const settings = config.get();
  const session = new EditorSession(new UndoRedoCommands(toCommandsOptions(settings)), { text: args.text });

  printHeader();
  printInfo(`Selection-scoped undo: ${colors.highlight(String(settings.selectionScopedUndo))}`);
  printInfo(`Working directory: ${colors.muted(config.getCwd())}`);
  printSeparator();
  printInfo('Type help for commands.');
  console.log();

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  rl.on('close', () => {
    session.close();
    console.log();
    printInfo('Goodbye!');
  });

  const prompt = (): void => {
    rl.question(colors.primary('❯ '), (input) => {
      const reply = session.execute(input);

      for (const notice of reply.notices) {
        printNotice(notice, reply.refused);
      }
      printOutput(reply.output);
      if (reply.error) {
        printError(reply.error);
      }

      if (reply.quit) {
        rl.close();
        return;
      }
      prompt();
    });
  };

  prompt();
}

main().catch((error: unknown) => {
  printError(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
