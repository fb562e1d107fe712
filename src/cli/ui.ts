/**
 * CLI UI - Terminal output for the scratch editor
 */

import chalk from 'chalk';

// ============================================================================
// Colors & Styles
// ============================================================================

export const colors = {
  primary: chalk.cyan,
  secondary: chalk.gray,
  success: chalk.green,
  error: chalk.red,
  warning: chalk.yellow,
  info: chalk.blue,
  muted: chalk.dim,
  highlight: chalk.bold.white,
};

// ============================================================================
// Headers & Separators
// ============================================================================

export function printHeader(): void {
  const logo = `
  ${chalk.cyan('╭─────────────────────────────────────╮')}
  ${chalk.cyan('│')}  ${chalk.bold.white('checkpoint-redo')} ${chalk.dim('- scratch editor')}  ${chalk.cyan('│')}
  ${chalk.cyan('╰─────────────────────────────────────╯')}
`;
  console.log(logo);
}

export function printSeparator(): void {
  const width = process.stdout.columns || 80;
  console.log(colors.muted('─'.repeat(Math.min(width - 2, 60))));
}

// ============================================================================
// Messages
// ============================================================================

/**
 * Notices raised by undo/redo; refusals are highlighted
 */
export function printNotice(message: string, refused: boolean): void {
  const marker = refused ? colors.warning('! ') : colors.success('✓ ');
  console.log(marker + message);
}

export function printOutput(lines: string[]): void {
  for (const line of lines) {
    console.log(colors.muted('  │ ') + line);
  }
}

export function printError(message: string): void {
  console.log(colors.error('✗ Error: ') + message);
}

export function printInfo(message: string): void {
  console.log(colors.info('ℹ ') + message);
}
