/**
 * tg-relay — Format Command
 *
 * Converts text to MarkdownV2 without sending it. Reads the argument, or
 * stdin when no argument is given.
 */

import type { Command } from 'commander';
import { formatMarkdownV2 } from '../formatter/index.js';
import { printResult } from '../utils/output.js';
import { printError, readStdin } from './helpers.js';

export function registerFormatCommand(program: Command): void {
  program
    .command('format')
    .description('Convert Markdown to Telegram MarkdownV2 and print it')
    .argument('[text]', 'Text to format (reads stdin if omitted)')
    .action(formatCommand);
}

export async function formatCommand(text: string | undefined): Promise<void> {
  let input: string;
  try {
    input = text ?? (await readStdin());
  } catch (error) {
    printError('Failed to read input', error);
    return;
  }

  const output = formatMarkdownV2(input);

  printResult({ input, output }, () => {
    process.stdout.write(output.endsWith('\n') ? output : output + '\n');
  });
}
