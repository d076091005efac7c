/**
 * tg-relay — Send Command
 *
 * Formats text and delivers it to one chat through the Bot API, the same
 * way the relay delivers inbound messages.
 */

import type { Command } from 'commander';
import { formatMarkdownV2 } from '../formatter/index.js';
import { TelegramClient } from '../telegram/client.js';
import { deliverFormatted } from '../telegram/outbound.js';
import { ExitCode, printErrorResult, printResult } from '../utils/output.js';
import { loadCliConfig, parseChatId, printError, readStdin, requireSettings } from './helpers.js';

interface SendOptions {
  preview?: boolean;
}

export function registerSendCommand(program: Command): void {
  program
    .command('send')
    .description('Format a message and send it to a chat')
    .argument('<chatId>', 'Numeric chat id or @channelusername')
    .argument('[text]', 'Text to send (reads stdin if omitted)')
    .option('--no-preview', 'Disable link previews')
    .action(sendCommand);
}

export async function sendCommand(
  chatIdArg: string,
  text: string | undefined,
  opts: SendOptions
): Promise<void> {
  const chatId = parseChatId(chatIdArg);
  if (chatId === null) {
    printErrorResult({
      code: 'INVALID_CHAT_ID',
      message: `Invalid chat id "${chatIdArg}".`,
      suggestion: 'Use a numeric id (e.g. -1001234567890) or @channelusername.',
    });
    process.exitCode = ExitCode.USAGE_ERROR;
    return;
  }

  const config = loadCliConfig();
  if (!config) return;
  if (!requireSettings(config, ['BOT_TOKEN'])) return;
  const { botToken } = config.telegram;
  if (!botToken) return;

  let input: string;
  try {
    input = text ?? (await readStdin());
  } catch (error) {
    printError('Failed to read input', error);
    return;
  }

  const formatted = formatMarkdownV2(input);
  const client = new TelegramClient({ ...config.telegram, botToken });

  const ora = (await import('ora')).default;
  const spinner = ora({ text: 'Sending...', stream: process.stderr }).start();

  const result = await deliverFormatted(client, chatId, formatted, {
    disableLinkPreview: opts.preview === false,
  });
  spinner.stop();

  if (!result.success) {
    printErrorResult({
      code: 'SEND_FAILED',
      message: `Telegram rejected the message: ${result.error}`,
      suggestion: result.errorCode === 400
        ? `Check the chat id, or preview the output with \`tg-relay format\`.`
        : undefined,
    });
    process.exitCode = ExitCode.GENERAL_ERROR;
    return;
  }

  printResult({ chatId, messageId: result.messageId, text: formatted }, () => {
    process.stderr.write(`\n  Sent message ${result.messageId} to ${chatId}.\n\n`);
  });
}
