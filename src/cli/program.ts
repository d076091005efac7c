/**
 * tg-relay — Program Definition
 *
 * Commander-based CLI: the webhook server plus the tools around it.
 */

import { Command } from 'commander';
import { CLI_NAME, VERSION_STRING } from '../config/defaults.js';
import { ExitCode } from '../utils/output.js';
import { registerDevCommands } from './dev.js';
import { registerFormatCommand } from './format.js';
import { applyGlobalOptions } from './global-options.js';
import { didYouMean } from './helpers.js';
import { registerSendCommand } from './send.js';
import { registerServeCommand } from './serve.js';
import { registerWebhookCommands } from './webhook.js';

export function createProgram(): Command {
  const program = new Command();

  program
    .name(CLI_NAME)
    .description('Relay Telegram messages through a Markdown → MarkdownV2 formatter')
    .version(VERSION_STRING, '-V, --version', 'Show version information');

  // ── Global Options ────────────────────────────────────────────────────

  applyGlobalOptions(program);

  // ── Server ────────────────────────────────────────────────────────────

  registerServeCommand(program);

  // ── Formatting & Sending ──────────────────────────────────────────────

  registerFormatCommand(program);
  registerSendCommand(program);

  // ── Webhook Registration ──────────────────────────────────────────────

  registerWebhookCommands(program);

  // ── Developer Tools ───────────────────────────────────────────────────

  registerDevCommands(program);

  // ── Unknown Command Handler (did you mean?) ───────────────────────────

  program.on('command:*', (operands: string[]) => {
    const unknown = operands[0];
    const commands = program.commands.map((c) => c.name());
    const suggestion = didYouMean(unknown, commands);

    process.stderr.write(`\n  Error: Unknown command "${unknown}".`);
    if (suggestion) {
      process.stderr.write(` Did you mean "${suggestion}"?`);
    }
    process.stderr.write(`\n  Run \`${CLI_NAME} --help\` for available commands.\n\n`);
    process.exitCode = ExitCode.USAGE_ERROR;
  });

  return program;
}
