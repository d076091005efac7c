/**
 * tg-relay — Webhook Commands
 *
 * Manage the bot's webhook registration:
 *   tg-relay webhook set [baseUrl]
 *   tg-relay webhook info
 *   tg-relay webhook delete
 */

import type { ChalkInstance } from 'chalk';
import type { Command } from 'commander';
import { WEBHOOK_PATH } from '../config/defaults.js';
import type { RequiredSetting } from '../config/loader.js';
import type { RelayConfig } from '../config/types.js';
import { TelegramClient } from '../telegram/client.js';
import { UPDATE_KINDS, type WebhookInfo } from '../telegram/types.js';
import { ExitCode, printErrorResult, printResult, printSuccess } from '../utils/output.js';
import { loadCliConfig, printError, requireSettings } from './helpers.js';

interface SetOptions {
  dropPending?: boolean;
}

interface DeleteOptions {
  dropPending?: boolean;
}

// ============================================================================
// REGISTER
// ============================================================================

export function registerWebhookCommands(program: Command): void {
  const webhook = program
    .command('webhook')
    .description('Manage the bot webhook registration');

  webhook
    .command('set')
    .description(`Register {baseUrl}${WEBHOOK_PATH} as the bot webhook`)
    .argument('[baseUrl]', 'Public base URL of the relay (default: BASE_URL)')
    .option('--drop-pending', 'Drop updates queued while no webhook was set')
    .action(webhookSetCommand);

  webhook
    .command('info')
    .description('Show the current webhook registration')
    .action(webhookInfoCommand);

  webhook
    .command('delete')
    .description('Remove the webhook registration')
    .option('--drop-pending', 'Drop queued updates as well')
    .action(webhookDeleteCommand);
}

// ============================================================================
// HELPERS
// ============================================================================

/** `https://relay.example.com/` → `https://relay.example.com/telegram/webhook` */
export function buildWebhookUrl(baseUrl: string): string {
  return baseUrl.replace(/\/+$/, '') + WEBHOOK_PATH;
}

function createClient(config: RelayConfig): TelegramClient | null {
  const { botToken } = config.telegram;
  if (!botToken) return null;
  return new TelegramClient({ ...config.telegram, botToken });
}

// ============================================================================
// SET
// ============================================================================

export async function webhookSetCommand(baseUrlArg: string | undefined, opts: SetOptions): Promise<void> {
  const config = loadCliConfig();
  if (!config) return;

  const required: RequiredSetting[] = baseUrlArg
    ? ['BOT_TOKEN', 'WEBHOOK_SECRET']
    : ['BOT_TOKEN', 'WEBHOOK_SECRET', 'BASE_URL'];
  if (!requireSettings(config, required)) return;

  const baseUrl = baseUrlArg ?? config.server.baseUrl;
  const secret = config.telegram.webhookSecret;
  const client = createClient(config);
  if (!baseUrl || !secret || !client) return;

  if (!URL.canParse(baseUrl)) {
    printErrorResult({
      code: 'INVALID_URL',
      message: `Invalid base URL "${baseUrl}".`,
      suggestion: 'Pass an absolute https:// URL.',
    });
    process.exitCode = ExitCode.USAGE_ERROR;
    return;
  }

  const url = buildWebhookUrl(baseUrl);

  const ora = (await import('ora')).default;
  const spinner = ora({ text: 'Registering webhook...', stream: process.stderr }).start();

  try {
    await client.setWebhook(url, secret, {
      dropPendingUpdates: opts.dropPending,
      allowedUpdates: [...UPDATE_KINDS],
    });
    spinner.stop();

    printResult({ url, registered: true }, () => {
      printSuccess(`Webhook set to ${url}`);
    });
  } catch (error) {
    spinner.stop();
    printError('Failed to set webhook', error);
  }
}

// ============================================================================
// INFO
// ============================================================================

export async function webhookInfoCommand(): Promise<void> {
  const config = loadCliConfig();
  if (!config) return;
  if (!requireSettings(config, ['BOT_TOKEN'])) return;
  const client = createClient(config);
  if (!client) return;

  try {
    const info = await client.getWebhookInfo();
    const chalk = (await import('chalk')).default;

    printResult(info, () => printWebhookInfo(info, chalk));
  } catch (error) {
    printError('Failed to fetch webhook info', error);
  }
}

function printWebhookInfo(info: WebhookInfo, chalk: ChalkInstance): void {
  console.log();
  console.log(chalk.bold.cyan('  Webhook'));
  console.log();
  console.log(chalk.gray('  URL:           ') + (info.url ? info.url : chalk.yellow('not set')));
  console.log(chalk.gray('  Pending:       ') + info.pending_update_count);
  if (info.ip_address) {
    console.log(chalk.gray('  IP address:    ') + info.ip_address);
  }
  if (info.max_connections !== undefined) {
    console.log(chalk.gray('  Connections:   ') + info.max_connections);
  }
  if (info.allowed_updates) {
    console.log(chalk.gray('  Updates:       ') + info.allowed_updates.join(', '));
  }
  if (info.last_error_message) {
    const when = info.last_error_date
      ? ` (${new Date(info.last_error_date * 1000).toISOString()})`
      : '';
    console.log(chalk.gray('  Last error:    ') + chalk.red(info.last_error_message) + when);
  }
  console.log();
}

// ============================================================================
// DELETE
// ============================================================================

export async function webhookDeleteCommand(opts: DeleteOptions): Promise<void> {
  const config = loadCliConfig();
  if (!config) return;
  if (!requireSettings(config, ['BOT_TOKEN'])) return;
  const client = createClient(config);
  if (!client) return;

  try {
    await client.deleteWebhook(opts.dropPending === true);
    printResult({ deleted: true }, () => {
      printSuccess('Webhook removed.');
    });
  } catch (error) {
    printError('Failed to delete webhook', error);
  }
}
