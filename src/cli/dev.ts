/**
 * tg-relay — Developer Tools Commands
 *
 *   tg-relay dev update --kind=channel_post --text="# Hi"
 *   tg-relay dev update --post http://localhost:8000/telegram/webhook
 */

import type { Command } from 'commander';
import { InvalidArgumentError } from 'commander';
import { WEBHOOK_PATH } from '../config/defaults.js';
import { generateUpdate } from '../dev/update.js';
import { UPDATE_KINDS, type UpdateKind } from '../telegram/types.js';
import { ExitCode } from '../utils/output.js';
import { loadCliConfig, printError } from './helpers.js';

interface UpdateOptions {
  kind: UpdateKind;
  text?: string;
  caption?: boolean;
  chat?: number;
  secret?: string;
  post?: string;
  format: 'json' | 'compact' | 'curl';
}

const FORMATS = ['json', 'compact', 'curl'] as const;

// ============================================================================
// ARGUMENT PARSERS
// ============================================================================

export function parseUpdateKind(value: string): UpdateKind {
  const kind = UPDATE_KINDS.find((k) => k === value);
  if (!kind) {
    throw new InvalidArgumentError(`Expected one of: ${UPDATE_KINDS.join(', ')}.`);
  }
  return kind;
}

function parseFormat(value: string): UpdateOptions['format'] {
  const format = FORMATS.find((f) => f === value);
  if (!format) {
    throw new InvalidArgumentError(`Expected one of: ${FORMATS.join(', ')}.`);
  }
  return format;
}

function parseInteger(value: string): number {
  if (!/^-?\d+$/.test(value)) {
    throw new InvalidArgumentError('Expected an integer.');
  }
  return Number(value);
}

// ============================================================================
// REGISTER
// ============================================================================

export function registerDevCommands(program: Command): void {
  const dev = program
    .command('dev')
    .description('Developer tools for testing a relay');

  dev
    .command('update')
    .description('Generate a mock Telegram update (optionally POST it to a relay)')
    .option('--kind <kind>', `Update field (${UPDATE_KINDS.join(', ')})`, parseUpdateKind, 'message')
    .option('--text <text>', 'Message text')
    .option('--caption', 'Send the text as a media caption')
    .option('--chat <id>', 'Chat id', parseInteger)
    .option('--secret <secret>', 'Secret-token header value (default: WEBHOOK_SECRET)')
    .option('--post <url>', 'POST the update to this webhook URL')
    .option('--format <format>', 'Output format (json, compact, curl)', parseFormat, 'json')
    .action(devUpdateCommand);
}

// ============================================================================
// UPDATE
// ============================================================================

export async function devUpdateCommand(opts: UpdateOptions): Promise<void> {
  const config = loadCliConfig();
  if (!config) return;

  const event = generateUpdate({
    kind: opts.kind,
    text: opts.text,
    asCaption: opts.caption,
    chatId: opts.chat,
    secret: opts.secret ?? config.telegram.webhookSecret,
  });

  if (!opts.post) {
    switch (opts.format) {
      case 'compact':
        console.log(JSON.stringify(event.payload));
        break;
      case 'curl':
        console.log(toCurl(event.payload, event.headers, `http://localhost:${config.server.port}${WEBHOOK_PATH}`));
        break;
      default:
        console.log(JSON.stringify(event, null, 2));
    }
    return;
  }

  try {
    const response = await fetch(opts.post, {
      method: 'POST',
      headers: event.headers,
      body: JSON.stringify(event.payload),
      signal: AbortSignal.timeout(10_000),
    });
    const body = await response.text();

    console.log(`\n  ${event.description}`);
    console.log(`  POST ${opts.post}`);
    console.log(`  Status: ${response.status}`);
    console.log(`  Body: ${body}\n`);

    if (!response.ok) {
      process.exitCode = ExitCode.GENERAL_ERROR;
    }
  } catch (error) {
    printError(`Failed to POST to ${opts.post}`, error);
  }
}

/** Render a copy-pasteable curl invocation. */
export function toCurl(payload: unknown, headers: Record<string, string>, url: string): string {
  const quote = (value: string): string => `'${value.replace(/'/g, `'\\''`)}'`;
  const headerArgs = Object.entries(headers).map(([name, value]) => `-H ${quote(`${name}: ${value}`)}`);
  return ['curl', '-X POST', ...headerArgs, `-d ${quote(JSON.stringify(payload))}`, quote(url)].join(' \\\n  ');
}
