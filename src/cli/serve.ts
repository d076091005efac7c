/**
 * tg-relay — Serve Command
 *
 * Runs the webhook server in the foreground until SIGINT/SIGTERM, then
 * stops accepting requests and waits for in-flight forwards.
 */

import type { Command } from 'commander';
import { HEALTH_PATH, WEBHOOK_PATH } from '../config/defaults.js';
import { asConfiguredRelay } from '../config/loader.js';
import { startRelay, type RunningRelay } from '../relay/app.js';
import { createLogger } from '../utils/logger.js';
import { ExitCode } from '../utils/output.js';
import { loadCliConfig, parsePort, printError, requireSettings } from './helpers.js';

const log = createLogger('Serve');

interface ServeOptions {
  port?: number;
  host?: string;
}

export function registerServeCommand(program: Command): void {
  program
    .command('serve')
    .description('Run the webhook server')
    .option('-p, --port <port>', 'Port to listen on (default: PORT or 8000)', parsePort)
    .option('--host <host>', 'Interface to bind (default: HOST or 0.0.0.0)')
    .action(serveCommand);
}

export async function serveCommand(opts: ServeOptions): Promise<void> {
  const config = loadCliConfig();
  if (!config) return;
  if (!requireSettings(config, ['BOT_TOKEN', 'WEBHOOK_SECRET'])) return;

  const configured = asConfiguredRelay(config);
  if (!configured) return;

  let relay: RunningRelay;
  try {
    relay = await startRelay(configured, { port: opts.port, host: opts.host });
  } catch (error) {
    printError('Failed to start server', error);
    return;
  }

  const { address, port } = relay.address;
  log.info('Listening', { address, port, webhook: WEBHOOK_PATH, health: HEALTH_PATH });
  if (configured.relay.logChatId !== undefined) {
    log.info('Copying messages to log chat', { chatId: configured.relay.logChatId });
  }

  let stopping = false;
  const shutdown = (signal: NodeJS.Signals): void => {
    if (stopping) return;
    stopping = true;
    log.info('Shutting down', { signal, pending: relay.server.pending });

    relay.stop().then(
      () => {
        log.info('Stopped');
        process.exitCode = signal === 'SIGINT' ? ExitCode.SIGINT : ExitCode.SUCCESS;
      },
      (error: unknown) => {
        log.error('Shutdown failed', error instanceof Error ? error : { error: String(error) });
        process.exitCode = ExitCode.GENERAL_ERROR;
      }
    );
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}
