/**
 * tg-relay — Relay Composition
 *
 * Wires config → Telegram client → forwarder → webhook server.
 */

import type { AddressInfo } from 'node:net';
import type { ConfiguredRelay } from '../config/loader.js';
import { WebhookServer } from '../server/webhook-server.js';
import { TelegramClient } from '../telegram/client.js';
import type { MessageSender } from '../telegram/types.js';
import { Forwarder } from './forwarder.js';

export interface StartRelayOptions {
  /** Replaces the Bot API client (tests, dry runs). */
  sender?: MessageSender;
  port?: number;
  host?: string;
}

export interface RunningRelay {
  server: WebhookServer;
  forwarder: Forwarder;
  address: AddressInfo;
  stop(): Promise<void>;
}

export async function startRelay(
  config: ConfiguredRelay,
  options: StartRelayOptions = {}
): Promise<RunningRelay> {
  const sender = options.sender ?? new TelegramClient(config.telegram);
  const forwarder = new Forwarder({ sender, logChatId: config.relay.logChatId });

  const server = new WebhookServer({
    secret: config.telegram.webhookSecret,
    maxBodyBytes: config.server.maxBodyBytes,
    onUpdate: (update) => forwarder.forwardUpdate(update),
  });

  const address = await server.listen(
    options.port ?? config.server.port,
    options.host ?? config.server.host
  );

  return {
    server,
    forwarder,
    address,
    stop: () => server.close(),
  };
}
