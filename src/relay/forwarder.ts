/**
 * tg-relay — Forwarder
 *
 * Formats an inbound message once and delivers the result to the chat it
 * came from and, when configured, to the logging chat. The two deliveries
 * are independent: one failing does not stop the other.
 */

import type { ChatId } from '../config/types.js';
import { formatMarkdownV2 } from '../formatter/index.js';
import { extractChatId, extractText, normalizeUpdate } from '../telegram/inbound.js';
import { deliverFormatted } from '../telegram/outbound.js';
import type { InboundMessage, MessageSender, TelegramUpdate } from '../telegram/types.js';
import { createLogger } from '../utils/logger.js';
import type { Delivery, ForwardResult } from './types.js';

const log = createLogger('Forwarder');

export interface ForwarderOptions {
  sender: MessageSender;
  /** Copy every formatted message here too. */
  logChatId?: ChatId;
  /** Defaults to MarkdownV2 conversion. */
  format?: (text: string) => string;
}

export class Forwarder {
  private readonly sender: MessageSender;
  private readonly logChatId?: ChatId;
  private readonly format: (text: string) => string;

  constructor(options: ForwarderOptions) {
    this.sender = options.sender;
    this.logChatId = options.logChatId;
    this.format = options.format ?? formatMarkdownV2;
  }

  async forwardUpdate(update: TelegramUpdate): Promise<ForwardResult> {
    const inbound = normalizeUpdate(update);
    if (!inbound) {
      const reason = extractText(update) ? 'no-chat' : 'no-text';
      log.debug('Nothing to forward', { updateId: update.update_id, reason });
      return { handled: false, reason };
    }
    return this.forwardMessage(inbound);
  }

  async forwardMessage(inbound: InboundMessage): Promise<ForwardResult> {
    const formatted = this.format(inbound.text);

    const targets: Array<Pick<Delivery, 'target' | 'chatId'>> = [
      { target: 'origin', chatId: inbound.chatId },
    ];
    if (this.logChatId !== undefined && String(this.logChatId) !== String(inbound.chatId)) {
      targets.push({ target: 'log', chatId: this.logChatId });
    }

    const deliveries = await Promise.all(
      targets.map(async ({ target, chatId }): Promise<Delivery> => ({
        target,
        chatId,
        result: await deliverFormatted(this.sender, chatId, formatted),
      }))
    );

    const failed = deliveries.filter((d) => !d.result.success).length;
    log.info('Forwarded message', {
      chatId: inbound.chatId,
      source: inbound.source,
      deliveries: deliveries.length,
      failed,
    });

    return { handled: true, formatted, deliveries };
  }
}

/** Chat id an update would be answered in, for log lines. */
export function describeUpdate(update: TelegramUpdate): Record<string, unknown> {
  return { updateId: update.update_id, chatId: extractChatId(update) };
}
