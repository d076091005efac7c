/**
 * tg-relay — Telegram Outbound Delivery
 *
 * Sends already-formatted MarkdownV2 text. A rejection (usually a 400
 * "can't parse entities") is reported as a failed delivery; the text is
 * not re-sent in another format.
 */

import type { ChatId } from '../config/types.js';
import { createLogger } from '../utils/logger.js';
import { TelegramApiError } from './client.js';
import type { DeliveryResult, MessageSender, SendMessageOptions } from './types.js';

const log = createLogger('Telegram:Outbound');

export async function deliverFormatted(
  sender: MessageSender,
  chatId: ChatId,
  formatted: string,
  options: Omit<SendMessageOptions, 'parseMode'> = {}
): Promise<DeliveryResult> {
  try {
    const sent = await sender.sendMessage(chatId, formatted, { ...options, parseMode: 'MarkdownV2' });
    log.debug('Delivered', { chatId, messageId: sent.message_id });
    return { success: true, messageId: sent.message_id };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    const errorCode = error instanceof TelegramApiError ? error.errorCode : undefined;

    log.warn('Delivery failed', { chatId, error: message, ...(errorCode !== undefined && { errorCode }) });

    return errorCode !== undefined
      ? { success: false, error: message, errorCode }
      : { success: false, error: message };
  }
}
