/**
 * tg-relay — Mock Update Generator
 *
 * Builds Bot API updates shaped like the ones Telegram posts to the
 * webhook, plus the headers that go with them. Useful for exercising a
 * running relay without a real bot conversation.
 */

import { SECRET_HEADER } from '../config/defaults.js';
import type { TelegramMessage, TelegramUpdate, UpdateKind } from '../telegram/types.js';

// ============================================================================
// TYPES
// ============================================================================

export interface MockUpdateOptions {
  /** Update field to place the message in. */
  kind?: UpdateKind;
  text?: string;
  /** Put the text in `caption` (a media message) instead of `text`. */
  asCaption?: boolean;
  chatId?: number;
  updateId?: number;
  /** Value for the secret-token header. */
  secret?: string;
  /** Seconds since epoch; defaults to now. */
  date?: number;
}

export interface MockUpdateEvent {
  kind: UpdateKind;
  payload: TelegramUpdate;
  headers: Record<string, string>;
  description: string;
}

const DEFAULT_TEXT = '# Hello\nThis is **bold** and https://example.com.';
const DEFAULT_PRIVATE_CHAT_ID = 100_200_300;
const DEFAULT_CHANNEL_CHAT_ID = -1_001_234_567_890;

// ============================================================================
// GENERATOR
// ============================================================================

export function generateUpdate(options: MockUpdateOptions = {}): MockUpdateEvent {
  const kind = options.kind ?? 'message';
  const isChannel = kind === 'channel_post' || kind === 'edited_channel_post';
  const chatId = options.chatId ?? (isChannel ? DEFAULT_CHANNEL_CHAT_ID : DEFAULT_PRIVATE_CHAT_ID);
  const text = options.text ?? DEFAULT_TEXT;
  const date = options.date ?? Math.floor(Date.now() / 1000);

  const message: TelegramMessage = {
    message_id: 1,
    date,
    chat: isChannel
      ? { id: chatId, type: 'channel', title: 'Test Channel' }
      : { id: chatId, type: 'private', username: 'test_user' },
    ...(options.asCaption ? { caption: text } : { text }),
  };

  const payload: TelegramUpdate = { update_id: options.updateId ?? 1 };
  payload[kind] = message;

  return {
    kind,
    payload,
    headers: {
      'Content-Type': 'application/json',
      [SECRET_HEADER]: options.secret ?? 'test-secret',
    },
    description: `Telegram ${kind} update for chat ${chatId}${options.asCaption ? ' (caption)' : ''}`,
  };
}
