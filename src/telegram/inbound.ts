/**
 * tg-relay — Telegram Inbound Update Handling
 *
 * Validates webhook bodies and pulls out the text to relay and the chat
 * it came from.
 */

import { createLogger } from '../utils/logger.js';
import {
  TelegramUpdateSchema,
  UPDATE_KINDS,
  type InboundMessage,
  type TelegramMessage,
  type TelegramUpdate,
  type UpdateKind,
} from './types.js';

const log = createLogger('Telegram:Inbound');

const INTEGER_PATTERN = /^[-+]?\d+$/;

// ============================================================================
// VALIDATION
// ============================================================================

/**
 * Validate a parsed JSON body as an update.
 * Returns null for anything that does not look like one.
 */
export function parseUpdate(body: unknown): TelegramUpdate | null {
  const result = TelegramUpdateSchema.safeParse(body);
  if (!result.success) {
    log.debug('Ignoring malformed update', {
      issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
    return null;
  }
  return result.data;
}

// ============================================================================
// EXTRACTION
// ============================================================================

interface MessageEntry {
  kind: UpdateKind;
  message: TelegramMessage;
}

function presentMessages(update: TelegramUpdate): MessageEntry[] {
  const entries: MessageEntry[] = [];
  for (const kind of UPDATE_KINDS) {
    const message = update[kind];
    if (message) entries.push({ kind, message });
  }
  return entries;
}

function findTextEntry(update: TelegramUpdate): (MessageEntry & { text: string }) | null {
  for (const entry of presentMessages(update)) {
    const text = entry.message.text ?? entry.message.caption;
    if (text !== undefined) return { ...entry, text };
  }
  return null;
}

/**
 * Text of the first message-bearing field that has any: its `text`,
 * else its `caption`. Fields without either are skipped.
 */
export function extractText(update: TelegramUpdate): string | null {
  return findTextEntry(update)?.text ?? null;
}

/**
 * Chat id of the first message-bearing field that has one.
 * An id that is not an integer yields null rather than a later field's id.
 */
export function extractChatId(update: TelegramUpdate): number | null {
  for (const { message } of presentMessages(update)) {
    const id = message.chat?.id;
    if (id === undefined) continue;
    return toInteger(id);
  }
  return null;
}

/**
 * Combine text and chat id. Null when either is missing or the text is empty.
 */
export function normalizeUpdate(update: TelegramUpdate): InboundMessage | null {
  const entry = findTextEntry(update);
  const chatId = extractChatId(update);

  if (!entry || !entry.text || chatId === null) return null;

  return {
    chatId,
    text: entry.text,
    source: entry.kind,
    messageId: entry.message.message_id,
  };
}

function toInteger(id: number | string): number | null {
  if (typeof id === 'number') {
    return Number.isFinite(id) ? Math.trunc(id) : null;
  }
  const trimmed = id.trim();
  if (!INTEGER_PATTERN.test(trimmed)) return null;
  const value = Number(trimmed);
  return Number.isSafeInteger(value) ? value : null;
}
