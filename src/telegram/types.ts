/**
 * tg-relay — Telegram Bot API Types
 *
 * Only the slice of the Bot API this relay touches: incoming updates
 * carrying a message, and the results of sendMessage and the webhook calls.
 */

import { z } from 'zod';
import type { ChatId } from '../config/types.js';

// ============================================================================
// UPDATES (received via webhook)
// ============================================================================

/** Update fields that may carry a message, in lookup order. */
export const UPDATE_KINDS = ['message', 'edited_message', 'channel_post', 'edited_channel_post'] as const;

export type UpdateKind = (typeof UPDATE_KINDS)[number];

export const TelegramChatSchema = z.object({
  id: z.union([z.number(), z.string()]),
  type: z.string().optional(),
  title: z.string().optional(),
  username: z.string().optional(),
});

export const TelegramMessageSchema = z.object({
  message_id: z.number().int().optional(),
  date: z.number().int().optional(),
  chat: TelegramChatSchema.optional(),
  text: z.string().optional(),
  caption: z.string().optional(),
});

export const TelegramUpdateSchema = z.object({
  update_id: z.number().int().optional(),
  message: TelegramMessageSchema.optional(),
  edited_message: TelegramMessageSchema.optional(),
  channel_post: TelegramMessageSchema.optional(),
  edited_channel_post: TelegramMessageSchema.optional(),
});

export type TelegramMessage = z.infer<typeof TelegramMessageSchema>;
export type TelegramUpdate = z.infer<typeof TelegramUpdateSchema>;

/** The text and origin pulled out of an update. */
export interface InboundMessage {
  chatId: number;
  text: string;
  /** Which update field the text came from. */
  source: UpdateKind;
  messageId?: number;
}

// ============================================================================
// API RESPONSES
// ============================================================================

export const ApiResponseSchema = z.object({
  ok: z.boolean(),
  result: z.unknown().optional(),
  error_code: z.number().int().optional(),
  description: z.string().optional(),
});

export const SentMessageSchema = z.object({
  message_id: z.number().int(),
  date: z.number().int().optional(),
  chat: TelegramChatSchema.optional(),
});

export const WebhookInfoSchema = z.object({
  url: z.string(),
  has_custom_certificate: z.boolean().optional(),
  pending_update_count: z.number().int(),
  ip_address: z.string().optional(),
  last_error_date: z.number().int().optional(),
  last_error_message: z.string().optional(),
  max_connections: z.number().int().optional(),
  allowed_updates: z.array(z.string()).optional(),
});

export type SentMessage = z.infer<typeof SentMessageSchema>;
export type WebhookInfo = z.infer<typeof WebhookInfoSchema>;

// ============================================================================
// SENDING
// ============================================================================

export type ParseMode = 'MarkdownV2';

export interface SendMessageOptions {
  parseMode?: ParseMode;
  disableLinkPreview?: boolean;
}

/** Anything that can put a message into a chat. */
export interface MessageSender {
  sendMessage(chatId: ChatId, text: string, options?: SendMessageOptions): Promise<SentMessage>;
}

/** Outcome of one delivery. Failures are values, not exceptions. */
export type DeliveryResult =
  | { success: true; messageId: number }
  | { success: false; error: string; errorCode?: number };
