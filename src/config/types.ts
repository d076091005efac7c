/**
 * tg-relay — Configuration Types & Schema
 */

import { z } from 'zod';

// ============================================================================
// ZOD SCHEMA
// ============================================================================

/** Telegram accepts a numeric chat id or an `@channelusername`. */
export const ChatIdSchema = z.union([z.number().int(), z.string().regex(/^@\w+$/)]);

export const TelegramConfigSchema = z.object({
  botToken: z.string().min(1).optional(),
  webhookSecret: z.string().min(1).optional(),
  apiBaseUrl: z.string().url().default('https://api.telegram.org'),
  timeoutMs: z.number().int().positive().default(10_000),
});

export const RelaySettingsSchema = z.object({
  /** Every formatted message is copied here as well. */
  logChatId: ChatIdSchema.optional(),
});

export const ServerConfigSchema = z.object({
  host: z.string().min(1).default('0.0.0.0'),
  port: z.number().int().min(0).max(65_535).default(8000),
  /** Public URL the webhook is registered under (without the route path). */
  baseUrl: z.string().url().optional(),
  maxBodyBytes: z.number().int().positive().default(1024 * 1024),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export const RelayConfigSchema = z.object({
  telegram: TelegramConfigSchema.default({}),
  relay: RelaySettingsSchema.default({}),
  server: ServerConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

// ============================================================================
// INFERRED TYPES
// ============================================================================

export type ChatId = z.infer<typeof ChatIdSchema>;
export type RelayConfig = z.infer<typeof RelayConfigSchema>;
export type TelegramConfig = z.infer<typeof TelegramConfigSchema>;

// ============================================================================
// ERROR
// ============================================================================

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}
