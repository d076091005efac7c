/**
 * tg-relay — Telegram Bot API Client
 *
 * POSTs JSON to https://api.telegram.org/bot<token>/<method> and validates
 * the `{ ok, result }` envelope. The token is part of the URL, so URLs are
 * never logged.
 */

import { z } from 'zod';
import type { ChatId } from '../config/types.js';
import { createLogger, redact } from '../utils/logger.js';
import {
  ApiResponseSchema,
  SentMessageSchema,
  WebhookInfoSchema,
  type MessageSender,
  type SendMessageOptions,
  type SentMessage,
  type WebhookInfo,
} from './types.js';

const log = createLogger('Telegram:Client');

// ============================================================================
// CONFIGURATION
// ============================================================================

const DEFAULT_API_BASE_URL = 'https://api.telegram.org';
const DEFAULT_TIMEOUT_MS = 10_000;

export interface TelegramClientConfig {
  botToken: string;
  /** Bot API root (without trailing slash), e.g. for a local Bot API server. */
  apiBaseUrl?: string;
  timeoutMs?: number;
}

export interface SetWebhookOptions {
  dropPendingUpdates?: boolean;
  allowedUpdates?: string[];
}

type ResultSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

// ============================================================================
// CLIENT
// ============================================================================

export class TelegramClient implements MessageSender {
  private readonly botToken: string;
  private readonly apiBaseUrl: string;
  private readonly timeoutMs: number;

  constructor(config: TelegramClientConfig) {
    this.botToken = config.botToken;
    this.apiBaseUrl = (config.apiBaseUrl || DEFAULT_API_BASE_URL).replace(/\/$/, '');
    this.timeoutMs = config.timeoutMs || DEFAULT_TIMEOUT_MS;
  }

  // ── Methods ───────────────────────────────────────────────────────────────

  async sendMessage(
    chatId: ChatId,
    text: string,
    options: SendMessageOptions = {}
  ): Promise<SentMessage> {
    const params: Record<string, unknown> = { chat_id: chatId, text };
    if (options.parseMode) {
      params.parse_mode = options.parseMode;
    }
    if (options.disableLinkPreview) {
      params.link_preview_options = { is_disabled: true };
    }
    return this.call('sendMessage', params, SentMessageSchema);
  }

  async setWebhook(url: string, secretToken: string, options: SetWebhookOptions = {}): Promise<boolean> {
    const params: Record<string, unknown> = { url, secret_token: secretToken };
    if (options.dropPendingUpdates) {
      params.drop_pending_updates = true;
    }
    if (options.allowedUpdates) {
      params.allowed_updates = options.allowedUpdates;
    }
    return this.call('setWebhook', params, z.boolean());
  }

  async getWebhookInfo(): Promise<WebhookInfo> {
    return this.call('getWebhookInfo', {}, WebhookInfoSchema);
  }

  async deleteWebhook(dropPendingUpdates = false): Promise<boolean> {
    const params: Record<string, unknown> = {};
    if (dropPendingUpdates) {
      params.drop_pending_updates = true;
    }
    return this.call('deleteWebhook', params, z.boolean());
  }

  // ── Transport ─────────────────────────────────────────────────────────────

  /**
   * Call a Bot API method and validate its `result` against `schema`.
   *
   * @throws {TelegramApiError} on transport failure, `ok: false`, or a
   *   result that does not match the schema
   */
  async call<T>(method: string, params: Record<string, unknown>, schema: ResultSchema<T>): Promise<T> {
    log.debug('API call', { method });

    let response: Response;
    try {
      response = await fetch(`${this.apiBaseUrl}/bot${this.botToken}/${method}`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(params),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      if (error instanceof DOMException && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
        throw new TelegramApiError(`${method} timed out after ${this.timeoutMs}ms`, 'TIMEOUT', method);
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new TelegramApiError(`Network error: ${redact(message)}`, 'NETWORK_ERROR', method);
    }

    const body: unknown = await response.json().catch(() => undefined);
    const envelope = ApiResponseSchema.safeParse(body);

    if (!envelope.success) {
      throw new TelegramApiError(
        `${method}: unexpected response (HTTP ${response.status})`,
        'INVALID_RESPONSE',
        method,
        response.status
      );
    }

    const { ok, result, error_code, description } = envelope.data;

    if (!response.ok || !ok) {
      throw new TelegramApiError(
        `${method} failed: ${description ?? `HTTP ${response.status}`}`,
        'API_ERROR',
        method,
        error_code ?? response.status
      );
    }

    const parsed = schema.safeParse(result);
    if (!parsed.success) {
      throw new TelegramApiError(
        `${method}: unexpected result shape`,
        'INVALID_RESPONSE',
        method,
        response.status
      );
    }

    return parsed.data;
  }
}

// ============================================================================
// ERROR
// ============================================================================

export type TelegramErrorCode = 'API_ERROR' | 'TIMEOUT' | 'NETWORK_ERROR' | 'INVALID_RESPONSE';

export class TelegramApiError extends Error {
  constructor(
    message: string,
    public readonly code: TelegramErrorCode,
    public readonly method: string,
    /** Bot API `error_code`, or the HTTP status when the body had none. */
    public readonly errorCode?: number
  ) {
    super(message);
    this.name = 'TelegramApiError';
  }
}
