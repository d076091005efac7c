/**
 * tg-relay — Constants
 */

export const CLI_NAME = 'tg-relay';

export const CLI_VERSION = '0.1.0';

/** Route Telegram posts updates to. */
export const WEBHOOK_PATH = '/telegram/webhook';

export const HEALTH_PATH = '/healthz';

/** Header Telegram echoes back with the secret given to setWebhook. */
export const SECRET_HEADER = 'x-telegram-bot-api-secret-token';

/** Environment variable → dotted config path. */
export const ENV_KEYS = {
  BOT_TOKEN: 'telegram.botToken',
  WEBHOOK_SECRET: 'telegram.webhookSecret',
  TELEGRAM_API_URL: 'telegram.apiBaseUrl',
  TELEGRAM_TIMEOUT_MS: 'telegram.timeoutMs',
  LOG_CHAT_ID: 'relay.logChatId',
  HOST: 'server.host',
  PORT: 'server.port',
  BASE_URL: 'server.baseUrl',
  LOG_LEVEL: 'logging.level',
} as const;

// Injected at build time by tsup (see tsup.config.ts)
declare const __BUILD_COMMIT__: string;
declare const __BUILD_DATE__: string;

export const BUILD_COMMIT = typeof __BUILD_COMMIT__ !== 'undefined' ? __BUILD_COMMIT__ : 'dev';
export const BUILD_DATE = typeof __BUILD_DATE__ !== 'undefined' ? __BUILD_DATE__ : 'local';

/**
 * Full version string for --version output.
 * Example: tg-relay/0.1.0 linux-x64 node-v20.11.0 (abc1234 2026-10-18)
 */
export const VERSION_STRING =
  `${CLI_NAME}/${CLI_VERSION} ${process.platform}-${process.arch} node-${process.version} (${BUILD_COMMIT} ${BUILD_DATE})`;
