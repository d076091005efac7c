/**
 * tg-relay — Configuration Loader
 *
 * Reads an optional JSON file (~/.tg-relay/config.json, or the path in
 * TG_RELAY_CONFIG), overlays environment variables, validates the result
 * and freezes it. Loaded once at startup and passed by reference after that.
 */

import { existsSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { createLogger, isLogLevel } from '../utils/logger.js';
import { ENV_KEYS } from './defaults.js';
import {
  ConfigError,
  RelayConfigSchema,
  type RelayConfig,
  type TelegramConfig,
} from './types.js';

const log = createLogger('Config');

type ConfigInput = Record<string, unknown>;

// ============================================================================
// PATHS
// ============================================================================

const CONFIG_DIR_NAME = '.tg-relay';

export function getConfigDir(): string {
  return join(homedir(), CONFIG_DIR_NAME);
}

export function getConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return env.TG_RELAY_CONFIG || join(getConfigDir(), 'config.json');
}

// ============================================================================
// SOURCES
// ============================================================================

/**
 * Read the JSON config file. Missing file → empty object.
 * An unreadable file is reported and ignored.
 */
export function readConfigFile(path: string): ConfigInput {
  if (!existsSync(path)) return {};

  try {
    const json: unknown = JSON.parse(readFileSync(path, 'utf-8'));
    if (!isPlainObject(json)) {
      throw new Error('expected a JSON object');
    }
    return json;
  } catch (error) {
    log.warn('Ignoring unreadable config file', {
      path,
      error: error instanceof Error ? error.message : String(error),
    });
    return {};
  }
}

/**
 * Map set environment variables onto their config paths.
 * Numbers are coerced here; anything non-numeric is passed through so
 * the schema reports it.
 */
export function readEnvOverrides(env: NodeJS.ProcessEnv): ConfigInput {
  const overrides: ConfigInput = {};

  for (const [key, path] of Object.entries(ENV_KEYS)) {
    const raw = env[key];
    if (raw === undefined || raw === '') continue;
    setPath(overrides, path, coerceEnvValue(key, raw));
  }

  return overrides;
}

function coerceEnvValue(key: string, raw: string): unknown {
  switch (key) {
    case 'PORT':
    case 'TELEGRAM_TIMEOUT_MS':
      return /^\d+$/.test(raw) ? Number(raw) : raw;
    case 'LOG_CHAT_ID':
      return /^-?\d+$/.test(raw) ? Number(raw) : raw;
    case 'LOG_LEVEL': {
      const level = raw.toLowerCase();
      return isLogLevel(level) ? level : raw;
    }
    default:
      return raw;
  }
}

// ============================================================================
// LOAD
// ============================================================================

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  /** Overrides TG_RELAY_CONFIG and the default path. */
  configPath?: string;
}

/**
 * Load, validate and freeze the configuration.
 *
 * @throws {ConfigError} when a value fails validation
 */
export function loadConfig(options: LoadConfigOptions = {}): RelayConfig {
  const env = options.env ?? process.env;
  const path = options.configPath ?? getConfigPath(env);

  const merged = mergeDeep(readConfigFile(path), readEnvOverrides(env));
  const result = RelayConfigSchema.safeParse(merged);

  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${describePath(issue.path.join('.'))}: ${issue.message}`
    );
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }

  return deepFreeze(result.data);
}

// ============================================================================
// REQUIRED SETTINGS
// ============================================================================

export type RequiredSetting = 'BOT_TOKEN' | 'WEBHOOK_SECRET' | 'BASE_URL';

/**
 * Names (as environment variables) of required settings that are unset.
 */
export function missingSettings(config: RelayConfig, required: RequiredSetting[]): RequiredSetting[] {
  return required.filter((key) => {
    switch (key) {
      case 'BOT_TOKEN':
        return !config.telegram.botToken;
      case 'WEBHOOK_SECRET':
        return !config.telegram.webhookSecret;
      case 'BASE_URL':
        return !config.server.baseUrl;
    }
  });
}

/** Config with the webhook credentials guaranteed present. */
export interface ConfiguredRelay extends RelayConfig {
  telegram: TelegramConfig & { botToken: string; webhookSecret: string };
}

/**
 * Narrow a config to one that can serve webhooks.
 * Returns null if the bot token or webhook secret is missing.
 */
export function asConfiguredRelay(config: RelayConfig): ConfiguredRelay | null {
  const { botToken, webhookSecret } = config.telegram;
  if (!botToken || !webhookSecret) return null;

  return Object.freeze({
    ...config,
    telegram: Object.freeze({ ...config.telegram, botToken, webhookSecret }),
  });
}

// ============================================================================
// HELPERS
// ============================================================================

function describePath(path: string): string {
  const entry = Object.entries(ENV_KEYS).find(([, configPath]) => configPath === path);
  return entry ? `${entry[0]} (${path})` : path || '(root)';
}

function isPlainObject(value: unknown): value is ConfigInput {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function setPath(target: ConfigInput, dotted: string, value: unknown): void {
  const segments = dotted.split('.');
  const last = segments.pop();
  if (last === undefined) return;

  let node = target;
  for (const segment of segments) {
    const child = node[segment];
    if (isPlainObject(child)) {
      node = child;
    } else {
      const created: ConfigInput = {};
      node[segment] = created;
      node = created;
    }
  }
  node[last] = value;
}

function mergeDeep(base: ConfigInput, overlay: ConfigInput): ConfigInput {
  const result: ConfigInput = { ...base };
  for (const [key, value] of Object.entries(overlay)) {
    const existing = result[key];
    result[key] =
      isPlainObject(existing) && isPlainObject(value) ? mergeDeep(existing, value) : value;
  }
  return result;
}

function deepFreeze<T extends object>(value: T): T {
  for (const key of Object.keys(value)) {
    const child: unknown = Reflect.get(value, key);
    if (typeof child === 'object' && child !== null && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}
