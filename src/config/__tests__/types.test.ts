import { describe, it, expect } from 'vitest';
import {
  RelayConfigSchema,
  ChatIdSchema,
  ServerConfigSchema,
  TelegramConfigSchema,
  LoggingConfigSchema,
  ConfigError,
} from '../types.js';

// ============================================================================
// RelayConfigSchema
// ============================================================================

describe('RelayConfigSchema', () => {
  it('returns full defaults for empty input', () => {
    const config = RelayConfigSchema.parse({});

    expect(config.telegram).toEqual({
      apiBaseUrl: 'https://api.telegram.org',
      timeoutMs: 10_000,
    });
    expect(config.relay).toEqual({});
    expect(config.server).toEqual({
      host: '0.0.0.0',
      port: 8000,
      maxBodyBytes: 1_048_576,
    });
    expect(config.logging).toEqual({ level: 'info' });
  });

  it('keeps provided credentials', () => {
    const config = RelayConfigSchema.parse({
      telegram: { botToken: 'test-token', webhookSecret: 'test-secret' },
    });
    expect(config.telegram.botToken).toBe('test-token');
    expect(config.telegram.webhookSecret).toBe('test-secret');
  });

  it('rejects an empty bot token', () => {
    expect(() => RelayConfigSchema.parse({ telegram: { botToken: '' } })).toThrow();
  });
});

// ============================================================================
// ChatIdSchema
// ============================================================================

describe('ChatIdSchema', () => {
  it('accepts integer chat ids, including negative group ids', () => {
    expect(ChatIdSchema.parse(42)).toBe(42);
    expect(ChatIdSchema.parse(-1001234567890)).toBe(-1001234567890);
  });

  it('accepts channel usernames', () => {
    expect(ChatIdSchema.parse('@relay_log')).toBe('@relay_log');
  });

  it('rejects fractional ids and free-form strings', () => {
    expect(() => ChatIdSchema.parse(1.5)).toThrow();
    expect(() => ChatIdSchema.parse('relay log')).toThrow();
  });
});

// ============================================================================
// SUB-SCHEMAS
// ============================================================================

describe('ServerConfigSchema', () => {
  it('rejects out-of-range ports', () => {
    expect(() => ServerConfigSchema.parse({ port: 70_000 })).toThrow();
    expect(() => ServerConfigSchema.parse({ port: -1 })).toThrow();
  });

  it('allows port 0 for an ephemeral port', () => {
    expect(ServerConfigSchema.parse({ port: 0 }).port).toBe(0);
  });

  it('requires baseUrl to be a URL', () => {
    expect(() => ServerConfigSchema.parse({ baseUrl: 'not a url' })).toThrow();
  });
});

describe('TelegramConfigSchema', () => {
  it('rejects a non-positive timeout', () => {
    expect(() => TelegramConfigSchema.parse({ timeoutMs: 0 })).toThrow();
  });
});

describe('LoggingConfigSchema', () => {
  it('accepts each log level', () => {
    for (const level of ['debug', 'info', 'warn', 'error'] as const) {
      expect(LoggingConfigSchema.parse({ level }).level).toBe(level);
    }
  });

  it('rejects unknown levels', () => {
    expect(() => LoggingConfigSchema.parse({ level: 'verbose' })).toThrow();
  });
});

describe('ConfigError', () => {
  it('carries the individual issues', () => {
    const error = new ConfigError('Invalid configuration', ['PORT (server.port): bad']);
    expect(error.name).toBe('ConfigError');
    expect(error.issues).toEqual(['PORT (server.port): bad']);
    expect(error).toBeInstanceOf(Error);
  });
});
