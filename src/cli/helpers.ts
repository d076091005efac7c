/**
 * tg-relay — Shared CLI Helpers
 */

import { InvalidArgumentError } from 'commander';
import {
  getConfigPath,
  loadConfig,
  missingSettings,
  type RequiredSetting,
} from '../config/loader.js';
import { ChatIdSchema, ConfigError, type ChatId, type RelayConfig } from '../config/types.js';
import { setLogLevel } from '../utils/logger.js';
import { ExitCode, printErrorResult } from '../utils/output.js';
import { isDebugForced } from './global-options.js';

// ============================================================================
// CONFIG
// ============================================================================

/**
 * Load the configuration and apply its log level.
 * Prints the validation issues and returns null if it is invalid.
 */
export function loadCliConfig(): RelayConfig | null {
  let config: RelayConfig;
  try {
    config = loadConfig();
  } catch (error) {
    if (!(error instanceof ConfigError)) throw error;
    printErrorResult({
      code: 'INVALID_CONFIG',
      message: error.message,
      suggestion: `Check your environment variables and ${getConfigPath()}.`,
    });
    process.exitCode = ExitCode.USAGE_ERROR;
    return null;
  }

  if (!isDebugForced()) {
    setLogLevel(config.logging.level);
  }
  return config;
}

/**
 * Require settings to be present. Prints which ones are missing and sets
 * the exit code if any are.
 */
export function requireSettings(config: RelayConfig, required: RequiredSetting[]): boolean {
  const missing = missingSettings(config, required);
  if (missing.length === 0) return true;

  printErrorResult({
    code: 'MISSING_CONFIG',
    message: `Missing required setting${missing.length === 1 ? '' : 's'}: ${missing.join(', ')}`,
    suggestion: `Set ${missing.length === 1 ? 'it' : 'them'} in the environment or in ${getConfigPath()}.`,
  });
  process.exitCode = ExitCode.UNAUTHORIZED;
  return false;
}

// ============================================================================
// ERRORS
// ============================================================================

export function printError(context: string, error: unknown): void {
  const message = error instanceof Error ? error.message : String(error);
  printErrorResult({
    code: 'COMMAND_ERROR',
    message: `${context}: ${message}`,
  });
  process.exitCode = ExitCode.GENERAL_ERROR;
}

// ============================================================================
// ARGUMENTS
// ============================================================================

/**
 * Parse a chat id argument: an integer (negative for groups/channels) or
 * an `@channelusername`.
 */
export function parseChatId(value: string): ChatId | null {
  const candidate: unknown = /^-?\d+$/.test(value) ? Number(value) : value;
  const result = ChatIdSchema.safeParse(candidate);
  return result.success ? result.data : null;
}

/** Commander argument parser for --port. */
export function parsePort(value: string): number {
  const port = Number(value);
  if (!/^\d+$/.test(value) || port > 65_535) {
    throw new InvalidArgumentError('Port must be an integer between 0 and 65535.');
  }
  return port;
}

/**
 * Read all of stdin as UTF-8.
 */
export async function readStdin(stream: NodeJS.ReadableStream = process.stdin): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks).toString('utf-8');
}

// ============================================================================
// SUGGESTIONS
// ============================================================================

function levenshtein(a: string, b: string): number {
  const m = a.length;
  const n = b.length;
  const dp: number[][] = Array.from({ length: m + 1 }, () => new Array<number>(n + 1).fill(0));

  for (let i = 0; i <= m; i++) dp[i][0] = i;
  for (let j = 0; j <= n; j++) dp[0][j] = j;

  for (let i = 1; i <= m; i++) {
    for (let j = 1; j <= n; j++) {
      dp[i][j] = a[i - 1] === b[j - 1]
        ? dp[i - 1][j - 1]
        : 1 + Math.min(dp[i - 1][j], dp[i][j - 1], dp[i - 1][j - 1]);
    }
  }

  return dp[m][n];
}

/**
 * Closest command name within `maxDistance` edits, for "did you mean?".
 */
export function didYouMean(
  input: string,
  candidates: string[],
  maxDistance = 3
): string | undefined {
  let best: string | undefined;
  let bestDist = maxDistance + 1;

  for (const candidate of candidates) {
    const dist = levenshtein(input.toLowerCase(), candidate.toLowerCase());
    if (dist < bestDist) {
      bestDist = dist;
      best = candidate;
    }
  }

  return bestDist <= maxDistance ? best : undefined;
}
