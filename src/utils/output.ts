/**
 * tg-relay — Output Utilities
 *
 * Output helpers that respect --json and --quiet. Command results go to
 * stdout; errors and hints go to stderr.
 */

export type OutputMode = 'human' | 'json' | 'quiet';

let currentMode: OutputMode = 'human';

export function setOutputMode(mode: OutputMode): void {
  currentMode = mode;
}

// ============================================================================
// EXIT CODES
// ============================================================================

export const ExitCode = {
  SUCCESS: 0,
  GENERAL_ERROR: 1,
  USAGE_ERROR: 2,
  UNAUTHORIZED: 4,
  SIGINT: 130,
} as const;

// ============================================================================
// STRUCTURED OUTPUT
// ============================================================================

/**
 * Print a command result. JSON mode serializes `data`; quiet mode prints
 * only string results; human mode defers to `formatter`.
 */
export function printResult(data: unknown, formatter?: () => void): void {
  if (currentMode === 'json') {
    process.stdout.write(JSON.stringify(data, null, 2) + '\n');
    return;
  }

  if (currentMode === 'quiet') {
    if (typeof data === 'string') {
      process.stdout.write(data + '\n');
    }
    return;
  }

  if (formatter) {
    formatter();
  }
}

export interface ErrorResult {
  code: string;
  message: string;
  suggestion?: string;
}

/**
 * Print a structured error to stderr.
 */
export function printErrorResult(error: ErrorResult): void {
  if (currentMode === 'json') {
    process.stderr.write(JSON.stringify({ error }, null, 2) + '\n');
    return;
  }

  process.stderr.write(`\n  Error: ${error.message}\n`);
  if (error.suggestion) {
    process.stderr.write(`  ${error.suggestion}\n`);
  }
  process.stderr.write('\n');
}

/**
 * Print a success message (human mode only).
 */
export function printSuccess(message: string): void {
  if (currentMode === 'human') {
    process.stderr.write(`  ${message}\n`);
  }
}
