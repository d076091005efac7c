/**
 * tg-relay — Global Options
 *
 * Applies global flags (--no-color, --json, --quiet, --debug) to the root
 * Commander program. These are inherited by all subcommands.
 */

import type { Command } from 'commander';
import { setLogLevel } from '../utils/logger.js';
import { setOutputMode } from '../utils/output.js';

export interface GlobalOptions {
  /** False when --no-color is given. */
  color?: boolean;
  json?: boolean;
  quiet?: boolean;
  debug?: boolean;
}

let debugForced = false;

/** Whether --debug pinned the log level (config must not override it). */
export function isDebugForced(): boolean {
  return debugForced;
}

/**
 * Register global flags and a preAction hook that applies them
 * before any subcommand runs.
 */
export function applyGlobalOptions(program: Command): void {
  program
    .option('--no-color', 'Disable colored output')
    .option('--json', 'Output results as JSON')
    .option('-q, --quiet', 'Suppress non-essential output')
    .option('--debug', 'Show debug-level diagnostics');

  program.hook('preAction', () => {
    const opts = program.opts<GlobalOptions>();

    if (opts.color === false) {
      process.env.NO_COLOR = '1';
    }

    if (opts.json) {
      setOutputMode('json');
      process.env.NO_COLOR = '1';
    } else if (opts.quiet) {
      setOutputMode('quiet');
    }

    if (opts.debug) {
      setLogLevel('debug');
      debugForced = true;
    }
  });
}
