#!/usr/bin/env node
/**
 * tg-relay — Main Entry Point
 */

import { createProgram } from './cli/program.js';
import { ExitCode } from './utils/output.js';

// ── EPIPE handler ─────────────────────────────────────────────────────────
// `tg-relay format ... | head` may close the pipe before we finish writing.

function handlePipeError(err: NodeJS.ErrnoException): void {
  if (err.code === 'EPIPE') {
    process.exit(0);
  }
  throw err;
}

process.stdout.on('error', handlePipeError);
process.stderr.on('error', handlePipeError);

// ── Unhandled rejection safety net ──────────────────────────────────────────

process.on('unhandledRejection', (reason) => {
  const message = reason instanceof Error ? reason.message : String(reason);
  process.stderr.write(`\n  Fatal: ${message}\n\n`);
  process.exitCode = ExitCode.GENERAL_ERROR;
});

// ── CLI ──────────────────────────────────────────────────────────────────────

const program = createProgram();
program.parseAsync(process.argv).catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  process.stderr.write(`\n  Fatal: ${message}\n\n`);
  process.exitCode = ExitCode.GENERAL_ERROR;
});
