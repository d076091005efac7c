/**
 * tg-relay — Logger
 *
 * Scoped, leveled logger. Writes one line per entry to stderr so stdout
 * stays clean for command output. Respects NO_COLOR and non-TTY stderr.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[90m',  // gray
  info: '\x1b[36m',   // cyan
  warn: '\x1b[33m',   // yellow
  error: '\x1b[31m',  // red
};

const RESET = '\x1b[0m';
const DIM = '\x1b[90m';

// Bot API URLs embed the token: https://api.telegram.org/bot<token>/method
const BOT_TOKEN_PATTERN = /\/bot\d+:[\w-]+/g;

let globalLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  globalLevel = level;
}

export function getLogLevel(): LogLevel {
  return globalLevel;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

/**
 * Strip bot tokens from anything that might contain a Bot API URL.
 */
export function redact(text: string): string {
  return text.replace(BOT_TOKEN_PATTERN, '/bot***');
}

function isColorless(): boolean {
  if (process.env.NO_COLOR !== undefined && process.env.NO_COLOR !== '') return true;
  if (process.env.TERM === 'dumb') return true;
  return !process.stderr.isTTY;
}

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown> | Error): void;
}

function formatData(data: Record<string, unknown>): string {
  return Object.entries(data)
    .map(([k, v]) => `${k}=${typeof v === 'string' ? v : JSON.stringify(v)}`)
    .join(' ');
}

export function createLogger(scope: string): Logger {
  const log = (level: LogLevel, message: string, data?: Record<string, unknown> | Error) => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[globalLevel]) return;

    const timestamp = new Date().toISOString().slice(11, 23);
    const levelTag = level.toUpperCase().padEnd(5);
    const noColor = isColorless();
    const paint = (color: string, text: string) => (noColor ? text : `${color}${text}${RESET}`);

    let line = `${paint(DIM, timestamp)} ${paint(LEVEL_COLORS[level], levelTag)} ${paint(DIM, `[${scope}]`)} ${message}`;

    if (data instanceof Error) {
      line += ` ${paint(LEVEL_COLORS.error, data.message)}`;
      if (data.stack && globalLevel === 'debug') {
        line += `\n${data.stack}`;
      }
    } else if (data && Object.keys(data).length > 0) {
      line += ` ${paint(DIM, formatData(data))}`;
    }

    process.stderr.write(redact(line) + '\n');
  };

  return {
    debug: (msg, data) => log('debug', msg, data),
    info: (msg, data) => log('info', msg, data),
    warn: (msg, data) => log('warn', msg, data),
    error: (msg, data) => log('error', msg, data),
  };
}
