/**
 * Minimal leveled logger.
 *
 * Writes to stderr by default: the MCP server speaks JSON-RPC on stdout and
 * anything else written there corrupts the transport.
 *
 *   MESHBRIDGE_LOG_LEVEL   debug | info | warn | error   (default: info)
 *   MESHBRIDGE_LOG_FORMAT  json → one JSON object per line
 *   NO_COLOR               disables ANSI colors
 */

import { format } from 'node:util';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export interface LogSink {
  write(chunk: string): unknown;
  isTTY?: boolean;
}

export interface LoggerOptions {
  level?: LogLevel;
  stream?: LogSink;
  json?: boolean;
  color?: boolean;
  /** Injected clock for deterministic output in tests. */
  now?: () => Date;
}

export interface Logger {
  readonly name: string;
  level: LogLevel;
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  isEnabled(level: LogLevel): boolean;
  child(suffix: string): Logger;
}

export function parseLogLevel(raw: string | undefined, fallback: LogLevel = 'info'): LogLevel {
  const value = (raw ?? '').trim().toLowerCase();
  if (value === 'warning') return 'warn';
  if (value === 'debug' || value === 'info' || value === 'warn' || value === 'error') return value;
  return fallback;
}

// ─── ANSI ────────────────────────────────────────────────────

const ANSI: Record<LogLevel | 'dim' | 'reset', string> = {
  debug: '\x1b[2m',
  info: '\x1b[36m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
  dim: '\x1b[2m',
  reset: '\x1b[0m',
};

// ─── Factory ─────────────────────────────────────────────────

export function createLogger(name: string, options: LoggerOptions = {}): Logger {
  const stream: LogSink = options.stream ?? process.stderr;
  const json = options.json ?? process.env['MESHBRIDGE_LOG_FORMAT'] === 'json';
  const color = options.color ?? (!process.env['NO_COLOR'] && stream.isTTY === true && !json);
  const now = options.now ?? (() => new Date());

  const logger: Logger = {
    name,
    level: options.level ?? parseLogLevel(process.env['MESHBRIDGE_LOG_LEVEL']),

    isEnabled(level: LogLevel): boolean {
      return LEVEL_RANK[level] >= LEVEL_RANK[logger.level];
    },

    debug: (message, ...args) => emit('debug', message, args),
    info: (message, ...args) => emit('info', message, args),
    warn: (message, ...args) => emit('warn', message, args),
    error: (message, ...args) => emit('error', message, args),

    child(suffix: string): Logger {
      return createLogger(`${name}.${suffix}`, { ...options, level: logger.level, stream, json, color, now });
    },
  };

  function emit(level: LogLevel, message: string, args: unknown[]): void {
    if (!logger.isEnabled(level)) return;
    const text = args.length > 0 ? format(message, ...args) : message;
    const time = now().toISOString();

    let line: string;
    if (json) {
      line = JSON.stringify({ time, level, logger: name, message: text });
    } else if (color) {
      const tag = level.toUpperCase().padEnd(5);
      line = `${ANSI.dim}${time}${ANSI.reset} ${ANSI[level]}${tag}${ANSI.reset} [${name}] ${text}`;
    } else {
      line = `${time} ${level.toUpperCase().padEnd(5)} [${name}] ${text}`;
    }
    stream.write(line + '\n');
  }

  return logger;
}
