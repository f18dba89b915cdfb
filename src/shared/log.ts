import type { LogLevel } from './config.js';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const GREEN = '\x1b[32m';
const YELLOW = '\x1b[33m';
const RED = '\x1b[31m';
const RESET = '\x1b[0m';

export interface LogSink {
  out(line: string): void;
  err(line: string): void;
}

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const consoleSink: LogSink = {
  out: line => console.log(line),
  err: line => console.error(line),
};

export interface LoggerOpts {
  level?: LogLevel;
  sink?: LogSink;
  color?: boolean;
  prefix?: string;
}

export function createLogger(opts: LoggerOpts = {}): Logger {
  const threshold = LEVEL_ORDER[opts.level ?? 'info'];
  const sink = opts.sink ?? consoleSink;
  const color = opts.color ?? (opts.sink === undefined && process.stdout.isTTY === true);
  const prefix = opts.prefix ?? '[nexus]';

  const paint = (text: string, code: string): string => (color ? `${code}${text}${RESET}` : text);
  const enabled = (level: LogLevel): boolean => LEVEL_ORDER[level] >= threshold;

  return {
    debug(message) {
      if (enabled('debug')) sink.out(`${prefix} ${message}`);
    },
    info(message) {
      if (enabled('info')) sink.out(`${prefix} ${message}`);
    },
    success(message) {
      if (enabled('info')) sink.out(`${prefix} ${paint(message, GREEN)}`);
    },
    warn(message) {
      if (enabled('warn')) sink.err(`${prefix} ${paint(message, YELLOW)}`);
    },
    error(message) {
      if (enabled('error')) sink.err(`${prefix} ${paint(message, RED)}`);
    },
  };
}

/** In-memory sink for tests and for callers that want to inspect output. */
export function memorySink(): LogSink & { lines: string[] } {
  const lines: string[] = [];
  return {
    lines,
    out: line => lines.push(line),
    err: line => lines.push(line),
  };
}
