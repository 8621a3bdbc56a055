/**
 * Structured logging with pluggable transports.
 *
 *  - One global Logger instance (exported as `logger`); components call
 *    logger.child('hooks') / logger.child('templates') for namespaced loggers.
 *  - Entries carry level, message, ISO 8601 timestamp, optional component,
 *    arbitrary data and structured error info.
 *  - ConsoleTransport (coloured with chalk) and JsonTransport (JSON lines,
 *    size-based rotation).
 */

import fs from 'fs';
import path from 'path';
import chalk from 'chalk';

// ── Log level ordering ────────────────────────────────────────────────────

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'fatal'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

// ── Log entry ─────────────────────────────────────────────────────────────

export interface LogEntry {
  level: LogLevel;
  message: string;
  /** ISO 8601 timestamp */
  timestamp: string;
  /** e.g. 'hooks', 'templates', 'theme:starter' */
  component?: string;
  data?: Record<string, unknown>;
  error?: {
    message: string;
    stack?: string;
    code?: string;
  };
}

export interface Transport {
  write(entry: LogEntry): void;
}

// ── ConsoleTransport ──────────────────────────────────────────────────────

const LEVEL_COLOR: Record<LogLevel, (s: string) => string> = {
  debug: chalk.gray,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red,
  fatal: chalk.bgRed.white,
};

const LEVEL_LABEL: Record<LogLevel, string> = {
  debug: 'DEBUG',
  info: ' INFO',
  warn: ' WARN',
  error: 'ERROR',
  fatal: 'FATAL',
};

export function formatConsoleLine(entry: LogEntry): string {
  const label = LEVEL_COLOR[entry.level](LEVEL_LABEL[entry.level]);
  const ts = chalk.dim(entry.timestamp);
  const comp = entry.component ? chalk.blue(` [${entry.component}]`) : '';

  let line = `${ts} ${label}${comp} ${entry.message}`;

  if (entry.data && Object.keys(entry.data).length > 0) {
    line += ' ' + chalk.dim(JSON.stringify(entry.data));
  }

  if (entry.error) {
    line += chalk.red(` | ${entry.error.message}`);
    if (entry.error.stack) {
      line += '\n' + chalk.dim(entry.error.stack);
    }
  }

  return line;
}

export class ConsoleTransport implements Transport {
  write(entry: LogEntry): void {
    const line = formatConsoleLine(entry);
    if (entry.level === 'error' || entry.level === 'fatal') {
      process.stderr.write(line + '\n');
    } else {
      process.stdout.write(line + '\n');
    }
  }
}

// ── JsonTransport ─────────────────────────────────────────────────────────

export interface JsonTransportOptions {
  filePath: string;
  /** Max file size in bytes before rotation. Default: 10 MB */
  maxSize?: number;
  /** Number of rotated files to keep. Default: 5 */
  maxFiles?: number;
}

export class JsonTransport implements Transport {
  private filePath: string;
  private maxSize: number;
  private maxFiles: number;

  constructor(options: JsonTransportOptions) {
    this.filePath = options.filePath;
    this.maxSize = options.maxSize ?? 10 * 1024 * 1024;
    this.maxFiles = options.maxFiles ?? 5;

    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
  }

  write(entry: LogEntry): void {
    this.maybeRotate();
    fs.appendFileSync(this.filePath, JSON.stringify(entry) + '\n', 'utf-8');
  }

  private maybeRotate(): void {
    if (!fs.existsSync(this.filePath)) return;
    if (fs.statSync(this.filePath).size < this.maxSize) return;

    for (let i = this.maxFiles - 1; i >= 1; i--) {
      const older = `${this.filePath}.${i}`;
      if (fs.existsSync(older)) {
        fs.renameSync(older, `${this.filePath}.${i + 1}`);
      }
    }
    fs.renameSync(this.filePath, `${this.filePath}.1`);
  }
}

// ── Logger ────────────────────────────────────────────────────────────────

export interface LoggerOptions {
  level?: LogLevel;
  transports?: Transport[];
  component?: string;
}

export class Logger {
  private level: LogLevel;
  private transports: Transport[];
  private component?: string;

  constructor(options?: LoggerOptions) {
    this.level = options?.level ?? 'info';
    this.transports = options?.transports ?? [new ConsoleTransport()];
    this.component = options?.component;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  addTransport(transport: Transport): void {
    this.transports.push(transport);
  }

  removeTransport(transport: Transport): void {
    const idx = this.transports.indexOf(transport);
    if (idx >= 0) this.transports.splice(idx, 1);
  }

  /**
   * Child loggers share the parent's transport array, so a transport added
   * to the parent later also receives the child's entries.
   */
  child(component: string): Logger {
    return new Logger({
      level: this.level,
      transports: this.transports,
      component: this.component ? `${this.component}:${component}` : component,
    });
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log('info', message, data);
  }

  warn(message: string, errorOrData?: unknown, data?: Record<string, unknown>): void {
    this.route('warn', message, errorOrData, data);
  }

  error(message: string, errorOrData?: unknown, data?: Record<string, unknown>): void {
    this.route('error', message, errorOrData, data);
  }

  fatal(message: string, errorOrData?: unknown, data?: Record<string, unknown>): void {
    this.route('fatal', message, errorOrData, data);
  }

  // ── Internal ───────────────────────────────────────────────────────────

  private route(level: LogLevel, message: string, errorOrData: unknown, data?: Record<string, unknown>): void {
    if (errorOrData instanceof Error) {
      this.log(level, message, data, errorOrData);
    } else if (isRecord(errorOrData)) {
      this.log(level, message, errorOrData);
    } else {
      this.log(level, message, data);
    }
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>, err?: Error): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) return;

    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
      component: this.component,
      data,
    };

    if (err) {
      const code = 'code' in err && typeof err.code === 'string' ? err.code : undefined;
      entry.error = { message: err.message, stack: err.stack, code };
    }

    for (const transport of this.transports) {
      transport.write(entry);
    }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ── Global singleton ──────────────────────────────────────────────────────

const envLevel = process.env['LOG_LEVEL'];

/**
 * Global logger. Components take an injected Logger and fall back to
 * `logger.child(...)`.
 */
export const logger = new Logger({
  level: isLogLevel(envLevel) ? envLevel : 'info',
  transports: [new ConsoleTransport()],
});
