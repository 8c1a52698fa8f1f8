/**
 * Structured logging with pluggable transports.
 *
 *  - One global Logger instance (exported as `logger`), plus per-component
 *    child loggers created via logger.child('component').
 *  - Log entries carry: level, message, ISO 8601 timestamp, optional
 *    component, arbitrary data, and structured error info.
 *  - ConsoleTransport colours entries with chalk; tests plug in their own
 *    capturing transport.
 */

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
  return typeof value === 'string' && Object.hasOwn(LEVEL_ORDER, value);
}

// ── Log entry ─────────────────────────────────────────────────────────────

export interface LogEntry {
  level: LogLevel;
  message: string;
  /** ISO 8601 timestamp */
  timestamp: string;
  /** e.g. 'hooks', 'plugins', 'plugins:trace' */
  component?: string;
  /** Arbitrary structured data */
  data?: Record<string, unknown>;
  /** Structured error info */
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

// ── Transport interface ───────────────────────────────────────────────────

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

export class ConsoleTransport implements Transport {
  write(entry: LogEntry): void {
    const colorize = LEVEL_COLOR[entry.level];
    const label = colorize(LEVEL_LABEL[entry.level]);
    const ts = chalk.dim(entry.timestamp);
    const comp = entry.component ? chalk.blue(` [${entry.component}]`) : '';

    let line = `${ts} ${label}${comp} ${entry.message}`;

    if (entry.data && Object.keys(entry.data).length > 0) {
      line += ' ' + chalk.dim(JSON.stringify(entry.data));
    }

    if (entry.error) {
      line += chalk.red(` | ${entry.error.name}: ${entry.error.message}`);
      if (entry.error.stack) {
        line += '\n' + chalk.dim(entry.error.stack);
      }
    }

    if (LEVEL_ORDER[entry.level] >= LEVEL_ORDER.warn) {
      process.stderr.write(line + '\n');
    } else {
      process.stdout.write(line + '\n');
    }
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
  private readonly component?: string;

  constructor(options?: LoggerOptions) {
    this.level = options?.level ?? 'info';
    this.transports = options?.transports ?? [new ConsoleTransport()];
    this.component = options?.component;
  }

  // ── Level control ──────────────────────────────────────────────────────

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  // ── Transport management ───────────────────────────────────────────────

  addTransport(transport: Transport): void {
    this.transports.push(transport);
  }

  removeTransport(transport: Transport): void {
    const idx = this.transports.indexOf(transport);
    if (idx >= 0) this.transports.splice(idx, 1);
  }

  // ── Child loggers ──────────────────────────────────────────────────────

  /**
   * Create a child logger with the parent's level and transports, stamping
   * every entry with `component` (nested under the parent's own component).
   */
  child(component: string): Logger {
    return new Logger({
      level: this.level,
      // shared array: transports added to the parent reach the child
      transports: this.transports,
      component: this.component ? `${this.component}:${component}` : component,
    });
  }

  // ── Logging methods ────────────────────────────────────────────────────

  debug(message: string, data?: Record<string, unknown>): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log('warn', message, data);
  }

  error(message: string, errorOrData?: Error | Record<string, unknown>, data?: Record<string, unknown>): void {
    if (errorOrData instanceof Error) {
      this.log('error', message, data, errorOrData);
    } else {
      this.log('error', message, errorOrData);
    }
  }

  fatal(message: string, errorOrData?: Error | Record<string, unknown>, data?: Record<string, unknown>): void {
    if (errorOrData instanceof Error) {
      this.log('fatal', message, data, errorOrData);
    } else {
      this.log('fatal', message, errorOrData);
    }
  }

  // ── Internal ───────────────────────────────────────────────────────────

  private log(level: LogLevel, message: string, data?: Record<string, unknown>, err?: Error): void {
    if (!this.isEnabled(level)) return;

    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
      component: this.component,
      data,
    };
    if (err) {
      entry.error = { name: err.name, message: err.message, stack: err.stack };
    }

    for (const transport of this.transports) {
      try {
        transport.write(entry);
      } catch {
        // transport errors stay isolated
      }
    }
  }
}

// ── Global singleton ──────────────────────────────────────────────────────

const envLevel = process.env['HOOKWIRE_LOG_LEVEL'];

/**
 * Global logger instance. Components should call `logger.child('name')` to
 * create namespaced sub-loggers rather than using this directly.
 */
export const logger = new Logger({
  level: isLogLevel(envLevel) ? envLevel : 'info',
  transports: [new ConsoleTransport()],
});
