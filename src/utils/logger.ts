/**
 * Logger
 *
 * Levelled logger used across the cache subsystem.
 * Level comes from LOG_LEVEL, output format from LOG_FORMAT (text | json).
 */

// ============================================================================
// Types
// ============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'text' | 'json';

export type LogContext = Record<string, unknown>;

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  source?: string;
  message: string;
  context?: LogContext;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

export interface LoggerOptions {
  level?: LogLevel;
  format?: LogFormat;
  source?: string;
  /** Suppress all output (tests) */
  silent?: boolean;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

function resolveLevel(): LogLevel {
  const raw = process.env.LOG_LEVEL?.toLowerCase();
  return isLogLevel(raw) ? raw : 'info';
}

function resolveFormat(): LogFormat {
  return process.env.LOG_FORMAT?.toLowerCase() === 'json' ? 'json' : 'text';
}

// ============================================================================
// Logger
// ============================================================================

export class Logger {
  private level: LogLevel;
  private readonly format: LogFormat;
  private readonly source?: string;
  private readonly silent: boolean;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? resolveLevel();
    this.format = options.format ?? resolveFormat();
    this.source = options.source;
    this.silent = options.silent ?? false;
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, undefined, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, undefined, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, undefined, context);
  }

  /**
   * Log an error. Accepts either `(message, context)` or
   * `(message, error, context)`.
   */
  error(message: string, errorOrContext?: Error | LogContext, context?: LogContext): void {
    if (errorOrContext instanceof Error) {
      this.log('error', message, errorOrContext, context);
    } else {
      this.log('error', message, undefined, errorOrContext);
    }
  }

  /**
   * Create a logger that prefixes entries with a nested source name.
   */
  child(name: string): Logger {
    return new Logger({
      level: this.level,
      format: this.format,
      source: this.source ? `${this.source}:${name}` : name,
      silent: this.silent,
    });
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  isDebugEnabled(): boolean {
    return this.isEnabled('debug');
  }

  private isEnabled(level: LogLevel): boolean {
    return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[this.level];
  }

  private log(level: LogLevel, message: string, error?: Error, context?: LogContext): void {
    if (this.silent || !this.isEnabled(level)) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      source: this.source,
      message,
      context: context && Object.keys(context).length > 0 ? context : undefined,
      error: error ? { name: error.name, message: error.message, stack: error.stack } : undefined,
    };

    const line = this.format === 'json' ? JSON.stringify(entry) : formatText(entry);

    switch (level) {
      case 'error':
        console.error(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      default:
        console.log(line);
    }
  }
}

function formatText(entry: LogEntry): string {
  const source = entry.source ? ` [${entry.source}]` : '';
  let line = `${entry.timestamp} ${entry.level.toUpperCase().padEnd(5)}${source} ${entry.message}`;
  if (entry.context) {
    line += ` ${JSON.stringify(entry.context)}`;
  }
  if (entry.error) {
    line += `\n  ${entry.error.name}: ${entry.error.message}`;
    if (entry.error.stack && entry.level === 'debug') {
      line += `\n${entry.error.stack}`;
    }
  }
  return line;
}

// ============================================================================
// Singleton
// ============================================================================

let loggerInstance: Logger | null = null;

export function getLogger(): Logger {
  if (!loggerInstance) {
    loggerInstance = new Logger();
  }
  return loggerInstance;
}

export function resetLogger(): void {
  loggerInstance = null;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return new Logger(options);
}

export const logger = getLogger();
