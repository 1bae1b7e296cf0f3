/**
 * Structured Logger
 *
 * One JSON line per entry with level, message, timestamp and the bound
 * context. API keys are redacted before anything is written.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Logger interface for dependency injection
 */
export interface ILogger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  /**
   * Create child logger with additional context
   */
  child(context: Record<string, unknown>): ILogger;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

// Covers apiKey, api_key and X-Api-Key in JSON, query strings and headers
const REDACTION_PATTERN = /(api[_-]?key['"]?\s*[=:]\s*['"]?)[^'"\s,}{&]+/gi;

export interface StructuredLoggerOptions {
  /** Minimum level written; defaults to CHAINMETRICS_LOG_LEVEL or 'info' */
  minLevel?: LogLevel;
  /** Output sink, console.log unless overridden */
  sink?: (line: string) => void;
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVEL_ORDER;
}

export class StructuredLogger implements ILogger {
  private readonly minLevel: LogLevel;
  private readonly sink: (line: string) => void;

  constructor(
    private readonly context: Record<string, unknown> = {},
    options: StructuredLoggerOptions = {}
  ) {
    const envLevel = process.env.CHAINMETRICS_LOG_LEVEL?.toLowerCase();
    this.minLevel = options.minLevel ?? (isLogLevel(envLevel) ? envLevel : 'info');
    this.sink = options.sink ?? ((line) => console.log(line));
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.log('debug', message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.log('info', message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.log('warn', message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.log('error', message, meta);
  }

  child(context: Record<string, unknown>): ILogger {
    return new StructuredLogger(
      { ...this.context, ...context },
      { minLevel: this.minLevel, sink: this.sink }
    );
  }

  private log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) {
      return;
    }

    const logEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
      ...this.context,
      ...meta,
    };

    this.sink(redact(JSON.stringify(logEntry)));
  }
}

/**
 * Replace credentials in a serialized log line
 */
export function redact(line: string): string {
  return line.replace(REDACTION_PATTERN, '$1[REDACTED]');
}

/**
 * Default logger for a named component
 */
export function createLogger(component: string, options?: StructuredLoggerOptions): ILogger {
  return new StructuredLogger({ component }, options);
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  meta?: Record<string, unknown>;
}

/**
 * Logger that keeps entries in memory instead of writing them
 */
export class MemoryLogger implements ILogger {
  readonly entries: LogEntry[] = [];

  debug(message: string, meta?: Record<string, unknown>): void {
    this.entries.push({ level: 'debug', message, meta });
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.entries.push({ level: 'info', message, meta });
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.entries.push({ level: 'warn', message, meta });
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.entries.push({ level: 'error', message, meta });
  }

  child(): ILogger {
    return this;
  }

  messages(level: LogLevel): string[] {
    return this.entries.filter((entry) => entry.level === level).map((entry) => entry.message);
  }
}
