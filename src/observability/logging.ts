/**
 * Structured logging for the TM1 client.
 *
 * The client never writes to the console on its own unless asked to: callers
 * pass their own {@link Logger}, enable `logging` in the configuration, or get
 * a console logger that only reports warnings and errors.
 */

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  trace(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

export interface ConsoleLoggerOptions {
  /** Lowest level written; defaults to warn */
  level?: LogLevel;
  /** Prefix lines with an ISO timestamp; defaults to true */
  timestamps?: boolean;
}

const LEVEL_RANK: Record<LogLevel, number> = { trace: 0, debug: 1, info: 2, warn: 3, error: 4 };

/**
 * Writes one line per entry: `[tm1] LEVEL message {context}`. Warnings and
 * errors go to stderr.
 */
export class ConsoleLogger implements Logger {
  readonly level: LogLevel;
  private readonly timestamps: boolean;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.level = options.level ?? 'warn';
    this.timestamps = options.timestamps ?? true;
  }

  trace(message: string, context?: Record<string, unknown>): void {
    this.write('trace', message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.write('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.write('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.write('warn', message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.write('error', message, context);
  }

  private write(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (LEVEL_RANK[level] < LEVEL_RANK[this.level]) {
      return;
    }
    const line = [
      ...(this.timestamps ? [new Date().toISOString()] : []),
      '[tm1]',
      level.toUpperCase(),
      message,
      ...(context && Object.keys(context).length > 0 ? [JSON.stringify(context)] : []),
    ].join(' ');
    (LEVEL_RANK[level] >= LEVEL_RANK.warn ? console.error : console.log)(line);
  }
}

/**
 * Discards everything.
 */
export class NoopLogger implements Logger {
  trace(): void {}
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
}

const CREDENTIAL_HEADERS = new Set(['authorization', 'cookie', 'set-cookie', 'tm1-impersonate']);

/**
 * Masks the values of headers that carry credentials.
 */
export function redactHeaders(headers: Record<string, string>): Record<string, string> {
  return Object.fromEntries(
    Object.entries(headers).map(([name, value]) => [name, CREDENTIAL_HEADERS.has(name.toLowerCase()) ? '***' : value])
  );
}

export function logRequest(logger: Logger, method: string, url: string, headers: Record<string, string>): void {
  logger.debug('Outgoing request', { method, url, headers: redactHeaders(headers) });
}

export function logResponse(logger: Logger, method: string, url: string, status: number, durationMs: number): void {
  logger.debug('Incoming response', { method, url, status, durationMs });
}

/**
 * Logs a failure of `operation` at error level.
 */
export function logError(logger: Logger, error: Error, operation: string): void {
  logger.error(`${operation} failed`, { error: error.name, message: error.message });
}
