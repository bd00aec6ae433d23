/**
 * JSON-per-line console logger.
 *
 * Each entry carries the level, an ISO timestamp, the logger scope and the
 * message; context fields are spread into the entry as-is.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogContext = Record<string, unknown>;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVEL_ORDER;
}

export class Logger {
  private readonly minLevel: LogLevel;

  constructor(
    private readonly scope: string,
    minLevel?: LogLevel,
  ) {
    const fromEnv = process.env.LOG_LEVEL;
    this.minLevel = minLevel ?? (isLogLevel(fromEnv) ? fromEnv : 'info');
  }

  child(scope: string): Logger {
    return new Logger(`${this.scope}.${scope}`, this.minLevel);
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  error(message: string, error?: unknown, context?: LogContext): void {
    const errorContext =
      error instanceof Error
        ? { ...context, error: { message: error.message, stack: error.stack } }
        : error !== undefined
          ? { ...context, error: String(error) }
          : context;
    this.log('error', message, errorContext);
  }

  private log(level: Exclude<LogLevel, 'silent'>, message: string, context?: LogContext): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) return;

    const entry: Record<string, unknown> = {
      level,
      timestamp: new Date().toISOString(),
      scope: this.scope,
      message,
      ...context,
    };
    Object.keys(entry).forEach((key) => entry[key] === undefined && delete entry[key]);

    const line = JSON.stringify(entry);
    if (level === 'error') console.error(line);
    else if (level === 'warn') console.warn(line);
    else console.log(line);
  }
}
