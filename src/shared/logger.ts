/**
 * Structured console logger.
 *
 * Lines look like `[2025-01-15T12:00:00.000Z] [INFO] message {"key":"value"}`.
 * Never pass passwords, hashes or tokens in the context.
 */

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogContext = Record<string, unknown>;

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

export class Logger {
  constructor(private level: LogLevel = 'info') {}

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  private enabled(level: Exclude<LogLevel, 'silent'>): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.level);
  }

  private format(level: LogLevel, message: string, context?: LogContext): string {
    const timestamp = new Date().toISOString();
    const contextStr = context ? ` ${JSON.stringify(context)}` : '';
    return `[${timestamp}] [${level.toUpperCase()}] ${message}${contextStr}`;
  }

  debug(message: string, context?: LogContext): void {
    if (this.enabled('debug')) console.log(this.format('debug', message, context));
  }

  info(message: string, context?: LogContext): void {
    if (this.enabled('info')) console.log(this.format('info', message, context));
  }

  warn(message: string, context?: LogContext): void {
    if (this.enabled('warn')) console.warn(this.format('warn', message, context));
  }

  error(message: string, error?: Error | LogContext): void {
    if (!this.enabled('error')) return;
    if (error instanceof Error) {
      console.error(this.format('error', message, { error: error.message, stack: error.stack }));
    } else {
      console.error(this.format('error', message, error));
    }
  }
}

const envLevel = process.env.LOG_LEVEL;

export const logger = new Logger(isLogLevel(envLevel) ? envLevel : 'info');
