import { errorMessage } from '../errors';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogContext = Record<string, string | number | boolean | undefined>;

const LEVELS: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

function isLogLevel(value: string): value is LogLevel {
  return value in LEVELS;
}

export function levelFromEnv(value = process.env.LOG_LEVEL): LogLevel {
  const normalized = value?.toLowerCase();
  return normalized && isLogLevel(normalized) ? normalized : 'info';
}

export class Logger {
  private static silenced = false;

  constructor(
    private readonly prefix = '',
    private readonly level: LogLevel = levelFromEnv()
  ) {}

  /** JSON output mode keeps stdout clean for the report. */
  static silence(value: boolean): void {
    Logger.silenced = value;
  }

  child(prefix: string): Logger {
    return new Logger(this.prefix ? `${this.prefix}:${prefix}` : prefix, this.level);
  }

  debug(message: string, context?: LogContext): void {
    if (this.enabled('debug')) console.log(this.format(message, context));
  }

  info(message: string, context?: LogContext): void {
    if (this.enabled('info')) console.log(this.format(message, context));
  }

  warn(message: string, context?: LogContext): void {
    if (this.enabled('warn')) console.warn(this.format(message, context));
  }

  error(message: string, error?: unknown, context?: LogContext): void {
    if (!this.enabled('error')) return;
    const detail = error === undefined ? undefined : errorMessage(error);
    console.error(this.format(message, { ...context, error: detail }));
  }

  private enabled(level: LogLevel): boolean {
    return !Logger.silenced && LEVELS[level] >= LEVELS[this.level];
  }

  private format(message: string, context?: LogContext): string {
    const prefix = this.prefix ? `[${this.prefix}] ` : '';
    const fields = context
      ? Object.entries(context)
          .filter(([, value]) => value !== undefined)
          .map(([key, value]) => `${key}=${String(value)}`)
          .join(' ')
      : '';
    return fields ? `${prefix}${message} (${fields})` : `${prefix}${message}`;
  }
}

export const logger = new Logger('chapter-reel');
