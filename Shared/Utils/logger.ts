/**
 * Shared logger for the sandbox services.
 *
 * Every level goes to stderr so that process stdout stays free for whatever
 * the host pipes through it (supervisors, `| jq`, test runners).
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isValidLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

/**
 * JSON replacer that serializes Error objects (whose properties are non-enumerable).
 */
function errorReplacer(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    const obj: Record<string, unknown> = { message: value.message, name: value.name };
    if (value.stack) obj.stack = value.stack;
    if ('code' in value) obj.code = value.code;
    return obj;
  }
  return value;
}

/**
 * The level is read from `LOG_LEVEL` on every call, so loggers created at
 * import time pick up a value that `.env` loading sets later.
 */
function currentLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL;
  return isValidLogLevel(envLevel) ? envLevel : 'info';
}

export class Logger {
  constructor(private readonly context: string = 'sandbox') {}

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[currentLevel()];
  }

  private formatMessage(level: LogLevel, message: string, data?: unknown): string {
    const timestamp = new Date().toISOString();
    const base = `[${timestamp}] [${level.toUpperCase()}] [${this.context}] ${message}`;
    if (data !== undefined) {
      return `${base} ${JSON.stringify(data, errorReplacer)}`;
    }
    return base;
  }

  private write(level: LogLevel, message: string, data?: unknown): void {
    if (this.shouldLog(level)) {
      console.error(this.formatMessage(level, message, data));
    }
  }

  debug(message: string, data?: unknown): void {
    this.write('debug', message, data);
  }

  info(message: string, data?: unknown): void {
    this.write('info', message, data);
  }

  warn(message: string, data?: unknown): void {
    this.write('warn', message, data);
  }

  error(message: string, data?: unknown): void {
    this.write('error', message, data);
  }

  /**
   * Create a child logger with additional context
   */
  child(context: string): Logger {
    return new Logger(`${this.context}:${context}`);
  }
}
