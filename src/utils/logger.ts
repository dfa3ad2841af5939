/**
 * Logging utilities
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

export class AppLogger {
  private static level: LogLevel = AppLogger.levelFromEnv(process.env.LOG_LEVEL);

  static levelFromEnv(value: string | undefined): LogLevel {
    const normalized = (value || '').trim().toLowerCase();
    return isLogLevel(normalized) ? normalized : 'info';
  }

  static setLevel(level: LogLevel): void {
    this.level = level;
  }

  static getLevel(): LogLevel {
    return this.level;
  }

  private static formatMessage(level: string, message: string): string {
    const timestamp = new Date().toISOString();
    return `[${timestamp}] [${level}] ${message}`;
  }

  private static enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  static info(message: string): void {
    if (this.enabled('info')) {
      console.log(this.formatMessage('INFO', message));
    }
  }

  static warn(message: string): void {
    if (this.enabled('warn')) {
      console.warn(this.formatMessage('WARN', message));
    }
  }

  static error(message: string, error?: unknown): void {
    if (!this.enabled('error')) {
      return;
    }
    let errorDetails = '';
    if (error instanceof Error) {
      errorDetails = `\n${error.stack ?? error.message}`;
    } else if (error !== undefined) {
      errorDetails = `\n${String(error)}`;
    }
    console.error(this.formatMessage('ERROR', message + errorDetails));
  }

  static debug(message: string): void {
    if (this.enabled('debug')) {
      console.log(this.formatMessage('DEBUG', message));
    }
  }
}
