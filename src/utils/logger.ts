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

export class AppLogger {
  private static threshold: LogLevel = 'info';

  static setLevel(level: LogLevel): void {
    this.threshold = level;
  }

  static getLevel(): LogLevel {
    return this.threshold;
  }

  private static isEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.threshold];
  }

  private static formatMessage(level: string, message: string): string {
    const timestamp = new Date().toISOString();
    return `[${timestamp}] [${level}] ${message}`;
  }

  static info(message: string): void {
    if (this.isEnabled('info')) {
      console.log(this.formatMessage('INFO', message));
    }
  }

  static warn(message: string): void {
    if (this.isEnabled('warn')) {
      console.warn(this.formatMessage('WARN', message));
    }
  }

  static error(message: string, error?: Error): void {
    if (this.isEnabled('error')) {
      const errorDetails = error ? `\n${error.stack ?? error.message}` : '';
      console.error(this.formatMessage('ERROR', message + errorDetails));
    }
  }

  static debug(message: string): void {
    if (this.isEnabled('debug')) {
      console.log(this.formatMessage('DEBUG', message));
    }
  }
}
