/**
 * Console logger implementation with a minimum level
 */

import { ILogger, LogLevel, LOG_LEVELS } from '../../domain/interfaces';

export function isEnabled(level: LogLevel, minLevel: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(minLevel);
}

export class ConsoleLogger implements ILogger {
  constructor(private readonly minLevel: LogLevel = 'info') {}

  // Always printed, like a plain console.log
  log(message: string, ...args: unknown[]): void {
    console.log(message, ...args);
  }

  error(message: string, ...args: unknown[]): void {
    if (isEnabled('error', this.minLevel)) {
      console.error(message, ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (isEnabled('warn', this.minLevel)) {
      console.warn(message, ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (isEnabled('info', this.minLevel)) {
      console.info(message, ...args);
    }
  }

  debug(message: string, ...args: unknown[]): void {
    if (isEnabled('debug', this.minLevel)) {
      console.debug(message, ...args);
    }
  }
}
