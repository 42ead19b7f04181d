/**
 * Fans every call out to a list of loggers
 */

import { ILogger } from '../../domain/interfaces';

export class CompositeLogger implements ILogger {
  constructor(private readonly loggers: readonly ILogger[]) {}

  log(message: string, ...args: unknown[]): void {
    this.loggers.forEach((logger) => logger.log(message, ...args));
  }

  error(message: string, ...args: unknown[]): void {
    this.loggers.forEach((logger) => logger.error(message, ...args));
  }

  warn(message: string, ...args: unknown[]): void {
    this.loggers.forEach((logger) => logger.warn(message, ...args));
  }

  info(message: string, ...args: unknown[]): void {
    this.loggers.forEach((logger) => logger.info(message, ...args));
  }

  debug(message: string, ...args: unknown[]): void {
    this.loggers.forEach((logger) => logger.debug(message, ...args));
  }
}
