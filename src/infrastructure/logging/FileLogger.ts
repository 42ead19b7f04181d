/**
 * File logger implementation
 * Appends to dated files under the runtime directory; errors also go to a separate file
 */

import fs from 'fs';
import path from 'path';
import { ILogger, LogLevel } from '../../domain/interfaces';
import { isEnabled } from './ConsoleLogger';

export function formatLine(level: string, message: string, args: unknown[], now: Date = new Date()): string {
  const argsStr = args.length > 0 ? ' ' + args.map(formatArg).join(' ') : '';
  return `[${now.toISOString()}] [${level}] ${message}${argsStr}\n`;
}

function formatArg(arg: unknown): string {
  if (arg instanceof Error) {
    return arg.stack ?? `${arg.name}: ${arg.message}`;
  }
  if (typeof arg === 'object' && arg !== null) {
    try {
      return JSON.stringify(arg);
    } catch {
      return String(arg);
    }
  }
  return String(arg);
}

export class FileLogger implements ILogger {
  private writeStream: fs.WriteStream | null;
  private errorStream: fs.WriteStream | null;

  constructor(logDir: string, private readonly minLevel: LogLevel = 'info') {
    fs.mkdirSync(logDir, { recursive: true });

    const date = new Date().toISOString().split('T')[0];
    this.writeStream = this.open(path.join(logDir, `app-${date}.log`));
    this.errorStream = this.open(path.join(logDir, `error-${date}.log`));
  }

  log(message: string, ...args: unknown[]): void {
    this.write(this.writeStream, 'LOG', message, args);
  }

  error(message: string, ...args: unknown[]): void {
    if (isEnabled('error', this.minLevel)) {
      this.write(this.errorStream, 'ERROR', message, args);
      this.write(this.writeStream, 'ERROR', message, args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (isEnabled('warn', this.minLevel)) {
      this.write(this.writeStream, 'WARN', message, args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (isEnabled('info', this.minLevel)) {
      this.write(this.writeStream, 'INFO', message, args);
    }
  }

  debug(message: string, ...args: unknown[]): void {
    if (isEnabled('debug', this.minLevel)) {
      this.write(this.writeStream, 'DEBUG', message, args);
    }
  }

  /**
   * Close file streams (call on application shutdown)
   */
  close(): void {
    this.writeStream?.end();
    this.errorStream?.end();
    this.writeStream = null;
    this.errorStream = null;
  }

  private open(file: string): fs.WriteStream {
    const stream = fs.createWriteStream(file, { flags: 'a' });
    stream.on('error', (err) => {
      console.error(`Error writing to ${file}:`, err);
    });
    return stream;
  }

  private write(stream: fs.WriteStream | null, level: string, message: string, args: unknown[]): void {
    if (!stream || stream.destroyed || !stream.writable) {
      return;
    }
    stream.write(formatLine(level, message, args));
  }
}
