/**
 * Leveled context logger writing to the console.
 *
 * A client can be handed any object with the same four methods instead.
 */

import { config, type LogLevelName } from './config';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

export function parseLogLevel(level: LogLevelName): LogLevel {
  switch (level) {
    case 'debug': return LogLevel.DEBUG;
    case 'info': return LogLevel.INFO;
    case 'warn': return LogLevel.WARN;
    case 'error': return LogLevel.ERROR;
    case 'silent': return LogLevel.SILENT;
  }
}

export interface Logger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}

export class ConsoleLogger implements Logger {
  constructor(
    private readonly context: string,
    private readonly level: LogLevel = parseLogLevel(config.logging.level),
  ) {}

  debug(message: string, meta?: unknown) {
    if (this.level <= LogLevel.DEBUG) console.debug(this.format(message, meta));
  }

  info(message: string, meta?: unknown) {
    if (this.level <= LogLevel.INFO) console.info(this.format(message, meta));
  }

  warn(message: string, meta?: unknown) {
    if (this.level <= LogLevel.WARN) console.warn(this.format(message, meta));
  }

  error(message: string, meta?: unknown) {
    if (this.level <= LogLevel.ERROR) console.error(this.format(message, meta));
  }

  private format(message: string, meta?: unknown): string {
    const line = `[${this.context}] ${message}`;
    return meta === undefined ? line : `${line} ${JSON.stringify(meta)}`;
  }
}

export function createLogger(context: string): Logger {
  return new ConsoleLogger(context);
}
