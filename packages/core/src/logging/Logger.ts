/**
 * Logging for the converter.
 *
 * Console output goes through console.error/warn/info/debug prefixed with
 * the level tag; a log file, when configured, gets every message down to
 * debug with an ISO timestamp.
 *
 *   const logger = createLogger('warnings', { logFile: '.archconf/convert.log' });
 *   logger.info('Parsed database', { records: 42 });   // file only
 *   await closeLogger(logger);
 */

import { createWriteStream, mkdirSync, statSync, writeFileSync, type WriteStream } from 'fs';
import { dirname, resolve } from 'path';
import type { LogLevel, Logger } from '@archconf/types';

export type { LogLevel, Logger };

export const LOG_LEVELS: readonly LogLevel[] = ['silent', 'errors', 'warnings', 'info', 'debug'];

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

type Method = keyof Logger;

/** Lowest configured level at which each method produces output */
const ENABLED_FROM: Record<Method, LogLevel> = {
  error: 'errors',
  warn: 'warnings',
  info: 'info',
  debug: 'debug',
  trace: 'debug',
};

const TAG: Record<Method, string> = {
  error: 'ERROR',
  warn: 'WARN',
  info: 'INFO',
  debug: 'DEBUG',
  trace: 'TRACE',
};

type Context = Record<string, unknown>;

/**
 * `message {"key":value}`; circular references print as "[Circular]".
 */
export function formatMessage(message: string, context?: Context): string {
  if (!context || Object.keys(context).length === 0) {
    return message;
  }
  const seen = new WeakSet<object>();
  const json = JSON.stringify(context, (_key, value: unknown) => {
    if (typeof value !== 'object' || value === null) return value;
    if (seen.has(value)) return '[Circular]';
    seen.add(value);
    return value;
  });
  return `${message} ${json}`;
}

/**
 * Shared level filter. Subclasses only decide where an enabled line goes.
 */
abstract class LevelLogger implements Logger {
  private readonly rank: number;

  constructor(level: LogLevel) {
    this.rank = LOG_LEVELS.indexOf(level);
  }

  protected abstract emit(method: Method, message: string, context?: Context): void;

  private log(method: Method, message: string, context?: Context): void {
    if (this.rank >= LOG_LEVELS.indexOf(ENABLED_FROM[method])) {
      this.emit(method, message, context);
    }
  }

  error(message: string, context?: Context): void {
    this.log('error', message, context);
  }

  warn(message: string, context?: Context): void {
    this.log('warn', message, context);
  }

  info(message: string, context?: Context): void {
    this.log('info', message, context);
  }

  debug(message: string, context?: Context): void {
    this.log('debug', message, context);
  }

  trace(message: string, context?: Context): void {
    this.log('trace', message, context);
  }
}

export class ConsoleLogger extends LevelLogger {
  constructor(level: LogLevel = 'info') {
    super(level);
  }

  protected emit(method: Method, message: string, context?: Context): void {
    const line = formatMessage(`[${TAG[method]}] ${message}`, context);
    const target = method === 'trace' ? 'debug' : method;
    console[target](line);
  }
}

/**
 * Appends `<ISO time> [LEVEL] message` lines to a file, which is truncated
 * and has its parent directories created on construction.
 */
export class FileLogger extends LevelLogger {
  private readonly stream: WriteStream;

  constructor(level: LogLevel, filePath: string) {
    super(level);
    const path = resolve(filePath);
    mkdirSync(dirname(path), { recursive: true });
    if (statSync(path, { throwIfNoEntry: false })?.isDirectory()) {
      throw new Error(`Cannot write log file: '${path}' is a directory`);
    }
    writeFileSync(path, '');
    this.stream = createWriteStream(path, { flags: 'a' });
    this.stream.on('error', (err) => {
      console.error(`[ERROR] Log file ${path} is no longer writable: ${err.message}`);
    });
  }

  protected emit(method: Method, message: string, context?: Context): void {
    this.stream.write(`${formatMessage(`${new Date().toISOString()} [${TAG[method]}] ${message}`, context)}\n`);
  }

  close(): Promise<void> {
    return new Promise((done) => {
      this.stream.end(done);
    });
  }
}

/**
 * Fans every call out to several loggers; each applies its own level.
 */
export class MultiLogger implements Logger {
  constructor(private readonly loggers: readonly Logger[]) {}

  error(message: string, context?: Context): void {
    this.loggers.forEach((l) => l.error(message, context));
  }

  warn(message: string, context?: Context): void {
    this.loggers.forEach((l) => l.warn(message, context));
  }

  info(message: string, context?: Context): void {
    this.loggers.forEach((l) => l.info(message, context));
  }

  debug(message: string, context?: Context): void {
    this.loggers.forEach((l) => l.debug(message, context));
  }

  trace(message: string, context?: Context): void {
    this.loggers.forEach((l) => l.trace(message, context));
  }

  async close(): Promise<void> {
    await Promise.all(this.loggers.map(closeLogger));
  }
}

/**
 * Console logger at `level`; with `logFile`, also a debug-level FileLogger.
 */
export function createLogger(level: LogLevel, options: { logFile?: string } = {}): Logger {
  const consoleLogger = new ConsoleLogger(level);
  return options.logFile ? new MultiLogger([consoleLogger, new FileLogger('debug', options.logFile)]) : consoleLogger;
}

/** Flush any log files held by a logger from createLogger(). */
export async function closeLogger(logger: Logger): Promise<void> {
  if (logger instanceof FileLogger || logger instanceof MultiLogger) {
    await logger.close();
  }
}
