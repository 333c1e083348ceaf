/**
 * Structured logger with file and console output support
 */

import * as fs from 'fs';
import { LogLevel } from '../types';
import { colors, levelColors, stripColors } from '../config/colors';

export interface LoggerOptions {
  logFile?: string | null;
  verbose?: boolean;
  level?: LogLevel;
  /** Drop all output (tests) */
  silent?: boolean;
  scope?: string;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
};

/**
 * Logger with level filtering, scoped prefixes and optional file output
 */
export class Logger {
  private logStream: fs.WriteStream | null;
  private readonly level: LogLevel;
  private readonly silent: boolean;
  private readonly scope: string | null;

  constructor(options: LoggerOptions = {}, stream: fs.WriteStream | null = null) {
    this.level = options.level ?? (options.verbose ? LogLevel.DEBUG : LogLevel.INFO);
    this.silent = options.silent ?? false;
    this.scope = options.scope ?? null;
    this.logStream = stream;

    if (!stream && options.logFile) {
      // Append so restarts keep history
      this.logStream = fs.createWriteStream(options.logFile, { flags: 'a' });
    }
  }

  /**
   * Derive a logger that prefixes every line with [scope]
   */
  child(scope: string): Logger {
    return new Logger(
      { level: this.level, silent: this.silent, scope },
      this.logStream
    );
  }

  debug(...args: unknown[]): void {
    this.write(LogLevel.DEBUG, args);
  }

  info(...args: unknown[]): void {
    this.write(LogLevel.INFO, args);
  }

  warn(...args: unknown[]): void {
    this.write(LogLevel.WARN, args);
  }

  error(...args: unknown[]): void {
    this.write(LogLevel.ERROR, args);
  }

  /**
   * Close the log stream
   */
  close(): void {
    if (this.logStream) {
      this.logStream.end();
      this.logStream = null;
    }
  }

  private write(level: LogLevel, args: unknown[]): void {
    if (this.silent || LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) {
      return;
    }

    const prefix = this.scope ? `[${this.scope}] ` : '';
    const message = prefix + this.formatArgs(args);

    if (this.logStream) {
      this.logStream.write(`${new Date().toISOString()} [${level}] ${stripColors(message)}\n`);
      return;
    }

    const line = `${colors.gray}${new Date().toISOString()}${colors.reset} ${levelColors[level]}${level.padEnd(5)}${colors.reset} ${message}`;
    if (level === LogLevel.ERROR) {
      console.error(line);
    } else if (level === LogLevel.WARN) {
      console.warn(line);
    } else {
      console.log(line);
    }
  }

  private formatArgs(args: unknown[]): string {
    return args
      .map((arg) => {
        if (typeof arg === 'string') {
          return arg;
        }
        if (typeof arg === 'bigint') {
          return arg.toString();
        }
        if (arg instanceof Error) {
          return `${arg.name}: ${arg.message}`;
        }
        if (typeof arg === 'object' && arg !== null) {
          return JSON.stringify(arg, (_key, value: unknown) =>
            typeof value === 'bigint' ? value.toString() : value
          );
        }
        return String(arg);
      })
      .join(' ');
  }
}

/**
 * Global logger instance (initialized by main app)
 */
let globalLogger: Logger | null = null;

/**
 * Initialize the global logger
 */
export function initLogger(options: LoggerOptions): Logger {
  if (globalLogger) {
    globalLogger.close();
  }
  globalLogger = new Logger(options);
  return globalLogger;
}

/**
 * Get the global logger instance
 */
export function getLogger(): Logger {
  if (!globalLogger) {
    globalLogger = new Logger();
  }
  return globalLogger;
}
