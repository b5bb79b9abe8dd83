/**
 * Console-backed logger with levels and a context prefix.
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  NONE = 4, // silent
}

export interface LoggerOptions {
  level?: LogLevel;
  context?: string;
}

export class Logger {
  private readonly level: LogLevel;
  private readonly context: string | undefined;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? LogLevel.INFO;
    this.context = options.context;
  }

  private format(message: string): string {
    return this.context ? `[${this.context}] ${message}` : message;
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.DEBUG) console.debug(this.format(message), ...args);
  }

  info(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.INFO) console.info(this.format(message), ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.WARN) console.warn(this.format(message), ...args);
  }

  error(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.ERROR) console.error(this.format(message), ...args);
  }

  /** Logger with the same level and a nested context, e.g. `build:render` */
  child(context: string): Logger {
    return new Logger({
      level: this.level,
      context: this.context ? `${this.context}:${context}` : context,
    });
  }
}

export function createLogger(options?: LoggerOptions): Logger {
  return new Logger(options);
}
