export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

export interface ILogger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/**
 * Level-filtered logger writing to the console. Diagnostics go to stderr so
 * stdout stays free for command summaries.
 */
export class ConsoleLogger implements ILogger {
  constructor(private level: LogLevel = LogLevel.INFO) {}

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.DEBUG) console.error(`[debug] ${message}`, ...args);
  }

  info(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.INFO) console.error(message, ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.WARN) console.error(`WARN: ${message}`, ...args);
  }

  error(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.ERROR) console.error(`ERROR: ${message}`, ...args);
  }
}

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  switch (value?.trim().toLowerCase()) {
    case 'debug':
      return LogLevel.DEBUG;
    case 'info':
      return LogLevel.INFO;
    case 'warn':
      return LogLevel.WARN;
    case 'error':
      return LogLevel.ERROR;
    case 'silent':
      return LogLevel.SILENT;
    default:
      return undefined;
  }
}
