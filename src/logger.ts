/**
 * Logger
 *
 * Levelled logging to stderr. Stdout belongs to the JSON-RPC channel, so
 * nothing here may ever write to it.
 */

export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

export type LogContext = Record<string, unknown>;

export interface LogSink {
  write(chunk: string): unknown;
}

export interface LoggerOptions {
  level?: LogLevel;
  timestamp?: boolean;
  colorize?: boolean;
  sink?: LogSink;
}

const COLORS = {
  [LogLevel.DEBUG]: '\x1b[36m', // Cyan
  [LogLevel.INFO]: '\x1b[32m', // Green
  [LogLevel.WARN]: '\x1b[33m', // Yellow
  [LogLevel.ERROR]: '\x1b[31m', // Red
  RESET: '\x1b[0m',
};

const LEVEL_ORDER = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];

export function parseLogLevel(value: string | undefined, fallback: LogLevel = LogLevel.INFO): LogLevel {
  if (!value) return fallback;
  const upper = value.toUpperCase();
  return LEVEL_ORDER.find(level => level === upper) ?? fallback;
}

export class Logger {
  private level: LogLevel;
  private timestamp: boolean;
  private colorize: boolean;
  private sink: LogSink;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level || LogLevel.INFO;
    this.timestamp = options.timestamp !== false;
    this.sink = options.sink ?? process.stderr;
    this.colorize = options.colorize ?? (options.sink === undefined && process.stderr.isTTY === true);
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  private formatMessage(level: LogLevel, message: string, context?: LogContext): string {
    const timestamp = this.timestamp ? `[${new Date().toISOString()}] ` : '';
    const levelStr = this.colorize ? `${COLORS[level]}${level}${COLORS.RESET}` : level;
    const details = context && Object.keys(context).length > 0 ? ` ${safeStringify(context)}` : '';
    return `${timestamp}${levelStr}: ${message}${details}`;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(this.level);
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (this.shouldLog(level)) {
      this.sink.write(`${this.formatMessage(level, message, context)}\n`);
    }
  }

  debug(message: string, context?: LogContext): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log(LogLevel.WARN, message, context);
  }

  error(message: string, error?: unknown, context?: LogContext): void {
    const details =
      error instanceof Error
        ? { error: error.message, ...(error.stack ? { stack: error.stack } : {}) }
        : error === undefined
          ? {}
          : { error: String(error) };
    this.log(LogLevel.ERROR, message, { ...context, ...details });
  }
}

function safeStringify(context: LogContext): string {
  return JSON.stringify(context, (_key, value: unknown) =>
    typeof value === 'bigint' ? value.toString() : value
  );
}

export const logger = new Logger({
  level: parseLogLevel(process.env.LOG_LEVEL),
});
