/**
 * Logging collaborator for the sample output.
 *
 * Every component receives a `Logger` by injection; nothing logs through
 * ambient globals other than the console sink of `ConsoleLogger`.
 */

/**
 * Log levels.
 */
export enum LogLevel {
  Debug = 'debug',
  Info = 'info',
  Warn = 'warn',
  Error = 'error',
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  [LogLevel.Debug]: 0,
  [LogLevel.Info]: 1,
  [LogLevel.Warn]: 2,
  [LogLevel.Error]: 3,
};

export type LogContext = Record<string, unknown>;

/**
 * Log entry structure.
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: Date;
  context: LogContext;
  error?: Error;
}

/**
 * Logger interface.
 */
export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, error?: Error, context?: LogContext): void;
  /** Creates a child logger that adds `context` to every entry. */
  child(context: LogContext): Logger;
}

/**
 * Log configuration.
 */
export interface LogConfig {
  /** Minimum log level. */
  level: LogLevel;
  /** Whether to prefix text output with an ISO timestamp. */
  timestamps: boolean;
  /** Emit one JSON object per line instead of text. */
  json: boolean;
}

export const DEFAULT_LOG_CONFIG: LogConfig = {
  level: LogLevel.Info,
  timestamps: true,
  json: false,
};

/**
 * Parses a level name such as `"warn"`; unknown names fall back to `fallback`.
 */
export function parseLogLevel(value: string | undefined, fallback: LogLevel = LogLevel.Info): LogLevel {
  switch (value?.trim().toLowerCase()) {
    case 'debug':
      return LogLevel.Debug;
    case 'info':
      return LogLevel.Info;
    case 'warn':
    case 'warning':
      return LogLevel.Warn;
    case 'error':
      return LogLevel.Error;
    default:
      return fallback;
  }
}

/**
 * Console logger implementation.
 */
export class ConsoleLogger implements Logger {
  private readonly config: LogConfig;
  private readonly baseContext: LogContext;

  constructor(config: Partial<LogConfig> = {}, baseContext: LogContext = {}) {
    this.config = { ...DEFAULT_LOG_CONFIG, ...config };
    this.baseContext = baseContext;
  }

  debug(message: string, context?: LogContext): void {
    this.log(LogLevel.Debug, message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log(LogLevel.Info, message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log(LogLevel.Warn, message, context);
  }

  error(message: string, error?: Error, context?: LogContext): void {
    this.log(LogLevel.Error, message, context, error);
  }

  child(context: LogContext): Logger {
    return new ConsoleLogger(this.config, { ...this.baseContext, ...context });
  }

  private log(level: LogLevel, message: string, context?: LogContext, error?: Error): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[this.config.level]) {
      return;
    }

    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date(),
      context: { ...this.baseContext, ...context },
      ...(error ? { error } : {}),
    };

    const line = this.config.json ? formatJson(entry) : formatText(entry, this.config.timestamps);
    sinkFor(level)(line);

    if (error && !this.config.json) {
      console.error(error);
    }
  }
}

function formatJson(entry: LogEntry): string {
  return JSON.stringify({
    level: entry.level,
    message: entry.message,
    timestamp: entry.timestamp.toISOString(),
    ...entry.context,
    ...(entry.error && {
      error: {
        name: entry.error.name,
        message: entry.error.message,
        stack: entry.error.stack,
      },
    }),
  });
}

function formatText(entry: LogEntry, timestamps: boolean): string {
  const parts: string[] = [];

  if (timestamps) {
    parts.push(`[${entry.timestamp.toISOString()}]`);
  }

  parts.push(`[${entry.level.toUpperCase()}]`);
  parts.push(entry.message);

  if (Object.keys(entry.context).length > 0) {
    parts.push(JSON.stringify(entry.context));
  }

  return parts.join(' ');
}

function sinkFor(level: LogLevel): (line: string) => void {
  switch (level) {
    case LogLevel.Debug:
      return console.debug;
    case LogLevel.Info:
      return console.info;
    case LogLevel.Warn:
      return console.warn;
    case LogLevel.Error:
      return console.error;
  }
}

/**
 * No-op logger that discards all messages.
 */
export class NoopLogger implements Logger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
  child(): Logger {
    return this;
  }
}

export function createLogger(config: Partial<LogConfig> = {}): Logger {
  return new ConsoleLogger(config);
}

export function createNoopLogger(): Logger {
  return new NoopLogger();
}
