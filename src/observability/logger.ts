export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export interface LogEntry {
  ts: string; // ISO timestamp
  level: LogLevel;
  msg: string;
  [key: string]: unknown; // Additional context
}

export interface LoggerOptions {
  level: LogLevel;
  json: boolean; // If false, use human-readable format
  write?: (line: string) => void; // Defaults to stderr
}

/** What code that only emits log lines depends on. */
export interface LogSink {
  debug(msg: string, context?: Record<string, unknown>): void;
  info(msg: string, context?: Record<string, unknown>): void;
  warn(msg: string, context?: Record<string, unknown>): void;
  error(msg: string, context?: Record<string, unknown>): void;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && (LOG_LEVELS as readonly string[]).includes(value);
}

export class Logger implements LogSink {
  private readonly level: LogLevel;
  private readonly json: boolean;
  private readonly sink: (line: string) => void;

  constructor(options: LoggerOptions) {
    this.level = options.level;
    this.json = options.json;
    this.sink = options.write ?? ((line: string) => process.stderr.write(line + '\n'));
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[this.level];
  }

  private formatMessage(level: LogLevel, msg: string, context?: Record<string, unknown>): string {
    const entry: LogEntry = {
      ts: new Date().toISOString(),
      level,
      msg,
      ...context,
    };

    if (this.json) {
      return JSON.stringify(entry);
    }

    const levelStr = level.toUpperCase().padEnd(5);
    const contextStr = context && Object.keys(context).length > 0 ? ` ${JSON.stringify(context)}` : '';
    return `[${entry.ts}] ${levelStr} ${msg}${contextStr}`;
  }

  private write(level: LogLevel, msg: string, context?: Record<string, unknown>): void {
    if (!this.shouldLog(level)) return;
    this.sink(this.formatMessage(level, msg, context));
  }

  debug(msg: string, context?: Record<string, unknown>): void {
    this.write('debug', msg, context);
  }

  info(msg: string, context?: Record<string, unknown>): void {
    this.write('info', msg, context);
  }

  warn(msg: string, context?: Record<string, unknown>): void {
    this.write('warn', msg, context);
  }

  error(msg: string, context?: Record<string, unknown>): void {
    this.write('error', msg, context);
  }

  child(context: Record<string, unknown>): ChildLogger {
    return new ChildLogger(this, context);
  }

  // Logs the elapsed time at debug level when the returned function is called
  time(label: string): () => void {
    const start = performance.now();
    return () => {
      const duration = performance.now() - start;
      this.debug(`${label} completed`, { durationMs: Math.round(duration) });
    };
  }
}

export class ChildLogger implements LogSink {
  constructor(
    private parent: LogSink,
    private context: Record<string, unknown>
  ) {}

  debug(msg: string, context?: Record<string, unknown>): void {
    this.parent.debug(msg, { ...this.context, ...context });
  }

  info(msg: string, context?: Record<string, unknown>): void {
    this.parent.info(msg, { ...this.context, ...context });
  }

  warn(msg: string, context?: Record<string, unknown>): void {
    this.parent.warn(msg, { ...this.context, ...context });
  }

  error(msg: string, context?: Record<string, unknown>): void {
    this.parent.error(msg, { ...this.context, ...context });
  }

  child(context: Record<string, unknown>): ChildLogger {
    return new ChildLogger(this, context);
  }
}

let globalLogger: Logger | null = null;

export function createLogger(options: LoggerOptions): Logger {
  globalLogger = new Logger(options);
  return globalLogger;
}

export function getLogger(): Logger {
  if (!globalLogger) {
    // Default logger for early use
    globalLogger = new Logger({ level: 'info', json: false });
  }
  return globalLogger;
}
