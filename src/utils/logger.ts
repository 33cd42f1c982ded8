/**
 * Logger utility for the GA4 query tool
 *
 * Entries are JSON lines on stderr: stdout carries report output for the CLI
 * and the protocol stream for the MCP server.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

export interface LogContext {
  tool?: string;
  report?: string;
}

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  metadata?: Record<string, unknown>;
}

export type LogSink = (line: string) => void;

class Logger {
  private level: LogLevel;
  private sink: LogSink = (line) => console.error(line);
  private static instance: Logger;

  private readonly levelPriority: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
  };

  private constructor() {
    const fromEnv = process.env.LOG_LEVEL ?? '';
    this.level = isLogLevel(fromEnv) ? fromEnv : 'info';
  }

  static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  setSink(sink: LogSink): void {
    this.sink = sink;
  }

  private shouldLog(level: LogLevel): boolean {
    return this.levelPriority[level] >= this.levelPriority[this.level];
  }

  private formatEntry(entry: LogEntry): string {
    const base = {
      timestamp: entry.timestamp,
      level: entry.level.toUpperCase(),
      message: entry.message,
      ...(entry.metadata && Object.keys(entry.metadata).length > 0 && { ...entry.metadata }),
    };

    return JSON.stringify(base);
  }

  private log(level: LogLevel, message: string, metadata?: Record<string, unknown>): void {
    if (!this.shouldLog(level)) return;

    this.sink(
      this.formatEntry({
        timestamp: new Date().toISOString(),
        level,
        message,
        metadata,
      })
    );
  }

  debug(message: string, metadata?: Record<string, unknown>): void {
    this.log('debug', message, metadata);
  }

  info(message: string, metadata?: Record<string, unknown>): void {
    this.log('info', message, metadata);
  }

  warn(message: string, metadata?: Record<string, unknown>): void {
    this.log('warn', message, metadata);
  }

  error(message: string, metadata?: Record<string, unknown>): void {
    this.log('error', message, metadata);
  }

  child(context: LogContext): ChildLogger {
    return new ChildLogger(this, context);
  }
}

class ChildLogger {
  constructor(
    private parent: Logger,
    private context: LogContext
  ) {}

  debug(message: string, metadata?: Record<string, unknown>): void {
    this.parent.debug(message, { ...this.context, ...metadata });
  }

  info(message: string, metadata?: Record<string, unknown>): void {
    this.parent.info(message, { ...this.context, ...metadata });
  }

  warn(message: string, metadata?: Record<string, unknown>): void {
    this.parent.warn(message, { ...this.context, ...metadata });
  }

  error(message: string, metadata?: Record<string, unknown>): void {
    this.parent.error(message, { ...this.context, ...metadata });
  }
}

export const logger = Logger.getInstance();
export { Logger, ChildLogger };
