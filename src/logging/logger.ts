export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  /**
   * Derive a logger for a narrower scope (e.g. a single session).
   * The child inherits the parent's sink and, unless given, its level.
   */
  child(scope: string, level?: LogLevel): Logger;
}

export type LogSink = (line: string) => void;

export interface ConsoleLoggerOptions {
  level?: LogLevel;
  prefix?: string;
  /** Defaults to console.error: stdout is reserved for the MCP transport */
  sink?: LogSink;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Leveled logger writing single lines to stderr.
 */
export class ConsoleLogger implements Logger {
  private readonly level: LogLevel;
  private readonly prefix: string;
  private readonly sink: LogSink;

  constructor(options?: ConsoleLoggerOptions) {
    this.level = options?.level ?? 'info';
    this.prefix = options?.prefix ?? '[mcp-sessions]';
    this.sink = options?.sink ?? ((line) => console.error(line));
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.write('debug', message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.write('info', message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.write('warn', message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.write('error', message, meta);
  }

  child(scope: string, level?: LogLevel): Logger {
    return new ConsoleLogger({
      level: level ?? this.level,
      prefix: `${this.prefix} [${scope}]`,
      sink: this.sink,
    });
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_WEIGHT[level] >= LEVEL_WEIGHT[this.level];
  }

  private write(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (!this.isEnabled(level)) {
      return;
    }

    let line = `${this.prefix} ${level.toUpperCase()} ${message}`;
    if (meta && Object.keys(meta).length > 0) {
      line += ` ${JSON.stringify(meta)}`;
    }
    this.sink(line);
  }
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => silentLogger,
};

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
