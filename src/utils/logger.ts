/**
 * Logger interface for type-safe logging
 */
export interface Logger {
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  debug?(message: string, context?: Record<string, unknown>): void;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

/**
 * Console-based logger that drops messages below its minimum level
 */
export class ConsoleLogger implements Logger {
  private readonly threshold: number;

  constructor(public readonly level: LogLevel = 'info') {
    this.threshold = LEVEL_RANK[level];
  }

  warn(message: string, context?: Record<string, unknown>): void {
    if (!this.enabled('warn')) return;
    if (context !== undefined) {
      console.warn(message, context);
    } else {
      console.warn(message);
    }
  }

  error(message: string, context?: Record<string, unknown>): void {
    if (!this.enabled('error')) return;
    if (context !== undefined) {
      console.error(message, context);
    } else {
      console.error(message);
    }
  }

  info(message: string, context?: Record<string, unknown>): void {
    if (!this.enabled('info')) return;
    if (context !== undefined) {
      console.info(message, context);
    } else {
      console.info(message);
    }
  }

  debug(message: string, context?: Record<string, unknown>): void {
    if (!this.enabled('debug')) return;
    if (context !== undefined) {
      console.debug(message, context);
    } else {
      console.debug(message);
    }
  }

  private enabled(level: Exclude<LogLevel, 'silent'>): boolean {
    return LEVEL_RANK[level] >= this.threshold;
  }
}

/**
 * Logger that discards everything. Default for library components.
 */
export const SILENT_LOGGER: Logger = new ConsoleLogger('silent');

export function createLogger(level: LogLevel = 'info'): Logger {
  return level === 'silent' ? SILENT_LOGGER : new ConsoleLogger(level);
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVELS.some((entry) => entry === value);
}
