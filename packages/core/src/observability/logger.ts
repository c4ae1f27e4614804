/**
 * Structured logging for observa.
 *
 * A lightweight, zero-dependency structured logger with levels, JSON
 * output, per-instance module names and a global debug mode toggle.
 * Observable objects and collections log through a child of the logger
 * given in their configuration.
 *
 * @module observability/logger
 */

/** Log level */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Structured log entry */
export interface LogEntry {
  readonly level: LogLevel;
  readonly message: string;
  readonly timestamp: number;
  readonly module: string;
  readonly context?: Record<string, unknown>;
  readonly error?: { name: string; message: string; stack?: string };
}

/** Logger configuration */
export interface ObservaLoggerConfig {
  /** Minimum log level (default: 'warn') */
  readonly level?: LogLevel;
  /** Enable debug mode (overrides level to 'debug') */
  readonly debug?: boolean;
  /** Module name prefix */
  readonly module?: string;
  /** Custom log handler (default: console when `json` is set, otherwise silent) */
  readonly handler?: (entry: LogEntry) => void;
  /** Enable JSON output format */
  readonly json?: boolean;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let globalDebug = false;

/** Enable/disable global debug mode for all observa loggers */
export function setDebugMode(enabled: boolean): void {
  globalDebug = enabled;
}

/** Check if global debug mode is enabled */
export function isDebugMode(): boolean {
  return globalDebug;
}

/**
 * Structured logger for observa modules.
 *
 * @example
 * ```typescript
 * import { createLogger, defineObservable, observableProperty } from '@observa/core';
 *
 * const log = createLogger({ module: 'app', level: 'debug', json: true });
 * const Person = defineObservable({ age: observableProperty(0) });
 *
 * // Observer registrations and failures of this instance are logged
 * // under "app:Person"
 * const person = new Person({}, { logger: log });
 * ```
 */
export class ObservaLogger {
  private readonly config: Required<Omit<ObservaLoggerConfig, 'handler' | 'json'>> &
    Pick<ObservaLoggerConfig, 'handler' | 'json'>;

  constructor(config: ObservaLoggerConfig = {}) {
    this.config = {
      level: config.debug ? 'debug' : (config.level ?? 'warn'),
      debug: config.debug ?? false,
      module: config.module ?? 'observa',
      handler: config.handler,
      json: config.json,
    };
  }

  /** Module name entries are tagged with */
  get module(): string {
    return this.config.module;
  }

  /** Create a child logger with a sub-module prefix */
  child(subModule: string): ObservaLogger {
    return new ObservaLogger({
      ...this.config,
      module: `${this.config.module}:${subModule}`,
    });
  }

  /** Whether an entry at `level` would be emitted */
  isLevelEnabled(level: LogLevel): boolean {
    const effectiveLevel = globalDebug ? 'debug' : this.config.level;
    return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[effectiveLevel];
  }

  /** Log at debug level */
  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  /** Log at info level */
  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  /** Log at warn level */
  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  /**
   * Log at error level. Non-Error values thrown by user code are
   * stringified into the entry's error message.
   */
  error(message: string, error?: unknown, context?: Record<string, unknown>): void {
    this.log('error', message, context, error === undefined ? undefined : describeError(error));
  }

  // ── Private ──────────────────────────────────────────────────────────

  private log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: LogEntry['error']
  ): void {
    if (!this.isLevelEnabled(level)) return;

    const entry: LogEntry = {
      level,
      message,
      timestamp: Date.now(),
      module: this.config.module,
      ...(context ? { context } : {}),
      ...(error ? { error } : {}),
    };

    if (this.config.handler) {
      this.config.handler(entry);
      return;
    }

    if (this.config.json) {
      const consoleFn = level === 'error' ? console.error : level === 'warn' ? console.warn : console.log;
      consoleFn(JSON.stringify(entry));
    }
    // Silent by default with no handler
  }
}

function describeError(error: unknown): NonNullable<LogEntry['error']> {
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  return { name: 'NonError', message: String(error) };
}

/** Factory function to create an ObservaLogger */
export function createLogger(config?: ObservaLoggerConfig): ObservaLogger {
  return new ObservaLogger(config);
}
