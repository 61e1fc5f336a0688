/**
 * Structured logging for the QoS policy packages.
 *
 * Provides a lightweight, zero-dependency structured logger with levels,
 * JSON output, module context, and process-wide debug and handler toggles.
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
}

/** Log entry consumer */
export type LogHandler = (entry: LogEntry) => void;

/** Logger configuration */
export interface QosLoggerConfig {
  /** Minimum log level (default: 'info') */
  readonly level?: LogLevel;
  /** Enable debug mode (overrides level to 'debug') */
  readonly debug?: boolean;
  /** Module name prefix */
  readonly module?: string;
  /** Custom log handler (default: the global handler, if any) */
  readonly handler?: LogHandler;
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
let globalHandler: LogHandler | undefined;

/** Enable/disable global debug mode for all loggers */
export function setDebugMode(enabled: boolean): void {
  globalDebug = enabled;
}

/** Check if global debug mode is enabled */
export function isDebugMode(): boolean {
  return globalDebug;
}

/**
 * Route entries from every logger without its own handler to `handler`.
 * Pass `undefined` to restore the silent default.
 */
export function setLogHandler(handler: LogHandler | undefined): void {
  globalHandler = handler;
}

/**
 * Structured logger for library modules.
 *
 * @example
 * ```typescript
 * import { createLogger } from '@qos-policy/core';
 *
 * const log = createLogger({ module: 'policy-codec', level: 'debug' });
 *
 * log.debug('Decoded policy', { policyId: 5 });
 *
 * const end = log.time('decode-list');
 * // ... do work ...
 * end({ count: 3 }); // logs "decode-list completed" with durationMs
 * ```
 */
export class QosLogger {
  private readonly config: Required<Omit<QosLoggerConfig, 'handler' | 'json'>> &
    Pick<QosLoggerConfig, 'handler' | 'json'>;

  constructor(config: QosLoggerConfig = {}) {
    this.config = {
      level: config.debug ? 'debug' : (config.level ?? 'info'),
      debug: config.debug ?? false,
      module: config.module ?? 'qos-policy',
      handler: config.handler,
      json: config.json,
    };
  }

  get module(): string {
    return this.config.module;
  }

  /** Create a child logger with a sub-module prefix */
  child(subModule: string): QosLogger {
    return new QosLogger({
      ...this.config,
      module: `${this.config.module}:${subModule}`,
    });
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log('error', message, {
      ...context,
      ...(error ? { error: { message: error.message, stack: error.stack } } : {}),
    });
  }

  /**
   * Start a timer. Returns a function that logs completion with duration.
   */
  time(operation: string): (context?: Record<string, unknown>) => void {
    const start = performance.now();
    return (context?: Record<string, unknown>) => {
      const durationMs = Math.round((performance.now() - start) * 100) / 100;
      this.log('debug', `${operation} completed`, { ...context, durationMs });
    };
  }

  // ── Private ──────────────────────────────────────────────────────────

  private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    const effectiveLevel = globalDebug ? 'debug' : this.config.level;
    if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[effectiveLevel]) return;

    const entry: LogEntry = {
      level,
      message,
      timestamp: Date.now(),
      module: this.config.module,
      ...(context ? { context } : {}),
    };

    const handler = this.config.handler ?? globalHandler;
    if (handler) {
      handler(entry);
      return;
    }

    if (this.config.json) {
      const consoleFn = level === 'error' ? console.error : level === 'warn' ? console.warn : console.log;
      consoleFn(JSON.stringify(entry));
    }
    // Silent by default with no handler
  }
}

/** Factory function to create a QosLogger */
export function createLogger(config?: QosLoggerConfig): QosLogger {
  return new QosLogger(config);
}
