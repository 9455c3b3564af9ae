/**
 * Structured logging for widecol
 *
 * Every component that logs (the client's tables and read streams, the
 * emulator) accepts an optional {@link Logger}; the default is a no-op
 * logger so the library stays silent unless asked.
 *
 * @example
 * ```typescript
 * import { createConsoleLogger, withContext } from '@widecol/core';
 *
 * const logger = createConsoleLogger({ format: 'pretty', minLevel: 'info' });
 * const tableLogger = withContext(logger, { table: 'projects/p/instances/i/tables/users' });
 * tableLogger.info('Rows read', { rowsRead: 42, durationMs: 15 });
 * ```
 */

// =============================================================================
// Types
// =============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Values allowed in a log context. Contexts are serialized to JSON.
 */
export type LogContextValue =
  | string
  | number
  | boolean
  | null
  | LogContextValue[]
  | { [key: string]: LogContextValue };

/**
 * Structured context attached to log entries.
 */
export interface LogContext {
  /** Component emitting the entry (`client`, `emulator`, ...) */
  service?: string;
  /** RPC or high-level operation (`readRows`, `mutateRows`, `createTable`) */
  operation?: string;
  /** Fully qualified instance name */
  instance?: string;
  /** Fully qualified table name */
  table?: string;
  /** Row key, UTF-8 decoded for display */
  rowKey?: string;
  durationMs?: number;
  rowsRead?: number;
  chunksRead?: number;
  attempt?: number;
  errorCode?: string;
  [key: string]: LogContextValue | undefined;
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  /** Unix timestamp in milliseconds */
  timestamp: number;
  context?: LogContext;
  error?: Error;
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, error?: Error, context?: LogContext): void;
}

export interface LoggerConfig {
  /** Minimum level to emit (default: 'debug') */
  minLevel?: LogLevel;
  /** Sink receiving every emitted entry */
  output?: (entry: LogEntry) => void;
}

export interface ConsoleLoggerConfig extends LoggerConfig {
  /** 'json' for one JSON object per line, 'pretty' for humans (default: 'json') */
  format?: 'json' | 'pretty';
}

/**
 * Logger that keeps its entries for assertions in tests.
 */
export interface TestLogger extends Logger {
  getLogs(): LogEntry[];
  getLogsByLevel(level: LogLevel): LogEntry[];
  clear(): void;
}

// =============================================================================
// Levels
// =============================================================================

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export const LogLevels = {
  DEBUG: 'debug' as const,
  INFO: 'info' as const,
  WARN: 'warn' as const,
  ERROR: 'error' as const,

  order(level: LogLevel): number {
    return LOG_LEVEL_ORDER[level];
  },

  isAtLeast(level: LogLevel, minLevel: LogLevel): boolean {
    return LOG_LEVEL_ORDER[level] >= LOG_LEVEL_ORDER[minLevel];
  },
};

export function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVEL_ORDER;
}

// =============================================================================
// Factories
// =============================================================================

/**
 * Create a logger that hands every entry at or above `minLevel` to `output`.
 */
export function createLogger(config: LoggerConfig = {}): Logger {
  const minLevel = config.minLevel ?? 'debug';
  const output = config.output ?? (() => {});

  const log = (level: LogLevel, message: string, context?: LogContext, error?: Error): void => {
    if (!LogLevels.isAtLeast(level, minLevel)) return;

    const entry: LogEntry = { level, message, timestamp: Date.now() };
    if (context !== undefined) {
      entry.context = context;
    }
    if (error !== undefined) {
      entry.error = error;
    }
    output(entry);
  };

  return {
    debug(message: string, context?: LogContext): void {
      log('debug', message, context);
    },
    info(message: string, context?: LogContext): void {
      log('info', message, context);
    },
    warn(message: string, context?: LogContext): void {
      log('warn', message, context);
    },
    error(message: string, error?: Error, context?: LogContext): void {
      log('error', message, context, error);
    },
  };
}

/**
 * Format a log entry the way {@link createConsoleLogger} prints it.
 */
export function formatLogEntry(entry: LogEntry, format: 'json' | 'pretty'): string {
  if (format === 'json') {
    return JSON.stringify({
      level: entry.level,
      message: entry.message,
      timestamp: entry.timestamp,
      ...(entry.context && { context: entry.context }),
      ...(entry.error && {
        error: {
          name: entry.error.name,
          message: entry.error.message,
          stack: entry.error.stack,
        },
      }),
    });
  }

  const time = new Date(entry.timestamp).toISOString();
  let output = `[${time}] ${entry.level.toUpperCase().padEnd(5)} ${entry.message}`;
  if (entry.context) {
    output += ` ${JSON.stringify(entry.context)}`;
  }
  if (entry.error) {
    output += `\n  Error: ${entry.error.message}`;
    if (entry.error.stack) {
      output += `\n  ${entry.error.stack}`;
    }
  }
  return output;
}

/**
 * Create a logger writing to the console, warnings and errors to stderr.
 */
export function createConsoleLogger(config: ConsoleLoggerConfig = {}): Logger {
  const format = config.format ?? 'json';

  return createLogger({
    ...config,
    output: (entry) => {
      const line = formatLogEntry(entry, format);
      if (entry.level === 'warn' || entry.level === 'error') {
        console.error(line);
      } else {
        console.log(line);
      }
    },
  });
}

/**
 * Logger that discards everything. Default for every widecol component.
 */
export function createNoopLogger(): Logger {
  return {
    debug(): void {},
    info(): void {},
    warn(): void {},
    error(): void {},
  };
}

/**
 * Create a logger that captures entries for assertions.
 *
 * @example
 * ```typescript
 * const logger = createTestLogger();
 * await table.mutateRows(rows);
 * expect(logger.getLogsByLevel('warn')).toHaveLength(0);
 * ```
 */
export function createTestLogger(config: LoggerConfig = {}): TestLogger {
  const logs: LogEntry[] = [];
  const logger = createLogger({
    minLevel: config.minLevel,
    output: (entry) => {
      logs.push(entry);
      config.output?.(entry);
    },
  });

  return {
    ...logger,
    getLogs(): LogEntry[] {
      return [...logs];
    },
    getLogsByLevel(level: LogLevel): LogEntry[] {
      return logs.filter(entry => entry.level === level);
    },
    clear(): void {
      logs.length = 0;
    },
  };
}

/**
 * Child logger that merges `context` into every entry; local context wins.
 */
export function withContext(logger: Logger, context: LogContext): Logger {
  const merge = (local?: LogContext): LogContext =>
    local === undefined ? context : { ...context, ...local };

  return {
    debug(message: string, local?: LogContext): void {
      logger.debug(message, merge(local));
    },
    info(message: string, local?: LogContext): void {
      logger.info(message, merge(local));
    },
    warn(message: string, local?: LogContext): void {
      logger.warn(message, merge(local));
    },
    error(message: string, error?: Error, local?: LogContext): void {
      logger.error(message, error, merge(local));
    },
  };
}
