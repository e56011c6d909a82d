// src/utils/logger.ts
//
// Leveled console logging. Every component takes a Logger so callers can
// swap in their own (or a capturing one in tests).

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LogLevels: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export type LogContext = Record<string, string | number | boolean | null | undefined>;

export interface LogEntry {
  level: LogLevel;
  message: string;
  context?: LogContext;
  error?: Error;
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, error?: Error, context?: LogContext): void;
}

export interface TestLogger extends Logger {
  readonly entries: LogEntry[];
  messages(level?: LogLevel): string[];
  clear(): void;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LogLevels, value);
}

function createLevelLogger(minLevel: LogLevel, output: (entry: LogEntry) => void): Logger {
  const threshold = LogLevels[minLevel];
  const emit = (entry: LogEntry) => {
    if (LogLevels[entry.level] >= threshold) output(entry);
  };

  return {
    debug: (message, context) => emit({ level: 'debug', message, context }),
    info: (message, context) => emit({ level: 'info', message, context }),
    warn: (message, context) => emit({ level: 'warn', message, context }),
    error: (message, error, context) => emit({ level: 'error', message, error, context }),
  };
}

function formatContext(context?: LogContext): string {
  if (!context) return '';
  const pairs = Object.entries(context)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${value}`);
  return pairs.length ? ` (${pairs.join(', ')})` : '';
}

/**
 * Logger writing to the console. Warnings and errors go to stderr.
 */
export function createConsoleLogger(options: { minLevel?: LogLevel } = {}): Logger {
  return createLevelLogger(options.minLevel ?? 'info', (entry) => {
    const line = `[pathbridge] ${entry.level.toUpperCase()} ${entry.message}${formatContext(entry.context)}`;
    switch (entry.level) {
      case 'error':
        console.error(line, ...(entry.error ? [entry.error] : []));
        break;
      case 'warn':
        console.warn(line);
        break;
      default:
        console.log(line);
    }
  });
}

export function createNoopLogger(): Logger {
  return createLevelLogger('error', () => undefined);
}

/**
 * Captures every entry in memory for assertions.
 */
export function createTestLogger(): TestLogger {
  const entries: LogEntry[] = [];
  const logger = createLevelLogger('debug', (entry) => {
    entries.push(entry);
  });

  return {
    ...logger,
    entries,
    messages: (level?: LogLevel) =>
      entries.filter((entry) => !level || entry.level === level).map((entry) => entry.message),
    clear: () => {
      entries.length = 0;
    },
  };
}

/**
 * Derive a logger that drops everything below `minLevel`.
 * The parent is untouched, so the suppression ends with the derived
 * logger's scope.
 */
export function withMinLevel(logger: Logger, minLevel: LogLevel): Logger {
  const threshold = LogLevels[minLevel];
  const allowed = (level: LogLevel) => LogLevels[level] >= threshold;

  return {
    debug: (message, context) => {
      if (allowed('debug')) logger.debug(message, context);
    },
    info: (message, context) => {
      if (allowed('info')) logger.info(message, context);
    },
    warn: (message, context) => {
      if (allowed('warn')) logger.warn(message, context);
    },
    error: (message, error, context) => {
      if (allowed('error')) logger.error(message, error, context);
    },
  };
}
