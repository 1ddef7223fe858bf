/**
 * Console logging utility
 * Threshold comes from LOG_LEVEL (debug, info, warn, error), default info
 */

export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 10,
  [LogLevel.INFO]: 20,
  [LogLevel.WARN]: 30,
  [LogLevel.ERROR]: 40,
};

interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  scope?: string;
  metadata?: Record<string, unknown>;
}

export interface Logger {
  debug(message: string, metadata?: Record<string, unknown>): void;
  info(message: string, metadata?: Record<string, unknown>): void;
  warn(message: string, metadata?: Record<string, unknown>): void;
  error(message: string, error?: unknown, metadata?: Record<string, unknown>): void;
  child(scope: string): Logger;
}

export function parseLogLevel(value: string | undefined): LogLevel {
  switch (value?.toLowerCase()) {
    case 'debug':
      return LogLevel.DEBUG;
    case 'warn':
      return LogLevel.WARN;
    case 'error':
      return LogLevel.ERROR;
    default:
      return LogLevel.INFO;
  }
}

export function formatLog(entry: LogEntry): string {
  const scopeStr = entry.scope ? ` [${entry.scope}]` : '';
  const metadataStr = entry.metadata
    ? ` ${JSON.stringify(entry.metadata)}`
    : '';
  return `[${entry.timestamp}] ${entry.level}:${scopeStr} ${entry.message}${metadataStr}`;
}

export function serializeError(error: unknown): unknown {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }
  return error;
}

export function createLogger(
  scope?: string,
  threshold: () => LogLevel = () => parseLogLevel(process.env.LOG_LEVEL)
): Logger {
  function write(level: LogLevel, message: string, metadata?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold()]) return;

    const line = formatLog({
      level,
      message,
      timestamp: new Date().toISOString(),
      scope,
      metadata,
    });

    if (level === LogLevel.ERROR) {
      console.error(line);
    } else if (level === LogLevel.WARN) {
      console.warn(line);
    } else {
      console.log(line);
    }
  }

  return {
    debug(message, metadata) {
      write(LogLevel.DEBUG, message, metadata);
    },

    info(message, metadata) {
      write(LogLevel.INFO, message, metadata);
    },

    warn(message, metadata) {
      write(LogLevel.WARN, message, metadata);
    },

    error(message, error, metadata) {
      write(LogLevel.ERROR, message, {
        ...metadata,
        error: serializeError(error),
      });
    },

    child(childScope) {
      return createLogger(scope ? `${scope}:${childScope}` : childScope, threshold);
    },
  };
}

export const logger = createLogger();
