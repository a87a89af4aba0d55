/**
 * Structured JSON logger for the request engine
 */

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  component: string;
  event: string;
  metadata?: Record<string, unknown>;
  stack?: string;
}

export interface Logger {
  debug(component: string, event: string, metadata?: Record<string, unknown>): void;
  info(component: string, event: string, metadata?: Record<string, unknown>): void;
  warn(component: string, event: string, metadata?: Record<string, unknown>): void;
  error(component: string, event: string, error: Error, metadata?: Record<string, unknown>): void;
}

/**
 * Log levels with their numeric priority (lower = more severe)
 */
const LOG_LEVELS: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

export function parseLogLevel(value: string | undefined, fallback: LogLevel | 'silent' = 'warn'): LogLevel | 'silent' {
  const level = value?.toLowerCase();
  if (level === 'error' || level === 'warn' || level === 'info' || level === 'debug' || level === 'silent') {
    return level;
  }
  return fallback;
}

export interface LoggerOptions {
  level?: LogLevel | 'silent';
  /** Receives one serialized entry per call. Defaults to stderr so stdout stays free for command output. */
  write?: (line: string) => void;
}

/**
 * Create a structured JSON logger
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? parseLogLevel(process.env.LOG_LEVEL);
  const write = options.write ?? ((line: string) => console.error(line));

  const shouldLog = (entryLevel: LogLevel): boolean => level !== 'silent' && LOG_LEVELS[entryLevel] <= LOG_LEVELS[level];

  const emit = (
    entryLevel: LogLevel,
    component: string,
    event: string,
    metadata?: Record<string, unknown>,
    stack?: string,
  ): void => {
    if (!shouldLog(entryLevel)) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level: entryLevel,
      component,
      event,
    };

    if (metadata && Object.keys(metadata).length > 0) {
      entry.metadata = metadata;
    }
    if (stack) {
      entry.stack = stack;
    }

    write(JSON.stringify(entry));
  };

  return {
    debug(component, event, metadata) {
      emit('debug', component, event, metadata);
    },
    info(component, event, metadata) {
      emit('info', component, event, metadata);
    },
    warn(component, event, metadata) {
      emit('warn', component, event, metadata);
    },
    error(component, event, error, metadata) {
      emit('error', component, event, { ...metadata, message: error.message }, error.stack);
    },
  };
}

export const silentLogger: Logger = createLogger({ level: 'silent' });
