export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogData = Record<string, unknown>;

/**
 * Logging capability handed to the socket manager and its collaborators.
 */
export interface Logger {
  debug(message: string, data?: LogData): void;
  info(message: string, data?: LogData): void;
  warn(message: string, data?: LogData): void;
  error(message: string, data?: LogData): void;
  /** Derive a logger that adds `fields` to every entry. */
  child(fields: LogData): Logger;
}

export interface LoggerOptions {
  /** Entries below this level are discarded (default: 'info') */
  level?: LogLevel | undefined;
  /** Fields attached to every entry */
  fields?: LogData | undefined;
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  data?: LogData | undefined;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function formatLog(entry: LogEntry): string {
  const base = `[${entry.timestamp}] ${entry.level.toUpperCase()}: ${entry.message}`;
  if (entry.data && Object.keys(entry.data).length > 0) {
    return `${base} ${JSON.stringify(entry.data)}`;
  }
  return base;
}

function createLogEntry(level: LogLevel, message: string, data?: LogData): LogEntry {
  return {
    level,
    message,
    timestamp: new Date().toISOString(),
    data,
  };
}

const WRITERS: Record<LogLevel, (line: string) => void> = {
  debug: (line) => console.debug(line),
  info: (line) => console.info(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

export function createLogger(options: LoggerOptions = {}): Logger {
  const minLevel = LEVEL_ORDER[options.level ?? 'info'];
  const fields = options.fields ?? {};

  const write = (level: LogLevel, message: string, data?: LogData): void => {
    if (LEVEL_ORDER[level] < minLevel) {
      return;
    }
    WRITERS[level](formatLog(createLogEntry(level, message, { ...fields, ...data })));
  };

  return {
    debug: (message, data) => write('debug', message, data),
    info: (message, data) => write('info', message, data),
    warn: (message, data) => write('warn', message, data),
    error: (message, data) => write('error', message, data),
    child: (childFields) =>
      createLogger({ level: options.level, fields: { ...fields, ...childFields } }),
  };
}

