import type { LogData, Logger, LogLevel } from '../src/index.js';

export interface LogRecord {
  level: LogLevel;
  message: string;
  data: LogData;
}

export interface RecordingLogger extends Logger {
  /** Entries from this logger and every child derived from it */
  readonly records: LogRecord[];

  /** Messages logged at `level`, in order */
  messages(level: LogLevel): string[];
}

/**
 * Logger that keeps every entry in memory instead of printing it.
 */
export function createRecordingLogger(
  fields: LogData = {},
  records: LogRecord[] = []
): RecordingLogger {
  const record = (level: LogLevel, message: string, data?: LogData): void => {
    records.push({ level, message, data: { ...fields, ...data } });
  };

  return {
    records,
    messages: (level) => records.filter((r) => r.level === level).map((r) => r.message),
    debug: (message, data) => record('debug', message, data),
    info: (message, data) => record('info', message, data),
    warn: (message, data) => record('warn', message, data),
    error: (message, data) => record('error', message, data),
    child: (childFields) => createRecordingLogger({ ...fields, ...childFields }, records),
  };
}
