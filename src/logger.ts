/**
 * Logging for the mock API process.
 *
 * Entries go to the console as one JSON object per line so a test harness
 * running the mock can grep or parse them. Loggers are plain objects with
 * bound context (`component`, `routes`, ...); setLogHandler() redirects every
 * entry, which the test suites use to silence or capture output.
 */

export enum LogLevel {
  Debug = 'debug',
  Info = 'info',
  Warn = 'warn',
  Error = 'error',
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
  timestamp: string;
}

export type LogHandler = (entry: LogEntry) => void;

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  child(context: Record<string, unknown>): Logger;
}

const SEVERITY: Record<LogLevel, number> = {
  [LogLevel.Debug]: 0,
  [LogLevel.Info]: 1,
  [LogLevel.Warn]: 2,
  [LogLevel.Error]: 3,
};

const CONSOLE_WRITERS: Record<LogLevel, (line: string) => void> = {
  [LogLevel.Debug]: (line) => console.log(line),
  [LogLevel.Info]: (line) => console.log(line),
  [LogLevel.Warn]: (line) => console.warn(line),
  [LogLevel.Error]: (line) => console.error(line),
};

const consoleHandler: LogHandler = ({ level, timestamp, message, context }) => {
  CONSOLE_WRITERS[level](JSON.stringify({ level, ts: timestamp, msg: message, ...context }));
};

let handler: LogHandler = consoleHandler;
let minLevel: LogLevel = LogLevel.Info;

/** Route entries to `next`; called without arguments, restores console output. */
export function setLogHandler(next?: LogHandler): void {
  handler = next ?? consoleHandler;
}

export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

/** Narrow a raw string, such as LOG_LEVEL, to a LogLevel. */
export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(SEVERITY, value);
}

function emit(level: LogLevel, message: string, context: Record<string, unknown>): void {
  if (SEVERITY[level] < SEVERITY[minLevel]) return;
  handler({ level, message, context, timestamp: new Date().toISOString() });
}

export function createLogger(bound: Record<string, unknown> = {}): Logger {
  const at = (level: LogLevel) => (message: string, context?: Record<string, unknown>) =>
    emit(level, message, { ...bound, ...context });

  return {
    debug: at(LogLevel.Debug),
    info: at(LogLevel.Info),
    warn: at(LogLevel.Warn),
    error: at(LogLevel.Error),
    child: (context) => createLogger({ ...bound, ...context }),
  };
}

/** Root logger; modules derive children carrying their own context. */
export const logger = createLogger({ component: 'cloud-mock-api' });
