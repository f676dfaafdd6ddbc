/**
 * Defines the available log levels.
 */
export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  DEBUG = 3,
}

let currentLogLevel: LogLevel = LogLevel.INFO;

/**
 * Sets the current logging level for the process.
 */
export function setLogLevel(level: LogLevel): void {
  currentLogLevel = level;
}

const levelNames: Record<string, LogLevel> = {
  error: LogLevel.ERROR,
  warn: LogLevel.WARN,
  info: LogLevel.INFO,
  debug: LogLevel.DEBUG,
};

/**
 * Maps a level name such as "debug" to its {@link LogLevel}.
 * Unknown names yield undefined.
 */
export function parseLogLevel(name: string): LogLevel | undefined {
  return levelNames[name.trim().toLowerCase()];
}

/**
 * Levelled console logger. Diagnostics go to stderr so that CLI output on
 * stdout stays machine readable.
 */
export const logger = {
  debug: (message: string) => {
    if (currentLogLevel >= LogLevel.DEBUG) {
      console.debug(message);
    }
  },
  info: (message: string) => {
    if (currentLogLevel >= LogLevel.INFO) {
      console.error(message);
    }
  },
  warn: (message: string) => {
    if (currentLogLevel >= LogLevel.WARN) {
      console.warn(message);
    }
  },
  /** Always logs, whatever the level. */
  error: (message: string) => {
    if (currentLogLevel >= LogLevel.ERROR) {
      console.error(message);
    }
  },
};
