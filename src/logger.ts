/**
 * Console-backed logging shared by the scheduler, executor and middleware.
 */

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = typeof LOG_LEVELS[number];

/**
 * Logger interface accepted anywhere a logger can be injected.
 */
export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

const severity = (level: LogLevel): number => LOG_LEVELS.indexOf(level);

/**
 * Format a log line as `[timestamp] [LEVEL] [scope] message`.
 */
export function formatLogLine(level: Exclude<LogLevel, 'silent'>, scope: string, message: string, at: Date = new Date()): string {
  return `[${at.toISOString()}] [${level.toUpperCase()}] [${scope}] ${message}`;
}

/**
 * Create a logger that drops messages below `level`.
 */
export function createLogger(scope: string, level: LogLevel = 'info'): Logger {
  const enabled = (candidate: LogLevel) => severity(candidate) >= severity(level);

  return {
    debug: (msg, ...args) => {
      if (enabled('debug')) console.debug(formatLogLine('debug', scope, msg), ...args);
    },
    info: (msg, ...args) => {
      if (enabled('info')) console.info(formatLogLine('info', scope, msg), ...args);
    },
    warn: (msg, ...args) => {
      if (enabled('warn')) console.warn(formatLogLine('warn', scope, msg), ...args);
    },
    error: (msg, ...args) => {
      if (enabled('error')) console.error(formatLogLine('error', scope, msg), ...args);
    },
  };
}
