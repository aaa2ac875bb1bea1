export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export function isLogLevel(level: string): level is LogLevel {
  return LOG_LEVELS.some((l) => l === level);
}

/**
 * Console logger filtered by level. Everything goes to stderr: stdout carries
 * sanitized output when the CLI runs in a pipe.
 */
export function createDefaultLogger(level: LogLevel = 'info'): Logger {
  const minLevel = LOG_LEVELS.indexOf(level);

  return {
    debug: (message, ...args) => {
      if (minLevel <= 0) console.error('[logscrub]', message, ...args);
    },
    info: (message, ...args) => {
      if (minLevel <= 1) console.error('[logscrub]', message, ...args);
    },
    warn: (message, ...args) => {
      if (minLevel <= 2) console.warn('[logscrub]', message, ...args);
    },
    error: (message, ...args) => {
      if (minLevel <= 3) console.error('[logscrub]', message, ...args);
    },
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
