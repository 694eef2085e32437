export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export const DEFAULT_LOG_LEVEL: LogLevel = 'info';

/**
 * Console backed logger. Messages below `level` are dropped.
 */
export function makeConsoleLogger(prefix: string = 'forklift', level: LogLevel = DEFAULT_LOG_LEVEL): Logger {
  const enabled = (messageLevel: LogLevel) => LEVELS.indexOf(messageLevel) >= LEVELS.indexOf(level);
  const format = (message: string) => `[${prefix}] ${message}`;

  return {
    debug: (message, ...details) => { if (enabled('debug')) { console.debug(format(message), ...details); } },
    info: (message, ...details) => { if (enabled('info')) { console.info(format(message), ...details); } },
    warn: (message, ...details) => { if (enabled('warn')) { console.warn(format(message), ...details); } },
    error: (message, ...details) => { if (enabled('error')) { console.error(format(message), ...details); } },
  };
}
