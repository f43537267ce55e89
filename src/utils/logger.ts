/**
 * Console-backed logger with a minimum level
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface Logger {
  readonly level: LogLevel;
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const noop = () => {};

export function createLogger(level: LogLevel = 'info'): Logger {
  const enabled = (target: LogLevel) => LEVEL_ORDER[target] >= LEVEL_ORDER[level];

  return {
    level,
    debug: enabled('debug') ? console.debug.bind(console) : noop,
    info: enabled('info') ? console.log.bind(console) : noop,
    warn: enabled('warn') ? console.warn.bind(console) : noop,
    error: enabled('error') ? console.error.bind(console) : noop,
  };
}

export const silentLogger: Logger = createLogger('silent');
