/**
 * @fileoverview Console-backed logging with a `[pawlink]` prefix and level filtering.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Returns a logger whose lines carry an extra scope tag. */
  child(scope: string): Logger;
}

export interface LogSink {
  log(line: string): void;
  warn(line: string): void;
  error(line: string): void;
}

export function isLogLevel(value: unknown): value is LogLevel {
  const names: readonly string[] = LOG_LEVELS;
  return typeof value === 'string' && names.includes(value);
}

export function createLogger(
  level: LogLevel = 'info',
  sink: LogSink = console,
  scope?: string
): Logger {
  const threshold = LEVEL_ORDER[level];
  const prefix = scope !== undefined ? `[pawlink:${scope}]` : '[pawlink]';
  const enabled = (candidate: LogLevel): boolean => LEVEL_ORDER[candidate] >= threshold;

  return {
    debug(message) {
      if (enabled('debug')) {
        sink.log(`${prefix} ${message}`);
      }
    },
    info(message) {
      if (enabled('info')) {
        sink.log(`${prefix} ${message}`);
      }
    },
    warn(message) {
      if (enabled('warn')) {
        sink.warn(`${prefix} ${message}`);
      }
    },
    error(message) {
      if (enabled('error')) {
        sink.error(`${prefix} ${message}`);
      }
    },
    child(childScope) {
      const nested = scope !== undefined ? `${scope}:${childScope}` : childScope;
      return createLogger(level, sink, nested);
    },
  };
}

/** Logger that drops everything; handy default for library classes. */
export const silentLogger: Logger = createLogger('silent');
