/**
 * Logger utility for @gridmarket/runtime
 *
 * Level-filtered console logging with ISO timestamps. Components accept an
 * optional Logger and fall back to {@link silentLogger}.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

// Private - not exported from module
const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  setLevel(level: LogLevel): void;
  /** Derive a logger that appends `scope` to the prefix and shares the level. */
  child(scope: string): Logger;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

/**
 * Create a logger instance with the specified minimum level
 *
 * @param minLevel - Minimum log level to output (default: 'info')
 * @param prefix - Prefix for log messages (default: '[GridMarket]')
 *
 * @example
 * ```typescript
 * const logger = createLogger('debug', '[Settlement]');
 * logger.info('Auction 3 ended'); // 2026-01-21T12:00:00.000Z INFO  [Settlement] Auction 3 ended
 * logger.child('escrow').debug('x'); // 2026-01-21T12:00:00.001Z DEBUG [Settlement:escrow] x
 * ```
 */
export function createLogger(minLevel: LogLevel = 'info', prefix = '[GridMarket]'): Logger {
  const state = { level: LOG_LEVELS[minLevel] };
  return buildLogger(state, prefix);
}

function buildLogger(state: { level: number }, prefix: string): Logger {
  const log = (level: LogLevel, message: string, ...args: unknown[]) => {
    if (LOG_LEVELS[level] < state.level) return;

    const timestamp = new Date().toISOString();
    const levelStr = level.toUpperCase().padEnd(5);
    const fullMessage = `${timestamp} ${levelStr} ${prefix} ${message}`;

    switch (level) {
      case 'debug':
        console.debug(fullMessage, ...args);
        break;
      case 'info':
        console.info(fullMessage, ...args);
        break;
      case 'warn':
        console.warn(fullMessage, ...args);
        break;
      case 'error':
        console.error(fullMessage, ...args);
        break;
    }
  };

  return {
    debug: (message, ...args) => log('debug', message, ...args),
    info: (message, ...args) => log('info', message, ...args),
    warn: (message, ...args) => log('warn', message, ...args),
    error: (message, ...args) => log('error', message, ...args),
    setLevel: (level) => {
      state.level = LOG_LEVELS[level];
    },
    child: (scope) => buildLogger(state, childPrefix(prefix, scope)),
  };
}

function childPrefix(prefix: string, scope: string): string {
  if (prefix.startsWith('[') && prefix.endsWith(']')) {
    return `${prefix.slice(0, -1)}:${scope}]`;
  }
  return `${prefix}:${scope}`;
}

/**
 * No-op logger for silent operation
 *
 * Use this in tests or when a component is given no logger.
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  setLevel: () => {},
  child: () => silentLogger,
};
