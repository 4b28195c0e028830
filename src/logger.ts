/**
 * Logging
 *
 * Components report through a small `Logger` interface. The default writes
 * to the console; debug output is only emitted when `ARMLINK_DEBUG` is set.
 */

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

function debugEnabled(): boolean {
  if (typeof process === 'undefined') return false;
  const value = process.env.ARMLINK_DEBUG;
  return value !== undefined && value !== '' && value !== '0' && value !== 'false';
}

/**
 * Console-backed logger. Messages are prefixed with `[armlink]`.
 */
export function createConsoleLogger(prefix: string = '[armlink]'): Logger {
  const verbose = debugEnabled();
  return {
    debug(message, ...details) {
      if (verbose) console.debug(`${prefix} ${message}`, ...details);
    },
    info(message, ...details) {
      if (verbose) console.info(`${prefix} ${message}`, ...details);
    },
    warn(message, ...details) {
      console.warn(`${prefix} ${message}`, ...details);
    },
    error(message, ...details) {
      console.error(`${prefix} ${message}`, ...details);
    },
  };
}

export const consoleLogger: Logger = createConsoleLogger();

/**
 * Logger that drops everything.
 */
export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};
