/**
 * @module logger
 * Console-backed loggers with a bracketed component prefix, e.g. `[cutout] model loaded`.
 */

import type { Logger } from '@cutout/types';

/** Logger writing to the console, prefixing every message with `[prefix]`. */
export function createConsoleLogger(prefix: string): Logger {
  const tag = `[${prefix}]`;
  return {
    debug: (message, ...args) => console.debug(`${tag} ${message}`, ...args),
    info: (message, ...args) => console.log(`${tag} ${message}`, ...args),
    warn: (message, ...args) => console.warn(`${tag} ${message}`, ...args),
    error: (message, ...args) => console.error(`${tag} ${message}`, ...args),
  };
}

const noop = (): void => {};

/** Logger that discards everything. */
export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};
