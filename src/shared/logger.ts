import type { Logger } from './types';

const noop = () => {};

/**
 * Provide a safe fallback logger if console is not available
 */
export function resolveLogger(logger?: Logger): Logger {
  if (logger) return logger;
  return typeof console !== 'undefined' ? console : { log: noop, warn: noop, error: noop };
}

/**
 * Silent logger, for tests and embedders that want no output
 */
export const silentLogger: Logger = { log: noop, warn: noop, error: noop };
