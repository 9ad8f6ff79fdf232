import { loglevelAdapter } from '@adapter/loglevel';

import type { ClientLogger } from '@/types/dependencies';

export type Logger = ClientLogger;

let currentLogger: Logger = loglevelAdapter;

/**
 * A proxy logger that delegates to the currently configured logger instance.
 * This allows the logger to be swapped at runtime via `setLogger` while
 * handlers created by the default entry point keep their reference.
 */
export const loggerInstance: Logger = {
  info: (...args: unknown[]) => currentLogger.info(...args),
  warn: (...args: unknown[]) => currentLogger.warn(...args),
  error: (...args: unknown[]) => currentLogger.error(...args),
  debug: (...args: unknown[]) => currentLogger.debug(...args),
  getLevel: () => currentLogger.getLevel(),
  get levels() {
    return currentLogger.levels;
  },
};

/**
 * Overrides the logger used by the default response handler and error mapper.
 * Useful for tests or for routing output into another logging library.
 *
 * @param newLogger The logger instance to use.
 */
export const setLogger = (newLogger: Logger) => {
  currentLogger = newLogger;
};
