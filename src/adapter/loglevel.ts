/**
 * @fileoverview Optional adapter for the 'loglevel' library.
 * Provides a logger object compatible with the library's dependency contract.
 */
import log from 'loglevel';

import type { ClientLogger } from '@/types/dependencies';

/**
 * Implements `ClientLogger` by delegating every call to `loglevel`.
 */
export const loglevelAdapter: ClientLogger = {
  info: (...args: unknown[]) => log.info(...args),
  warn: (...args: unknown[]) => log.warn(...args),
  error: (...args: unknown[]) => log.error(...args),
  debug: (...args: unknown[]) => log.debug(...args),
  getLevel: () => log.getLevel(),
  levels: {
    DEBUG: log.levels.DEBUG,
  },
};
