/**
 * @fileoverview Provides a no-operation logger implementation.
 */
import type { ClientLogger } from '@/types/dependencies';

export const noop = (): void => {};

/**
 * A logger that discards everything (a "null object"), for callers of the
 * pure entry point that do not want output.
 */
export const noopLogger: ClientLogger = {
  info: noop,
  warn: noop,
  error: noop,
  debug: noop,
  getLevel: () => Number.MAX_SAFE_INTEGER, // disables every level
  levels: { DEBUG: 1 },
};
