/**
 * @fileoverview Type definitions for dependency injection.
 */

/**
 * Defines the interface for a logger compatible with the library.
 * This allows consumers to inject their own logging implementation.
 */
export interface ClientLogger {
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
  debug: (...args: unknown[]) => void;
  getLevel: () => number;
  levels: {
    DEBUG: number;
  };
}

/** Decides whether an HTTP status code counts as success. */
export type StatusPredicate = (status: number) => boolean;

/**
 * Dependencies of the pure response handler.
 */
export interface ResponseHandlerDependencies {
  /** The logging implementation. */
  logger: ClientLogger;

  /** Defaults to accepting 200..299. */
  isAcceptableStatus?: StatusPredicate;
}
