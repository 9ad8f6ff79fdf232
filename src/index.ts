/**
 * @fileoverview The main, convenient entry point.
 * Provides a response handler and an Axios error mapper wired to the default
 * loglevel-backed logger.
 */
import { createAxiosErrorMapper } from '@adapter/axios';
import { createResponseHandlerPure } from '@core/response-handler';

import { loggerInstance } from './logger';

// Re-export everything from the pure entry point for a consistent API.
export { type Logger, setLogger } from './logger';
export * from './pure';
export { createAxiosErrorMapper } from '@adapter/axios';

/**
 * Maps anything Axios throws to a ClientError, logging through the current logger.
 */
export const axiosErrorMapper = createAxiosErrorMapper(loggerInstance);

/**
 * Response handler accepting 2xx statuses, logging through the current logger.
 *
 * @example
 * const result = responseHandler.decode(
 *   { status: response.status, body: new Uint8Array(response.data) },
 *   decodeTimeline,
 * );
 * if (!result.isSuccess) log.error(describeClientError(result.error));
 */
export const responseHandler = createResponseHandlerPure({
  logger: loggerInstance,
});
