/**
 * @fileoverview Optional adapter that classifies errors thrown by Axios.
 */
import {
  isClientError,
  RequestFailure,
  requestFailed,
  ResponseFailure,
  responseFailed,
  ResponseSerializationFailure,
  responseSerializationFailed,
  unknownError,
} from '@core/client-error';
import { parseErrorResponse } from '@core/error-response';
import { isSuccessfulStatus } from '@core/response-handler';
import { toBytes } from '@utils/bytes';
import axios, { AxiosError } from 'axios';

import type { ClientLogger } from '@/types/dependencies';
import type { ClientError } from '@/types/error';

/**
 * Handlers receive an AxiosError and return a ClientError, or null when the
 * error is not theirs to classify.
 */
// eslint-disable-next-line no-unused-vars
type ErrorHandler = (error: AxiosError) => ClientError | null;

/**
 * Tried in order; the first non-null result wins.
 */
const errorHandlers: ErrorHandler[] = [
  // Axios rejects before sending when the URL cannot be built
  (error) => {
    if (error.code !== AxiosError.ERR_INVALID_URL) return null;
    return requestFailed(RequestFailure.invalidURL(error.config?.url ?? ''));
  },
  // A successful status that still failed: Axios could not parse the body
  // (ERR_BAD_RESPONSE) or a custom validateStatus rejected it
  (error) => {
    if (!error.response || !isSuccessfulStatus(error.response.status)) {
      return null;
    }
    return error.code === AxiosError.ERR_BAD_RESPONSE
      ? responseSerializationFailed(
          ResponseSerializationFailure.jsonSerializationFailed(error),
        )
      : responseFailed(ResponseFailure.invalidResponse(error));
  },
  // A response arrived but its status failed validateStatus
  (error) => {
    if (!error.response) return null;
    const errorResponse = parseErrorResponse(toBytes(error.response.data));
    return responseFailed(
      ResponseFailure.unacceptableStatusCode(
        error.response.status,
        errorResponse,
      ),
    );
  },
  // Timeouts, aborts and network failures: nothing usable came back
  (error) => responseFailed(ResponseFailure.invalidResponse(error)),
];

const classify = (error: unknown): ClientError => {
  if (isClientError(error)) return error;

  if (axios.isAxiosError(error)) {
    for (const handler of errorHandlers) {
      const result = handler(error);
      if (result) return result;
    }
  }

  return unknownError(error);
};

/**
 * Creates a mapper from anything Axios may throw to a ClientError.
 *
 * @example
 * try {
 *   await axios.get('/statuses/show.json', { params: { id } });
 * } catch (error) {
 *   const clientError = axiosErrorMapper(error);
 *   const reason = getResponseFailureReason(clientError);
 *   if (reason?.type === 'unacceptableStatusCode' &&
 *       containsErrorCode(reason.errorResponse, ServiceErrorCode.RATE_LIMIT_EXCEEDED)) { ... }
 * }
 */
export const createAxiosErrorMapper =
  (logger: ClientLogger) =>
  (error: unknown): ClientError => {
    const clientError = classify(error);
    if (logger.getLevel() <= logger.levels.DEBUG) {
      logger.debug(`[AxiosErrorMapper] Classified error as ${clientError.kind}`, {
        reason: 'reason' in clientError ? clientError.reason.type : undefined,
      });
    }
    return clientError;
  };
