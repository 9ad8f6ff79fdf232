/* eslint-disable no-unused-vars */
/**
 * @fileoverview Turns raw HTTP responses into decoded values or classified errors.
 *
 * The handler is dependency-injected: it receives a logger and an optional
 * status predicate, and never performs I/O itself. Each step returns a
 * `Result` so callers can stop at the first ClientError.
 */
import { decodeUtf8 } from '@utils/bytes';

import type {
  ResponseHandlerDependencies,
  StatusPredicate,
} from '@/types/dependencies';
import type { ClientError } from '@/types/error';
import { Failure, type Result, Success } from '@/types/result';

import {
  describeClientError,
  ResponseFailure,
  responseFailed,
  ResponseSerializationFailure,
  responseSerializationFailed,
} from './client-error';
import { isValidErrorResponse, parseErrorResponse } from './error-response';
import { checkMediaProcessing } from './media-processing';

/** Status and body as handed over by the transport. */
export interface RawResponse {
  status: number;
  body: Uint8Array;
}

/** Maps decoded JSON into a domain value; throws when the shape is wrong. */
export type Decoder<T> = (json: unknown) => T;

/** Narrows decoded JSON to a domain type. */
export type TypeGuard<T> = (json: unknown) => json is T;

export interface ResponseHandler {
  validate: (response: RawResponse) => Result<Uint8Array>;
  parseJson: (response: RawResponse) => Result<unknown>;
  decode: <T>(response: RawResponse, decoder: Decoder<T>) => Result<T>;
  convert: <T>(
    response: RawResponse,
    guard: TypeGuard<T>,
    typeName: string,
  ) => Result<T>;
  mediaStatus: (response: RawResponse) => Result<unknown>;
}

export const isSuccessfulStatus: StatusPredicate = (status) =>
  status >= 200 && status < 300;

/**
 * Creates a response handler bound to the given dependencies.
 *
 * @example
 * const handler = createResponseHandlerPure({ logger: noopLogger });
 * const result = handler.convert(response, isTimeline, 'Timeline');
 * if (!result.isSuccess && getResponseFailureReason(result.error)) { ... }
 */
export const createResponseHandlerPure = ({
  logger,
  isAcceptableStatus = isSuccessfulStatus,
}: ResponseHandlerDependencies): ResponseHandler => {
  const fail = (
    error: ClientError,
    status: number,
    details: Record<string, unknown> = {},
  ): Result<never> => {
    logger.warn(`[ResponseHandler] ${describeClientError(error)}`, {
      kind: error.kind,
      status,
      ...details,
    });
    return Failure(error);
  };

  const validate = (response: RawResponse): Result<Uint8Array> => {
    if (isAcceptableStatus(response.status)) return Success(response.body);

    const errorResponse = parseErrorResponse(response.body);
    return fail(
      responseFailed(
        ResponseFailure.unacceptableStatusCode(response.status, errorResponse),
      ),
      response.status,
      isValidErrorResponse(errorResponse)
        ? { serviceCodes: errorResponse.errors.map(({ code }) => code) }
        : {},
    );
  };

  const parseJson = (response: RawResponse): Result<unknown> => {
    const validated = validate(response);
    if (!validated.isSuccess) return validated;

    const text = decodeUtf8(validated.value);
    if (text === undefined) {
      return fail(
        responseSerializationFailed(
          ResponseSerializationFailure.cannotConvert(validated.value, 'String'),
        ),
        response.status,
      );
    }

    try {
      return Success(JSON.parse(text));
    } catch (error) {
      return fail(
        responseSerializationFailed(
          ResponseSerializationFailure.jsonSerializationFailed(error),
        ),
        response.status,
      );
    }
  };

  const decode = <T>(response: RawResponse, decoder: Decoder<T>): Result<T> => {
    const json = parseJson(response);
    if (!json.isSuccess) return json;

    try {
      return Success(decoder(json.value));
    } catch (error) {
      return fail(
        responseSerializationFailed(
          ResponseSerializationFailure.jsonDecodeFailed(error),
        ),
        response.status,
      );
    }
  };

  const convert = <T>(
    response: RawResponse,
    guard: TypeGuard<T>,
    typeName: string,
  ): Result<T> => {
    const json = parseJson(response);
    if (!json.isSuccess) return json;
    if (guard(json.value)) return Success(json.value);

    return fail(
      responseSerializationFailed(
        ResponseSerializationFailure.cannotConvert(response.body, typeName),
      ),
      response.status,
    );
  };

  const mediaStatus = (response: RawResponse): Result<unknown> => {
    const json = parseJson(response);
    if (!json.isSuccess) return json;

    const processingError = checkMediaProcessing(json.value);
    if (processingError) return fail(processingError, response.status);

    if (logger.getLevel() <= logger.levels.DEBUG) {
      logger.debug('[ResponseHandler] Media status accepted', json.value);
    }
    return json;
  };

  return { validate, parseJson, decode, convert, mediaStatus };
};
