/**
 * @fileoverview Constructors, descriptions and narrowing for ClientError.
 *
 * Every function here is pure. Descriptions are deterministic so they can be
 * logged, shown to users and asserted on in tests.
 */
import {
  isInteger,
  isJsonObject,
  isString,
  type JsonObject,
} from '@utils/type-guards';

import type {
  ClientError,
  ClientErrorKind,
  ErrorResponse,
  RequestFailureReason,
  ResponseFailureReason,
  ResponseSerializationFailureReason,
  UploadMediaError,
  UploadMediaFailureReason,
} from '@/types/error';

import { isErrorResponse } from './error-response';
import {
  describeUploadMediaError,
  isUploadMediaError,
} from './upload-media-error';

// --- Reason factories ---

export const RequestFailure = {
  invalidURL: (url: string): RequestFailureReason => ({
    type: 'invalidURL',
    url,
  }),
  invalidParameter: (
    parameter: Readonly<Record<string, unknown>>,
    cause: string,
  ): RequestFailureReason => ({ type: 'invalidParameter', parameter, cause }),
  cannotEncodeStringToData: (string: string): RequestFailureReason => ({
    type: 'cannotEncodeStringToData',
    string,
  }),
  jsonSerializationFailed: (cause: unknown): RequestFailureReason => ({
    type: 'jsonSerializationFailed',
    cause,
  }),
};

export const ResponseFailure = {
  invalidResponse: (cause?: unknown): ResponseFailureReason =>
    cause === undefined
      ? { type: 'invalidResponse' }
      : { type: 'invalidResponse', cause },
  unacceptableStatusCode: (
    statusCode: number,
    errorResponse: ErrorResponse,
  ): ResponseFailureReason => ({
    type: 'unacceptableStatusCode',
    statusCode,
    errorResponse,
  }),
};

export const ResponseSerializationFailure = {
  jsonSerializationFailed: (
    cause: unknown,
  ): ResponseSerializationFailureReason => ({
    type: 'jsonSerializationFailed',
    cause,
  }),
  jsonDecodeFailed: (cause: unknown): ResponseSerializationFailureReason => ({
    type: 'jsonDecodeFailed',
    cause,
  }),
  cannotConvert: (
    data: Uint8Array,
    targetTypeName: string,
  ): ResponseSerializationFailureReason => ({
    type: 'cannotConvert',
    data,
    targetTypeName,
  }),
};

export const UploadMediaFailure = {
  processingFailed: (error: UploadMediaError): UploadMediaFailureReason => ({
    type: 'processingFailed',
    error,
  }),
};

// --- Case factories ---

export const requestFailed = (reason: RequestFailureReason): ClientError => ({
  kind: 'requestFailed',
  reason,
});

export const responseFailed = (reason: ResponseFailureReason): ClientError => ({
  kind: 'responseFailed',
  reason,
});

export const responseSerializationFailed = (
  reason: ResponseSerializationFailureReason,
): ClientError => ({ kind: 'responseSerializationFailed', reason });

export const uploadMediaFailed = (
  reason: UploadMediaFailureReason,
): ClientError => ({ kind: 'uploadMediaFailed', reason });

export const unknownError = (cause: unknown): ClientError => ({
  kind: 'unknown',
  cause,
});

// --- Guards and conversion ---

type ReasonCheck = (reason: JsonObject) => boolean;

const hasCause: ReasonCheck = (reason) => 'cause' in reason;

// Payload checks per kind and reason type; a foreign object must pass one to
// be treated as a ClientError.
const REASON_CHECKS: ReadonlyMap<string, ReadonlyMap<string, ReasonCheck>> =
  new Map<Exclude<ClientErrorKind, 'unknown'>, ReadonlyMap<string, ReasonCheck>>([
    [
      'requestFailed',
      new Map<RequestFailureReason['type'], ReasonCheck>([
        ['invalidURL', (reason) => isString(reason.url)],
        [
          'invalidParameter',
          (reason) => isJsonObject(reason.parameter) && isString(reason.cause),
        ],
        ['cannotEncodeStringToData', (reason) => isString(reason.string)],
        ['jsonSerializationFailed', hasCause],
      ]),
    ],
    [
      'responseFailed',
      new Map<ResponseFailureReason['type'], ReasonCheck>([
        ['invalidResponse', () => true],
        [
          'unacceptableStatusCode',
          (reason) =>
            isInteger(reason.statusCode) && isErrorResponse(reason.errorResponse),
        ],
      ]),
    ],
    [
      'responseSerializationFailed',
      new Map<ResponseSerializationFailureReason['type'], ReasonCheck>([
        ['jsonSerializationFailed', hasCause],
        ['jsonDecodeFailed', hasCause],
        [
          'cannotConvert',
          (reason) =>
            reason.data instanceof Uint8Array && isString(reason.targetTypeName),
        ],
      ]),
    ],
    [
      'uploadMediaFailed',
      new Map<UploadMediaFailureReason['type'], ReasonCheck>([
        ['processingFailed', (reason) => isUploadMediaError(reason.error)],
      ]),
    ],
  ]);

export const isClientError = (value: unknown): value is ClientError => {
  if (!isJsonObject(value) || !isString(value.kind)) return false;
  if (value.kind === 'unknown') return 'cause' in value;
  if (!isJsonObject(value.reason) || !isString(value.reason.type)) return false;

  const check = REASON_CHECKS.get(value.kind)?.get(value.reason.type);
  return check !== undefined && check(value.reason);
};

/**
 * Converts any thrown value into a ClientError. A value that already is one
 * is returned unchanged, so `toClientError(toClientError(e)) === toClientError(e)`.
 */
export const toClientError = (error: unknown): ClientError =>
  isClientError(error) ? error : unknownError(error);

// --- Descriptions ---

// Object.prototype.toString never consults the value's own toString.
const tagOf = (value: unknown): string => {
  try {
    return Object.prototype.toString.call(value);
  } catch {
    return '[object Unknown]';
  }
};

const formatParameter = (parameter: Readonly<Record<string, unknown>>) => {
  let text: unknown;
  try {
    text = JSON.stringify(parameter);
  } catch {
    text = undefined;
  }
  // cyclic values throw; a toJSON returning undefined yields no text
  return isString(text) ? text : tagOf(parameter);
};

const describeValue = (cause: unknown): string => {
  if (isClientError(cause)) return describeClientError(cause);
  if (isUploadMediaError(cause)) return describeUploadMediaError(cause);
  if (cause instanceof Error) return cause.message || cause.name;
  if (isString(cause)) return cause;
  return String(cause);
};

/**
 * Human-readable text for an opaque underlying failure. Never empty and never
 * throws: values that cannot be stringified are described by their tag.
 */
export const describeCause = (cause: unknown): string => {
  let text: unknown;
  try {
    text = describeValue(cause);
  } catch {
    text = undefined;
  }
  return isString(text) && text !== '' ? text : tagOf(cause);
};

export const describeRequestFailure = (reason: RequestFailureReason): string => {
  switch (reason.type) {
    case 'invalidURL':
      return `URL is not valid: ${reason.url}`;
    case 'invalidParameter':
      return `Parameter is not valid: ${formatParameter(reason.parameter)}, cause: ${reason.cause}`;
    case 'cannotEncodeStringToData':
      return `Could not encode "${reason.string}"`;
    case 'jsonSerializationFailed':
      return `JSON could not be serialized because of error:\n${describeCause(reason.cause)}`;
  }
};

export const describeResponseFailure = (
  reason: ResponseFailureReason,
): string => {
  switch (reason.type) {
    case 'invalidResponse':
      return reason.cause === undefined
        ? 'Response is invalid'
        : `Response is invalid: ${describeCause(reason.cause)}`;
    case 'unacceptableStatusCode':
      return `Response status code was unacceptable: ${reason.statusCode} with message: ${reason.errorResponse.message}.`;
  }
};

export const describeResponseSerializationFailure = (
  reason: ResponseSerializationFailureReason,
): string => {
  switch (reason.type) {
    case 'jsonSerializationFailed':
      return `Response could not be serialized because of error:\n${describeCause(reason.cause)}`;
    case 'jsonDecodeFailed':
      return `Response could not be decoded because of error:\n${describeCause(reason.cause)}`;
    case 'cannotConvert':
      return `Response could not convert to "${reason.targetTypeName}"`;
  }
};

// Uses the service's own message, not the formatted UploadMediaError text.
export const describeUploadMediaFailure = (
  reason: UploadMediaFailureReason,
): string => reason.error.message;

export const describeClientError = (error: ClientError): string => {
  switch (error.kind) {
    case 'requestFailed':
      return describeRequestFailure(error.reason);
    case 'responseFailed':
      return describeResponseFailure(error.reason);
    case 'responseSerializationFailed':
      return describeResponseSerializationFailure(error.reason);
    case 'uploadMediaFailed':
      return describeUploadMediaFailure(error.reason);
    case 'unknown':
      return describeCause(error.cause);
  }
};

// --- Narrowing accessors ---

export const getRequestFailureReason = (
  error: ClientError,
): RequestFailureReason | undefined =>
  error.kind === 'requestFailed' ? error.reason : undefined;

export const getResponseFailureReason = (
  error: ClientError,
): ResponseFailureReason | undefined =>
  error.kind === 'responseFailed' ? error.reason : undefined;

export const getResponseSerializationFailureReason = (
  error: ClientError,
): ResponseSerializationFailureReason | undefined =>
  error.kind === 'responseSerializationFailed' ? error.reason : undefined;

export const getUploadMediaFailureReason = (
  error: ClientError,
): UploadMediaFailureReason | undefined =>
  error.kind === 'uploadMediaFailed' ? error.reason : undefined;

/** Wrapped in an object so that an `undefined` cause is still distinguishable. */
export const getUnknownCause = (
  error: ClientError,
): { readonly cause: unknown } | undefined =>
  error.kind === 'unknown' ? { cause: error.cause } : undefined;
