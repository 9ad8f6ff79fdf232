/**
 * @fileoverview Lenient parsing of the service's JSON error envelope.
 *
 * The expected body is `{"errors":[{"message":"...","code":34}, ...]}`.
 * Anything else degrades to a fallback response carrying the raw body text;
 * `parseErrorResponse` never throws.
 */
import { decodeUtf8 } from '@utils/bytes';
import { isInteger, isJsonObject, isString } from '@utils/type-guards';

import type { ErrorResponse } from '@/types/error';

/** Well-known service error codes callers commonly branch on. */
export const ServiceErrorCode = {
  PAGE_NOT_FOUND: 34,
  RATE_LIMIT_EXCEEDED: 88,
  OVER_CAPACITY: 130,
  INTERNAL_ERROR: 131,
  DUPLICATE_STATUS: 187,
} as const;

const UNKNOWN_MESSAGE = 'Unknown';

export const createErrorResponse = (
  message: string,
  code: number,
  errors: readonly ErrorResponse[] = [],
): ErrorResponse => ({ message, code, errors });

const fallbackErrorResponse = (bytes: Uint8Array): ErrorResponse =>
  createErrorResponse(decodeUtf8(bytes) ?? UNKNOWN_MESSAGE, 0);

const parseJson = (text: string): { value: unknown } | undefined => {
  try {
    return { value: JSON.parse(text) };
  } catch {
    return undefined;
  }
};

const parseEntry = (entry: unknown): ErrorResponse | undefined => {
  if (!isJsonObject(entry)) return undefined;
  const { message, code } = entry;
  if (!isString(message) || !isInteger(code)) return undefined;
  return createErrorResponse(message, code);
};

/**
 * Parses a raw response body into an ErrorResponse.
 *
 * Entries missing a string `message` or an integer `code` are skipped. When no
 * entry survives (or the body is not the envelope at all) the result is the
 * fallback: the body decoded as UTF-8 (or "Unknown"), code 0, no errors.
 *
 * @example
 * const response = parseErrorResponse(body);
 * if (containsErrorCode(response, ServiceErrorCode.RATE_LIMIT_EXCEEDED)) { ... }
 */
export const parseErrorResponse = (bytes: Uint8Array): ErrorResponse => {
  const text = decodeUtf8(bytes);
  if (text === undefined) return createErrorResponse(UNKNOWN_MESSAGE, 0);

  const parsed = parseJson(text);
  if (!parsed || !isJsonObject(parsed.value)) {
    return fallbackErrorResponse(bytes);
  }

  const { errors } = parsed.value;
  if (!Array.isArray(errors)) return fallbackErrorResponse(bytes);

  const entries: ErrorResponse[] = [];
  for (const entry of errors) {
    const parsedEntry = parseEntry(entry);
    if (parsedEntry) entries.push(parsedEntry);
  }

  const [first] = entries;
  if (!first) return fallbackErrorResponse(bytes);

  return createErrorResponse(first.message, first.code, entries);
};

/** Shallow shape check for values built elsewhere. */
export const isErrorResponse = (value: unknown): value is ErrorResponse =>
  isJsonObject(value) &&
  isString(value.message) &&
  isInteger(value.code) &&
  Array.isArray(value.errors);

/**
 * True when the response came from a parsed envelope rather than the fallback.
 * @internal
 */
export const isValidErrorResponse = (response: ErrorResponse): boolean =>
  response.errors.length > 0;

/** True when any entry in `errors` carries exactly `code`. */
export const containsErrorCode = (
  response: ErrorResponse,
  code: number,
): boolean => response.errors.some((entry) => entry.code === code);
