/**
 * @fileoverview Request construction helpers.
 * Each helper reports failure as a `requestFailed` ClientError instead of throwing.
 */
import { encodeUtf8 } from '@utils/bytes';

import { Failure, type Result, Success } from '@/types/result';

import { RequestFailure, requestFailed } from './client-error';

export type QueryValue = string | number | boolean;

export type QueryParameters = Readonly<Record<string, unknown>>;

const isQueryValue = (value: unknown): value is QueryValue =>
  typeof value === 'string' ||
  typeof value === 'boolean' ||
  (typeof value === 'number' && Number.isFinite(value));

/**
 * Joins `path` onto `baseURL`. An unparsable result becomes `invalidURL`.
 */
export const resolveRequestUrl = (baseURL: string, path: string): Result<URL> => {
  const joined = `${baseURL.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`;
  try {
    return Success(new URL(joined));
  } catch {
    return Failure(requestFailed(RequestFailure.invalidURL(joined)));
  }
};

/**
 * Flattens parameters into query pairs. Arrays are comma-joined, nullish
 * values skipped; objects, functions and non-finite numbers are rejected.
 */
export const encodeQueryParameters = (
  parameters: QueryParameters,
): Result<URLSearchParams> => {
  const search = new URLSearchParams();

  for (const [key, value] of Object.entries(parameters)) {
    if (value === undefined || value === null) continue;

    if (isQueryValue(value)) {
      search.append(key, String(value));
      continue;
    }

    if (Array.isArray(value) && value.every(isQueryValue)) {
      search.append(key, value.map(String).join(','));
      continue;
    }

    return Failure(
      requestFailed(
        RequestFailure.invalidParameter(
          parameters,
          `"${key}" must be a string, finite number, boolean or an array of them`,
        ),
      ),
    );
  }

  return Success(search);
};

/** UTF-8 encodes a string body. */
export const encodeString = (value: string): Result<Uint8Array> => {
  const bytes = encodeUtf8(value);
  return bytes
    ? Success(bytes)
    : Failure(requestFailed(RequestFailure.cannotEncodeStringToData(value)));
};

/** Serializes a JSON body; cyclic values and BigInts fail as `jsonSerializationFailed`. */
export const encodeJsonBody = (value: unknown): Result<Uint8Array> => {
  let text: string;
  try {
    text = JSON.stringify(value);
  } catch (error) {
    return Failure(requestFailed(RequestFailure.jsonSerializationFailed(error)));
  }
  // undefined, functions and symbols stringify to nothing
  if (typeof text !== 'string') {
    return Failure(
      requestFailed(
        RequestFailure.jsonSerializationFailed(
          new TypeError('Value has no JSON representation'),
        ),
      ),
    );
  }
  return encodeString(text);
};
