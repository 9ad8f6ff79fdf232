import { isInteger, isJsonObject, isString } from '@utils/type-guards';

import type { UploadMediaError } from '@/types/error';

export const isUploadMediaError = (value: unknown): value is UploadMediaError =>
  isJsonObject(value) &&
  isInteger(value.code) &&
  isString(value.name) &&
  isString(value.message);

/**
 * Picks an UploadMediaError out of decoded JSON, ignoring extra fields.
 * Returns `undefined` when a field is missing or has the wrong type.
 */
export const decodeUploadMediaError = (
  value: unknown,
): UploadMediaError | undefined =>
  isUploadMediaError(value)
    ? { code: value.code, name: value.name, message: value.message }
    : undefined;

/** Formats as `"{name}[code:{code}]: {message}"`. */
export const describeUploadMediaError = (error: UploadMediaError): string =>
  `${error.name}[code:${error.code}]: ${error.message}`;
