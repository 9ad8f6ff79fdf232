/**
 * @fileoverview Type guards for safer property access on unknown JSON values.
 */

export type JsonObject = Record<string, unknown>;

export const isJsonObject = (value: unknown): value is JsonObject =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export const isString = (value: unknown): value is string =>
  typeof value === 'string';

export const isInteger = (value: unknown): value is number =>
  typeof value === 'number' && Number.isInteger(value);

/** Reads `key` from an unknown value, `undefined` when it is not an object. */
export const readField = (value: unknown, key: string): unknown =>
  isJsonObject(value) ? value[key] : undefined;
