/**
 * @fileoverview UTF-8 helpers for response and request bodies.
 */

const encoder = new TextEncoder();

// fatal: invalid sequences throw instead of becoming U+FFFD
const strictDecoder = new TextDecoder('utf-8', { fatal: true });

const UNPAIRED_SURROGATE =
  /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

/**
 * Decodes bytes as UTF-8, returning `undefined` for malformed input.
 */
export const decodeUtf8 = (bytes: Uint8Array): string | undefined => {
  try {
    return strictDecoder.decode(bytes);
  } catch {
    return undefined;
  }
};

/**
 * Encodes a string as UTF-8, returning `undefined` when the string holds an
 * unpaired surrogate and so has no UTF-8 form.
 */
export const encodeUtf8 = (value: string): Uint8Array | undefined =>
  UNPAIRED_SURROGATE.test(value) ? undefined : encoder.encode(value);

const isPlainObject = (value: object): boolean => {
  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
};

/**
 * Turns a transport payload into bytes. Strings are UTF-8 encoded, binary
 * payloads are viewed as-is and JSON values are serialized. Other objects
 * (streams, class instances) have no body text and become empty.
 */
export const toBytes = (data: unknown): Uint8Array => {
  if (data instanceof Uint8Array) return data;
  if (data instanceof ArrayBuffer) return new Uint8Array(data);
  if (ArrayBuffer.isView(data)) {
    return new Uint8Array(data.buffer, data.byteOffset, data.byteLength);
  }
  if (typeof data === 'string') return encoder.encode(data);
  if (data === undefined || data === null) return new Uint8Array(0);
  if (typeof data === 'object' && !Array.isArray(data) && !isPlainObject(data)) {
    return new Uint8Array(0);
  }

  try {
    return encoder.encode(JSON.stringify(data));
  } catch {
    // cyclic values and BigInts have no JSON text
    return new Uint8Array(0);
  }
};
