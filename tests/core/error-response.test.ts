/**
 * @fileoverview Unit tests for the error envelope parser.
 * The parser must never throw: every malformed body degrades to the fallback.
 */
import {
  containsErrorCode,
  createErrorResponse,
  isValidErrorResponse,
  parseErrorResponse,
  ServiceErrorCode,
} from '@core/error-response';
import { describe, expect, test } from 'vitest';

import { bytes, invalidUtf8, jsonBytes } from '../helper/test-helpers';

describe('parseErrorResponse', () => {
  describe('Well-formed envelopes', () => {
    test('Verifies a single error entry is mirrored at the top level', () => {
      const parsed = parseErrorResponse(
        bytes('{"errors":[{"message":"Sorry, that page does not exist","code":34}]}'),
      );

      expect(parsed).toEqual({
        message: 'Sorry, that page does not exist',
        code: 34,
        errors: [
          { message: 'Sorry, that page does not exist', code: 34, errors: [] },
        ],
      });
      expect(containsErrorCode(parsed, 34)).toBe(true);
      expect(containsErrorCode(parsed, 1)).toBe(false);
    });

    test('Verifies malformed entries are skipped and the first kept entry leads', () => {
      const parsed = parseErrorResponse(
        bytes('{"errors":[{"message":"a","code":1},{"bad":"entry"},{"message":"b","code":2}]}'),
      );

      expect(parsed.message).toBe('a');
      expect(parsed.code).toBe(1);
      expect(parsed.errors).toHaveLength(2);
      expect(parsed.errors.map((entry) => entry.message)).toEqual(['a', 'b']);
    });

    test('Verifies entries keep the order of the source array', () => {
      const parsed = parseErrorResponse(
        jsonBytes({
          errors: [
            { message: 'third', code: 3 },
            { message: 'first', code: 1 },
            { message: 'second', code: 2 },
          ],
        }),
      );

      expect(parsed.errors.map((entry) => entry.code)).toEqual([3, 1, 2]);
      expect(parsed.code).toBe(3);
    });

    test('Verifies the leading entry may come after skipped entries', () => {
      const parsed = parseErrorResponse(
        jsonBytes({
          errors: ['not an object', { code: 9 }, { message: 'kept', code: 5 }],
        }),
      );

      expect(parsed).toEqual(
        createErrorResponse('kept', 5, [createErrorResponse('kept', 5)]),
      );
    });

    test('Verifies extra fields on the envelope and on entries are ignored', () => {
      const parsed = parseErrorResponse(
        jsonBytes({
          request: '/1.1/statuses/show.json',
          errors: [{ message: 'Over capacity', code: 130, label: 'x' }],
        }),
      );

      expect(parsed).toEqual(
        createErrorResponse('Over capacity', 130, [
          createErrorResponse('Over capacity', 130),
        ]),
      );
    });

    test.each([
      { scenario: 'a fractional code', entry: { message: 'm', code: 1.5 } },
      { scenario: 'a numeric string code', entry: { message: 'm', code: '34' } },
      { scenario: 'a boolean code', entry: { message: 'm', code: true } },
      { scenario: 'a numeric message', entry: { message: 7, code: 7 } },
      { scenario: 'a null message', entry: { message: null, code: 7 } },
    ])('Verifies an entry with $scenario is skipped', ({ entry }) => {
      const parsed = parseErrorResponse(
        jsonBytes({ errors: [entry, { message: 'valid', code: 2 }] }),
      );

      expect(parsed.errors).toEqual([createErrorResponse('valid', 2)]);
    });
  });

  describe('Fallback', () => {
    test.each([
      { scenario: 'plain text', body: 'Service Unavailable' },
      { scenario: 'an HTML page', body: '<html><body>Bad Gateway</body></html>' },
      { scenario: 'truncated JSON', body: '{"errors":[{"message":"a"' },
      { scenario: 'an empty body', body: '' },
      { scenario: 'an empty errors array', body: '{"errors":[]}' },
      { scenario: 'only malformed entries', body: '{"errors":[{"bad":"entry"},{"code":1}]}' },
      { scenario: 'a string errors field', body: '{"errors":"oops"}' },
      { scenario: 'an object errors field', body: '{"errors":{"message":"a","code":1}}' },
      { scenario: 'no errors field', body: '{"error":"invalid_token"}' },
      { scenario: 'a top-level array', body: '[{"message":"a","code":1}]' },
      { scenario: 'a top-level string', body: '"errors"' },
      { scenario: 'a top-level null', body: 'null' },
    ])('Verifies $scenario yields the raw text with code 0', ({ body }) => {
      expect(parseErrorResponse(bytes(body))).toEqual({
        message: body,
        code: 0,
        errors: [],
      });
    });

    test('Verifies a body that is not valid UTF-8 yields "Unknown"', () => {
      expect(parseErrorResponse(invalidUtf8())).toEqual({
        message: 'Unknown',
        code: 0,
        errors: [],
      });
    });

    test('Verifies multi-byte text survives the fallback unchanged', () => {
      expect(parseErrorResponse(bytes('Überlastet – bitte später')).message).toBe(
        'Überlastet – bitte später',
      );
    });

    test('Verifies containsErrorCode is false for every code on a fallback', () => {
      const parsed = parseErrorResponse(bytes('Internal Server Error'));

      expect(containsErrorCode(parsed, 0)).toBe(false);
      expect(containsErrorCode(parsed, 131)).toBe(false);
    });
  });

  describe('Queries', () => {
    test('Verifies isValidErrorResponse separates parsed envelopes from fallbacks', () => {
      expect(
        isValidErrorResponse(
          parseErrorResponse(jsonBytes({ errors: [{ message: 'a', code: 1 }] })),
        ),
      ).toBe(true);
      expect(isValidErrorResponse(parseErrorResponse(bytes('nope')))).toBe(false);
    });

    test('Verifies containsErrorCode looks past the leading entry', () => {
      const parsed = parseErrorResponse(
        jsonBytes({
          errors: [
            { message: 'Status is a duplicate.', code: ServiceErrorCode.DUPLICATE_STATUS },
            { message: 'Rate limit exceeded', code: ServiceErrorCode.RATE_LIMIT_EXCEEDED },
          ],
        }),
      );

      expect(containsErrorCode(parsed, 88)).toBe(true);
      expect(containsErrorCode(parsed, 187)).toBe(true);
      expect(containsErrorCode(parsed, 34)).toBe(false);
    });

    test('Verifies containsErrorCode only inspects errors, not the top-level code', () => {
      const synthetic = createErrorResponse('synthetic', 34);

      expect(containsErrorCode(synthetic, 34)).toBe(false);
    });
  });
});
