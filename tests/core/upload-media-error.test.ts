import {
  decodeUploadMediaError,
  describeUploadMediaError,
  isUploadMediaError,
} from '@core/upload-media-error';
import { describe, expect, test } from 'vitest';

describe('UploadMediaError', () => {
  test('Verifies the description format', () => {
    expect(
      describeUploadMediaError({ code: 404, name: 'NotFound', message: 'missing' }),
    ).toBe('NotFound[code:404]: missing');
  });

  test('Verifies decoding keeps only the three known fields', () => {
    expect(
      decodeUploadMediaError({
        code: 1,
        name: 'InvalidMedia',
        message: 'Invalid or Unsupported media',
        retry_after_secs: 5,
      }),
    ).toEqual({ code: 1, name: 'InvalidMedia', message: 'Invalid or Unsupported media' });
  });

  test.each([
    { scenario: 'a string code', value: { code: '1', name: 'n', message: 'm' } },
    { scenario: 'a missing name', value: { code: 1, message: 'm' } },
    { scenario: 'a missing message', value: { code: 1, name: 'n' } },
    { scenario: 'an array', value: [1, 'n', 'm'] },
    { scenario: 'null', value: null },
  ])('Verifies decoding rejects $scenario', ({ value }) => {
    expect(decodeUploadMediaError(value)).toBeUndefined();
    expect(isUploadMediaError(value)).toBe(false);
  });
});
