/**
 * @fileoverview Verifies what the default and pure entry points expose and
 * that the default instances log through the swappable logger.
 */
import * as main from '@/index';
import * as pure from '@/pure';
import { loglevelAdapter } from '@adapter/loglevel';
import { afterEach, describe, expect, test } from 'vitest';

import { bytes, createMockLogger } from '../helper/test-helpers';

afterEach(() => {
  main.setLogger(loglevelAdapter);
});

describe('Entry points', () => {
  test('Verifies the pure entry point carries no default instances', () => {
    expect('responseHandler' in pure).toBe(false);
    expect('axiosErrorMapper' in pure).toBe(false);
    expect('setLogger' in pure).toBe(false);
    expect(typeof pure.createResponseHandlerPure).toBe('function');
    expect(typeof pure.parseErrorResponse).toBe('function');
  });

  test('Verifies the internal validity check is not exported', () => {
    expect('isValidErrorResponse' in main).toBe(false);
    expect('isValidErrorResponse' in pure).toBe(false);
  });

  test('Verifies the main entry point re-exports the pure API', () => {
    expect(main.toClientError).toBe(pure.toClientError);
    expect(main.ServiceErrorCode.RATE_LIMIT_EXCEEDED).toBe(88);
  });

  test('Verifies the default response handler logs through setLogger', () => {
    const logger = createMockLogger();
    main.setLogger(logger);

    const result = main.responseHandler.validate({
      status: 401,
      body: bytes('{"errors":[{"message":"Could not authenticate you","code":32}]}'),
    });

    expect(result.isSuccess).toBe(false);
    expect(logger.warn).toHaveBeenCalledWith(
      '[ResponseHandler] Response status code was unacceptable: 401 with message: Could not authenticate you.',
      { kind: 'responseFailed', status: 401, serviceCodes: [32] },
    );
  });

  test('Verifies the default Axios mapper logs through setLogger', () => {
    const logger = createMockLogger();
    main.setLogger(logger);

    const error = main.axiosErrorMapper(new Error('boom'));

    expect(main.describeClientError(error)).toBe('boom');
    expect(logger.debug).toHaveBeenCalledWith(
      '[AxiosErrorMapper] Classified error as unknown',
      { reason: undefined },
    );
  });
});
