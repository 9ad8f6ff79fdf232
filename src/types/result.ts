import type { ClientError } from './error';

/** Outcome of a step that can fail with a classified client error. */
export type Result<T> =
  | { readonly isSuccess: true; readonly value: T }
  | { readonly isSuccess: false; readonly error: ClientError };

export const Success = <T>(value: T): Result<T> => ({ isSuccess: true, value });

export const Failure = (error: ClientError): Result<never> => ({
  isSuccess: false,
  error,
});
