/**
 * @fileoverview The PURE public entry point.
 * Use this to provide your own logger instead of the loglevel default.
 */
export * from '@core/index';
export { noopLogger } from '@utils/noop-logger';

// Export all public types
export type {
  ClientLogger,
  ResponseHandlerDependencies,
  StatusPredicate,
} from '@/types/dependencies';
export type {
  ClientError,
  ClientErrorKind,
  ErrorResponse,
  RequestFailureReason,
  ResponseFailureReason,
  ResponseSerializationFailureReason,
  UploadMediaError,
  UploadMediaFailureReason,
} from '@/types/error';
export { Failure, type Result, Success } from '@/types/result';
