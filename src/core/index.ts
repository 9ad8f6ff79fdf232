/**
 * @fileoverview Internal entry point for the pure, dependency-injected core.
 * Public entry points re-export from here.
 */
export * from './client-error';
export {
  containsErrorCode,
  createErrorResponse,
  isErrorResponse,
  parseErrorResponse,
  ServiceErrorCode,
} from './error-response';
export { checkMediaProcessing } from './media-processing';
export * from './request-encoder';
export * from './response-handler';
export * from './upload-media-error';
