/**
 * @fileoverview Interprets the media upload status envelope.
 *
 * The status endpoint answers with
 * `{"processing_info":{"state":"failed","error":{"code":1,"name":"InvalidMedia","message":"..."}}}`
 * once server-side processing gives up.
 */
import { readField } from '@utils/type-guards';

import type { ClientError, UploadMediaError } from '@/types/error';

import { UploadMediaFailure, uploadMediaFailed } from './client-error';
import { decodeUploadMediaError } from './upload-media-error';

const UNSPECIFIED_PROCESSING_ERROR: UploadMediaError = {
  code: 0,
  name: 'Unknown',
  message: 'Media processing failed',
};

/**
 * Returns an `uploadMediaFailed` error when the status reports a failed
 * processing state, `null` for every other body.
 */
export const checkMediaProcessing = (json: unknown): ClientError | null => {
  const info = readField(json, 'processing_info');
  if (readField(info, 'state') !== 'failed') return null;

  const error =
    decodeUploadMediaError(readField(info, 'error')) ??
    UNSPECIFIED_PROCESSING_ERROR;
  return uploadMediaFailed(UploadMediaFailure.processingFailed(error));
};
