/**
 * @fileoverview Type definitions for the client error taxonomy.
 *
 * Every failure the client can report is one `ClientError` value. Cases are
 * discriminated on `kind`, reasons on `type`, so callers can switch on them
 * exhaustively.
 */

/**
 * Structured form of the service's JSON error envelope
 * (`{"errors":[{"message":"...","code":34}]}`).
 * When `errors` is non-empty, `message` and `code` mirror `errors[0]`.
 */
export interface ErrorResponse {
  readonly message: string;
  readonly code: number;
  readonly errors: readonly ErrorResponse[];
}

/** Media processing error as reported by the upload status endpoint. */
export interface UploadMediaError {
  readonly code: number;
  readonly name: string;
  readonly message: string;
}

export type RequestFailureReason =
  | { readonly type: 'invalidURL'; readonly url: string }
  | {
      readonly type: 'invalidParameter';
      readonly parameter: Readonly<Record<string, unknown>>;
      readonly cause: string;
    }
  | { readonly type: 'cannotEncodeStringToData'; readonly string: string }
  | { readonly type: 'jsonSerializationFailed'; readonly cause: unknown };

export type ResponseFailureReason =
  | { readonly type: 'invalidResponse'; readonly cause?: unknown }
  | {
      readonly type: 'unacceptableStatusCode';
      readonly statusCode: number;
      readonly errorResponse: ErrorResponse;
    };

export type ResponseSerializationFailureReason =
  | { readonly type: 'jsonSerializationFailed'; readonly cause: unknown }
  | { readonly type: 'jsonDecodeFailed'; readonly cause: unknown }
  | {
      readonly type: 'cannotConvert';
      readonly data: Uint8Array;
      readonly targetTypeName: string;
    };

export type UploadMediaFailureReason = {
  readonly type: 'processingFailed';
  readonly error: UploadMediaError;
};

export type ClientError =
  | { readonly kind: 'requestFailed'; readonly reason: RequestFailureReason }
  | { readonly kind: 'responseFailed'; readonly reason: ResponseFailureReason }
  | {
      readonly kind: 'responseSerializationFailed';
      readonly reason: ResponseSerializationFailureReason;
    }
  | {
      readonly kind: 'uploadMediaFailed';
      readonly reason: UploadMediaFailureReason;
    }
  | { readonly kind: 'unknown'; readonly cause: unknown };

export type ClientErrorKind = ClientError['kind'];
