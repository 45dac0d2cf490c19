/**
 * Error taxonomy for the frame extraction service.
 *
 * Every failure the core can observe is mapped to one of these classes so
 * the orchestrator and the trigger adapter can log a stable `code` and the
 * queue's redelivery policy can be reasoned about from `retryable`.
 */

export enum VideoProcessingErrorCode {
  EXTRACTION_FAILED = 'EXTRACTION_FAILED',
  TRANSFER_FAILED = 'TRANSFER_FAILED',
  PACKAGING_FAILED = 'PACKAGING_FAILED',
  NOTIFICATION_FAILED = 'NOTIFICATION_FAILED',
  CONFIGURATION_INVALID = 'CONFIGURATION_INVALID',
  TRIGGER_DECODE_FAILED = 'TRIGGER_DECODE_FAILED',
}

export interface VideoProcessingErrorOptions {
  cause?: unknown;
  details?: Record<string, unknown>;
}

export abstract class VideoProcessingError extends Error {
  abstract readonly code: VideoProcessingErrorCode;
  abstract readonly retryable: boolean;
  readonly details?: Record<string, unknown>;

  protected constructor(message: string, options: VideoProcessingErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.details = options.details;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      ...(this.details && { details: this.details }),
    };
  }
}

/**
 * The source cannot be opened or decoded.
 */
export class ExtractionError extends VideoProcessingError {
  readonly code = VideoProcessingErrorCode.EXTRACTION_FAILED;
  readonly retryable = false;

  constructor(message: string, options?: VideoProcessingErrorOptions) {
    super(message, options);
  }
}

/**
 * Download or upload against object storage failed.
 */
export class TransferError extends VideoProcessingError {
  readonly code = VideoProcessingErrorCode.TRANSFER_FAILED;
  readonly retryable = true;
  readonly bucket: string;
  readonly key: string;
  /** Storage-side error name, e.g. `AccessDenied` or `NoSuchKey`. */
  readonly reason?: string;

  constructor(
    message: string,
    target: { bucket: string; key: string; reason?: string },
    options?: VideoProcessingErrorOptions,
  ) {
    super(message, options);
    this.bucket = target.bucket;
    this.key = target.key;
    this.reason = target.reason;
  }
}

export class PackagingError extends VideoProcessingError {
  readonly code = VideoProcessingErrorCode.PACKAGING_FAILED;
  readonly retryable = false;

  constructor(message: string, options?: VideoProcessingErrorOptions) {
    super(message, options);
  }
}

export class NotificationError extends VideoProcessingError {
  readonly code = VideoProcessingErrorCode.NOTIFICATION_FAILED;
  readonly retryable = true;

  constructor(message: string, options?: VideoProcessingErrorOptions) {
    super(message, options);
  }
}

/**
 * A required setting is missing or unparseable and has no default.
 */
export class ConfigurationError extends VideoProcessingError {
  readonly code = VideoProcessingErrorCode.CONFIGURATION_INVALID;
  readonly retryable = false;

  constructor(message: string, options?: VideoProcessingErrorOptions) {
    super(message, options);
  }
}

/**
 * The inbound trigger message is malformed. Raised before a request exists.
 */
export class TriggerDecodeError extends VideoProcessingError {
  readonly code = VideoProcessingErrorCode.TRIGGER_DECODE_FAILED;
  readonly retryable = false;

  constructor(message: string, options?: VideoProcessingErrorOptions) {
    super(message, options);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
