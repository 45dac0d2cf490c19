export {
  VideoProcessingError,
  VideoProcessingErrorCode,
  type VideoProcessingErrorOptions,
  ExtractionError,
  TransferError,
  PackagingError,
  NotificationError,
  ConfigurationError,
  TriggerDecodeError,
  errorMessage,
} from './video-processing.errors';
