import { ProcessingStatus } from '../../../domain/value-objects/processing-outcome.vo';

/**
 * Wire format of the completion message. Exactly these three fields.
 */
export interface CompletionNotification {
  request_id: string;
  result_s3_path: string;
  status: ProcessingStatus;
}

/**
 * Notifier Port (Driven Port)
 * Fire-and-forget completion message. Raises NotificationError on delivery
 * failure; no internal retry.
 */
export interface NotifierPort {
  notify(
    target: string,
    requestId: string,
    resultLocation: string,
    status: ProcessingStatus,
  ): Promise<void>;
}
