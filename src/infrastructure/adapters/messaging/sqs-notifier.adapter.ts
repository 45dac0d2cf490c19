import { Injectable } from '@nestjs/common';
import {
  CompletionNotification,
  NotifierPort,
} from '../../../application/ports/output/notifier.port';
import { ProcessingStatus } from '../../../domain/value-objects/processing-outcome.vo';
import { SqsService } from '../../../shared/aws/sqs/sqs.service';
import { NotificationError, errorMessage } from '../../../shared/errors';
import { PinoLoggerService } from '../../../shared/logging/pino-logger.service';

/**
 * SQS Notifier Adapter
 * Implements NotifierPort by sending the completion message to the queue URL
 * carried by the request.
 */
@Injectable()
export class SqsNotifierAdapter implements NotifierPort {
  constructor(
    private readonly sqsService: SqsService,
    private readonly logger: PinoLoggerService,
  ) {
    this.logger.setContext(SqsNotifierAdapter.name);
  }

  async notify(
    target: string,
    requestId: string,
    resultLocation: string,
    status: ProcessingStatus,
  ): Promise<void> {
    const notification: CompletionNotification = {
      request_id: requestId,
      result_s3_path: resultLocation,
      status,
    };

    try {
      const { messageId } = await this.sqsService.sendMessage(target, notification);
      this.logger.info({ requestId, status, target, messageId }, 'Completion notification sent');
    } catch (error) {
      throw new NotificationError(
        `Failed to send completion notification: ${errorMessage(error)}`,
        { cause: error, details: { target, requestId, status } },
      );
    }
  }
}
