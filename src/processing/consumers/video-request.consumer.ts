import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SqsMessageHandler } from '@ssut/nestjs-sqs';
import { Message } from '@aws-sdk/client-sqs';
import { AppConfig } from '../../config/configuration';
import { ProcessVideoUseCase } from '../../application/use-cases';
import { ExtractionLimitsPort } from '../../application/ports/output/extraction-limits.port';
import { EXTRACTION_LIMITS_PORT } from '../../application/ports/port.tokens';
import { PinoLoggerService } from '../../shared/logging/pino-logger.service';
import { TriggerDefaults, decodeVideoRequest } from '../dto/video-request.dto';
import { VideoProcessingError, errorMessage } from '../../shared/errors';

export const VIDEO_REQUESTS_CONSUMER = 'video-requests-queue';

/**
 * Video Request Consumer
 * Listens to the video requests queue and runs one request per message.
 *
 * Returning normally deletes the message; throwing leaves it on the queue for
 * redelivery, and eventually the dead-letter queue.
 */
@Injectable()
export class VideoRequestConsumer {
  private readonly defaults: TriggerDefaults;

  constructor(
    private readonly processVideo: ProcessVideoUseCase,
    @Inject(EXTRACTION_LIMITS_PORT) private readonly extractionLimits: ExtractionLimitsPort,
    private readonly configService: ConfigService<AppConfig, true>,
    private readonly logger: PinoLoggerService,
  ) {
    const s3Config = this.configService.get('s3', { infer: true });
    const sqsConfig = this.configService.get('sqs', { infer: true });

    this.defaults = {
      inputBucket: s3Config.inputBucket,
      notificationQueueUrl: sqsConfig.notificationQueueUrl,
    };

    this.logger.setContext(VideoRequestConsumer.name);
  }

  @SqsMessageHandler(VIDEO_REQUESTS_CONSUMER, false)
  async handleMessage(message: Message): Promise<void> {
    const messageLogger = this.logger.withMessageId(message.MessageId ?? 'unknown');

    try {
      const request = decodeVideoRequest(message.Body, this.defaults);
      const limits = await this.extractionLimits.resolve();

      messageLogger.info(
        { requestId: request.requestId, source: request.sourceUri },
        'Received video request',
      );

      await this.processVideo.execute(request, limits);
    } catch (error) {
      messageLogger.error(
        {
          error: errorMessage(error),
          ...(error instanceof VideoProcessingError && {
            code: error.code,
            retryable: error.retryable,
          }),
        },
        'Video request failed',
      );

      // Re-throw so SQS redelivers the message
      throw error;
    }
  }
}
