import { Injectable, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SQSClient, SendMessageCommand } from '@aws-sdk/client-sqs';
import { AppConfig } from '../../../config/configuration';
import { SqsSendResult } from '../interfaces/sqs-message.interface';
import { PinoLoggerService } from '../../logging/pino-logger.service';

/**
 * Producer side of SQS. Sends to arbitrary queue URLs, since the
 * notification target travels with each request.
 */
@Injectable()
export class SqsService implements OnModuleDestroy {
  private readonly client: SQSClient;

  constructor(
    private readonly configService: ConfigService<AppConfig, true>,
    private readonly logger: PinoLoggerService,
  ) {
    const awsConfig = this.configService.get('aws', { infer: true });

    this.client = new SQSClient({
      region: awsConfig.region,
      ...(awsConfig.endpoint && { endpoint: awsConfig.endpoint }),
      ...(awsConfig.credentials && { credentials: awsConfig.credentials }),
    });

    this.logger.setContext(SqsService.name);
  }

  async sendMessage<T>(queueUrl: string, body: T): Promise<SqsSendResult> {
    const command = new SendMessageCommand({
      QueueUrl: queueUrl,
      MessageBody: JSON.stringify(body),
    });

    const response = await this.client.send(command);

    this.logger.debug({ queueUrl, messageId: response.MessageId }, 'Message sent');

    return {
      messageId: response.MessageId ?? '',
      sequenceNumber: response.SequenceNumber,
    };
  }

  onModuleDestroy() {
    this.client.destroy();
  }
}
