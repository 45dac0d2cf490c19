import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SqsModule } from '@ssut/nestjs-sqs';
import { SQSClient } from '@aws-sdk/client-sqs';
import { ConfigModule } from './config/config.module';
import { AppConfig } from './config/configuration';
import { SharedModule } from './shared/shared.module';
import { ProcessingModule } from './processing/processing.module';
import { VIDEO_REQUESTS_CONSUMER } from './processing/consumers/video-request.consumer';

/**
 * Application Module
 * SQS-driven worker that turns uploaded videos into frame archives
 * Uses @ssut/nestjs-sqs for consuming messages
 */
@Module({
  imports: [
    ConfigModule,
    SharedModule,

    // One message at a time: a request owns the scratch volume while it runs
    SqsModule.registerAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService<AppConfig, true>) => {
        const awsConfig = configService.get('aws', { infer: true });
        const sqsConfig = configService.get('sqs', { infer: true });

        // Create SQS client with LocalStack support
        const sqsClient = new SQSClient({
          region: awsConfig.region,
          ...(awsConfig.endpoint && { endpoint: awsConfig.endpoint }),
          ...(awsConfig.credentials && { credentials: awsConfig.credentials }),
        });

        return {
          consumers: [
            {
              name: VIDEO_REQUESTS_CONSUMER,
              queueUrl: sqsConfig.videoRequestsUrl,
              region: awsConfig.region,
              sqs: sqsClient,
              batchSize: 1,
              waitTimeSeconds: sqsConfig.waitTimeSeconds,
              visibilityTimeout: sqsConfig.visibilityTimeout,
            },
          ],
          producers: [],
        };
      },
    }),

    ProcessingModule,
  ],
})
export class AppModule {}
