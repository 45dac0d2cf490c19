import { Module } from '@nestjs/common';
import { SqsModule } from './sqs/sqs.module';
import { S3Module } from './s3/s3.module';
import { SsmModule } from './ssm/ssm.module';

@Module({
  imports: [SqsModule, S3Module, SsmModule],
  exports: [SqsModule, S3Module, SsmModule],
})
export class AwsModule {}
