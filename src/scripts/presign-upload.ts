import 'reflect-metadata';
import { Module } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { ConfigModule } from '../config/config.module';
import { AppConfig } from '../config/configuration';
import { LoggingModule } from '../shared/logging/logging.module';
import { S3Module } from '../shared/aws/s3/s3.module';
import { DEFAULT_UPLOAD_URL_EXPIRY_SECONDS, S3Service } from '../shared/aws/s3/s3.service';

/**
 * Prints a presigned PUT URL for uploading a source video into the input bucket.
 *
 * Usage: npm run presign-upload -- <key> [content-type] [expires-in-seconds]
 */
@Module({
  imports: [ConfigModule, LoggingModule, S3Module],
})
class PresignUploadModule {}

async function main() {
  const [key, contentType = 'video/mp4', expiresIn] = process.argv.slice(2);

  if (!key) {
    console.error('Usage: npm run presign-upload -- <key> [content-type] [expires-in-seconds]');
    process.exit(1);
  }

  const expiresInSeconds = expiresIn ? Number(expiresIn) : DEFAULT_UPLOAD_URL_EXPIRY_SECONDS;
  if (!Number.isInteger(expiresInSeconds) || expiresInSeconds <= 0) {
    console.error(`Invalid expiry: ${expiresIn}`);
    process.exit(1);
  }

  const app = await NestFactory.createApplicationContext(PresignUploadModule, {
    logger: false,
  });

  try {
    const configService = app.get<ConfigService<AppConfig, true>>(ConfigService);
    const s3Service = app.get(S3Service);
    const { inputBucket } = configService.get('s3', { infer: true });

    const url = await s3Service.getSignedUploadUrl(
      inputBucket,
      key,
      contentType,
      expiresInSeconds,
    );

    console.log(url);
  } finally {
    await app.close();
  }
}

main().catch((error) => {
  console.error('Failed to create upload URL:', error);
  process.exit(1);
});
